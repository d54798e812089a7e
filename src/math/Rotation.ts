/**
 * Rotation - Opaque orientation value
 *
 * Callers only see the Rotation interface. The backing representation is a
 * unit quaternion from three.js; no instance is ever mutated after
 * construction, so composing or inverting always yields a new value.
 *
 * Composition convention:
 *   a.compose(b).apply(v) === a.apply(b.apply(v))
 * i.e. `b` acts first. This is the `a * b` product of the usual rotation
 * libraries.
 */

import * as THREE from "three";
import { InvalidInputError } from "@/core/errors";
import type { EulerOrder, Vector3 } from "@/types";
import { toVec3 } from "@/core/shape";
import { Vec3 } from "./Vec3";

/** Quaternion as [x, y, z, w] (scalar last) */
export type QuaternionTuple = readonly [number, number, number, number];

/** Row-major 3×3 matrix */
export type Matrix3Rows = readonly [Vector3, Vector3, Vector3];

export interface Rotation {
  /** Rotate a vector */
  apply(v: Vector3): Vector3;
  /** Rotate a vector by the inverse rotation */
  applyInverse(v: Vector3): Vector3;
  /** this ∘ other: `other` acts first */
  compose(other: Rotation): Rotation;
  invert(): Rotation;
  /**
   * Extrinsic Euler angles (radians) for the given axis sequence, one angle
   * per axis in the order the axes are named.
   */
  toEuler(order: EulerOrder): Vector3;
  toQuaternion(): QuaternionTuple;
  toMatrix(): Matrix3Rows;
  /** Rotation angle in radians, in [0, π] */
  magnitude(): number;
  /** Angle of the rotation taking this one to `other` */
  angleTo(other: Rotation): number;
  equals(other: Rotation, tolerance?: number): boolean;
  clone(): Rotation;
}

/** Tolerance on orthonormality when building from a matrix */
const MATRIX_TOLERANCE = 1e-6;

/**
 * Quaternion-backed Rotation.
 */
class QuaternionRotation implements Rotation {
  private readonly q: THREE.Quaternion;

  /** Takes ownership of `q`; callers must pass a fresh, normalized quaternion */
  constructor(q: THREE.Quaternion) {
    this.q = q;
  }

  apply(v: Vector3): Vector3 {
    const r = new THREE.Vector3(v[0], v[1], v[2]).applyQuaternion(this.q);
    return [r.x, r.y, r.z];
  }

  applyInverse(v: Vector3): Vector3 {
    const r = new THREE.Vector3(v[0], v[1], v[2]).applyQuaternion(this.q.clone().invert());
    return [r.x, r.y, r.z];
  }

  compose(other: Rotation): Rotation {
    return new QuaternionRotation(new THREE.Quaternion().multiplyQuaternions(this.q, toThree(other)));
  }

  invert(): Rotation {
    return new QuaternionRotation(this.q.clone().invert());
  }

  toEuler(order: EulerOrder): Vector3 {
    const { three, axes } = EULER_ORDERS[order];
    const euler = new THREE.Euler().setFromQuaternion(this.q, three);
    return [euler[axes[0]], euler[axes[1]], euler[axes[2]]];
  }

  toQuaternion(): QuaternionTuple {
    return [this.q.x, this.q.y, this.q.z, this.q.w];
  }

  toMatrix(): Matrix3Rows {
    const cx = this.apply([1, 0, 0]);
    const cy = this.apply([0, 1, 0]);
    const cz = this.apply([0, 0, 1]);
    return [
      [cx[0], cy[0], cz[0]],
      [cx[1], cy[1], cz[1]],
      [cx[2], cy[2], cz[2]],
    ];
  }

  magnitude(): number {
    const { x, y, z, w } = this.q;
    return 2 * Math.atan2(Math.hypot(x, y, z), Math.abs(w));
  }

  angleTo(other: Rotation): number {
    return this.invert().compose(other).magnitude();
  }

  equals(other: Rotation, tolerance = 1e-9): boolean {
    return this.angleTo(other) <= tolerance;
  }

  clone(): Rotation {
    return new QuaternionRotation(this.q.clone());
  }
}

type Axis = "x" | "y" | "z";

/**
 * Extrinsic "abc" is the same rotation as three.js intrinsic order "CBA".
 */
const EULER_ORDERS: Record<EulerOrder, { three: THREE.EulerOrder; axes: readonly [Axis, Axis, Axis] }> = {
  xyz: { three: "ZYX", axes: ["x", "y", "z"] },
  xzy: { three: "YZX", axes: ["x", "z", "y"] },
  yxz: { three: "ZXY", axes: ["y", "x", "z"] },
  yzx: { three: "XZY", axes: ["y", "z", "x"] },
  zxy: { three: "YXZ", axes: ["z", "x", "y"] },
  zyx: { three: "XYZ", axes: ["z", "y", "x"] },
};

function toThree(rotation: Rotation): THREE.Quaternion {
  const [x, y, z, w] = rotation.toQuaternion();
  return new THREE.Quaternion(x, y, z, w);
}

/**
 * Rotation factories
 */
export const Rotation = {
  identity(): Rotation {
    return new QuaternionRotation(new THREE.Quaternion());
  },

  /**
   * From a quaternion [x, y, z, w]; normalized on the way in.
   */
  fromQuaternion(q: readonly number[]): Rotation {
    if (q.length !== 4 || !q.every(Number.isFinite)) {
      throw new InvalidInputError("quaternion must be 4 finite numbers [x, y, z, w]");
    }
    const [x = 0, y = 0, z = 0, w = 0] = q;
    const norm = Math.hypot(x, y, z, w);
    if (norm === 0) {
      throw new InvalidInputError("quaternion must be non-zero");
    }
    return new QuaternionRotation(new THREE.Quaternion(x / norm, y / norm, z / norm, w / norm));
  },

  /**
   * Rotation of `angle` radians about `axis` (right-hand rule).
   */
  fromAxisAngle(axis: Vector3, angle: number): Rotation {
    const a = toVec3(axis, "axis");
    const len = Math.hypot(a[0], a[1], a[2]);
    if (len === 0 || !Number.isFinite(angle)) {
      throw new InvalidInputError("axis must be non-zero and angle finite");
    }
    const q = new THREE.Quaternion().setFromAxisAngle(
      new THREE.Vector3(a[0] / len, a[1] / len, a[2] / len),
      angle
    );
    return new QuaternionRotation(q);
  },

  /**
   * From a row-major direction cosine matrix. The matrix must be a proper
   * rotation (orthonormal, determinant +1).
   */
  fromMatrix(rows: readonly (readonly number[])[]): Rotation {
    if (rows.length !== 3) {
      throw new InvalidInputError(`rotation matrix must be 3×3, got ${rows.length} rows`);
    }
    const [r0, r1, r2] = rows.map((row, i) => toVec3(row, `matrix row ${i}`));
    if (!r0 || !r1 || !r2) {
      throw new InvalidInputError("rotation matrix must be 3×3");
    }
    assertProperRotation([r0, r1, r2]);

    // prettier-ignore
    const m = new THREE.Matrix4().set(
      r0[0], r0[1], r0[2], 0,
      r1[0], r1[1], r1[2], 0,
      r2[0], r2[1], r2[2], 0,
      0, 0, 0, 1
    );
    return new QuaternionRotation(new THREE.Quaternion().setFromRotationMatrix(m).normalize());
  },
};

function assertProperRotation([a, b, c]: Matrix3Rows): void {
  const gram: readonly [Vector3, Vector3, number][] = [
    [a, a, 1],
    [b, b, 1],
    [c, c, 1],
    [a, b, 0],
    [a, c, 0],
    [b, c, 0],
  ];
  for (const [u, v, expected] of gram) {
    if (Math.abs(Vec3.dot(u, v) - expected) > MATRIX_TOLERANCE) {
      throw new InvalidInputError("rotation matrix is not orthonormal");
    }
  }
  const det = Vec3.dot(a, Vec3.cross(b, c));
  if (Math.abs(det - 1) > MATRIX_TOLERANCE) {
    throw new InvalidInputError(`rotation matrix must have determinant +1, got ${det}`);
  }
}
