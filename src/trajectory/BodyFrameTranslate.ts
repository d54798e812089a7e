/**
 * BodyFrameTranslate - Sensor position → vehicle reference-point position
 *
 * For each (position, attitude) pair:
 *
 *   reference = attitude⁻¹( attitude(position) − boresight )
 *
 * The position is rotated into the body frame, the lever arm is removed
 * there, and the result is rotated back, i.e. position − attitude⁻¹(boresight).
 */

import { InvalidInputError } from "@/core/errors";
import { isBatch, toVec3, toVec3Batch } from "@/core/shape";
import type { Rotation } from "@/math/Rotation";
import { Vec3 } from "@/math/Vec3";
import type { BoresightOffset, Vector3, VectorInput } from "@/types";

/**
 * Remove a fixed mounting offset from sensor-reported positions.
 *
 * Accepts one (position, attitude) pair or parallel sequences of equal
 * length; the output mirrors the input shape. A zero boresight returns the
 * positions unchanged (as copies).
 */
export function translateToReference(
  position: VectorInput,
  attitude: Rotation,
  boresight: BoresightOffset
): Vector3;
export function translateToReference(
  positions: readonly VectorInput[],
  attitudes: readonly Rotation[],
  boresight: BoresightOffset
): Vector3[];
export function translateToReference(
  positions: VectorInput | readonly VectorInput[],
  attitudes: Rotation | readonly Rotation[],
  boresight: BoresightOffset
): Vector3 | Vector3[] {
  const offset = toVec3(boresight, "boresight");

  if (isBatch(positions)) {
    if (!isRotationList(attitudes)) {
      throw new InvalidInputError("a batch of positions needs a sequence of attitudes");
    }
    if (attitudes.length !== positions.length) {
      throw new InvalidInputError(
        `positions and attitudes must have equal length, got ${positions.length} and ${attitudes.length}`
      );
    }
    const points = toVec3Batch(positions, "position");
    return points.map((p, i) => {
      const attitude = attitudes[i];
      if (!attitude) throw new InvalidInputError(`missing attitude at index ${i}`);
      return translatePoint(p, attitude, offset);
    });
  }

  if (isRotationList(attitudes)) {
    throw new InvalidInputError("a single position needs a single attitude");
  }
  return translatePoint(toVec3(positions, "position"), attitudes, offset);
}

function translatePoint(position: Vector3, attitude: Rotation, boresight: Vector3): Vector3 {
  if (Vec3.isZero(boresight)) {
    return Vec3.clone(position);
  }
  const body = attitude.apply(position);
  return attitude.applyInverse(Vec3.subtract(body, boresight));
}

function isRotationList(value: Rotation | readonly Rotation[]): value is readonly Rotation[] {
  return Array.isArray(value);
}
