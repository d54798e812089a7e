/**
 * FrameRotation - ECEF → local East-North-Up rotation
 *
 * The rotation is assembled from the same chain of elementary matrices used
 * for the north-pole-referenced construction:
 *
 *   M = Rlon · Rlat · Fpole
 *   R = P · Mᵀ
 *
 * 1. Rlon  rotates about the polar axis by the longitude
 * 2. Rlat  rotates about the resulting east axis by (90° − colatitude)
 * 3. Fpole diag(-1, -1, 1), flips the north-pole-referenced axes into the
 *          desired handedness
 * 4. P     reorders the North-East-Down-style intermediate axes into ENU
 *
 * Multiplication order matters. The local geodetic normal maps to (0, 0, 1).
 */

import { DEFAULT_DIAGNOSTICS_OPTIONS } from "@/config/geodesyConfig";
import { InvalidInputError, NumericDegeneracyError } from "@/core/errors";
import { isBatch, toVec3, toVec3Batch } from "@/core/shape";
import { DiagnosticsLogger } from "@/debug/DiagnosticsLogger";
import { Angle } from "@/math/Angle";
import { Rotation, type Matrix3Rows } from "@/math/Rotation";
import { Vec3 } from "@/math/Vec3";
import type { Vector3, VectorInput } from "@/types";
import { ecefToGeodetic } from "./GeodeticTransform";

const NORTH_POLE_FLIP: Matrix3Rows = [
  [-1, 0, 0],
  [0, -1, 0],
  [0, 0, 1],
];

const NED_TO_ENU: Matrix3Rows = [
  [0, -1, 0],
  [1, 0, 0],
  [0, 0, 1],
];

export interface EnuRotationOptions {
  /** |latitude| in degrees above which a polar warning is logged */
  polarWarningLatitudeDeg?: number;
}

/**
 * Rotation taking ECEF vectors into East-North-Up coordinates at the given
 * geodetic point.
 *
 * @param latitudeRad Geodetic latitude, strictly inside (−π/2, π/2)
 * @param longitudeRad Longitude, any finite value
 */
export function computeEcefToEnuRotation(
  latitudeRad: number,
  longitudeRad: number,
  options: EnuRotationOptions = {}
): Rotation {
  assertLatitude(latitudeRad, options);

  const sColat = Math.sin(Math.PI / 2 - latitudeRad);
  const cColat = Math.cos(Math.PI / 2 - latitudeRad);
  const latRotation: Matrix3Rows = [
    [cColat, 0, sColat],
    [0, 1, 0],
    [-sColat, 0, cColat],
  ];

  const sLon = Math.sin(longitudeRad);
  const cLon = Math.cos(longitudeRad);
  const lonRotation: Matrix3Rows = [
    [cLon, -sLon, 0],
    [sLon, cLon, 0],
    [0, 0, 1],
  ];

  const chain = multiply(lonRotation, multiply(latRotation, NORTH_POLE_FLIP));
  return Rotation.fromMatrix(multiply(NED_TO_ENU, transpose(chain)));
}

/**
 * Geodetic "up" unit vector (ellipsoid normal) expressed in ECEF.
 */
export function localUpUnitVectorInEcef(latitudeRad: number, longitudeRad: number): Vector3 {
  const cLat = Math.cos(latitudeRad);
  return [cLat * Math.cos(longitudeRad), cLat * Math.sin(longitudeRad), Math.sin(latitudeRad)];
}

/**
 * ENU offsets of ECEF point(s) relative to an ECEF origin, using the tangent
 * plane at the origin's geodetic position.
 */
export function ecefToEnu(position: VectorInput, origin: VectorInput): Vector3;
export function ecefToEnu(positions: readonly VectorInput[], origin: VectorInput): Vector3[];
export function ecefToEnu(
  input: VectorInput | readonly VectorInput[],
  origin: VectorInput
): Vector3 | Vector3[] {
  const o = toVec3(origin, "origin");
  const [lon, lat] = ecefToGeodetic(o);
  const rotation = computeEcefToEnuRotation(Angle.toRadians(lat), Angle.toRadians(lon));

  if (isBatch(input)) {
    return toVec3Batch(input, "position").map((p) => rotation.apply(Vec3.subtract(p, o)));
  }
  return rotation.apply(Vec3.subtract(toVec3(input, "position"), o));
}

function assertLatitude(latitudeRad: number, options: EnuRotationOptions): void {
  if (!Number.isFinite(latitudeRad)) {
    throw new InvalidInputError(`latitude must be finite, got ${latitudeRad}`);
  }
  if (Math.abs(latitudeRad) >= Math.PI / 2) {
    throw new NumericDegeneracyError(
      `latitude ${Angle.toDegrees(latitudeRad)}° is at or beyond a pole; the ENU frame is undefined there`
    );
  }
  const warnAbove = options.polarWarningLatitudeDeg ?? DEFAULT_DIAGNOSTICS_OPTIONS.polarWarningLatitudeDeg;
  if (Math.abs(Angle.toDegrees(latitudeRad)) > warnAbove) {
    DiagnosticsLogger.warn("FrameRotation", "latitude is close to a pole, east/north axes are ill-conditioned", {
      latitudeDeg: Angle.toDegrees(latitudeRad),
      warnAboveDeg: warnAbove,
    });
  }
}

function multiply(a: Matrix3Rows, b: Matrix3Rows): Matrix3Rows {
  const cols = transpose(b);
  const row = (r: Vector3): Vector3 => [Vec3.dot(r, cols[0]), Vec3.dot(r, cols[1]), Vec3.dot(r, cols[2])];
  return [row(a[0]), row(a[1]), row(a[2])];
}

function transpose([r0, r1, r2]: Matrix3Rows): Matrix3Rows {
  return [
    [r0[0], r1[0], r2[0]],
    [r0[1], r1[1], r2[1]],
    [r0[2], r1[2], r2[2]],
  ];
}
