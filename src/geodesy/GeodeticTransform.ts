/**
 * GeodeticTransform - ECEF ⇄ geodetic conversion on the WGS84 ellipsoid
 *
 * Geodetic coordinates are [longitude°, latitude°, altitude m] in that order.
 * Both directions accept one 3-vector or an N×3 batch and return the same
 * shape.
 *
 * ECEF → geodetic uses Bowring's iteration on the parametric latitude, which
 * converges to machine precision in a handful of steps for any point outside
 * the Earth's core; altitude is taken from the numerically stable form
 *   h = p·cos φ + z·sin φ − a·√(1 − e²·sin² φ)
 */

import { WGS84 } from "@/config/geodesyConfig";
import { isBatch, toVec3, toVec3Batch } from "@/core/shape";
import { Angle } from "@/math/Angle";
import type { LonLatAlt, Vector3, VectorInput } from "@/types";

const MAX_ITERATIONS = 10;
const CONVERGENCE_RAD = 1e-15;

/**
 * Convert ECEF position(s) in meters to geodetic coordinates.
 */
export function ecefToGeodetic(position: VectorInput): LonLatAlt;
export function ecefToGeodetic(positions: readonly VectorInput[]): LonLatAlt[];
export function ecefToGeodetic(
  input: VectorInput | readonly VectorInput[]
): LonLatAlt | LonLatAlt[] {
  if (isBatch(input)) {
    return toVec3Batch(input, "position").map(ecefPointToGeodetic);
  }
  return ecefPointToGeodetic(toVec3(input, "position"));
}

/**
 * Convert geodetic coordinate(s) to ECEF positions in meters.
 */
export function geodeticToEcef(coord: VectorInput): Vector3;
export function geodeticToEcef(coords: readonly VectorInput[]): Vector3[];
export function geodeticToEcef(
  input: VectorInput | readonly VectorInput[]
): Vector3 | Vector3[] {
  if (isBatch(input)) {
    return toVec3Batch(input, "coordinate").map(geodeticPointToEcef);
  }
  return geodeticPointToEcef(toVec3(input, "coordinate"));
}

/**
 * Prime vertical radius of curvature N(φ).
 */
export function primeVerticalRadius(latitudeRad: number): number {
  const s = Math.sin(latitudeRad);
  return WGS84.semiMajorAxis / Math.sqrt(1 - WGS84.eccentricitySquared * s * s);
}

function ecefPointToGeodetic([x, y, z]: Vector3): LonLatAlt {
  const { semiMajorAxis: a, semiMinorAxis: b, flattening: f } = WGS84;
  const e2 = WGS84.eccentricitySquared;
  const ep2 = WGS84.secondEccentricitySquared;

  const p = Math.hypot(x, y);
  const longitude = Angle.toDegrees(Math.atan2(y, x));

  if (p === 0) {
    // On the polar axis; longitude is arbitrary and atan2 gives 0
    const latitude = z >= 0 ? 90 : -90;
    return [longitude, latitude, Math.abs(z) - b];
  }

  let beta = Math.atan2(z, (1 - f) * p);
  let latitude = 0;
  for (let i = 0; i < MAX_ITERATIONS; i++) {
    const sb = Math.sin(beta);
    const cb = Math.cos(beta);
    const next = Math.atan2(z + ep2 * b * sb * sb * sb, p - e2 * a * cb * cb * cb);
    const converged = i > 0 && Math.abs(next - latitude) < CONVERGENCE_RAD;
    latitude = next;
    if (converged) break;
    beta = Math.atan2((1 - f) * Math.sin(latitude), Math.cos(latitude));
  }

  const sl = Math.sin(latitude);
  const altitude = p * Math.cos(latitude) + z * sl - a * Math.sqrt(1 - e2 * sl * sl);

  return [longitude, Angle.toDegrees(latitude), altitude];
}

function geodeticPointToEcef([longitudeDeg, latitudeDeg, altitude]: LonLatAlt): Vector3 {
  const lat = Angle.toRadians(latitudeDeg);
  const lon = Angle.toRadians(longitudeDeg);
  const n = primeVerticalRadius(lat);
  const cosLat = Math.cos(lat);

  return [
    (n + altitude) * cosLat * Math.cos(lon),
    (n + altitude) * cosLat * Math.sin(lon),
    (n * (1 - WGS84.eccentricitySquared) + altitude) * Math.sin(lat),
  ];
}
