/**
 * Trajectory cross-validation core
 *
 * Layers, leaves first:
 * - math:       Vec3, Rotation, chi-square, small linear algebra
 * - geodesy:    ECEF ⇄ geodetic, ECEF → ENU
 * - trajectory: boresight removal, dead reckoning
 * - recording:  estimator snapshots, innovation statistics
 * - session:    sensor log + estimator + recorder, diagnostic series
 */

export * from "./types";

export { Vec3 } from "./math/Vec3";
export { Rotation } from "./math/Rotation";
export type { QuaternionTuple, Matrix3Rows } from "./math/Rotation";
export { Angle } from "./math/Angle";
export { Matrix } from "./math/Matrix";
export { chiSquareCdf, chiSquareQuantile } from "./math/ChiSquare";

export {
  TrajectoryError,
  InvalidInputError,
  OrderingError,
  NumericDegeneracyError,
  isTrajectoryError,
} from "./core/errors";
export type { TrajectoryErrorKind } from "./core/errors";

export { WGS84, DEFAULT_DIAGNOSTICS_OPTIONS, createDiagnosticsOptions } from "./config/geodesyConfig";
export { DiagnosticsLogger } from "./debug/DiagnosticsLogger";
export type { DiagnosticsLogEntry, DiagnosticsLevel } from "./debug/DiagnosticsLogger";

export * from "./geodesy";
export * from "./trajectory";
export * from "./recording";
export * from "./session";
