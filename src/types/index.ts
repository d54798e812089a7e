/**
 * Core type definitions for the trajectory cross-validation core
 */

import type { Rotation } from "@/math/Rotation";

export type { Rotation };

// =============================================================================
// MATH TYPES
// =============================================================================

/** 3D vector, meters when it carries an ECEF position (immutable) */
export type Vector3 = readonly [number, number, number];

/**
 * Loosely shaped vector input. Length is checked at run time so that
 * untyped callers get an InvalidInputError instead of silent truncation.
 */
export type VectorInput = readonly number[];

/** Geodetic coordinate: longitude (deg), latitude (deg), altitude (m) */
export type LonLatAlt = readonly [number, number, number];

// =============================================================================
// POSE TYPES
// =============================================================================

/**
 * Relative motion observed between two consecutive sensor frames.
 * Translation is expressed in the frame of the earlier pose.
 */
export interface RigidTransform {
  readonly translation: Vector3;
  readonly rotation: Rotation;
}

/** Lever arm from the vehicle reference point to a sensor, in the sensor body frame */
export type BoresightOffset = Vector3;

/** Absolute position and attitude */
export interface Pose {
  readonly position: Vector3;
  readonly attitude: Rotation;
}

/** Pose pinned to a timestamp (seconds) */
export interface TimedPose extends Pose {
  readonly timestamp: number;
}

/** Positions and attitudes of a trajectory, index-aligned with its timestamps */
export interface Trajectory {
  readonly timestamps: readonly number[];
  readonly positions: readonly Vector3[];
  readonly attitudes: readonly Rotation[];
}

// =============================================================================
// SENSOR TYPES
// =============================================================================

/**
 * Opaque sensor frame. `alignTo` is the frame-to-frame aligner
 * (visual or radar odometry) and returns the motion from `earlier` to this frame.
 */
export interface SensorFrame {
  alignTo(earlier: SensorFrame): RigidTransform;
}

/** Optional groundtruth block of a sensor log */
export interface GroundtruthLog {
  readonly POSITION: readonly Vector3[];
  readonly ATTITUDE: readonly Rotation[];
  readonly TIME: readonly number[];
}

/** Sensor-log collaborator. Parsing and I/O live outside this package. */
export interface SensorLog {
  getGpsPositions(): readonly Vector3[];
  getGpsAttitudes(): readonly Rotation[];
  /** Timestamps in [startIndex, endIndex); open-ended when endIndex is omitted */
  getTimestamps(startIndex?: number, endIndex?: number): readonly number[];
  getFrameAt(timestamp: number): SensorFrame;
  readonly tracklogBoresight: BoresightOffset;
  readonly groundtruth?: GroundtruthLog;
  readonly groundtruthBoresight?: BoresightOffset;
}

// =============================================================================
// ESTIMATOR TYPES
// =============================================================================

/** Innovation of one measurement update: residual Z and its covariance S */
export interface Innovation {
  readonly residual: readonly number[];
  readonly covariance: readonly (readonly number[])[];
}

/**
 * Live state of the fused estimator. Fields are deliberately mutable:
 * the estimator updates them in place between records.
 */
export interface EstimatorState {
  position: Vector3;
  attitude: Rotation;
  covariance?: number[][];
  /** null until the first measurement update */
  innovation: Innovation | null;
}

/** Independent copy of an EstimatorState, owned by a StateRecorder */
export interface EstimatorSnapshot {
  readonly timestamp: number;
  readonly position: Vector3;
  readonly attitude: Rotation;
  readonly covariance: readonly (readonly number[])[] | null;
  readonly innovation: Innovation | null;
}

// =============================================================================
// DIAGNOSTIC TYPES
// =============================================================================

/** Per-axis or joint normalized innovation squared */
export type NisMode = "joint" | "per-axis";

/** Named time series */
export interface TimeSeries<T> {
  readonly times: readonly number[];
  readonly values: readonly T[];
}

/** Options for diagnostic series extraction */
export interface DiagnosticsOptions {
  /** Confidence level for chi-square critical values, in (0, 1) */
  readonly confidence: number;
  /** Latitude (deg) above which ENU construction logs a polar warning */
  readonly polarWarningLatitudeDeg: number;
  /** Extrinsic Euler order whose first angle is reported as yaw */
  readonly yawEulerOrder: EulerOrder;
}

/** Extrinsic Euler axis sequence, lowercase like the usual robotics convention */
export type EulerOrder = "xyz" | "xzy" | "yxz" | "yzx" | "zxy" | "zyx";
