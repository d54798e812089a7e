/**
 * TrajectorySession - Cross-validation of one sensor log
 *
 * Wires the sensor-log collaborator, the live fused estimator and a
 * StateRecorder together, and exposes the three trajectories that get
 * compared against each other:
 *
 * - reference: GPS fixes moved to the vehicle reference point
 * - measured:  odometry-only dead reckoning seeded by the first GPS pose
 * - fused:     recorded estimator snapshots
 *
 * plus optional groundtruth. Map and chart rendering live elsewhere; the
 * get*Tracks / get*Series methods return exactly the data they draw.
 */

import { createDiagnosticsOptions } from "@/config/geodesyConfig";
import { InvalidInputError } from "@/core/errors";
import { DiagnosticsLogger } from "@/debug/DiagnosticsLogger";
import { computeEcefToEnuRotation } from "@/geodesy/FrameRotation";
import { ecefToGeodetic } from "@/geodesy/GeodeticTransform";
import { Angle } from "@/math/Angle";
import type { Rotation } from "@/math/Rotation";
import { Vec3 } from "@/math/Vec3";
import { normalizedInnovationSquared } from "@/recording/Innovation";
import { StateRecorder } from "@/recording/StateRecorder";
import { translateToReference } from "@/trajectory/BodyFrameTranslate";
import { integratePoses } from "@/trajectory/PoseIntegrator";
import type {
  BoresightOffset,
  DiagnosticsOptions,
  EstimatorState,
  GroundtruthLog,
  LonLatAlt,
  SensorLog,
  TimeSeries,
  Trajectory,
  Vector3,
} from "@/types";

/** Geodetic tracks ready for a map renderer */
export interface GeodeticTracks {
  /** Mean longitude/latitude/altitude of the first available track */
  readonly center: LonLatAlt;
  readonly groundtruth: LonLatAlt[] | null;
  readonly gps: LonLatAlt[];
  readonly measured: LonLatAlt[];
  /** null until the estimator has been recorded at least once */
  readonly fused: LonLatAlt[] | null;
}

/** ENU tracks in meters, each starting at the origin */
export interface LocalTrajectories {
  /** Geodetic point whose tangent plane is used */
  readonly origin: LonLatAlt;
  readonly groundtruth: Vector3[] | null;
  readonly gps: Vector3[];
  readonly measured: Vector3[];
  readonly fused: Vector3[] | null;
}

/** Unwrapped yaw (radians) over time */
export interface YawSeries {
  readonly groundtruth: TimeSeries<number> | null;
  readonly gps: TimeSeries<number>;
  readonly measured: TimeSeries<number>;
  readonly fused: TimeSeries<number>;
}

const ZERO_BORESIGHT: BoresightOffset = [0, 0, 0];

export class TrajectorySession {
  readonly recorder: StateRecorder;
  private readonly options: DiagnosticsOptions;
  private measured: Trajectory | null = null;

  constructor(
    private readonly log: SensorLog,
    private readonly estimator: EstimatorState,
    options: Partial<DiagnosticsOptions> = {},
    recorder: StateRecorder = new StateRecorder()
  ) {
    this.options = createDiagnosticsOptions(options);
    this.recorder = recorder;
  }

  /**
   * Snapshot the live estimator under `timestamp`.
   */
  recordEstimator(timestamp: number): void {
    this.recorder.record(timestamp, this.estimator);
  }

  // ===========================================================================
  // FUSED
  // ===========================================================================

  getPositions(): Vector3[] {
    return this.recorder.positions();
  }

  getAttitudes(): Rotation[] {
    return this.recorder.attitudes();
  }

  // ===========================================================================
  // MEASURED (odometry only)
  // ===========================================================================

  /**
   * Dead-reckoned trajectory over every log timestamp, seeded with the first
   * GPS pose. Computed once per session.
   */
  getMeasuredTrajectory(): Trajectory {
    if (this.measured === null) {
      const [position] = this.log.getGpsPositions();
      const [attitude] = this.log.getGpsAttitudes();
      if (position === undefined || attitude === undefined) {
        throw new InvalidInputError("sensor log has no GPS pose to seed odometry");
      }
      this.measured = integratePoses(this.log.getTimestamps(0), { position, attitude }, (t) =>
        this.log.getFrameAt(t)
      );
      DiagnosticsLogger.debug("TrajectorySession", "integrated odometry", {
        poses: this.measured.positions.length,
      });
    }
    return this.measured;
  }

  getMeasuredPositions(): Vector3[] {
    return this.getMeasuredTrajectory().positions.map(Vec3.clone);
  }

  getMeasuredAttitudes(): Rotation[] {
    return [...this.getMeasuredTrajectory().attitudes];
  }

  // ===========================================================================
  // REFERENCE POINT TRACKS (ECEF)
  // ===========================================================================

  /** GPS fixes moved to the vehicle reference point */
  getReferenceTrajectory(): Vector3[] {
    return translateToReference(
      this.log.getGpsPositions(),
      this.log.getGpsAttitudes(),
      this.log.tracklogBoresight
    );
  }

  /** Groundtruth moved to the vehicle reference point; null when the log has none */
  getGroundtruthTrajectory(): Vector3[] | null {
    const groundtruth = this.groundtruth();
    if (groundtruth === null) return null;

    return translateToReference(
      groundtruth.POSITION,
      groundtruth.ATTITUDE,
      this.log.groundtruthBoresight ?? ZERO_BORESIGHT
    );
  }

  getMeasuredReferenceTrajectory(): Vector3[] {
    const { positions, attitudes } = this.getMeasuredTrajectory();
    return translateToReference(positions, attitudes, this.log.tracklogBoresight);
  }

  /** null until the estimator has been recorded */
  getFusedReferenceTrajectory(): Vector3[] | null {
    if (this.recorder.size === 0) return null;
    return translateToReference(this.getPositions(), this.getAttitudes(), this.log.tracklogBoresight);
  }

  // ===========================================================================
  // DIAGNOSTIC DATA
  // ===========================================================================

  /**
   * Longitude/latitude/altitude tracks for map export.
   */
  getGeodeticTracks(): GeodeticTracks {
    const groundtruthEcef = this.getGroundtruthTrajectory();
    const fusedEcef = this.getFusedReferenceTrajectory();

    const groundtruth = groundtruthEcef ? ecefToGeodetic(groundtruthEcef) : null;
    const gps = ecefToGeodetic(this.getReferenceTrajectory());

    return {
      center: meanCoordinate(groundtruth ?? gps),
      groundtruth,
      gps,
      measured: ecefToGeodetic(this.getMeasuredReferenceTrajectory()),
      fused: fusedEcef ? ecefToGeodetic(fusedEcef) : null,
    };
  }

  /**
   * Tracks in the East-North-Up plane at the first reference point
   * (groundtruth when available, GPS otherwise). Each track is shifted so
   * that it starts at its own first point.
   */
  getLocalTrajectories(): LocalTrajectories {
    const groundtruth = this.getGroundtruthTrajectory();
    const gps = this.getReferenceTrajectory();

    const first = (groundtruth ?? gps)[0];
    if (first === undefined) {
      throw new InvalidInputError("no reference position to anchor the local frame");
    }
    const origin = ecefToGeodetic(first);
    const enu = computeEcefToEnuRotation(Angle.toRadians(origin[1]), Angle.toRadians(origin[0]), {
      polarWarningLatitudeDeg: this.options.polarWarningLatitudeDeg,
    });

    const local = (track: readonly Vector3[]): Vector3[] => {
      const start = track[0];
      if (start === undefined) return [];
      return track.map((p) => enu.apply(Vec3.subtract(p, start)));
    };
    const fused = this.getFusedReferenceTrajectory();

    return {
      origin,
      groundtruth: groundtruth ? local(groundtruth) : null,
      gps: local(gps),
      measured: local(this.getMeasuredReferenceTrajectory()),
      fused: fused ? local(fused) : null,
    };
  }

  /**
   * Unwrapped yaw over time for every source.
   */
  getYawSeries(): YawSeries {
    const yaw = (attitudes: readonly Rotation[]): number[] =>
      Angle.unwrap(attitudes.map((r) => r.toEuler(this.options.yawEulerOrder)[0]));

    const times = this.log.getTimestamps(0);
    const gpsAttitudes = this.log.getGpsAttitudes();
    if (gpsAttitudes.length !== times.length) {
      throw new InvalidInputError(
        `GPS attitudes (${gpsAttitudes.length}) and timestamps (${times.length}) differ in length`
      );
    }

    const groundtruth = this.groundtruth();
    const measured = this.getMeasuredTrajectory();
    const fused = this.recorder.series((s) => s.attitude);

    return {
      groundtruth: groundtruth ? { times: [...groundtruth.TIME], values: yaw(groundtruth.ATTITUDE) } : null,
      gps: { times: [...times], values: yaw(gpsAttitudes) },
      measured: { times: [...measured.timestamps], values: yaw(measured.attitudes) },
      fused: { times: fused.times, values: yaw(fused.values) },
    };
  }

  /**
   * Joint NIS of every recorded snapshot that carries an innovation.
   */
  getInnovationSeries(confidence = this.options.confidence): TimeSeries<number> {
    const snapshots = this.recorder.snapshots().filter((s) => s.innovation !== null);
    return {
      times: snapshots.map((s) => s.timestamp),
      values: snapshots.map((s) => normalizedInnovationSquared(s, confidence, "joint")),
    };
  }

  /**
   * Per-axis NIS of every recorded snapshot that carries an innovation.
   */
  getPerAxisInnovationSeries(confidence = this.options.confidence): TimeSeries<number[]> {
    const snapshots = this.recorder.snapshots().filter((s) => s.innovation !== null);
    return {
      times: snapshots.map((s) => s.timestamp),
      values: snapshots.map((s) => normalizedInnovationSquared(s, confidence, "per-axis")),
    };
  }

  /**
   * Groundtruth is optional: its absence is a normal branch, not an error.
   */
  private groundtruth(): GroundtruthLog | null {
    if (this.log.groundtruth === undefined) {
      DiagnosticsLogger.debug("TrajectorySession", "sensor log has no groundtruth");
      return null;
    }
    return this.log.groundtruth;
  }
}

function meanCoordinate(coords: readonly LonLatAlt[]): LonLatAlt {
  if (coords.length === 0) {
    throw new InvalidInputError("cannot center a map on an empty track");
  }
  const sum = coords.reduce<Vector3>((acc, c) => Vec3.add(acc, c), Vec3.zero());
  return Vec3.scale(sum, 1 / coords.length);
}
