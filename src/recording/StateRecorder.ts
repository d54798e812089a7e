/**
 * StateRecorder - Timestamp-keyed snapshots of the fused estimator
 *
 * Every record is a deep copy: the live estimator keeps mutating its
 * position, attitude, covariance and innovation between updates and none of
 * that may leak into history.
 *
 * Projections are ordered by ascending timestamp, never by insertion order,
 * so the same set of records always yields the same series.
 */

import { InvalidInputError } from "@/core/errors";
import { toVec3 } from "@/core/shape";
import { DiagnosticsLogger } from "@/debug/DiagnosticsLogger";
import { Matrix } from "@/math/Matrix";
import type { Rotation } from "@/math/Rotation";
import { Vec3 } from "@/math/Vec3";
import type { EstimatorSnapshot, EstimatorState, Innovation, TimeSeries, Vector3 } from "@/types";

/**
 * Deep copy of an estimator state, pinned to `timestamp`.
 */
export function snapshotEstimator(timestamp: number, state: EstimatorState): EstimatorSnapshot {
  return {
    timestamp,
    position: toVec3(state.position, "estimator position"),
    attitude: state.attitude.clone(),
    covariance: state.covariance ? Matrix.clone(state.covariance) : null,
    innovation: state.innovation ? cloneInnovation(state.innovation) : null,
  };
}

function cloneInnovation(innovation: Innovation): Innovation {
  return {
    residual: [...innovation.residual],
    covariance: Matrix.clone(innovation.covariance),
  };
}

/**
 * Key-value store of estimator snapshots.
 */
export class StateRecorder {
  private readonly store: Map<number, EstimatorSnapshot> = new Map();
  /** Sorted view of the keys, rebuilt lazily after a record */
  private sortedKeys: number[] | null = null;

  /**
   * Store an independent copy of `state` under `timestamp`.
   * A later record at the same timestamp replaces the earlier one.
   */
  record(timestamp: number, state: EstimatorState): void {
    if (!Number.isFinite(timestamp)) {
      throw new InvalidInputError(`timestamp must be finite, got ${timestamp}`);
    }
    const replaced = this.store.has(timestamp);
    this.store.set(timestamp, snapshotEstimator(timestamp, state));
    if (!replaced) {
      this.sortedKeys = null;
    }

    DiagnosticsLogger.debug("StateRecorder", replaced ? "replaced snapshot" : "recorded snapshot", {
      timestamp,
      size: this.store.size,
    });
  }

  /** Number of stored snapshots */
  get size(): number {
    return this.store.size;
  }

  has(timestamp: number): boolean {
    return this.store.has(timestamp);
  }

  get(timestamp: number): EstimatorSnapshot | undefined {
    return this.store.get(timestamp);
  }

  /** Stored timestamps, ascending */
  timestamps(): number[] {
    return [...this.keys()];
  }

  /** Stored snapshots, ascending by timestamp */
  snapshots(): EstimatorSnapshot[] {
    return this.keys().flatMap((t) => {
      const snapshot = this.store.get(t);
      return snapshot ? [snapshot] : [];
    });
  }

  /** Fused positions, ascending by timestamp */
  positions(): Vector3[] {
    return this.snapshots().map((s) => Vec3.clone(s.position));
  }

  /** Fused attitudes, ascending by timestamp */
  attitudes(): Rotation[] {
    return this.snapshots().map((s) => s.attitude);
  }

  /**
   * Project every snapshot through `project` into a time series.
   */
  series<T>(project: (snapshot: EstimatorSnapshot) => T): TimeSeries<T> {
    const snapshots = this.snapshots();
    return {
      times: snapshots.map((s) => s.timestamp),
      values: snapshots.map(project),
    };
  }

  clear(): void {
    this.store.clear();
    this.sortedKeys = null;
  }

  private keys(): readonly number[] {
    if (this.sortedKeys === null) {
      this.sortedKeys = [...this.store.keys()].sort((a, b) => a - b);
    }
    return this.sortedKeys;
  }
}
