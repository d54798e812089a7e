/**
 * PoseIntegrator - Dead reckoning from frame-to-frame alignments
 *
 * Chains relative rigid transforms into an absolute trajectory anchored at
 * one seed pose:
 *
 *   attitude[i] = attitude[i-1] ∘ rotation[i]
 *   position[i] = position[i-1] + attitude[i-1](translation[i])
 *
 * The increment is composed on the right (it acts in the previous pose's
 * body frame) and the translation is moved into the absolute frame with the
 * PREVIOUS attitude. Index 0 is the seed itself.
 *
 * There is no correction step: every alignment error is carried into all
 * later poses, so drift grows without bound along the sequence.
 *
 * Two entry points share one recurrence:
 * - integratePoses: whole sequence at once
 * - PoseIntegrator: one frame at a time, for streaming callers
 */

import { InvalidInputError, OrderingError } from "@/core/errors";
import { toVec3 } from "@/core/shape";
import { DiagnosticsLogger } from "@/debug/DiagnosticsLogger";
import { Vec3 } from "@/math/Vec3";
import type { Pose, RigidTransform, SensorFrame, TimedPose, Trajectory } from "@/types";

/** Looks up the sensor frame captured at a timestamp */
export type FrameProvider = (timestamp: number) => SensorFrame;

/**
 * One step of the recurrence.
 */
export function integrateStep(previous: Pose, transform: RigidTransform): Pose {
  const translation = toVec3(transform.translation, "translation");
  return {
    position: Vec3.add(previous.position, previous.attitude.apply(translation)),
    attitude: previous.attitude.compose(transform.rotation),
  };
}

/**
 * Throw OrderingError unless every timestamp is strictly greater than the
 * one before it.
 */
export function assertStrictlyIncreasing(timestamps: readonly number[]): void {
  timestamps.forEach((t, i) => {
    if (!Number.isFinite(t)) {
      throw new InvalidInputError(`timestamp[${i}] must be finite, got ${t}`);
    }
    const previous = timestamps[i - 1];
    if (previous !== undefined && !(t > previous)) {
      throw new OrderingError(
        `timestamps must be strictly increasing: t[${i}] = ${t} follows t[${i - 1}] = ${previous}`,
        i
      );
    }
  });
}

/**
 * Streaming dead-reckoning integrator.
 *
 * Seeded with one absolute pose (and optionally the sensor frame captured at
 * the seed time); each push appends one pose.
 */
export class PoseIntegrator {
  private readonly poses: TimedPose[];
  private last: TimedPose;
  private previousFrame: SensorFrame | null;

  constructor(seed: TimedPose, seedFrame: SensorFrame | null = null) {
    if (!Number.isFinite(seed.timestamp)) {
      throw new InvalidInputError(`seed timestamp must be finite, got ${seed.timestamp}`);
    }
    this.last = {
      timestamp: seed.timestamp,
      position: toVec3(seed.position, "seed position"),
      attitude: seed.attitude,
    };
    this.poses = [this.last];
    this.previousFrame = seedFrame;
  }

  /** Number of poses, seed included */
  get length(): number {
    return this.poses.length;
  }

  /** Latest integrated pose */
  get current(): TimedPose {
    return this.last;
  }

  /**
   * Align `frame` to the previously pushed frame and append the resulting pose.
   */
  push(timestamp: number, frame: SensorFrame): TimedPose {
    const earlier = this.previousFrame;
    if (earlier === null) {
      throw new InvalidInputError(
        "no earlier frame to align to; pass the seed frame to the constructor or use pushTransform"
      );
    }
    this.assertNext(timestamp);
    const pose = this.pushTransform(timestamp, frame.alignTo(earlier));
    this.previousFrame = frame;
    return pose;
  }

  /**
   * Append the pose reached by an already computed relative transform.
   */
  pushTransform(timestamp: number, transform: RigidTransform): TimedPose {
    this.assertNext(timestamp);
    const next: TimedPose = { timestamp, ...integrateStep(this.last, transform) };

    this.poses.push(next);
    this.last = next;

    DiagnosticsLogger.debug("PoseIntegrator", "integrated pose", {
      index: this.poses.length - 1,
      timestamp,
      position: next.position,
    });
    return next;
  }

  /**
   * Snapshot of the trajectory so far. Later pushes do not affect it.
   */
  trajectory(): Trajectory {
    return {
      timestamps: this.poses.map((p) => p.timestamp),
      positions: this.poses.map((p) => Vec3.clone(p.position)),
      attitudes: this.poses.map((p) => p.attitude),
    };
  }

  private assertNext(timestamp: number): void {
    if (!Number.isFinite(timestamp)) {
      throw new InvalidInputError(`timestamp must be finite, got ${timestamp}`);
    }
    if (!(timestamp > this.last.timestamp)) {
      throw new OrderingError(
        `timestamps must be strictly increasing: ${timestamp} follows ${this.last.timestamp}`,
        this.poses.length
      );
    }
  }
}

/**
 * Integrate a whole timestamp sequence.
 *
 * The ordering of `timestamps` is checked before any alignment runs. For
 * i = 1..N-1 the aligner is invoked as
 *   frameAt(t[i]).alignTo(frameAt(t[i-1]))
 *
 * @param seed Absolute pose at t[0], e.g. from GPS
 */
export function integratePoses(
  timestamps: readonly number[],
  seed: Pose,
  frameAt: FrameProvider
): Trajectory {
  assertStrictlyIncreasing(timestamps);

  const [first, ...rest] = timestamps;
  if (first === undefined) {
    return {
      timestamps: [],
      positions: [toVec3(seed.position, "seed position")],
      attitudes: [seed.attitude],
    };
  }
  if (rest.length === 0) {
    return new PoseIntegrator({ ...seed, timestamp: first }).trajectory();
  }

  const integrator = new PoseIntegrator({ ...seed, timestamp: first }, frameAt(first));
  for (const t of rest) {
    integrator.push(t, frameAt(t));
  }
  return integrator.trajectory();
}
