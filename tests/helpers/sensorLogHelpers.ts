/**
 * Test helpers for scripted sensor frames and in-memory sensor logs.
 *
 * Frames return predetermined relative transforms instead of running an
 * image or radar aligner, and record every alignTo call so tests can check
 * which pairs were aligned and in what order.
 */

import { Rotation } from "@/math/Rotation";
import type {
  BoresightOffset,
  GroundtruthLog,
  RigidTransform,
  SensorFrame,
  SensorLog,
  Vector3,
} from "@/types";

export interface ScriptedFrames {
  frameAt: (timestamp: number) => SensorFrame;
  /** [timestamp of aligned frame, timestamp of earlier frame] per alignTo call */
  calls: Array<[number, number]>;
}

/**
 * Frames whose alignment from timestamps[i-1] to timestamps[i] is steps[i-1].
 */
export function createScriptedFrames(
  timestamps: readonly number[],
  steps: readonly RigidTransform[]
): ScriptedFrames {
  const calls: Array<[number, number]> = [];
  const frames = new Map<number, SensorFrame>();
  const timestampOf = new Map<SensorFrame, number>();

  const frameAt = (timestamp: number): SensorFrame => {
    const existing = frames.get(timestamp);
    if (existing) return existing;

    const frame: SensorFrame = {
      alignTo(earlier: SensorFrame): RigidTransform {
        const earlierTimestamp = timestampOf.get(earlier) ?? Number.NaN;
        calls.push([timestamp, earlierTimestamp]);
        const step = steps[timestamps.indexOf(timestamp) - 1];
        if (!step) throw new Error(`no scripted step for t=${timestamp}`);
        return step;
      },
    };
    frames.set(timestamp, frame);
    timestampOf.set(frame, timestamp);
    return frame;
  };

  return { frameAt, calls };
}

/**
 * Relative transform shorthand.
 */
export function step(translation: Vector3, rotation: Rotation = Rotation.identity()): RigidTransform {
  return { translation, rotation };
}

export interface FakeSensorLogOptions {
  timestamps: readonly number[];
  gpsPositions: readonly Vector3[];
  gpsAttitudes?: readonly Rotation[];
  steps?: readonly RigidTransform[];
  tracklogBoresight?: BoresightOffset;
  groundtruth?: GroundtruthLog;
  groundtruthBoresight?: BoresightOffset;
}

export interface FakeSensorLog extends SensorLog {
  calls: Array<[number, number]>;
}

/**
 * In-memory SensorLog.
 */
export function createFakeSensorLog(options: FakeSensorLogOptions): FakeSensorLog {
  const {
    timestamps,
    gpsPositions,
    gpsAttitudes = gpsPositions.map(() => Rotation.identity()),
    steps = timestamps.slice(1).map(() => step([0, 0, 0])),
    tracklogBoresight = [0, 0, 0],
  } = options;
  const frames = createScriptedFrames(timestamps, steps);

  return {
    calls: frames.calls,
    tracklogBoresight,
    groundtruth: options.groundtruth,
    groundtruthBoresight: options.groundtruthBoresight,
    getGpsPositions: () => gpsPositions,
    getGpsAttitudes: () => gpsAttitudes,
    getTimestamps: (startIndex = 0, endIndex?: number) => timestamps.slice(startIndex, endIndex),
    getFrameAt: frames.frameAt,
  };
}
