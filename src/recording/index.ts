export { StateRecorder, snapshotEstimator } from "./StateRecorder";
export { normalizedInnovationSquared } from "./Innovation";
