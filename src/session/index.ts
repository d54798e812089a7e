export { TrajectorySession } from "./TrajectorySession";
export type { GeodeticTracks, LocalTrajectories, YawSeries } from "./TrajectorySession";
