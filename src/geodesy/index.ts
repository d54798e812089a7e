export { ecefToGeodetic, geodeticToEcef, primeVerticalRadius } from "./GeodeticTransform";
export { computeEcefToEnuRotation, localUpUnitVectorInEcef, ecefToEnu } from "./FrameRotation";
export type { EnuRotationOptions } from "./FrameRotation";
