export { translateToReference } from "./BodyFrameTranslate";
export {
  PoseIntegrator,
  integratePoses,
  integrateStep,
  assertStrictlyIncreasing,
} from "./PoseIntegrator";
export type { FrameProvider } from "./PoseIntegrator";
