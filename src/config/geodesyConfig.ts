import { InvalidInputError } from "@/core/errors";
import type { DiagnosticsOptions } from "@/types";

/**
 * WGS84 reference ellipsoid
 */
export const WGS84 = (() => {
  const semiMajorAxis = 6378137.0;
  const inverseFlattening = 298.257223563;
  const flattening = 1 / inverseFlattening;
  const semiMinorAxis = semiMajorAxis * (1 - flattening);
  const eccentricitySquared = flattening * (2 - flattening);
  return {
    semiMajorAxis,
    inverseFlattening,
    flattening,
    semiMinorAxis,
    eccentricitySquared,
    /** e'² = (a² - b²) / b² */
    secondEccentricitySquared: eccentricitySquared / (1 - eccentricitySquared),
  } as const;
})();

/**
 * Default diagnostic options
 */
export const DEFAULT_DIAGNOSTICS_OPTIONS: DiagnosticsOptions = {
  confidence: 0.99,
  polarWarningLatitudeDeg: 89.9,
  /**
   * First angle of the extrinsic z-x-y sequence is the heading about the
   * local vertical for a vehicle whose body y axis points forward.
   */
  yawEulerOrder: "zxy",
};

/**
 * Merge caller overrides into the defaults and check their domains.
 */
export function createDiagnosticsOptions(
  options: Partial<DiagnosticsOptions> = {}
): DiagnosticsOptions {
  const opts = { ...DEFAULT_DIAGNOSTICS_OPTIONS, ...options };

  if (!(opts.confidence > 0 && opts.confidence < 1)) {
    throw new InvalidInputError(`confidence must be in (0, 1), got ${opts.confidence}`);
  }
  if (!(opts.polarWarningLatitudeDeg > 0 && opts.polarWarningLatitudeDeg <= 90)) {
    throw new InvalidInputError(
      `polarWarningLatitudeDeg must be in (0, 90], got ${opts.polarWarningLatitudeDeg}`
    );
  }

  return opts;
}
