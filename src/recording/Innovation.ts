/**
 * Normalized innovation squared (NIS)
 *
 * Filter-consistency diagnostic. With residual Z and its predicted
 * covariance S:
 *
 *   joint:    Zᵀ S⁻¹ Z / χ²_p(n)        n = dim Z
 *   per-axis: Z_k² / S_kk / χ²_p(1)
 *
 * Values persistently above 1 mean the filter's predicted uncertainty does
 * not match the observed residuals.
 */

import { DEFAULT_DIAGNOSTICS_OPTIONS } from "@/config/geodesyConfig";
import { InvalidInputError, NumericDegeneracyError } from "@/core/errors";
import { chiSquareQuantile } from "@/math/ChiSquare";
import { Matrix } from "@/math/Matrix";
import type { EstimatorSnapshot, Innovation, NisMode } from "@/types";

export function normalizedInnovationSquared(
  snapshot: Pick<EstimatorSnapshot, "innovation">,
  confidence?: number,
  mode?: "joint"
): number;
export function normalizedInnovationSquared(
  snapshot: Pick<EstimatorSnapshot, "innovation">,
  confidence: number,
  mode: "per-axis"
): number[];
export function normalizedInnovationSquared(
  snapshot: Pick<EstimatorSnapshot, "innovation">,
  confidence?: number,
  mode?: NisMode
): number | number[];
export function normalizedInnovationSquared(
  snapshot: Pick<EstimatorSnapshot, "innovation">,
  confidence: number = DEFAULT_DIAGNOSTICS_OPTIONS.confidence,
  mode: NisMode = "joint"
): number | number[] {
  const innovation = snapshot.innovation;
  if (innovation === null) {
    throw new InvalidInputError("snapshot carries no innovation");
  }
  assertInnovation(innovation);

  if (mode === "per-axis") {
    const critical = chiSquareQuantile(confidence, 1);
    return innovation.residual.map((z, k) => {
      const variance = innovation.covariance[k]?.[k] ?? 0;
      if (!(variance > 0)) {
        throw new NumericDegeneracyError(`innovation variance on axis ${k} must be positive`);
      }
      return (z * z) / variance / critical;
    });
  }

  const critical = chiSquareQuantile(confidence, innovation.residual.length);
  return Matrix.inverseQuadraticForm(innovation.covariance, innovation.residual) / critical;
}

function assertInnovation({ residual, covariance }: Innovation): void {
  if (residual.length === 0) {
    throw new InvalidInputError("innovation residual must not be empty");
  }
  if (!residual.every(Number.isFinite)) {
    throw new InvalidInputError("innovation residual must contain finite numbers");
  }
  Matrix.assertSquare(covariance, residual.length, "innovation covariance");
}
