/**
 * Chi-square distribution
 *
 * CDF through the regularized lower incomplete gamma function
 * P(k/2, x/2). The quantile is found by bracketing and bisection.
 */

import { InvalidInputError } from "@/core/errors";

const MAX_ITERATIONS = 500;
const SERIES_EPS = 1e-16;
const TINY = 1e-300;

// Lanczos approximation, g = 7, n = 9
const LANCZOS_G = 7;
const LANCZOS_COEFFICIENTS = [
  0.99999999999980993, 676.5203681218851, -1259.1392167224028, 771.32342877765313,
  -176.61502916214059, 12.507343278686905, -0.13857109526572012, 9.9843695780195716e-6,
  1.5056327351493116e-7,
] as const;

/**
 * Natural log of the gamma function for x > 0.
 */
export function logGamma(x: number): number {
  if (x < 0.5) {
    // Reflection formula
    return Math.log(Math.PI / Math.sin(Math.PI * x)) - logGamma(1 - x);
  }
  const z = x - 1;
  let sum: number = LANCZOS_COEFFICIENTS[0];
  for (let i = 1; i < LANCZOS_COEFFICIENTS.length; i++) {
    sum += (LANCZOS_COEFFICIENTS[i] ?? 0) / (z + i);
  }
  const t = z + LANCZOS_G + 0.5;
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(sum);
}

/**
 * Regularized lower incomplete gamma P(a, x).
 */
export function regularizedLowerGamma(a: number, x: number): number {
  if (x <= 0) return 0;
  if (x < a + 1) {
    return gammaSeries(a, x);
  }
  return 1 - gammaContinuedFraction(a, x);
}

function gammaSeries(a: number, x: number): number {
  let term = 1 / a;
  let sum = term;
  let ap = a;
  for (let i = 0; i < MAX_ITERATIONS; i++) {
    ap += 1;
    term *= x / ap;
    sum += term;
    if (Math.abs(term) < Math.abs(sum) * SERIES_EPS) break;
  }
  return sum * Math.exp(-x + a * Math.log(x) - logGamma(a));
}

/** Upper tail Q(a, x) by Lentz's continued fraction */
function gammaContinuedFraction(a: number, x: number): number {
  let b = x + 1 - a;
  let c = 1 / TINY;
  let d = 1 / b;
  let h = d;
  for (let i = 1; i < MAX_ITERATIONS; i++) {
    const an = -i * (i - a);
    b += 2;
    d = an * d + b;
    if (Math.abs(d) < TINY) d = TINY;
    c = b + an / c;
    if (Math.abs(c) < TINY) c = TINY;
    d = 1 / d;
    const delta = d * c;
    h *= delta;
    if (Math.abs(delta - 1) < SERIES_EPS) break;
  }
  return Math.exp(-x + a * Math.log(x) - logGamma(a)) * h;
}

/**
 * P(X ≤ x) for X ~ χ²(dof).
 */
export function chiSquareCdf(x: number, dof: number): number {
  assertDegreesOfFreedom(dof);
  return regularizedLowerGamma(dof / 2, x / 2);
}

/**
 * Critical value x such that P(X ≤ x) = p for X ~ χ²(dof).
 */
export function chiSquareQuantile(p: number, dof: number): number {
  assertDegreesOfFreedom(dof);
  if (!(p > 0 && p < 1)) {
    throw new InvalidInputError(`probability must be in (0, 1), got ${p}`);
  }

  let lo = 0;
  let hi = Math.max(1, dof);
  while (chiSquareCdf(hi, dof) < p) {
    lo = hi;
    hi *= 2;
  }

  for (let i = 0; i < MAX_ITERATIONS && hi - lo > 1e-13 * hi; i++) {
    const mid = (lo + hi) / 2;
    if (chiSquareCdf(mid, dof) < p) {
      lo = mid;
    } else {
      hi = mid;
    }
  }
  return (lo + hi) / 2;
}

function assertDegreesOfFreedom(dof: number): void {
  if (!Number.isInteger(dof) || dof < 1) {
    throw new InvalidInputError(`degrees of freedom must be a positive integer, got ${dof}`);
  }
}
