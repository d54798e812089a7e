/**
 * Shape helpers for operations that take either one 3-vector or a batch.
 *
 * A batch is any array whose first element is itself an array. An empty array
 * is an empty batch. Nothing is truncated or padded: any other shape throws.
 */

import type { Vector3, VectorInput } from "@/types";
import { InvalidInputError } from "./errors";

/** Single 3-vector or N×3 batch */
export type VectorOrBatch = VectorInput | readonly VectorInput[];

export function isBatch(input: VectorOrBatch): input is readonly VectorInput[] {
  return input.length === 0 || Array.isArray(input[0]);
}

/**
 * Validate a 3-vector and return it as a fresh tuple.
 * @param label Name used in the error message
 */
export function toVec3(value: unknown, label = "vector"): Vector3 {
  if (!Array.isArray(value)) {
    throw new InvalidInputError(`${label} must be an array of 3 numbers`);
  }
  if (value.length !== 3) {
    throw new InvalidInputError(`${label} must have length 3, got ${value.length}`);
  }
  const [x, y, z]: unknown[] = value;
  if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(z)) {
    throw new InvalidInputError(`${label} must contain finite numbers`);
  }
  return [x, y, z];
}

/**
 * Validate an N×3 batch. The row index is reported on failure.
 */
export function toVec3Batch(rows: readonly unknown[], label = "vector"): Vector3[] {
  return rows.map((row, i) => toVec3(row, `${label}[${i}]`));
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}
