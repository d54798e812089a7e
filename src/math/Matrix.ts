import { InvalidInputError, NumericDegeneracyError } from "@/core/errors";

/** Dense row-major matrix */
export type MatrixRows = readonly (readonly number[])[];

/**
 * Matrix - Small dense linear algebra for innovation statistics
 */
export const Matrix = {
  /**
   * Check that `m` is n×n with finite entries.
   */
  assertSquare(m: MatrixRows, n: number, label = "matrix"): void {
    if (m.length !== n || m.some((row) => row.length !== n)) {
      throw new InvalidInputError(`${label} must be ${n}×${n}`);
    }
    if (m.some((row) => !row.every(Number.isFinite))) {
      throw new InvalidInputError(`${label} must contain finite numbers`);
    }
  },

  /** Deep copy */
  clone(m: MatrixRows): number[][] {
    return m.map((row) => [...row]);
  },

  /**
   * Solve A x = b by Gaussian elimination with partial pivoting.
   *
   * Throws NumericDegeneracyError when a pivot vanishes relative to the
   * largest entry of A.
   */
  solve(a: MatrixRows, b: readonly number[]): number[] {
    const n = b.length;
    Matrix.assertSquare(a, n);

    // Augmented working copy [A | b]
    const rows = a.map((row, i) => [...row, b[i] ?? 0]);
    const scale = Math.max(0, ...a.flatMap((row) => row.map(Math.abs)));
    const eps = Number.EPSILON * n * scale;

    for (let col = 0; col < n; col++) {
      let pivotRow = col;
      for (let r = col + 1; r < n; r++) {
        if (Math.abs(at(rows, r, col)) > Math.abs(at(rows, pivotRow, col))) pivotRow = r;
      }
      const pivot = at(rows, pivotRow, col);
      if (scale === 0 || Math.abs(pivot) <= eps) {
        throw new NumericDegeneracyError("matrix is singular");
      }
      const current = rowAt(rows, col);
      rows[col] = rowAt(rows, pivotRow);
      rows[pivotRow] = current;

      const pivotValues = rowAt(rows, col);
      for (let r = col + 1; r < n; r++) {
        const row = rowAt(rows, r);
        const factor = at(rows, r, col) / pivot;
        if (factor === 0) continue;
        for (let c = col; c <= n; c++) {
          row[c] = at(rows, r, c) - factor * (pivotValues[c] ?? 0);
        }
      }
    }

    // Back substitution
    const x = new Array<number>(n).fill(0);
    for (let r = n - 1; r >= 0; r--) {
      let sum = at(rows, r, n);
      for (let c = r + 1; c < n; c++) {
        sum -= at(rows, r, c) * (x[c] ?? 0);
      }
      x[r] = sum / at(rows, r, r);
    }
    return x;
  },

  /**
   * Quadratic form vᵀ A⁻¹ v without forming the inverse.
   */
  inverseQuadraticForm(a: MatrixRows, v: readonly number[]): number {
    const x = Matrix.solve(a, v);
    return v.reduce((sum, vi, i) => sum + vi * (x[i] ?? 0), 0);
  },
};

function rowAt(rows: number[][], r: number): number[] {
  const row = rows[r];
  if (!row) throw new InvalidInputError(`row ${r} out of bounds`);
  return row;
}

function at(rows: number[][], r: number, c: number): number {
  return rowAt(rows, r)[c] ?? 0;
}
