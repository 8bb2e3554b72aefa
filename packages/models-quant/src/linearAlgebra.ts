export type Matrix = number[][];

const PIVOT_EPSILON = 1e-8;

export const transpose = (matrix: Matrix): Matrix => {
  const rows = matrix.length;
  const cols = rows === 0 ? 0 : matrix[0].length;
  const result: Matrix = Array.from({ length: cols }, () => new Array<number>(rows).fill(0));

  for (let i = 0; i < rows; i += 1) {
    for (let j = 0; j < cols; j += 1) {
      result[j][i] = matrix[i][j];
    }
  }

  return result;
};

export const multiply = (a: Matrix, b: Matrix): Matrix => {
  if (a.length === 0 || b.length === 0) {
    return [];
  }

  const aCols = a[0].length;
  if (aCols !== b.length) {
    throw new Error(`Matrix dimensions mismatch: ${a.length}x${aCols} by ${b.length}x${b[0].length}`);
  }

  const bCols = b[0].length;
  const result: Matrix = Array.from({ length: a.length }, () => new Array<number>(bCols).fill(0));

  for (let i = 0; i < a.length; i += 1) {
    for (let k = 0; k < aCols; k += 1) {
      const left = a[i][k];
      if (left === 0) {
        continue;
      }
      for (let j = 0; j < bCols; j += 1) {
        result[i][j] += left * b[k][j];
      }
    }
  }

  return result;
};

export const multiplyVector = (matrix: Matrix, vector: readonly number[]): number[] => {
  if (matrix.length === 0) {
    return [];
  }

  if (matrix[0].length !== vector.length) {
    throw new Error(`Matrix/vector dimension mismatch: ${matrix[0].length} vs ${vector.length}`);
  }

  return matrix.map((row) => dot(row, vector));
};

export const dot = (a: readonly number[], b: readonly number[]): number => {
  let total = 0;
  for (let i = 0; i < a.length; i += 1) {
    total += a[i] * b[i];
  }
  return total;
};

/**
 * Gaussian elimination with partial pivoting. Returns null when the system is
 * singular to working precision.
 */
export const solveLinearSystem = (matrix: Matrix, vector: readonly number[]): number[] | null => {
  const n = matrix.length;
  const augmented: Matrix = matrix.map((row, i) => [...row, vector[i]]);

  for (let i = 0; i < n; i += 1) {
    let maxRow = i;
    for (let k = i + 1; k < n; k += 1) {
      if (Math.abs(augmented[k][i]) > Math.abs(augmented[maxRow][i])) {
        maxRow = k;
      }
    }

    if (Math.abs(augmented[maxRow][i]) < PIVOT_EPSILON) {
      return null;
    }

    if (maxRow !== i) {
      [augmented[i], augmented[maxRow]] = [augmented[maxRow], augmented[i]];
    }

    for (let k = i + 1; k < n; k += 1) {
      const factor = augmented[k][i] / augmented[i][i];
      for (let j = i; j <= n; j += 1) {
        augmented[k][j] -= factor * augmented[i][j];
      }
    }
  }

  const solution = new Array<number>(n).fill(0);
  for (let i = n - 1; i >= 0; i -= 1) {
    let total = augmented[i][n];
    for (let j = i + 1; j < n; j += 1) {
      total -= augmented[i][j] * solution[j];
    }
    solution[i] = total / augmented[i][i];
  }

  return solution;
};

export interface LeastSquaresOptions {
  /** Diagonal penalty, shared or per coefficient */
  ridge?: number | readonly number[];
}

/**
 * Solves the (optionally ridge-penalised) normal equations for `rows · β ≈ targets`.
 */
export const leastSquares = (
  rows: Matrix,
  targets: readonly number[],
  options: LeastSquaresOptions = {}
): number[] | null => {
  if (rows.length === 0 || rows.length !== targets.length) {
    return null;
  }

  const xt = transpose(rows);
  const xtx = multiply(xt, rows);
  const xty = multiplyVector(xt, targets);
  const ridge = options.ridge ?? 0;

  for (let i = 0; i < xtx.length; i += 1) {
    xtx[i][i] += typeof ridge === 'number' ? ridge : ridge[i] ?? 0;
  }

  return solveLinearSystem(xtx, xty);
};
