/**
 * Solver adapter over ml-matrix.
 *
 * Computes an inverse by solving A·X = I with either an LU decomposition
 * (partial pivoting) or a singular value decomposition, and turns every
 * failure into a NotInvertibleError.
 *
 * @module linalg/solver
 */

import { LuDecomposition, Matrix as MlMatrix, SingularValueDecomposition } from 'ml-matrix';
import { CONFIG } from '../config';
import { NotInvertibleError } from '../errors';
import { Matrix, SolveOptions } from '../types';

function toMlMatrix(matrix: Matrix): MlMatrix {
  const rows = matrix.length;
  const columns = matrix[0]?.length ?? 0;

  if (rows === 0 || columns === 0) {
    throw new NotInvertibleError('Cannot invert an empty matrix', 'shape', rows, columns);
  }
  if (matrix.some(row => row.length !== columns)) {
    throw new NotInvertibleError('Matrix rows have inconsistent lengths', 'shape', rows, columns);
  }
  if (rows !== columns) {
    throw new NotInvertibleError(`Matrix must be square, got ${rows}x${columns}`, 'shape', rows, columns);
  }
  if (matrix.some(row => row.some(value => !Number.isFinite(value)))) {
    throw new NotInvertibleError('Matrix contains non-finite entries', 'non-finite', rows, columns);
  }

  try {
    return new MlMatrix(matrix.map(row => [...row]));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new NotInvertibleError(`Invalid matrix: ${message}`, 'shape', rows, columns);
  }
}

function maxAbs(matrix: Matrix): number {
  let max = 0;
  for (const row of matrix) {
    for (const value of row) {
      max = Math.max(max, Math.abs(value));
    }
  }
  return max;
}

function solveWithLu(a: MlMatrix, scale: number, tolerance: number): MlMatrix {
  const lu = new LuDecomposition(a);
  const threshold = tolerance * scale;
  const pivots = lu.upperTriangularMatrix.diag();

  if (lu.isSingular() || pivots.some(pivot => Math.abs(pivot) <= threshold)) {
    throw new NotInvertibleError('Matrix is singular to working precision', 'singular', a.rows, a.columns);
  }
  return lu.solve(MlMatrix.eye(a.rows));
}

function solveWithSvd(a: MlMatrix, tolerance: number): MlMatrix {
  const svd = new SingularValueDecomposition(a);

  if (svd.rank < a.rows) {
    throw new NotInvertibleError(`Matrix is rank deficient (rank ${svd.rank} of ${a.rows})`, 'singular', a.rows, a.columns);
  }
  if (1 / svd.condition <= tolerance) {
    throw new NotInvertibleError(
      `Matrix is ill-conditioned (condition number ${svd.condition.toExponential(3)})`,
      'singular',
      a.rows,
      a.columns
    );
  }
  return svd.solve(MlMatrix.eye(a.rows));
}

/**
 * Inverse of a square matrix.
 *
 * @throws NotInvertibleError for empty, ragged, non-square, non-finite or singular input
 */
export function solveInverse(matrix: Matrix, options: SolveOptions = {}): number[][] {
  const method = options.method ?? CONFIG.solverMethod;
  const tolerance = options.tolerance ?? CONFIG.tolerance;
  const a = toMlMatrix(matrix);

  const solution = method === 'svd' ? solveWithSvd(a, tolerance) : solveWithLu(a, maxAbs(matrix), tolerance);

  // + 0 turns -0 into 0
  return solution.to2DArray().map(row => row.map(value => value + 0));
}
