import { Matrix } from '../types';

export function cloneMatrix(m: Matrix): number[][] {
  return m.map(row => [...row]);
}

export function identity(n: number): number[][] {
  return Array.from({ length: n }, (_, i) => Array.from({ length: n }, (_, j) => (i === j ? 1 : 0)));
}

/**
 * Dense product a × b. Throws when the inner dimensions disagree.
 */
export function multiply(a: Matrix, b: Matrix): number[][] {
  const inner = a[0]?.length ?? 0;
  if (inner !== b.length) {
    throw new Error(`Cannot multiply ${a.length}x${inner} by ${b.length}x${b[0]?.length ?? 0}`);
  }
  const cols = b[0]?.length ?? 0;
  return a.map(row =>
    Array.from({ length: cols }, (_, j) => {
      let sum = 0;
      for (let k = 0; k < inner; k++) {
        sum += row[k] * b[k][j];
      }
      return sum;
    })
  );
}

export function isIdentity(m: Matrix, epsilon = 1e-9): boolean {
  return m.every(
    (row, i) => row.length === m.length && row.every((v, j) => Math.abs(v - (i === j ? 1 : 0)) <= epsilon)
  );
}
