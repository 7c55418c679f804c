import { cloneMatrix } from '../linalg/matrix-utils';
import { Matrix } from '../types';

/**
 * CacheableMatrix: a matrix plus a slot for its cached inverse.
 *
 * Pure state holder. It never validates or computes anything; deciding when
 * the inverse has to be (re)computed is left to computeOrFetch.
 *
 * Invariant: the cached inverse, when set, belongs to the current matrix.
 * setMatrix clears it in the same call.
 *
 * Matrices are copied on the way in, so the instance owns what it stores.
 *
 * @example
 * const m = new CacheableMatrix([[2, 0], [0, 2]]);
 * computeOrFetch(m); // solves and caches
 * computeOrFetch(m); // served from cache
 */
export class CacheableMatrix {
  private value: Matrix;
  private cachedInverse: Matrix | null = null;

  constructor(initial: Matrix) {
    this.value = cloneMatrix(initial);
  }

  getMatrix(): Matrix {
    return this.value;
  }

  /**
   * Replace the matrix. Always clears the cached inverse, whatever its state.
   */
  setMatrix(newValue: Matrix): void {
    this.value = cloneMatrix(newValue);
    this.cachedInverse = null;
  }

  /**
   * @returns the inverse cached since the last setMatrix, or null if unset
   */
  getCachedInverse(): Matrix | null {
    return this.cachedInverse;
  }

  /**
   * Store an inverse for the current matrix. Not verified: the caller is
   * responsible for its correctness.
   */
  setCachedInverse(inv: Matrix): void {
    this.cachedInverse = cloneMatrix(inv);
  }

  hasCachedInverse(): boolean {
    return this.cachedInverse !== null;
  }

  get dimension(): number {
    return this.value.length;
  }
}
