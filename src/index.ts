import { computeOrFetch } from './matrix/compute-or-fetch';
import { CacheableMatrix } from './matrix/cacheable-matrix';
import { isIdentity, multiply } from './linalg/matrix-utils';
import { Matrix } from './types';

export { CacheableMatrix } from './matrix/cacheable-matrix';
export { computeOrFetch, computeOrFetchDetailed, CACHE_HIT_MESSAGE } from './matrix/compute-or-fetch';
export { inverseEvents } from './matrix/inverse-events';
export { solveInverse } from './linalg/solver';
export { cloneMatrix, identity, multiply, isIdentity } from './linalg/matrix-utils';
export { attachConsoleLogger, ConsoleLoggerOptions } from './utils/inverse-logger';
export { NotInvertibleError, NotInvertibleReason } from './errors';
export { CONFIG, loadConfig, DEFAULT_TOLERANCE } from './config';
export * from './types';

function format(m: Matrix): string {
  return JSON.stringify(m);
}

/**
 * Walk through a cache miss, a cache hit and an invalidation.
 */
function main(): void {
  const matrix = new CacheableMatrix([
    [2, 0],
    [0, 2],
  ]);

  console.log('\n🔢 Matrix:', format(matrix.getMatrix()));

  const first = computeOrFetch(matrix);
  console.log('   First call: ', format(first));

  const second = computeOrFetch(matrix);
  console.log('   Second call:', format(second));
  console.log(`   A × A⁻¹ = I: ${isIdentity(multiply(matrix.getMatrix(), second)) ? '✅' : '❌'}`);

  matrix.setMatrix([
    [1, 0],
    [0, 1],
  ]);
  console.log('\n🔄 Replaced matrix:', format(matrix.getMatrix()));
  console.log('   After replace:', format(computeOrFetch(matrix)));
}

if (require.main === module) {
  main();
}
