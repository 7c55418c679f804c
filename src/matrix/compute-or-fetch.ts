/**
 * Cached inversion.
 *
 * computeOrFetch returns the inverse held in a CacheableMatrix's slot when
 * there is one, and otherwise solves A·X = I, stores the result and returns
 * it. Every cache hit is announced as an `inverse_hit` log event on the
 * notification channel.
 *
 * Not atomic: callers sharing one CacheableMatrix across async code must
 * serialize setMatrix and computeOrFetch themselves.
 *
 * @module matrix/compute-or-fetch
 */

import { EventEmitter } from 'events';
import { CONFIG } from '../config';
import { solveInverse } from '../linalg/solver';
import { InverseLogEvent, InverseResult, Matrix, SolveOptions } from '../types';
import { CacheableMatrix } from './cacheable-matrix';
import { inverseEvents } from './inverse-events';

export const CACHE_HIT_MESSAGE = 'serving cached inverse';

function log(events: EventEmitter, entry: InverseLogEvent): void {
  events.emit('log', entry);
}

/**
 * Like computeOrFetch, but also reports whether the inverse came from the cache.
 *
 * @param solveOptions - passed to the solver unmodified
 * @param events - notification channel (defaults to inverseEvents)
 * @throws NotInvertibleError from the solver; the cache slot stays as it was
 */
export function computeOrFetchDetailed(
  cache: CacheableMatrix,
  solveOptions: SolveOptions = {},
  events: EventEmitter = inverseEvents
): InverseResult {
  const cached = cache.getCachedInverse();
  if (cached !== null) {
    log(events, {
      event: 'inverse_hit',
      message: CACHE_HIT_MESSAGE,
      dimension: cache.dimension,
      timestamp: Date.now(),
    });
    return { inverse: cached, cached: true };
  }

  log(events, { event: 'inverse_miss', dimension: cache.dimension, timestamp: Date.now() });

  const startedAt = Date.now();
  let inverse: Matrix;
  try {
    inverse = solveInverse(cache.getMatrix(), solveOptions);
  } catch (error) {
    log(events, {
      event: 'inverse_failed',
      dimension: cache.dimension,
      reason: error instanceof Error ? error.message : String(error),
      timestamp: Date.now(),
    });
    throw error;
  }

  cache.setCachedInverse(inverse);
  log(events, {
    event: 'inverse_computed',
    dimension: cache.dimension,
    method: solveOptions.method ?? CONFIG.solverMethod,
    durationMs: Date.now() - startedAt,
    timestamp: Date.now(),
  });

  // Return the stored copy so later hits hand back the same reference
  const stored = cache.getCachedInverse();
  return { inverse: stored ?? inverse, cached: false };
}

/**
 * Inverse of the matrix held by `cache`, computed at most once per matrix value.
 */
export function computeOrFetch(
  cache: CacheableMatrix,
  solveOptions: SolveOptions = {},
  events: EventEmitter = inverseEvents
): Matrix {
  return computeOrFetchDetailed(cache, solveOptions, events).inverse;
}
