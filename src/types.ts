/** Square numeric matrix, stored row-major. */
export type Matrix = ReadonlyArray<ReadonlyArray<number>>;

export type SolverMethod = 'lu' | 'svd';

/**
 * Options handed to the solver untouched by the caching layer.
 */
export interface SolveOptions {
  /** Decomposition used to solve A·X = I (default from config) */
  method?: SolverMethod;
  /** Relative threshold below which the matrix counts as singular */
  tolerance?: number;
}

export interface InverseResult {
  inverse: Matrix;
  /** true when served from the cached-inverse slot */
  cached: boolean;
}

export type InverseLogEvent =
  | { event: 'inverse_hit'; message: string; dimension: number; timestamp: number }
  | { event: 'inverse_miss'; dimension: number; timestamp: number }
  | {
      event: 'inverse_computed';
      dimension: number;
      method: SolverMethod;
      durationMs: number;
      timestamp: number;
    }
  | { event: 'inverse_failed'; dimension: number; reason: string; timestamp: number };

export interface InverseConfig {
  verboseLogging: boolean;
  solverMethod: SolverMethod;
  tolerance: number;
}
