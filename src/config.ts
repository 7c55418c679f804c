/**
 * Configuration for the inverse cache.
 *
 * Values come from environment variables (a local .env file is loaded via
 * dotenv):
 * - VERBOSE_INVERSE_LOGGING: 'true' to log misses, computations and failures
 * - INVERSE_SOLVER_METHOD: 'lu' (default) or 'svd'
 * - INVERSE_TOLERANCE: relative singularity threshold (default 1e-12)
 */
import dotenv from 'dotenv';
import { InverseConfig, SolverMethod } from './types';

dotenv.config();

export const DEFAULT_TOLERANCE = 1e-12;

const SOLVER_METHODS: readonly SolverMethod[] = ['lu', 'svd'];

function isSolverMethod(value: string): value is SolverMethod {
  return SOLVER_METHODS.some(method => method === value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): InverseConfig {
  const method = (env.INVERSE_SOLVER_METHOD ?? 'lu').trim().toLowerCase();
  if (!isSolverMethod(method)) {
    throw new Error(
      `Invalid INVERSE_SOLVER_METHOD "${env.INVERSE_SOLVER_METHOD}" (expected one of: ${SOLVER_METHODS.join(', ')})`
    );
  }

  let tolerance = DEFAULT_TOLERANCE;
  if (env.INVERSE_TOLERANCE !== undefined && env.INVERSE_TOLERANCE.trim() !== '') {
    tolerance = Number(env.INVERSE_TOLERANCE);
    if (!Number.isFinite(tolerance) || tolerance <= 0) {
      throw new Error(`Invalid INVERSE_TOLERANCE "${env.INVERSE_TOLERANCE}" (expected a positive number)`);
    }
  }

  return {
    verboseLogging: env.VERBOSE_INVERSE_LOGGING === 'true',
    solverMethod: method,
    tolerance,
  };
}

export const CONFIG: InverseConfig = loadConfig();
