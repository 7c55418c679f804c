import { EventEmitter } from 'events';
import { InverseLogEvent } from '../types';

export interface ConsoleLoggerOptions {
  /** Also print misses, computations and failures */
  verbose?: boolean;
}

/**
 * Print inverse-cache log events to the console.
 *
 * Cache hits are always reported; everything else only in verbose mode.
 *
 * @returns a function that detaches the logger
 */
export function attachConsoleLogger(events: EventEmitter, options: ConsoleLoggerOptions = {}): () => void {
  const listener = (entry: InverseLogEvent): void => {
    switch (entry.event) {
      case 'inverse_hit':
        console.log(`♻️  ${entry.message} (${entry.dimension}x${entry.dimension})`);
        break;
      case 'inverse_miss':
        if (options.verbose) {
          console.log(`🔍 No cached inverse for ${entry.dimension}x${entry.dimension} matrix, solving`);
        }
        break;
      case 'inverse_computed':
        if (options.verbose) {
          console.log(
            `🧮 Computed ${entry.dimension}x${entry.dimension} inverse via ${entry.method.toUpperCase()} in ${entry.durationMs}ms`
          );
        }
        break;
      case 'inverse_failed':
        if (options.verbose) {
          console.warn(`❌ Inversion failed: ${entry.reason}`);
        }
        break;
    }
  };

  events.on('log', listener);
  return () => {
    events.off('log', listener);
  };
}
