import { EventEmitter } from 'events';
import { CONFIG } from '../config';
import { attachConsoleLogger } from '../utils/inverse-logger';

/**
 * Default notification channel for computeOrFetch. Emits `'log'` events
 * (see InverseLogEvent) and prints them through the console logger.
 */
export const inverseEvents = new EventEmitter();

attachConsoleLogger(inverseEvents, { verbose: CONFIG.verboseLogging });
