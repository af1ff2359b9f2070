/**
 * rotalog
 *
 * Append-only log files that rotate into numbered or timestamped archives.
 */
export * from './core/sink/index.js';

export { observer } from './core/observer.js';
export type { RotalogEvents, RotalogEventNames, RotalogEventCallback } from './core/observer.js';

export * from './core/lifecycle/index.js';
