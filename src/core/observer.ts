/**
 * Central event system for rotalog.
 *
 * Sinks emit events at every step of the write and rotation path. Hosts,
 * the CLI and the diagnostic channel subscribe. Nothing in the write path
 * depends on a listener being present.
 *
 * @example
 * ```typescript
 * // In a sink - emit events at key points
 * observer.emit('sink:archived', { file, archive })
 *
 * // In a host - subscribe to events
 * const cleanup = observer.on('sink:rotated', (data) => shipArchive(data.archive))
 *
 * // Pattern matching for multiple events
 * observer.on(/^sink:/, ({ event, data }) => trace(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer';

import type { Signal } from './lifecycle/handlers.js';
import type { SinkStep, SinkState, SuffixExtension } from './sink/types.js';


/**
 * All events emitted by rotalog.
 *
 * Every sink payload carries `file`, the target path of the emitting sink, so
 * listeners can tell sinks apart.
 */
export interface RotalogEvents {

    // Lifecycle
    'sink:opened': { file: string; mode: number; reopened: boolean }
    'sink:closed': { file: string; totalWritten: number }
    'sink:degraded': { file: string; error: Error }
    'sink:recovered': { file: string }

    // Durability
    'sink:flushed': { file: string; writes: number; forced: boolean }

    // Rotation
    'sink:paused': { file: string }
    'sink:resumed': { file: string }
    'sink:checked': { file: string; size: number | null; maxFileSize: number }
    'sink:renumbered': { file: string; from: string; to: string }
    'sink:archived': { file: string; archive: string; policy: SuffixExtension }
    'sink:archive-removed': { file: string; archive: string }
    'sink:rotated': { file: string; archive: string; removed: string[]; durationMs: number }

    // Errors
    'sink:error': { file: string; step: SinkStep; error: Error; state: SinkState }

    // Process
    'process:signal': { signal: Signal }
    'process:exception': { error: Error; type: 'exception' | 'rejection' }
}

export type RotalogEventNames = Events<RotalogEvents>;
export type RotalogEventCallback<E extends RotalogEventNames> = ObserverEngine.EventCallback<RotalogEvents[E]>;

/**
 * Global observer instance for rotalog.
 *
 * Enable debug mode with `ROTALOG_DEBUG=1` to see all events as they occur.
 *
 * @example
 * ```typescript
 * import { observer } from './observer.js'
 *
 * const cleanup = observer.on('sink:error', ({ file, step, error }) => {
 *     alerting.notify(`${file}: ${step} failed: ${error.message}`)
 * })
 *
 * // Clean up when done
 * cleanup()
 * ```
 */
export const observer = new ObserverEngine<RotalogEvents>({
    name: 'rotalog',
    spy: process.env['ROTALOG_DEBUG']
        ? (action) => console.error(`[rotalog:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine };
