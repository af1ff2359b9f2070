/**
 * Process signal and exception handlers.
 *
 * Connects process signals to the sinks a host has open:
 *
 * - SIGINT, SIGTERM, SIGHUP close every sink (drain, sync, close)
 * - SIGUSR1 suspends every sink (pause rotation, priority flush)
 * - SIGUSR2 resumes rotation
 *
 * Uncaught exceptions and unhandled rejections close the sinks too, so
 * the lines logged before the crash reach the disk.
 */
import { attempt } from '@logosdx/utils'

import { observer } from '../observer.js'
import type { RotatingFileSink } from '../sink/sink.js'


/**
 * Signals that close sinks.
 */
export type ShutdownSignal = 'SIGINT' | 'SIGTERM' | 'SIGHUP'


/**
 * Signals that suspend and resume sinks.
 */
export type SuspendSignal = 'SIGUSR1' | 'SIGUSR2'


/**
 * Every signal we handle.
 */
export type Signal = ShutdownSignal | SuspendSignal


/**
 * Callback invoked after the sinks closed on a shutdown signal.
 */
export type SignalCallback = (signal: ShutdownSignal) => Promise<void>


/**
 * Callback invoked after the sinks closed on a fatal error.
 */
export type ErrorCallback = (error: Error, type: 'exception' | 'rejection') => Promise<void>


/**
 * Handler cleanup function.
 */
export type CleanupFn = () => void


/**
 * Active handlers tracking.
 */
interface ActiveHandlers {
    signals: Map<Signal, NodeJS.SignalsListener>
    exception: ((error: Error) => void) | null
    rejection: ((reason: unknown, promise: Promise<unknown>) => void) | null
}


// Track active handlers for cleanup
const activeHandlers: ActiveHandlers = {
    signals: new Map(),
    exception: null,
    rejection: null,
}


/**
 * Close every sink, reporting failures instead of throwing.
 */
export async function closeSinks(sinks: readonly RotatingFileSink[]): Promise<void> {

    await Promise.all(sinks.map(async (sink) => {

        const [, err] = await attempt(() => sink.close())

        if (err) {

            observer.emit('sink:error', { file: sink.filepath, step: 'close', error: err, state: sink.state })
        }
    }))
}


/**
 * Replace the listener for one signal.
 */
function listen(signal: Signal, handler: NodeJS.SignalsListener): void {

    const existing = activeHandlers.signals.get(signal)
    if (existing) {

        process.removeListener(signal, existing)
    }

    process.on(signal, handler)
    activeHandlers.signals.set(signal, handler)
}


/**
 * Remove the listeners for some signals.
 */
function unlisten(signals: readonly Signal[]): void {

    for (const signal of signals) {

        const handler = activeHandlers.signals.get(signal)
        if (handler) {

            process.removeListener(signal, handler)
            activeHandlers.signals.delete(signal)
        }
    }
}


/**
 * Register signal handlers for graceful shutdown.
 *
 * @param sinks - Sinks to close; the array is read when the signal arrives
 * @param callback - Called once the sinks are closed
 * @returns Cleanup function to remove handlers
 *
 * @example
 * ```typescript
 * const cleanup = registerSignalHandlers([sink], async (signal) => {
 *     process.exit(signal === 'SIGINT' ? 130 : 0)
 * })
 *
 * // Later: remove handlers
 * cleanup()
 * ```
 */
export function registerSignalHandlers(
    sinks: readonly RotatingFileSink[],
    callback: SignalCallback,
): CleanupFn {

    const signals: ShutdownSignal[] = ['SIGINT', 'SIGTERM', 'SIGHUP']

    for (const signal of signals) {

        listen(signal, () => {

            observer.emit('process:signal', { signal })
            void closeSinks(sinks).then(() => callback(signal))
        })
    }

    return () => unlisten(signals)
}


/**
 * Register SIGUSR1 / SIGUSR2 to suspend and resume sinks.
 *
 * Lets an operator hold rotation while copying logs off a host.
 *
 * @returns Cleanup function to remove handlers
 */
export function registerSuspendHandlers(sinks: readonly RotatingFileSink[]): CleanupFn {

    listen('SIGUSR1', () => {

        observer.emit('process:signal', { signal: 'SIGUSR1' })
        void Promise.all(sinks.map((sink) => sink.suspend()))
    })

    listen('SIGUSR2', () => {

        observer.emit('process:signal', { signal: 'SIGUSR2' })

        for (const sink of sinks) {

            sink.resumeRotation()
        }
    })

    return () => unlisten(['SIGUSR1', 'SIGUSR2'])
}


/**
 * Register exception handlers for emergency shutdown.
 *
 * Handles both uncaughtException and unhandledRejection.
 *
 * @param sinks - Sinks to close before the callback runs
 * @param callback - Called once the sinks are closed
 * @returns Cleanup function to remove handlers
 *
 * @example
 * ```typescript
 * const cleanup = registerExceptionHandlers([sink], async (error, type) => {
 *     console.error(`${type}: ${error.message}`)
 *     process.exit(1)
 * })
 * ```
 */
export function registerExceptionHandlers(
    sinks: readonly RotatingFileSink[],
    callback: ErrorCallback,
): CleanupFn {

    // Remove existing handlers
    if (activeHandlers.exception) {

        process.removeListener('uncaughtException', activeHandlers.exception)
    }
    if (activeHandlers.rejection) {

        process.removeListener('unhandledRejection', activeHandlers.rejection)
    }

    const exceptionHandler = (error: Error) => {

        observer.emit('process:exception', { error, type: 'exception' })
        void closeSinks(sinks).then(() => callback(error, 'exception'))
    }

    const rejectionHandler = (reason: unknown, _promise: Promise<unknown>) => {

        const error = reason instanceof Error
            ? reason
            : new Error(String(reason))

        observer.emit('process:exception', { error, type: 'rejection' })
        void closeSinks(sinks).then(() => callback(error, 'rejection'))
    }

    process.on('uncaughtException', exceptionHandler)
    process.on('unhandledRejection', rejectionHandler)

    activeHandlers.exception = exceptionHandler
    activeHandlers.rejection = rejectionHandler

    return () => {

        if (activeHandlers.exception) {

            process.removeListener('uncaughtException', activeHandlers.exception)
            activeHandlers.exception = null
        }
        if (activeHandlers.rejection) {

            process.removeListener('unhandledRejection', activeHandlers.rejection)
            activeHandlers.rejection = null
        }
    }
}


/**
 * Remove all registered handlers.
 */
export function removeAllHandlers(): void {

    for (const [signal, handler] of activeHandlers.signals) {

        process.removeListener(signal, handler)
    }
    activeHandlers.signals.clear()

    if (activeHandlers.exception) {

        process.removeListener('uncaughtException', activeHandlers.exception)
        activeHandlers.exception = null
    }
    if (activeHandlers.rejection) {

        process.removeListener('unhandledRejection', activeHandlers.rejection)
        activeHandlers.rejection = null
    }
}


/**
 * Check if a handler is registered for a signal.
 */
export function hasSignalHandler(signal: Signal): boolean {

    return activeHandlers.signals.has(signal)
}


/**
 * Check if exception handlers are registered.
 */
export function hasExceptionHandlers(): boolean {

    return activeHandlers.exception !== null || activeHandlers.rejection !== null
}
