/**
 * Lifecycle Module
 *
 * Ties process signals and fatal errors to open sinks so lines are synced
 * and files closed before the process exits.
 */
export type {
    ShutdownSignal,
    SuspendSignal,
    Signal,
    SignalCallback,
    ErrorCallback,
    CleanupFn,
} from './handlers.js'

export {
    closeSinks,
    registerSignalHandlers,
    registerSuspendHandlers,
    registerExceptionHandlers,
    removeAllHandlers,
    hasSignalHandler,
    hasExceptionHandlers,
} from './handlers.js'
