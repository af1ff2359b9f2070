/**
 * Sink Module
 *
 * File-backed log sink with archive rotation.
 *
 * @example
 * ```typescript
 * import { RotatingFileSink } from './core/sink/index.js'
 *
 * const sink = await RotatingFileSink.open({ file: 'logs/app.log' })
 * sink.info('ready')
 * await sink.close()
 * ```
 */

// Types
export type {
    SuffixExtension,
    RotationConfig,
    RotationConfigInput,
    RotationDelegate,
    ThrottleOptions,
    LogLevel,
    LineFormatter,
    FileMetadata,
    SinkOptions,
    SinkState,
    SinkStep,
    RotationResult,
    SinkStats,
} from './types.js';

export { LOG_LEVEL_PRIORITY } from './types.js';

// Errors
export {
    ArchiveExistsError,
    InvalidPathError,
    InvalidPermissionError,
    RotationConfigError,
    SinkOpenError,
} from './errors.js';

// Configuration
export type { SinkTuning, SinkTuningInput, EnvSinkConfig } from './config.js';

export {
    DEFAULT_MAX_FILE_SIZE,
    DEFAULT_MAX_ARCHIVED_FILES,
    DEFAULT_PERMISSION,
    DEFAULT_FLUSH_THRESHOLD,
    DEFAULT_CHECK_FREQUENCY,
    DEFAULT_CHECK_INTERVAL,
    parseSize,
    parsePermission,
    createRotationConfig,
    resolveSinkTuning,
    getEnvConfig,
} from './config.js';

// Rotation parts
export type { ArchiveNameOptions } from './namer.js';
export { archiveNameFor, formatArchiveTimestamp, isRotationSuffix, withGeneration } from './namer.js';
export type { ListArchivesOptions } from './enumerator.js';
export { listArchives } from './enumerator.js';
export { RotationThrottle, shouldCheck } from './throttle.js';
export type { RotationExecutorOptions } from './executor.js';
export { RotationExecutor } from './executor.js';
export type { FlushOutcome } from './write-buffer.js';
export { WriteBuffer } from './write-buffer.js';
export type { SerialQueueStats, ScheduleOptions } from './queue.js';
export { SerialQueue } from './queue.js';
export { statMetadata } from './metadata.js';

// Output
export { formatLine, rawLine, isLevelEnabled } from './formatter.js';
export type { DiagnosticEvent, DiagnosticOptions } from './diagnostics.js';
export { attachDiagnostics, formatDiagnostic } from './diagnostics.js';

// Sink
export { RotatingFileSink, validateFilePath } from './sink.js';
