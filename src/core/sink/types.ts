/**
 * Sink Types
 *
 * Type definitions for the rotating file sink: rotation policy,
 * delegate notifications, throttle and buffer tuning, and sink state.
 */
import type { Writable } from 'node:stream';


/**
 * Archive naming policy.
 *
 * - numbering: `<target>.1`, `<target>.2`, ... with 1 the most recent
 * - date_uuid: `<target>.<yyyyMMdd'T'HHmmssZ>_<uuid>`, ordered by mtime
 */
export type SuffixExtension = 'numbering' | 'date_uuid';

/**
 * Immutable rotation policy.
 *
 * `maxArchivedFilesCount` is only applied at eviction time. A value of 0
 * keeps no archives at all.
 */
export interface RotationConfig {

    /** How archives are named */
    readonly suffixExtension: SuffixExtension;

    /** Rotate once the target grows past this many bytes */
    readonly maxFileSize: number;

    /** Archives to keep (0-255) */
    readonly maxArchivedFilesCount: number;
}

/**
 * Input accepted when building a RotationConfig.
 *
 * `maxFileSize` may be a size string such as '10mb'.
 */
export interface RotationConfigInput {
    suffixExtension?: SuffixExtension;
    maxFileSize?: number | string;
    maxArchivedFilesCount?: number;
}

/**
 * Receiver of archive notifications.
 *
 * Owned by the caller and handed to the sink explicitly. Return values are
 * ignored; a throwing delegate is reported on the diagnostic channel.
 */
export interface RotationDelegate {

    /** The target at `oldPath` was renamed to the archive `newPath` */
    onArchived?(oldPath: string, newPath: string): void;

    /** The archive at `path` was deleted during eviction */
    onArchiveRemoved?(path: string): void;
}

/**
 * Throttle thresholds for file size checks.
 */
export interface ThrottleOptions {

    /** Check after this many log calls (default: 50,000) */
    checkFrequency?: number;

    /** Check once this many milliseconds passed since the last check (default: 8 minutes) */
    checkInterval?: number;

    /** Millisecond clock (default: Date.now) */
    now?: () => number;
}

/**
 * Log levels, least to most severe.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Numeric priority for log levels.
 * Higher numbers = more severe.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
};

/**
 * Turns a log call into the exact text appended to the target.
 * The result should end with a newline.
 */
export type LineFormatter = (level: LogLevel, message: string, timestamp: Date) => string;

/**
 * Size and modification time of a path.
 *
 * Implementations reject when the path cannot be inspected.
 */
export interface FileMetadata {

    /** File size in bytes */
    size(filepath: string): Promise<number>;

    /** Modification time in epoch milliseconds */
    modifiedAt(filepath: string): Promise<number>;
}

/**
 * Options for RotatingFileSink.open().
 */
export interface SinkOptions {

    /** Target file path */
    file: string;

    /** Octal permission string for the target (default: '640') */
    permission?: string;

    /** Rotation policy (default: numbering, 10mb, 5 archives) */
    rotation?: RotationConfig | RotationConfigInput;

    /** Archive notification receiver */
    delegate?: RotationDelegate;

    /** Size check throttle */
    throttle?: ThrottleOptions;

    /** Sync to disk after this many unsynced writes (default: 200) */
    flushThreshold?: number;

    /** Lowest level written (default: 'trace') */
    level?: LogLevel;

    /** Line formatter (default: `[timestamp] [LEVEL] message`) */
    format?: LineFormatter;

    /** File metadata capability (default: fs.stat based) */
    metadata?: FileMetadata;

    /** Diagnostic stream, or false to only emit events (default: process.stderr) */
    diagnostics?: Writable | false;
}

/**
 * Lifecycle of a sink.
 *
 * - open: appending to the target
 * - degraded: reopening the target failed; appends retry the open first
 * - closing: draining before close
 * - closed: no more writes
 */
export type SinkState = 'open' | 'degraded' | 'closing' | 'closed';

/**
 * Step names reported with sink errors.
 */
export type SinkStep =
    | 'append'
    | 'flush'
    | 'stat'
    | 'enumerate'
    | 'renumber'
    | 'archive'
    | 'evict'
    | 'reopen'
    | 'close'
    | 'delegate'
    | 'task';

/**
 * Outcome of a rotation.
 */
export interface RotationResult {

    /** Whether the target was archived */
    rotated: boolean;

    /** Archive the target was moved to */
    archive?: string;

    /** Renames performed while renumbering, oldest archive first */
    renumbered: Array<{ from: string; to: string }>;

    /** Archives deleted during eviction */
    removed: string[];

    /** Steps that failed */
    errors: Array<{ step: SinkStep; error: Error }>;
}

/**
 * Sink counters.
 */
export interface SinkStats {

    /** Tasks waiting in the serial queue */
    pending: number;

    /** Lines appended to the target */
    totalWritten: number;

    /** Bytes appended to the target */
    totalBytes: number;

    /** Lines dropped (below level, after close, or failed append) */
    dropped: number;

    /** Appends since the last sync */
    unsyncedWrites: number;

    /** Completed rotations */
    rotations: number;

    /** Size checks performed */
    checks: number;
}
