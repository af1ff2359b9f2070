/**
 * Rotating File Sink
 *
 * Appends lines to one target file and rotates it once it grows past
 * `maxFileSize`. All work for a sink runs on its own serial queue, so the
 * appends, syncs and rotations of one file happen in a single total order
 * while `log()` itself never blocks.
 *
 * @example
 * ```typescript
 * const sink = await RotatingFileSink.open({
 *     file: '/var/log/app/app.log',
 *     permission: '640',
 *     rotation: { suffixExtension: 'numbering', maxFileSize: '10mb', maxArchivedFilesCount: 5 },
 *     delegate: {
 *         onArchived: (from, to) => console.log(`archived ${from} -> ${to}`),
 *     },
 * })
 *
 * sink.info('service started')
 * await sink.close()
 * ```
 */
import { access, mkdir, open, stat, type FileHandle } from 'node:fs/promises';
import { dirname, resolve, sep } from 'node:path';
import { attempt, attemptSync } from '@logosdx/utils';

import { observer } from '../observer.js';
import {
    DEFAULT_PERMISSION,
    createRotationConfig,
    parsePermission,
    resolveSinkTuning,
} from './config.js';
import { attachDiagnostics } from './diagnostics.js';
import { InvalidPathError, SinkOpenError } from './errors.js';
import { RotationExecutor } from './executor.js';
import { formatLine, isLevelEnabled } from './formatter.js';
import { statMetadata } from './metadata.js';
import { SerialQueue } from './queue.js';
import { RotationThrottle } from './throttle.js';
import { WriteBuffer } from './write-buffer.js';
import type {
    FileMetadata,
    LineFormatter,
    LogLevel,
    RotationConfig,
    SinkOptions,
    SinkState,
    SinkStats,
    SinkStep,
} from './types.js';


/**
 * Reject paths that cannot name a regular file.
 *
 * @returns Absolute target path
 * @throws InvalidPathError
 */
export async function validateFilePath(file: string): Promise<string> {

    if (file.trim().length === 0) {

        throw new InvalidPathError(file, 'path is empty');

    }

    if (file.endsWith('/') || file.endsWith(sep)) {

        throw new InvalidPathError(file, 'path ends with a separator');

    }

    const filepath = resolve(file);
    const [stats] = await attempt(() => stat(filepath));

    if (stats?.isDirectory()) {

        throw new InvalidPathError(file, 'path is a directory');

    }

    return filepath;

}


/**
 * Resolved construction values handed to the private constructor.
 */
interface SinkInit {
    filepath: string;
    mode: number;
    config: RotationConfig;
    options: SinkOptions;
}


/**
 * Append-only log file with throttled size checks and archive rotation.
 *
 * Only `open()` throws. After that every filesystem failure is emitted as
 * `sink:error` and written to the diagnostic stream, and the call that hit
 * it carries on.
 */
export class RotatingFileSink {

    /** Absolute target path */
    readonly filepath: string;

    /** Permission bits used when creating the target */
    readonly mode: number;

    /** Rotation policy */
    readonly config: RotationConfig;

    /** Lowest level written */
    readonly level: LogLevel;

    #handle: FileHandle | null = null;
    #state: SinkState = 'open';
    #paused = false;

    #queue: SerialQueue;
    #throttle: RotationThrottle;
    #buffer: WriteBuffer;
    #executor: RotationExecutor;
    #format: LineFormatter;
    #metadata: FileMetadata;
    #detachDiagnostics: (() => void) | null = null;
    #closing: Promise<void> | null = null;

    #totalWritten = 0;
    #totalBytes = 0;
    #dropped = 0;
    #rotations = 0;
    #checks = 0;

    private constructor(init: SinkInit) {

        const { options } = init;
        const tuning = resolveSinkTuning({
            flushThreshold: options.flushThreshold,
            checkFrequency: options.throttle?.checkFrequency,
            checkInterval: options.throttle?.checkInterval,
            level: options.level,
        });

        this.filepath = init.filepath;
        this.mode = init.mode;
        this.config = init.config;
        this.level = tuning.level;

        this.#format = options.format ?? formatLine;
        this.#metadata = options.metadata ?? statMetadata;

        this.#queue = new SerialQueue((_label, error) => this.#report('task', error));

        this.#throttle = new RotationThrottle({
            checkFrequency: tuning.checkFrequency,
            checkInterval: tuning.checkInterval,
            now: options.throttle?.now,
        });

        this.#buffer = new WriteBuffer(() => this.#sync(), tuning.flushThreshold);

        this.#executor = new RotationExecutor({
            targetPath: this.filepath,
            config: this.config,
            delegate: options.delegate,
            metadata: this.#metadata,
            reopen: () => this.#reopen(),
            report: (step, error) => this.#report(step, error),
        });

    }

    /**
     * Validate options and open the target.
     *
     * @throws InvalidPathError if the path cannot name a file
     * @throws InvalidPermissionError if the permission is not octal
     * @throws RotationConfigError if the rotation or tuning options are invalid
     * @throws SinkOpenError if the target cannot be opened
     */
    static async open(options: SinkOptions): Promise<RotatingFileSink> {

        const filepath = await validateFilePath(options.file);
        const mode = parsePermission(options.permission ?? DEFAULT_PERMISSION);
        const config = createRotationConfig(options.rotation);

        const sink = new RotatingFileSink({ filepath, mode, config, options });

        const [, mkdirErr] = await attempt(() => mkdir(dirname(filepath), { recursive: true }));

        if (mkdirErr) {

            throw new SinkOpenError(filepath, mkdirErr);

        }

        const [, openErr] = await attempt(() => sink.#openTarget(false));

        if (openErr) {

            throw new SinkOpenError(filepath, openErr);

        }

        if (options.diagnostics !== false) {

            sink.#detachDiagnostics = attachDiagnostics({
                stream: options.diagnostics ?? process.stderr,
                file: filepath,
            });

        }

        return sink;

    }

    /**
     * Current lifecycle state.
     */
    get state(): SinkState {

        return this.#state;

    }

    /**
     * Whether the rotation gate is closed.
     */
    get isPaused(): boolean {

        return this.#paused;

    }

    /**
     * Counters for this sink.
     */
    get stats(): SinkStats {

        return {
            pending: this.#queue.stats.pending,
            totalWritten: this.#totalWritten,
            totalBytes: this.#totalBytes,
            dropped: this.#dropped,
            unsyncedWrites: this.#buffer.unsyncedWrites,
            rotations: this.#rotations,
            checks: this.#checks,
        };

    }

    // ─────────────────────────────────────────────────────────────
    // Write API
    // ─────────────────────────────────────────────────────────────

    /**
     * Queue a line for the target.
     *
     * Returns immediately. The line is formatted now, so its timestamp is
     * the time of the call, and written when the queue reaches it.
     */
    log(level: LogLevel, message: string): void {

        if (this.#state === 'closing' || this.#state === 'closed') {

            this.#dropped++;

            return;

        }

        if (!isLevelEnabled(level, this.level)) {

            this.#dropped++;

            return;

        }

        const [line, formatErr] = attemptSync(() => this.#format(level, message, new Date()));

        if (formatErr) {

            this.#dropped++;
            this.#report('append', formatErr);

            return;

        }

        this.#queue.enqueue('append', () => this.#append(line));

    }

    trace(message: string): void {

        this.log('trace', message);

    }

    debug(message: string): void {

        this.log('debug', message);

    }

    info(message: string): void {

        this.log('info', message);

    }

    warn(message: string): void {

        this.log('warn', message);

    }

    error(message: string): void {

        this.log('error', message);

    }

    // ─────────────────────────────────────────────────────────────
    // Control
    // ─────────────────────────────────────────────────────────────

    /**
     * Sync pending writes now, ahead of anything still queued.
     */
    async flush(): Promise<void> {

        if (this.#state === 'closed') {

            return;

        }

        await this.#queue.schedule('flush', () => this.#flushIfNeeded(true), { urgent: true });

    }

    /**
     * Close the rotation gate. Appends continue; size checks stop.
     */
    pauseRotation(): void {

        if (this.#paused) {

            return;

        }

        this.#paused = true;
        observer.emit('sink:paused', { file: this.filepath });

    }

    /**
     * Open the rotation gate again.
     */
    resumeRotation(): void {

        if (!this.#paused) {

            return;

        }

        this.#paused = false;
        observer.emit('sink:resumed', { file: this.filepath });

    }

    /**
     * Pause rotation and sync pending writes with priority.
     *
     * For hosts about to be suspended or backgrounded.
     */
    async suspend(): Promise<void> {

        this.pauseRotation();
        await this.flush();

    }

    /**
     * Wait until every queued line has been handled.
     */
    async drain(): Promise<void> {

        await this.#queue.drain();

    }

    /**
     * Drain the queue, sync and close the target.
     *
     * Lines logged after close() are dropped.
     */
    async close(): Promise<void> {

        if (!this.#closing) {

            this.#closing = this.#shutdown();

        }

        await this.#closing;

    }

    /**
     * The single close sequence shared by every close() call.
     */
    async #shutdown(): Promise<void> {

        this.#state = 'closing';

        await this.#queue.drain();
        await this.#flushIfNeeded(true);
        await this.#closeHandle();

        this.#state = 'closed';

        observer.emit('sink:closed', { file: this.filepath, totalWritten: this.#totalWritten });

        this.#detachDiagnostics?.();
        this.#detachDiagnostics = null;

    }

    // ─────────────────────────────────────────────────────────────
    // Serial context
    // ─────────────────────────────────────────────────────────────

    /**
     * Append one line, then sync and check rotation as needed.
     */
    async #append(line: string): Promise<void> {

        if (this.#state === 'degraded') {

            await this.#recover();

        }

        const handle = this.#handle;

        if (handle) {

            const [, writeErr] = await attempt(() => handle.write(line));

            if (writeErr) {

                this.#dropped++;
                this.#report('append', writeErr);

            }
            else {

                this.#totalWritten++;
                this.#totalBytes += Buffer.byteLength(line);
                this.#buffer.record();

            }

        }
        else {

            this.#dropped++;
            this.#report('append', new Error(`Target ${this.filepath} is not open`));

        }

        await this.#flushIfNeeded(false);
        await this.#checkRotation();

    }

    /**
     * Sync through the write buffer and report the outcome.
     */
    async #flushIfNeeded(force: boolean): Promise<void> {

        const outcome = await this.#buffer.flushIfNeeded(force);

        if (outcome.error) {

            this.#report('flush', outcome.error);

            return;

        }

        if (outcome.flushed) {

            observer.emit('sink:flushed', { file: this.filepath, writes: outcome.writes, forced: force });

        }

    }

    /**
     * Consult the gate and throttle, then stat and rotate if oversized.
     */
    async #checkRotation(): Promise<void> {

        if (this.#paused) {

            return;

        }

        if (!this.#throttle.tick()) {

            return;

        }

        this.#checks++;

        const [size, err] = await attempt(() => this.#metadata.size(this.filepath));

        if (err) {

            observer.emit('sink:checked', { file: this.filepath, size: null, maxFileSize: this.config.maxFileSize });
            this.#report('stat', err);

            return;

        }

        observer.emit('sink:checked', { file: this.filepath, size, maxFileSize: this.config.maxFileSize });

        if (size <= this.config.maxFileSize) {

            return;

        }

        await this.#rotate();

    }

    /**
     * Close the target and hand it to the executor.
     */
    async #rotate(): Promise<void> {

        const startedAt = Date.now();

        await this.#flushIfNeeded(true);
        await this.#closeHandle();

        const result = await this.#executor.rotate();

        if (!result.rotated || result.archive === undefined) {

            return;

        }

        this.#rotations++;

        observer.emit('sink:rotated', {
            file: this.filepath,
            archive: result.archive,
            removed: result.removed,
            durationMs: Date.now() - startedAt,
        });

    }

    /**
     * Open the target for appending.
     *
     * A target created here gets the configured permission bits
     * regardless of the umask.
     */
    async #openTarget(reopened: boolean): Promise<void> {

        const [, missing] = await attempt(() => access(this.filepath));
        const handle = await open(this.filepath, 'a', this.mode);

        if (missing) {

            const [, chmodErr] = await attempt(() => handle.chmod(this.mode));

            if (chmodErr) {

                await attempt(() => handle.close());
                throw chmodErr;

            }

        }

        this.#handle = handle;

        observer.emit('sink:opened', { file: this.filepath, mode: this.mode, reopened });

    }

    /**
     * Reopen after rotation; a failure leaves the sink degraded.
     */
    async #reopen(): Promise<void> {

        const [, err] = await attempt(() => this.#openTarget(true));

        if (err) {

            if (this.#state === 'open') {

                this.#state = 'degraded';

            }

            observer.emit('sink:degraded', { file: this.filepath, error: err });

            throw err;

        }

        if (this.#state === 'degraded') {

            this.#state = 'open';
            observer.emit('sink:recovered', { file: this.filepath });

        }

    }

    /**
     * Retry opening the target of a degraded sink.
     */
    async #recover(): Promise<void> {

        const [, err] = await attempt(() => this.#openTarget(true));

        if (err) {

            return;

        }

        this.#state = 'open';
        observer.emit('sink:recovered', { file: this.filepath });

    }

    /**
     * Sync the open target, if any.
     */
    async #sync(): Promise<void> {

        await this.#handle?.sync();

    }

    /**
     * Close the target handle, reporting a failure.
     */
    async #closeHandle(): Promise<void> {

        const handle = this.#handle;

        if (!handle) {

            return;

        }

        this.#handle = null;

        const [, err] = await attempt(() => handle.close());

        if (err) {

            this.#report('close', err);

        }

    }

    /**
     * Emit a sink error.
     */
    #report(step: SinkStep, error: Error): void {

        observer.emit('sink:error', { file: this.filepath, step, error, state: this.#state });

    }

}
