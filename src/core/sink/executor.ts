/**
 * Rotation Executor
 *
 * Runs one rotation of a target file:
 *
 * 1. renumber old archives (numbering policy only)
 * 2. archive the target
 * 3. evict archives beyond maxArchivedFilesCount
 * 4. reopen a fresh target
 *
 * Every step catches its own failures. A failed step is reported and the
 * remaining steps still run. Nothing is retried.
 */
import { access, rename, unlink } from 'node:fs/promises';
import { attempt, attemptSync } from '@logosdx/utils';

import { observer } from '../observer.js';
import { ArchiveExistsError } from './errors.js';
import { listArchives } from './enumerator.js';
import { statMetadata } from './metadata.js';
import { archiveNameFor, withGeneration, type ArchiveNameOptions } from './namer.js';
import type {
    FileMetadata,
    RotationConfig,
    RotationDelegate,
    RotationResult,
    SinkStep,
} from './types.js';


/**
 * Options for RotationExecutor construction.
 */
export interface RotationExecutorOptions {

    /** Target file path */
    targetPath: string;

    /** Rotation policy */
    config: RotationConfig;

    /** Opens a fresh target; rejects when it cannot */
    reopen: () => Promise<void>;

    /** Archive notification receiver */
    delegate?: RotationDelegate;

    /** Modification time source for enumeration */
    metadata?: FileMetadata;

    /** Clock and id source for date_uuid names */
    naming?: ArchiveNameOptions;

    /** Receives every step failure */
    report?: (step: SinkStep, error: Error) => void;
}


/**
 * Check whether a path exists.
 */
async function exists(filepath: string): Promise<boolean> {

    const [, err] = await attempt(() => access(filepath));

    return !err;

}


/**
 * Executes rotations for one target file.
 *
 * @example
 * ```typescript
 * const executor = new RotationExecutor({
 *     targetPath: '/logs/app.log',
 *     config: createRotationConfig({ maxArchivedFilesCount: 3 }),
 *     reopen: () => sink.reopen(),
 * })
 *
 * const result = await executor.rotate()
 * // { rotated: true, archive: '/logs/app.log.1', renumbered: [...], removed: [], errors: [] }
 * ```
 */
export class RotationExecutor {

    readonly targetPath: string;
    readonly config: RotationConfig;

    #reopen: () => Promise<void>;
    #delegate: RotationDelegate | undefined;
    #metadata: FileMetadata;
    #naming: ArchiveNameOptions;
    #report: (step: SinkStep, error: Error) => void;

    constructor(options: RotationExecutorOptions) {

        this.targetPath = options.targetPath;
        this.config = options.config;
        this.#reopen = options.reopen;
        this.#delegate = options.delegate;
        this.#metadata = options.metadata ?? statMetadata;
        this.#naming = options.naming ?? {};
        this.#report = options.report ?? (() => undefined);

    }

    /**
     * Run all four steps.
     */
    async rotate(): Promise<RotationResult> {

        const errors: RotationResult['errors'] = [];

        const fail = (step: SinkStep, error: Error): void => {

            errors.push({ step, error });
            this.#report(step, error);

        };

        const renumbered = await this.renumber(fail);
        const archive = await this.archive(fail);
        const removed = await this.evict(fail);

        const [, reopenErr] = await attempt(() => this.#reopen());

        if (reopenErr) {

            fail('reopen', reopenErr);

        }

        return {
            rotated: archive !== undefined,
            archive,
            renumbered,
            removed,
            errors,
        };

    }

    /**
     * Shift every numbered archive up one generation, vacating `.1`.
     *
     * The oldest of N archives becomes N+1, the newest becomes 2. A rename
     * whose destination already exists is skipped rather than overwriting.
     * Under date_uuid names never change and this is a no-op.
     */
    async renumber(fail: (step: SinkStep, error: Error) => void = this.#report): Promise<Array<{ from: string; to: string }>> {

        if (this.config.suffixExtension !== 'numbering') {

            return [];

        }

        const archives = await this.#list(fail);
        const renumbered: Array<{ from: string; to: string }> = [];

        for (const [index, from] of archives.entries()) {

            const generation = archives.length + 1 - index;
            const to = withGeneration(from, generation);

            if (await exists(to)) {

                continue;

            }

            const [, err] = await attempt(() => rename(from, to));

            if (err) {

                fail('renumber', err);
                continue;

            }

            renumbered.push({ from, to });
            observer.emit('sink:renumbered', { file: this.targetPath, from, to });

        }

        return renumbered;

    }

    /**
     * Move the target to its archive name.
     *
     * Never replaces an existing archive. When the name is taken (a skipped
     * renumber or a degraded listing) the target stays in place and the
     * failure is reported.
     *
     * @returns The archive path, or undefined when the target was not moved
     */
    async archive(fail: (step: SinkStep, error: Error) => void = this.#report): Promise<string | undefined> {

        const archive = archiveNameFor(this.targetPath, this.config.suffixExtension, this.#naming);

        if (await exists(archive)) {

            fail('archive', new ArchiveExistsError(archive));

            return undefined;

        }

        const [, err] = await attempt(() => rename(this.targetPath, archive));

        if (err) {

            fail('archive', err);

            return undefined;

        }

        observer.emit('sink:archived', {
            file: this.targetPath,
            archive,
            policy: this.config.suffixExtension,
        });

        this.#notify(fail, (delegate) => delegate.onArchived?.(this.targetPath, archive));

        return archive;

    }

    /**
     * Delete the oldest archives until at most maxArchivedFilesCount remain.
     *
     * @returns Deleted archive paths, oldest first
     */
    async evict(fail: (step: SinkStep, error: Error) => void = this.#report): Promise<string[]> {

        const archives = await this.#list(fail);
        const excess = archives.length - this.config.maxArchivedFilesCount;

        if (excess <= 0) {

            return [];

        }

        const removed: string[] = [];

        for (const archive of archives.slice(0, excess)) {

            const [, err] = await attempt(() => unlink(archive));

            if (err) {

                fail('evict', err);
                continue;

            }

            removed.push(archive);
            observer.emit('sink:archive-removed', { file: this.targetPath, archive });

            this.#notify(fail, (delegate) => delegate.onArchiveRemoved?.(archive));

        }

        return removed;

    }

    /**
     * Enumerate archives, reporting a degraded listing.
     */
    async #list(fail: (step: SinkStep, error: Error) => void): Promise<string[]> {

        return listArchives(this.targetPath, {
            metadata: this.#metadata,
            onError: (error) => fail('enumerate', error),
        });

    }

    /**
     * Call the delegate without letting it throw into the rotation.
     */
    #notify(
        fail: (step: SinkStep, error: Error) => void,
        call: (delegate: RotationDelegate) => void,
    ): void {

        const delegate = this.#delegate;

        if (!delegate) {

            return;

        }

        const [, err] = attemptSync(() => call(delegate));

        if (err) {

            fail('delegate', err);

        }

    }

}
