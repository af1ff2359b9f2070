import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdirSync } from 'node:fs';
import { chmod, mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { RotatingFileSink } from '../../../src/core/sink/sink.js';
import { rawLine } from '../../../src/core/sink/formatter.js';
import { statMetadata } from '../../../src/core/sink/metadata.js';
import {
    InvalidPathError,
    InvalidPermissionError,
    RotationConfigError,
    SinkOpenError,
} from '../../../src/core/sink/errors.js';
import { observer } from '../../../src/core/observer.js';
import type { FileMetadata, SinkOptions } from '../../../src/core/sink/types.js';

describe('sink: RotatingFileSink', () => {

    let testDir: string;
    let target: string;
    let sink: RotatingFileSink | null;
    let cleanups: Array<() => void>;

    /**
     * Open a sink on the test target with raw lines and no diagnostics.
     */
    async function openSink(options: Partial<SinkOptions> = {}): Promise<RotatingFileSink> {

        sink = await RotatingFileSink.open({
            file: target,
            format: rawLine,
            diagnostics: false,
            ...options,
        });

        return sink;

    }

    beforeEach(async () => {

        testDir = join(tmpdir(), `rotalog-test-sink-${Date.now()}-${Math.random().toString(36).slice(2)}`);
        await mkdir(testDir, { recursive: true });
        target = join(testDir, 'app.log');
        sink = null;
        cleanups = [];

    });

    afterEach(async () => {

        for (const cleanup of cleanups) {

            cleanup();

        }

        await sink?.close();
        await rm(testDir, { recursive: true, force: true });

    });

    describe('open', () => {

        it('should create the target with the permission bits', async () => {

            await openSink({ permission: '600' });

            const stats = await stat(target);

            expect(stats.isFile()).toBe(true);
            expect(stats.mode & 0o777).toBe(0o600);

        });

        it('should default to mode 640', async () => {

            const opened = await openSink();

            expect(opened.mode).toBe(0o640);
            expect((await stat(target)).mode & 0o777).toBe(0o640);

        });

        it('should leave the mode of an existing target alone', async () => {

            await writeFile(target, 'existing\n');
            await chmod(target, 0o644);

            await openSink({ permission: '600' });

            expect((await stat(target)).mode & 0o777).toBe(0o644);

        });

        it('should append to an existing target', async () => {

            await writeFile(target, 'existing\n');

            const opened = await openSink();
            opened.info('appended');
            await opened.close();

            expect(await readFile(target, 'utf8')).toBe('existing\nappended\n');

        });

        it('should create missing parent directories', async () => {

            target = join(testDir, 'nested', 'deeper', 'app.log');

            await openSink();

            expect((await stat(target)).isFile()).toBe(true);

        });

        it('should reject an empty path', async () => {

            await expect(RotatingFileSink.open({ file: '' })).rejects.toThrow(InvalidPathError);

        });

        it('should reject a path ending in a separator', async () => {

            await expect(RotatingFileSink.open({ file: `${testDir}/` })).rejects.toThrow(
                `Invalid log file path '${testDir}/': path ends with a separator`,
            );

        });

        it('should reject an existing directory', async () => {

            await expect(RotatingFileSink.open({ file: testDir })).rejects.toThrow(InvalidPathError);

        });

        it('should reject an invalid permission', async () => {

            await expect(RotatingFileSink.open({ file: target, permission: 'rw-r--r--' })).rejects.toThrow(
                InvalidPermissionError,
            );

        });

        it('should reject an invalid rotation config', async () => {

            await expect(RotatingFileSink.open({
                file: target,
                rotation: { maxArchivedFilesCount: -1 },
            })).rejects.toThrow(RotationConfigError);

        });

        it('should wrap open failures', async () => {

            await writeFile(join(testDir, 'plain-file'), '');

            await expect(RotatingFileSink.open({
                file: join(testDir, 'plain-file', 'app.log'),
                diagnostics: false,
            })).rejects.toThrow(SinkOpenError);

        });

        it('should emit sink:opened', async () => {

            const opened = vi.fn();
            cleanups.push(observer.on('sink:opened', (data) => {

                if (data.file === target) opened(data);

            }));

            await openSink();

            expect(opened).toHaveBeenCalledWith({ file: target, mode: 0o640, reopened: false });

        });

    });

    describe('writing', () => {

        it('should write lines in call order', async () => {

            const opened = await openSink();

            opened.info('one');
            opened.warn('two');
            opened.error('three');

            await opened.close();

            expect(await readFile(target, 'utf8')).toBe('one\ntwo\nthree\n');

        });

        it('should format lines with timestamp and level by default', async () => {

            const opened = await openSink({ format: undefined });

            opened.warn('disk almost full');
            await opened.close();

            const content = await readFile(target, 'utf8');

            expect(content).toMatch(/^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[WARN \] disk almost full\n$/);

        });

        it('should not block the caller', async () => {

            const opened = await openSink();

            opened.info('queued');

            expect(opened.stats.totalWritten).toBe(0);

            await opened.drain();

            expect(opened.stats.totalWritten).toBe(1);

        });

        it('should drop lines below the minimum level', async () => {

            const opened = await openSink({ level: 'warn' });

            opened.debug('hidden');
            opened.info('hidden');
            opened.warn('shown');

            await opened.close();

            expect(await readFile(target, 'utf8')).toBe('shown\n');
            expect(opened.stats.dropped).toBe(2);

        });

        it('should count written lines and bytes', async () => {

            const opened = await openSink();

            opened.info('abc');
            opened.info('de');

            await opened.drain();

            expect(opened.stats.totalWritten).toBe(2);
            expect(opened.stats.totalBytes).toBe(7);

        });

    });

    describe('durability', () => {

        it('should sync every flushThreshold writes', async () => {

            const flushed = vi.fn();
            cleanups.push(observer.on('sink:flushed', (data) => {

                if (data.file === target) flushed(data);

            }));

            const opened = await openSink({ flushThreshold: 2 });

            for (const n of [1, 2, 3, 4, 5]) {

                opened.info(`line ${n}`);

            }

            await opened.drain();

            expect(flushed.mock.calls).toEqual([
                [{ file: target, writes: 2, forced: false }],
                [{ file: target, writes: 2, forced: false }],
            ]);
            expect(opened.stats.unsyncedWrites).toBe(1);

        });

        it('should run a forced flush ahead of queued lines', async () => {

            const flushed = vi.fn();
            cleanups.push(observer.on('sink:flushed', (data) => {

                if (data.file === target) flushed(data);

            }));

            const opened = await openSink({ flushThreshold: 1000 });

            opened.info('one');
            opened.info('two');
            opened.info('three');

            await opened.flush();

            // Only the line already being written was ahead of the flush
            expect(flushed).toHaveBeenCalledWith({ file: target, writes: 1, forced: true });

            await opened.drain();

            expect(opened.stats.totalWritten).toBe(3);

        });

        it('should sync pending writes on close', async () => {

            const opened = await openSink({ flushThreshold: 1000 });

            opened.info('one');
            opened.info('two');

            await opened.close();

            expect(opened.stats.unsyncedWrites).toBe(0);

        });

    });

    describe('rotation', () => {

        it('should rotate once the target exceeds maxFileSize', async () => {

            const onArchived = vi.fn();
            const opened = await openSink({
                rotation: { maxFileSize: 10 },
                throttle: { checkFrequency: 1 },
                delegate: { onArchived },
            });

            opened.info('aaaaaaaaaaaa');
            opened.info('b');

            await opened.close();

            expect(await readFile(`${target}.1`, 'utf8')).toBe('aaaaaaaaaaaa\n');
            expect(await readFile(target, 'utf8')).toBe('b\n');
            expect(onArchived).toHaveBeenCalledWith(target, `${target}.1`);
            expect(opened.stats.rotations).toBe(1);

        });

        it('should not rotate a target at exactly maxFileSize', async () => {

            const opened = await openSink({
                rotation: { maxFileSize: 4 },
                throttle: { checkFrequency: 1 },
            });

            opened.info('abc');

            await opened.close();

            expect(await readdir(testDir)).toEqual(['app.log']);

        });

        it('should keep only maxArchivedFilesCount archives, newest first', async () => {

            const opened = await openSink({
                rotation: { maxFileSize: 1, maxArchivedFilesCount: 2 },
                throttle: { checkFrequency: 1 },
            });

            for (const n of [1, 2, 3, 4, 5]) {

                opened.info(`l${n}`);

            }

            await opened.close();

            expect((await readdir(testDir)).sort()).toEqual(['app.log', 'app.log.1', 'app.log.2']);
            expect(await readFile(`${target}.1`, 'utf8')).toBe('l5\n');
            expect(await readFile(`${target}.2`, 'utf8')).toBe('l4\n');
            expect(await readFile(target, 'utf8')).toBe('');

        });

        it('should use date_uuid archive names', async () => {

            const opened = await openSink({
                rotation: { maxFileSize: 1, suffixExtension: 'date_uuid' },
                throttle: { checkFrequency: 1 },
            });

            opened.info('first');
            opened.info('second');

            await opened.close();

            const archives = (await readdir(testDir)).filter((name) => name !== 'app.log');

            expect(archives).toHaveLength(2);

            for (const name of archives) {

                expect(name).toMatch(/^app\.log\.\d{8}T\d{6}Z_[0-9a-f-]{36}$/);

            }

        });

        it('should check size only as often as the throttle allows', async () => {

            const opened = await openSink({ throttle: { checkFrequency: 2 } });

            for (const n of [1, 2, 3, 4, 5]) {

                opened.info(`line ${n}`);

            }

            await opened.drain();

            // First call, then every second call
            expect(opened.stats.checks).toBe(3);

        });

        it('should emit sink:rotated with the archive', async () => {

            const rotated = vi.fn();
            cleanups.push(observer.on('sink:rotated', (data) => {

                if (data.file === target) rotated(data);

            }));

            const opened = await openSink({
                rotation: { maxFileSize: 1 },
                throttle: { checkFrequency: 1 },
            });

            opened.info('x');
            await opened.drain();

            expect(rotated).toHaveBeenCalledWith(expect.objectContaining({
                file: target,
                archive: `${target}.1`,
                removed: [],
            }));

        });

    });

    describe('pause gate', () => {

        it('should not rotate while paused', async () => {

            const opened = await openSink({
                rotation: { maxFileSize: 1 },
                throttle: { checkFrequency: 1 },
            });

            opened.pauseRotation();
            opened.info('one');
            opened.info('two');

            await opened.drain();

            expect(await readdir(testDir)).toEqual(['app.log']);
            expect(opened.stats.checks).toBe(0);

            opened.resumeRotation();
            opened.info('three');

            await opened.close();

            expect(await readFile(`${target}.1`, 'utf8')).toBe('one\ntwo\nthree\n');

        });

        it('should emit paused and resumed once per change', async () => {

            const events: string[] = [];
            cleanups.push(observer.on('sink:paused', (data) => {

                if (data.file === target) events.push('paused');

            }));
            cleanups.push(observer.on('sink:resumed', (data) => {

                if (data.file === target) events.push('resumed');

            }));

            const opened = await openSink();

            opened.pauseRotation();
            opened.pauseRotation();
            opened.resumeRotation();
            opened.resumeRotation();

            expect(events).toEqual(['paused', 'resumed']);

        });

        it('should pause and sync on suspend', async () => {

            const opened = await openSink({ flushThreshold: 1000 });

            opened.info('one');
            await opened.drain();

            await opened.suspend();

            expect(opened.isPaused).toBe(true);
            expect(opened.stats.unsyncedWrites).toBe(0);

        });

    });

    describe('close', () => {

        it('should drain queued lines before closing', async () => {

            const opened = await openSink();

            for (let i = 0; i < 50; i++) {

                opened.info(`line ${i}`);

            }

            await opened.close();

            const lines = (await readFile(target, 'utf8')).trimEnd().split('\n');

            expect(lines).toHaveLength(50);
            expect(lines[49]).toBe('line 49');
            expect(opened.state).toBe('closed');

        });

        it('should drop lines logged after close', async () => {

            const opened = await openSink();

            opened.info('before');
            await opened.close();

            opened.info('after');
            await opened.drain();

            expect(await readFile(target, 'utf8')).toBe('before\n');
            expect(opened.stats.dropped).toBe(1);

        });

        it('should be safe to call twice', async () => {

            const opened = await openSink();

            await opened.close();
            await opened.close();

            expect(opened.state).toBe('closed');

        });

        it('should finish the whole close for a concurrent second call', async () => {

            const closed = vi.fn();
            cleanups.push(observer.on('sink:closed', (data) => {

                if (data.file === target) closed(data);

            }));

            const opened = await openSink({ flushThreshold: 1000 });

            opened.info('one');
            opened.info('two');

            const first = opened.close();
            await opened.close();

            expect(opened.state).toBe('closed');
            expect(opened.stats.unsyncedWrites).toBe(0);
            expect(closed).toHaveBeenCalledTimes(1);

            await first;

            expect(await readFile(target, 'utf8')).toBe('one\ntwo\n');

        });

        it('should emit sink:closed with the line count', async () => {

            const closed = vi.fn();
            cleanups.push(observer.on('sink:closed', (data) => {

                if (data.file === target) closed(data);

            }));

            const opened = await openSink();

            opened.info('one');
            await opened.close();

            expect(closed).toHaveBeenCalledWith({ file: target, totalWritten: 1 });

        });

    });

    describe('degraded state', () => {

        it('should drop lines while the target cannot be reopened and recover later', async () => {

            let oversized = true;
            let blocked = false;

            const metadata: FileMetadata = {
                size: async () => (oversized ? 100 : 0),
                modifiedAt: (path) => statMetadata.modifiedAt(path),
            };

            const errors: string[] = [];
            const states: string[] = [];

            cleanups.push(observer.on('sink:error', (data) => {

                if (data.file === target) errors.push(data.step);

            }));
            cleanups.push(observer.on('sink:degraded', (data) => {

                if (data.file === target) states.push('degraded');

            }));
            cleanups.push(observer.on('sink:recovered', (data) => {

                if (data.file === target) states.push('recovered');

            }));

            const opened = await openSink({
                rotation: { maxFileSize: 10 },
                throttle: { checkFrequency: 1 },
                metadata,
                delegate: {
                    // A directory in place of the target makes the reopen fail
                    onArchived: () => {

                        if (!blocked) {

                            blocked = true;
                            mkdirSync(target);

                        }

                    },
                },
            });

            opened.info('first');
            await opened.drain();

            oversized = false;

            expect(opened.state).toBe('degraded');
            expect(states).toEqual(['degraded']);

            opened.info('lost');
            await opened.drain();

            expect(opened.state).toBe('degraded');
            expect(opened.stats.dropped).toBe(1);

            await rm(target, { recursive: true });

            opened.info('second');
            await opened.close();

            expect(states).toEqual(['degraded', 'recovered']);
            expect(errors).toEqual(['reopen', 'append']);
            expect(await readFile(`${target}.1`, 'utf8')).toBe('first\n');
            expect(await readFile(target, 'utf8')).toBe('second\n');

        });

    });

});
