import { describe, it, expect } from 'vitest';

import {
    createRotationConfig,
    getEnvConfig,
    parsePermission,
    parseSize,
    resolveSinkTuning,
} from '../../../src/core/sink/config.js';
import { InvalidPermissionError, RotationConfigError } from '../../../src/core/sink/errors.js';

describe('sink: config', () => {

    describe('parseSize', () => {

        it('should parse bytes', () => {

            expect(parseSize('100')).toBe(100);
            expect(parseSize('100b')).toBe(100);

        });

        it('should parse units case-insensitively', () => {

            expect(parseSize('2KB')).toBe(2048);
            expect(parseSize('10mb')).toBe(10 * 1024 * 1024);
            expect(parseSize('1gb')).toBe(1024 * 1024 * 1024);

        });

        it('should parse decimal values', () => {

            expect(parseSize('1.5mb')).toBe(Math.floor(1.5 * 1024 * 1024));

        });

        it('should tolerate surrounding whitespace', () => {

            expect(parseSize(' 1kb ')).toBe(1024);

        });

        it('should throw on invalid format', () => {

            expect(() => parseSize('huge')).toThrow('Invalid size format: huge');
            expect(() => parseSize('')).toThrow('Invalid size format');

        });

    });

    describe('parsePermission', () => {

        it('should parse three octal digits', () => {

            expect(parsePermission('640')).toBe(0o640);

        });

        it('should parse four octal digits', () => {

            expect(parsePermission('0600')).toBe(0o600);

        });

        it('should reject non-octal strings', () => {

            expect(() => parsePermission('999')).toThrow(InvalidPermissionError);
            expect(() => parsePermission('rw-r')).toThrow(InvalidPermissionError);
            expect(() => parsePermission('64')).toThrow(
                "Invalid file permission '64': expected 3 or 4 octal digits, e.g. '640'",
            );

        });

    });

    describe('createRotationConfig', () => {

        it('should fill in defaults', () => {

            expect(createRotationConfig()).toEqual({
                suffixExtension: 'numbering',
                maxFileSize: 10 * 1024 * 1024,
                maxArchivedFilesCount: 5,
            });

        });

        it('should accept a size string', () => {

            const config = createRotationConfig({ maxFileSize: '1mb', maxArchivedFilesCount: 3 });

            expect(config.maxFileSize).toBe(1048576);
            expect(config.maxArchivedFilesCount).toBe(3);

        });

        it('should return a frozen object', () => {

            expect(Object.isFrozen(createRotationConfig())).toBe(true);

        });

        it('should allow keeping no archives', () => {

            expect(createRotationConfig({ maxArchivedFilesCount: 0 }).maxArchivedFilesCount).toBe(0);

        });

        it('should reject more than 255 archives', () => {

            let caught: unknown;

            try {

                createRotationConfig({ maxArchivedFilesCount: 256 });

            }
            catch (err) {

                caught = err;

            }

            expect(caught).toBeInstanceOf(RotationConfigError);

            if (caught instanceof RotationConfigError) {

                expect(caught.field).toBe('maxArchivedFilesCount');
                expect(caught.message).toBe(
                    'Invalid rotation config: maxArchivedFilesCount: Max archived files count must be at most 255',
                );

            }

        });

        it('should reject an unparseable size string', () => {

            expect(() => createRotationConfig({ maxFileSize: 'huge' })).toThrow(
                'Invalid rotation config: maxFileSize: Invalid size format: huge',
            );

        });

        it('should reject a fractional byte count', () => {

            expect(() => createRotationConfig({ maxFileSize: 1.5 })).toThrow(RotationConfigError);

        });

    });

    describe('resolveSinkTuning', () => {

        it('should fill in defaults', () => {

            expect(resolveSinkTuning()).toEqual({
                flushThreshold: 200,
                checkFrequency: 50_000,
                checkInterval: 480_000,
                level: 'trace',
            });

        });

        it('should reject a zero flush threshold', () => {

            expect(() => resolveSinkTuning({ flushThreshold: 0 })).toThrow(
                'Invalid rotation config: flushThreshold: Flush threshold must be at least 1',
            );

        });

    });

    describe('getEnvConfig', () => {

        it('should return an empty rotation when nothing is set', () => {

            expect(getEnvConfig({})).toEqual({ rotation: {} });

        });

        it('should read every variable', () => {

            const config = getEnvConfig({
                ROTALOG_SUFFIX: 'date_uuid',
                ROTALOG_MAX_SIZE: '5mb',
                ROTALOG_MAX_ARCHIVES: '3',
                ROTALOG_PERMISSION: '600',
                ROTALOG_FLUSH_THRESHOLD: '50',
                ROTALOG_LEVEL: 'warn',
            });

            expect(config).toEqual({
                rotation: {
                    suffixExtension: 'date_uuid',
                    maxFileSize: '5mb',
                    maxArchivedFilesCount: 3,
                },
                permission: '600',
                flushThreshold: 50,
                level: 'warn',
            });

        });

        it('should reject an unknown suffix policy', () => {

            expect(() => getEnvConfig({ ROTALOG_SUFFIX: 'gzip' })).toThrow(
                'Invalid ROTALOG_SUFFIX: must be one of numbering, date_uuid',
            );

        });

        it('should reject an unknown level', () => {

            expect(() => getEnvConfig({ ROTALOG_LEVEL: 'loud' })).toThrow(
                'Invalid ROTALOG_LEVEL: must be one of trace, debug, info, warn, error',
            );

        });

    });

});
