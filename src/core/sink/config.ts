/**
 * Rotation configuration.
 *
 * Zod schemas for the rotation policy and sink tuning, size and
 * permission string parsing, and ROTALOG_* environment overrides.
 */
import { z } from 'zod';
import { attemptSync } from '@logosdx/utils';

import { InvalidPermissionError, RotationConfigError } from './errors.js';
import type {
    LogLevel,
    RotationConfig,
    RotationConfigInput,
} from './types.js';


/** Rotate once the target exceeds 10 MiB */
export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

/** Archives kept after eviction */
export const DEFAULT_MAX_ARCHIVED_FILES = 5;

/** Permission bits of the target */
export const DEFAULT_PERMISSION = '640';

/** Unsynced writes before a sync */
export const DEFAULT_FLUSH_THRESHOLD = 200;

/** Log calls between size checks */
export const DEFAULT_CHECK_FREQUENCY = 50_000;

/** Milliseconds between size checks */
export const DEFAULT_CHECK_INTERVAL = 8 * 60 * 1000;


/**
 * Parse a size string (e.g., '10mb', '1gb') to bytes.
 *
 * @example
 * ```typescript
 * parseSize('10mb')  // 10485760
 * parseSize('512kb') // 524288
 * parseSize('100')   // 100
 * ```
 */
export function parseSize(size: string): number {

    const match = size.trim().toLowerCase().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/);

    if (!match || !match[1]) {

        throw new Error(`Invalid size format: ${size}`);

    }

    const value = parseFloat(match[1]);
    const unit = match[2] ?? 'b';

    const multipliers: Record<string, number> = {
        b: 1,
        kb: 1024,
        mb: 1024 * 1024,
        gb: 1024 * 1024 * 1024,
    };

    const multiplier = multipliers[unit];

    if (multiplier === undefined) {

        throw new Error(`Invalid size unit: ${unit}`);

    }

    return Math.floor(value * multiplier);

}


/**
 * Parse an octal permission string into mode bits.
 *
 * @throws InvalidPermissionError unless the string is 3 or 4 octal digits
 *
 * @example
 * ```typescript
 * parsePermission('640')  // 0o640
 * parsePermission('0600') // 0o600
 * ```
 */
export function parsePermission(permission: string): number {

    if (!/^[0-7]{3,4}$/.test(permission)) {

        throw new InvalidPermissionError(permission);

    }

    return parseInt(permission, 8);

}


// ─────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────

export const SuffixExtensionSchema = z.enum(['numbering', 'date_uuid']);

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error']);

/**
 * Byte count, either a number or a size string.
 */
const SizeSchema = z
    .union([
        z.number().int('Max file size must be a whole number of bytes').nonnegative('Max file size cannot be negative'),
        z.string(),
    ])
    .transform((value, ctx) => {

        if (typeof value === 'number') {

            return value;

        }

        const [bytes, err] = attemptSync(() => parseSize(value));

        if (err) {

            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: err.message,
            });

            return z.NEVER;

        }

        return bytes;

    });

/**
 * Rotation policy schema.
 */
export const RotationConfigSchema = z.object({
    suffixExtension: SuffixExtensionSchema.default('numbering'),
    maxFileSize: SizeSchema.default(DEFAULT_MAX_FILE_SIZE),
    maxArchivedFilesCount: z
        .number()
        .int('Max archived files count must be a whole number')
        .min(0, 'Max archived files count cannot be negative')
        .max(255, 'Max archived files count must be at most 255')
        .default(DEFAULT_MAX_ARCHIVED_FILES),
});

/**
 * Write buffer, throttle and level tuning.
 */
export const SinkTuningSchema = z.object({
    flushThreshold: z
        .number()
        .int()
        .min(1, 'Flush threshold must be at least 1')
        .default(DEFAULT_FLUSH_THRESHOLD),
    checkFrequency: z
        .number()
        .int()
        .min(1, 'Check frequency must be at least 1')
        .default(DEFAULT_CHECK_FREQUENCY),
    checkInterval: z
        .number()
        .min(0, 'Check interval cannot be negative')
        .default(DEFAULT_CHECK_INTERVAL),
    level: LogLevelSchema.default('trace'),
});

export type SinkTuning = z.infer<typeof SinkTuningSchema>;
export type SinkTuningInput = z.input<typeof SinkTuningSchema>;


// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Turn the first zod issue into a RotationConfigError.
 */
function toConfigError(error: z.ZodError): RotationConfigError {

    const firstIssue = error.issues[0];
    const field = firstIssue?.path.join('.') || 'unknown';
    const message = firstIssue?.message ?? 'Invalid value';

    return new RotationConfigError(`Invalid rotation config: ${field}: ${message}`, field, error.issues);

}


/**
 * Build an immutable rotation policy, filling in defaults.
 *
 * @throws RotationConfigError if validation fails
 *
 * @example
 * ```typescript
 * createRotationConfig({ maxFileSize: '1mb', maxArchivedFilesCount: 3 })
 * // { suffixExtension: 'numbering', maxFileSize: 1048576, maxArchivedFilesCount: 3 }
 * ```
 */
export function createRotationConfig(input: RotationConfigInput | RotationConfig = {}): RotationConfig {

    const result = RotationConfigSchema.safeParse(input);

    if (!result.success) {

        throw toConfigError(result.error);

    }

    return Object.freeze({ ...result.data });

}


/**
 * Validate write buffer and throttle tuning, filling in defaults.
 *
 * @throws RotationConfigError if validation fails
 */
export function resolveSinkTuning(input: SinkTuningInput = {}): SinkTuning {

    const result = SinkTuningSchema.safeParse(input);

    if (!result.success) {

        throw toConfigError(result.error);

    }

    return result.data;

}


// ─────────────────────────────────────────────────────────────
// Environment
// ─────────────────────────────────────────────────────────────

/**
 * Sink settings read from the environment.
 */
export interface EnvSinkConfig {
    rotation: RotationConfigInput;
    permission?: string;
    flushThreshold?: number;
    level?: LogLevel;
}


/**
 * Read sink overrides from ROTALOG_* environment variables.
 *
 * Unset variables are left out so they never mask explicit options.
 *
 * @example
 * ```bash
 * ROTALOG_SUFFIX=date_uuid
 * ROTALOG_MAX_SIZE=50mb
 * ROTALOG_MAX_ARCHIVES=10
 * ROTALOG_PERMISSION=600
 * ROTALOG_FLUSH_THRESHOLD=500
 * ROTALOG_LEVEL=info
 * ```
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvSinkConfig {

    const rotation: RotationConfigInput = {};
    const config: EnvSinkConfig = { rotation };

    const suffix = env['ROTALOG_SUFFIX'];

    if (suffix) {

        const result = SuffixExtensionSchema.safeParse(suffix);

        if (!result.success) {

            throw new Error(
                `Invalid ROTALOG_SUFFIX: must be one of ${SuffixExtensionSchema.options.join(', ')}`,
            );

        }

        rotation.suffixExtension = result.data;

    }

    const maxSize = env['ROTALOG_MAX_SIZE'];

    if (maxSize) {

        rotation.maxFileSize = maxSize;

    }

    const maxArchives = env['ROTALOG_MAX_ARCHIVES'];

    if (maxArchives) {

        rotation.maxArchivedFilesCount = Number(maxArchives);

    }

    const permission = env['ROTALOG_PERMISSION'];

    if (permission) {

        config.permission = permission;

    }

    const flushThreshold = env['ROTALOG_FLUSH_THRESHOLD'];

    if (flushThreshold) {

        config.flushThreshold = Number(flushThreshold);

    }

    const level = env['ROTALOG_LEVEL'];

    if (level) {

        const result = LogLevelSchema.safeParse(level);

        if (!result.success) {

            throw new Error(
                `Invalid ROTALOG_LEVEL: must be one of ${LogLevelSchema.options.join(', ')}`,
            );

        }

        config.level = result.data;

    }

    return config;

}
