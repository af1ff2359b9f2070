/**
 * Sink errors.
 *
 * Only construction can fail loudly. Everything after a sink is open is
 * reported through `sink:error` events instead of thrown.
 */
import type { z } from 'zod';


/**
 * Error when the target path cannot be used.
 *
 * @example
 * ```typescript
 * const [sink, err] = await attempt(() => RotatingFileSink.open({ file: '/var/log/' }))
 * if (err instanceof InvalidPathError) {
 *     console.error(`Bad log path ${err.filepath}: ${err.reason}`)
 * }
 * ```
 */
export class InvalidPathError extends Error {

    override readonly name = 'InvalidPathError' as const;

    constructor(
        public readonly filepath: string,
        public readonly reason: string,
    ) {

        super(`Invalid log file path '${filepath}': ${reason}`);

    }

}


/**
 * Error when a permission string is not 3 or 4 octal digits.
 */
export class InvalidPermissionError extends Error {

    override readonly name = 'InvalidPermissionError' as const;

    constructor(public readonly permission: string) {

        super(`Invalid file permission '${permission}': expected 3 or 4 octal digits, e.g. '640'`);

    }

}


/**
 * Error when rotation or sink options fail validation.
 *
 * Includes the field that failed and all validation issues.
 */
export class RotationConfigError extends Error {

    override readonly name = 'RotationConfigError' as const;

    constructor(
        message: string,
        public readonly field: string,
        public readonly issues: z.ZodIssue[],
    ) {

        super(message);

    }

}


/**
 * Error when the target cannot be opened at construction.
 */
export class SinkOpenError extends Error {

    override readonly name = 'SinkOpenError' as const;

    constructor(
        public readonly filepath: string,
        public readonly error: Error,
    ) {

        super(`Failed to open log file '${filepath}': ${error.message}`, { cause: error });

    }

}


/**
 * Error when the archive name for a rotation is already taken.
 *
 * Reported with step `archive`; the target stays where it is.
 */
export class ArchiveExistsError extends Error {

    override readonly name = 'ArchiveExistsError' as const;
    readonly code = 'EEXIST' as const;

    constructor(public readonly archive: string) {

        super(`Archive '${archive}' already exists`);

    }

}
