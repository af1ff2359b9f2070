/**
 * Archive Namer
 *
 * Computes the path a target file is renamed to when it is archived.
 */
import { randomUUID } from 'node:crypto';

import type { SuffixExtension } from './types.js';


/**
 * Matches a `date_uuid` suffix, e.g. `20240115T103045Z_0f8f...`.
 */
export const DATE_UUID_SUFFIX = /^\d{8}T\d{6}Z_[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

/**
 * Matches a `numbering` suffix: a positive integer.
 */
export const NUMBERING_SUFFIX = /^[1-9]\d*$/;


/**
 * Format a date as a fixed-width UTC stamp.
 *
 * @example
 * ```typescript
 * formatArchiveTimestamp(new Date('2024-01-15T10:30:45.123Z'))
 * // '20240115T103045Z'
 * ```
 */
export function formatArchiveTimestamp(date: Date): string {

    return date
        .toISOString()
        .replace(/[-:]/g, '')
        .replace(/\.\d+Z$/, 'Z');

}


/**
 * Options for archiveNameFor().
 */
export interface ArchiveNameOptions {

    /** Time of archiving (default: now) */
    now?: Date;

    /** Unique id source (default: crypto.randomUUID) */
    uniqueId?: () => string;
}


/**
 * Compute the archive path for a target file.
 *
 * Under `numbering` the answer is always `<target>.1`; renumbering has
 * already vacated that slot. Under `date_uuid` the unique id keeps two
 * archives made in the same second apart.
 *
 * @example
 * ```typescript
 * archiveNameFor('/logs/app.log', 'numbering')
 * // '/logs/app.log.1'
 *
 * archiveNameFor('/logs/app.log', 'date_uuid')
 * // '/logs/app.log.20240115T103045Z_9b2c4e1a-...'
 * ```
 */
export function archiveNameFor(
    targetPath: string,
    policy: SuffixExtension,
    options: ArchiveNameOptions = {},
): string {

    if (policy === 'numbering') {

        return `${targetPath}.1`;

    }

    const stamp = formatArchiveTimestamp(options.now ?? new Date());
    const id = (options.uniqueId ?? randomUUID)().toLowerCase();

    return `${targetPath}.${stamp}_${id}`;

}


/**
 * Replace the rotation suffix of an archive path with a generation number.
 *
 * @example
 * ```typescript
 * withGeneration('/logs/app.log.2', 5) // '/logs/app.log.5'
 * ```
 */
export function withGeneration(archivePath: string, generation: number): string {

    const dot = archivePath.lastIndexOf('.');

    return `${archivePath.slice(0, dot)}.${generation}`;

}


/**
 * Check whether a string is a rotation suffix under either policy.
 */
export function isRotationSuffix(suffix: string): boolean {

    return NUMBERING_SUFFIX.test(suffix) || DATE_UUID_SUFFIX.test(suffix);

}
