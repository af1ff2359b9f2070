/**
 * Archive Enumerator
 *
 * Lists the archives sitting beside a target file, oldest first. The
 * directory itself is the only index: archive identity comes from the
 * file name and age from the modification time.
 */
import { readdir } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { attempt } from '@logosdx/utils';

import { statMetadata } from './metadata.js';
import { NUMBERING_SUFFIX, isRotationSuffix } from './namer.js';
import type { FileMetadata } from './types.js';


/**
 * Options for listArchives().
 */
export interface ListArchivesOptions {

    /** Modification time source (default: fs.stat) */
    metadata?: FileMetadata;

    /** Receives the failure when the listing degrades to empty */
    onError?: (error: Error) => void;
}


/**
 * Order two archives that share a modification time.
 *
 * Numbered archives with a higher number are older. Anything else falls
 * back to name order, which is chronological for date_uuid stamps.
 */
function compareSuffix(a: string, b: string): number {

    const suffixA = a.slice(a.lastIndexOf('.') + 1);
    const suffixB = b.slice(b.lastIndexOf('.') + 1);

    if (NUMBERING_SUFFIX.test(suffixA) && NUMBERING_SUFFIX.test(suffixB)) {

        return Number(suffixB) - Number(suffixA);

    }

    return a < b ? -1 : a > b ? 1 : 0;

}


/**
 * List archive files of a target, oldest modification time first.
 *
 * A sibling is an archive when its name is the target name plus one
 * rotation suffix (a generation number or a date_uuid stamp). The target
 * itself and unrelated siblings such as `app.log.bak` are left out.
 *
 * Never rejects: an unreadable directory or a failed stat yields `[]`.
 *
 * @example
 * ```typescript
 * await listArchives('/logs/app.log')
 * // ['/logs/app.log.3', '/logs/app.log.2', '/logs/app.log.1']
 * ```
 */
export async function listArchives(
    targetPath: string,
    options: ListArchivesOptions = {},
): Promise<string[]> {

    const metadata = options.metadata ?? statMetadata;
    const dir = dirname(targetPath);
    const base = basename(targetPath);
    const prefix = `${base}.`;

    const [names, readErr] = await attempt(() => readdir(dir));

    if (readErr) {

        options.onError?.(readErr);

        return [];

    }

    const candidates = names
        .filter((name) => name !== base && name.startsWith(prefix))
        .filter((name) => isRotationSuffix(name.slice(prefix.length)))
        .map((name) => join(dir, name));

    const [stamped, statErr] = await attempt(() => Promise.all(
        candidates.map(async (filepath) => ({
            filepath,
            mtime: await metadata.modifiedAt(filepath),
        })),
    ));

    if (statErr) {

        options.onError?.(statErr);

        return [];

    }

    return stamped
        .sort((a, b) => (a.mtime - b.mtime) || compareSuffix(a.filepath, b.filepath))
        .map((entry) => entry.filepath);

}
