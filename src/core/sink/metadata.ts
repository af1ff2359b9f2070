/**
 * File Metadata
 *
 * The size and modification time lookups the rotation path depends on,
 * behind the FileMetadata interface so tests and unusual filesystems
 * can substitute their own.
 */
import { stat } from 'node:fs/promises';

import type { FileMetadata } from './types.js';


/**
 * FileMetadata backed by fs.stat.
 */
export const statMetadata: FileMetadata = {

    async size(filepath: string): Promise<number> {

        const stats = await stat(filepath);

        return stats.size;

    },

    async modifiedAt(filepath: string): Promise<number> {

        const stats = await stat(filepath);

        return stats.mtimeMs;

    },

};
