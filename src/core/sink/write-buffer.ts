/**
 * Write Buffer
 *
 * Counts appends that have not been synced to stable storage and syncs
 * once `flushThreshold` of them pile up. A crash loses at most that many
 * lines.
 */
import { attempt } from '@logosdx/utils';

import { DEFAULT_FLUSH_THRESHOLD } from './config.js';


/**
 * Outcome of flushIfNeeded().
 */
export interface FlushOutcome {

    /** Whether a sync was attempted */
    flushed: boolean;

    /** Writes covered by the sync */
    writes: number;

    /** Sync failure, if any */
    error?: Error;
}


/**
 * Unsynced write counter with threshold-triggered sync.
 *
 * @example
 * ```typescript
 * const buffer = new WriteBuffer(() => handle.sync(), 200)
 *
 * await handle.write(line)
 * buffer.record()
 * await buffer.flushIfNeeded()       // syncs on the 200th write
 * await buffer.flushIfNeeded(true)   // syncs whatever is pending
 * ```
 */
export class WriteBuffer {

    readonly flushThreshold: number;

    readonly #sync: () => Promise<void>;
    #unsyncedWrites = 0;
    #totalFlushes = 0;

    constructor(sync: () => Promise<void>, flushThreshold: number = DEFAULT_FLUSH_THRESHOLD) {

        this.#sync = sync;
        this.flushThreshold = flushThreshold;

    }

    /**
     * Appends since the last sync.
     */
    get unsyncedWrites(): number {

        return this.#unsyncedWrites;

    }

    /**
     * Syncs performed, failed ones included.
     */
    get totalFlushes(): number {

        return this.#totalFlushes;

    }

    /**
     * Count one append.
     */
    record(): void {

        this.#unsyncedWrites += 1;

    }

    /**
     * Sync when forced with pending writes, or when the threshold is met.
     *
     * The counter resets even when the sync fails; the failure is returned
     * for the caller to report.
     */
    async flushIfNeeded(force = false): Promise<FlushOutcome> {

        const writes = this.#unsyncedWrites;
        const due = (force && writes > 0) || writes >= this.flushThreshold;

        if (!due) {

            return { flushed: false, writes: 0 };

        }

        this.#unsyncedWrites = 0;
        this.#totalFlushes += 1;

        const [, err] = await attempt(() => this.#sync());

        if (err) {

            return { flushed: true, writes, error: err };

        }

        return { flushed: true, writes };

    }

}
