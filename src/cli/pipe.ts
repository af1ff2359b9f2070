/**
 * Pipe a readable stream into a sink, one log line per input line.
 */
import { createInterface } from 'node:readline'
import type { Readable } from 'node:stream'

import { DEFAULT_FLUSH_THRESHOLD } from '../core/sink/config.js'
import type { RotatingFileSink } from '../core/sink/sink.js'
import type { LogLevel } from '../core/sink/types.js'


/**
 * Options for pipeLines().
 */
export interface PipeOptions {

    /** Queued lines at which reading waits for the sink to catch up (default: 200) */
    highWaterMark?: number
}


/**
 * Read `input` to the end, logging every line at `level`.
 *
 * Reading pauses whenever `highWaterMark` lines are queued on the sink,
 * so input faster than the disk does not pile up in memory. Resolves once
 * the input ends; the last lines may still be queued, so close or drain
 * the sink afterwards.
 *
 * @returns Number of lines read
 *
 * @example
 * ```typescript
 * const lines = await pipeLines(process.stdin, sink, 'info')
 * await sink.close()
 * ```
 */
export async function pipeLines(
    input: Readable,
    sink: RotatingFileSink,
    level: LogLevel,
    options: PipeOptions = {},
): Promise<number> {

    const highWaterMark = Math.max(1, options.highWaterMark ?? DEFAULT_FLUSH_THRESHOLD)
    const reader = createInterface({ input, crlfDelay: Infinity })
    let count = 0

    for await (const line of reader) {

        sink.log(level, line)
        count++

        if (sink.stats.pending >= highWaterMark) {

            await sink.drain()
        }
    }

    return count
}
