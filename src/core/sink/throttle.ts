/**
 * Rotation Throttle
 *
 * Stat-ing the target on every write is too expensive at high volume, so
 * size checks only happen every `checkFrequency` calls or every
 * `checkInterval` milliseconds, whichever comes first.
 */
import { DEFAULT_CHECK_FREQUENCY, DEFAULT_CHECK_INTERVAL } from './config.js';
import type { ThrottleOptions } from './types.js';


/**
 * Decide whether a size check is due.
 *
 * A call count of exactly zero is always due.
 *
 * @example
 * ```typescript
 * shouldCheck(10, 1_000, { checkFrequency: 50_000, checkInterval: 480_000 })     // false
 * shouldCheck(50_000, 1_000, { checkFrequency: 50_000, checkInterval: 480_000 }) // true
 * shouldCheck(10, 480_000, { checkFrequency: 50_000, checkInterval: 480_000 })   // true
 * ```
 */
export function shouldCheck(
    callCount: number,
    elapsedSinceLastCheck: number,
    thresholds: { checkFrequency: number; checkInterval: number },
): boolean {

    return callCount === 0
        || callCount >= thresholds.checkFrequency
        || elapsedSinceLastCheck >= thresholds.checkInterval;

}


/**
 * Stateful throttle owned by one sink.
 *
 * @example
 * ```typescript
 * const throttle = new RotationThrottle({ checkFrequency: 1000 })
 *
 * if (throttle.tick()) {
 *     // stat the file
 * }
 * ```
 */
export class RotationThrottle {

    readonly checkFrequency: number;
    readonly checkInterval: number;

    #now: () => number;
    #callCount = 0;
    #lastCheckAt: number | null = null;

    constructor(options: ThrottleOptions = {}) {

        this.checkFrequency = options.checkFrequency ?? DEFAULT_CHECK_FREQUENCY;
        this.checkInterval = options.checkInterval ?? DEFAULT_CHECK_INTERVAL;
        this.#now = options.now ?? Date.now;

    }

    /**
     * Calls since the last check.
     */
    get callCount(): number {

        return this.#callCount;

    }

    /**
     * Time of the last check, or null before the first.
     */
    get lastCheckAt(): number | null {

        return this.#lastCheckAt;

    }

    /**
     * Count one log call and report whether a size check is due.
     *
     * When it is, the counter and the last-check time reset, regardless of
     * what the check finds. Before the first check the elapsed time counts
     * as infinite, so the very first call always checks.
     */
    tick(): boolean {

        this.#callCount += 1;

        const now = this.#now();
        const elapsed = this.#lastCheckAt === null
            ? Number.POSITIVE_INFINITY
            : now - this.#lastCheckAt;

        if (!shouldCheck(this.#callCount, elapsed, this)) {

            return false;

        }

        this.#callCount = 0;
        this.#lastCheckAt = now;

        return true;

    }

}
