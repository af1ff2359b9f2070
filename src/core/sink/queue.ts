/**
 * Serial Queue
 *
 * The execution context of one sink. Tasks are enqueued immediately
 * (non-blocking) and run one at a time, in order, so appends, flushes and
 * rotations of a sink never interleave.
 *
 * The queue guarantees:
 * - Order preservation (first enqueued = first run)
 * - Non-blocking enqueue (callers never wait)
 * - Urgent tasks run before anything still waiting
 * - drain() waits for every pending task
 */
import { attempt, attemptSync } from '@logosdx/utils';


/**
 * A unit of work on the queue.
 */
interface QueueTask {
    label: string;
    run: () => Promise<void>;
    done?: () => void;
}

/**
 * Queue counters.
 */
export interface SerialQueueStats {

    /** Tasks waiting, urgent ones included */
    pending: number;

    /** Tasks that ran to completion */
    totalRun: number;

    /** Tasks that rejected */
    totalFailed: number;

    /** Whether a task is running right now */
    isRunning: boolean;
}

/**
 * Options for SerialQueue.schedule().
 */
export interface ScheduleOptions {

    /** Run ahead of every task still waiting */
    urgent?: boolean;
}


/**
 * Single-consumer task queue.
 *
 * @example
 * ```typescript
 * const queue = new SerialQueue((label, error) => report(label, error))
 *
 * queue.enqueue('append', () => handle.write(line))
 * await queue.schedule('flush', () => handle.sync(), { urgent: true })
 *
 * await queue.drain()  // Wait for everything
 * ```
 */
export class SerialQueue {

    #tasks: QueueTask[] = [];
    #urgent: QueueTask[] = [];
    #isRunning = false;
    #totalRun = 0;
    #totalFailed = 0;
    #onError: (label: string, error: Error) => void;

    // Resolve functions for drain waiters
    #drainResolvers: Array<() => void> = [];

    constructor(onError: (label: string, error: Error) => void = () => undefined) {

        this.#onError = onError;

    }


    /**
     * Get queue statistics.
     */
    get stats(): SerialQueueStats {

        return {
            pending: this.#tasks.length + this.#urgent.length,
            totalRun: this.#totalRun,
            totalFailed: this.#totalFailed,
            isRunning: this.#isRunning,
        };

    }


    /**
     * Enqueue a task without waiting for it.
     */
    enqueue(label: string, run: () => Promise<void>): void {

        this.#tasks.push({ label, run });
        this.#startCycle();

    }


    /**
     * Enqueue a task and resolve once it has run.
     *
     * Never rejects; a failing task goes to the error handler.
     */
    schedule(label: string, run: () => Promise<void>, options: ScheduleOptions = {}): Promise<void> {

        return new Promise((resolve) => {

            const task: QueueTask = { label, run, done: resolve };

            if (options.urgent) {

                this.#urgent.push(task);

            }
            else {

                this.#tasks.push(task);

            }

            this.#startCycle();

        });

    }


    /**
     * Wait until the queue is empty and nothing is running.
     */
    async drain(): Promise<void> {

        if (this.#tasks.length === 0 && this.#urgent.length === 0 && !this.#isRunning) {

            return;

        }

        return new Promise((resolve) => {

            this.#drainResolvers.push(resolve);

        });

    }


    /**
     * Start the run cycle if not already running.
     */
    #startCycle(): void {

        if (this.#isRunning) {

            return;

        }

        this.#isRunning = true;
        void this.#cycle();

    }


    /**
     * Run tasks sequentially, urgent ones first.
     */
    async #cycle(): Promise<void> {

        let task = this.#next();

        while (task) {

            const current = task;
            const [, err] = await attempt(() => current.run());

            if (err) {

                this.#totalFailed++;
                this.#handleError(current.label, err);

            }
            else {

                this.#totalRun++;

            }

            current.done?.();
            task = this.#next();

        }

        this.#isRunning = false;

        for (const resolve of this.#drainResolvers) {

            resolve();

        }

        this.#drainResolvers = [];

    }


    /**
     * Pass a task failure on; a throwing handler must not stop the cycle.
     */
    #handleError(label: string, error: Error): void {

        const [, handlerErr] = attemptSync(() => this.#onError(label, error));

        if (handlerErr) {

            console.error(`[rotalog] error handler failed for task '${label}': ${handlerErr.message}`);

        }

    }


    /**
     * Take the next task to run.
     */
    #next(): QueueTask | undefined {

        return this.#urgent.shift() ?? this.#tasks.shift();

    }

}
