/**
 * Log Request Bridge
 *
 * Collects log requests from frame-driven code (game loops, simulation
 * ticks) into fixed-size records and replays them through the ordinary
 * `log(level, message, category)` entry point in periodic batches.
 *
 * Messages are capped at 512 UTF-8 bytes and categories at 64, cut on
 * code point boundaries.
 *
 * @example
 * ```typescript
 * const requests = new LogRequestBuffer()
 * const stop = requests.schedule(logger, 16)
 *
 * // inside the tick
 * requests.request('warn', `Entity ${id} fell out of the world`, 'Physics')
 *
 * stop()
 * ```
 */
import { BoundedQueue } from './queue.js';
import { DEFAULT_CATEGORY, type LogLevel } from './types.js';

export const MAX_MESSAGE_BYTES = 512;
export const MAX_CATEGORY_BYTES = 64;

/**
 * One pending request.
 */
export interface LogRequest {
    readonly level: LogLevel;
    readonly message: string;
    readonly category: string;

    /** When the request was made, ms since the Unix epoch */
    readonly timestamp: number;
}

/**
 * Anything with the dispatcher's `log` signature.
 */
export interface LogTarget {
    log(level: LogLevel, message: string, category?: string): void;
}

/**
 * Cut a string to at most `maxBytes` UTF-8 bytes without splitting a
 * code point.
 */
export function truncateUtf8(text: string, maxBytes: number): string {

    const bytes = Buffer.from(text, 'utf-8');

    if (bytes.length <= maxBytes) {

        return text;

    }

    let end = maxBytes;

    // Back up over continuation bytes (10xxxxxx)
    while (end > 0 && (bytes[end] & 0xc0) === 0x80) {

        end--;

    }

    return bytes.subarray(0, end).toString('utf-8');

}

/**
 * Bounded buffer of log requests. Oldest requests are dropped on overflow.
 */
export class LogRequestBuffer {

    #requests: BoundedQueue<LogRequest>;
    #batch: LogRequest[] = [];
    #dropped = 0;

    constructor(capacity = 1024) {

        this.#requests = new BoundedQueue<LogRequest>(capacity);

    }

    /**
     * Requests waiting for the next pump.
     */
    get pending(): number {

        return this.#requests.size;

    }

    /**
     * Requests evicted by overflow.
     */
    get dropped(): number {

        return this.#dropped;

    }

    /**
     * Record a request.
     */
    request(
        level: LogLevel,
        message: string,
        category: string = DEFAULT_CATEGORY,
        now: number = Date.now(),
    ): void {

        const evicted = this.#requests.push({
            level,
            message: truncateUtf8(message, MAX_MESSAGE_BYTES),
            category: truncateUtf8(category, MAX_CATEGORY_BYTES),
            timestamp: now,
        });

        if (evicted) {

            this.#dropped++;

        }

    }

    /**
     * Replay every pending request into the target, oldest first.
     *
     * @returns Number of requests replayed
     */
    pump(target: LogTarget): number {

        const count = this.#requests.drainInto(this.#batch);

        for (const request of this.#batch) {

            target.log(request.level, request.message, request.category);

        }

        this.#batch.length = 0;

        return count;

    }

    /**
     * Pump on an interval. The timer is unref'd.
     *
     * @returns Function that stops the schedule
     */
    schedule(target: LogTarget, intervalMs = 16): () => void {

        const timer = setInterval(() => this.pump(target), intervalMs);
        timer.unref();

        return () => clearInterval(timer);

    }

}
