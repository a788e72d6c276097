/**
 * Performance Monitor
 *
 * Periodically reports heap, resident memory and event-loop delay
 * through a log callback. The timer is unref'd and never keeps the
 * process alive.
 */
import { monitorEventLoopDelay, type IntervalHistogram } from 'node:perf_hooks';

import { MessageBuilder } from './message.js';

/**
 * One sample.
 */
export interface PerformanceSample {
    heapUsedMB: number;
    rssMB: number;

    /** 99th percentile event-loop delay since the previous sample */
    eventLoopP99Ms: number;
}

const BYTES_PER_MB = 1024 * 1024;
const NS_PER_MS = 1e6;

/**
 * Format a sample as a log message.
 *
 * @example
 * ```typescript
 * formatPerformanceSample({ heapUsedMB: 42.25, rssMB: 120, eventLoopP99Ms: 1.5 })
 * // 'Performance - heap: 42.3 MB, rss: 120.0 MB, event loop p99: 1.50 ms'
 * ```
 */
export function formatPerformanceSample(sample: PerformanceSample): string {

    return new MessageBuilder()
        .append('Performance - heap: ')
        .appendFixed(sample.heapUsedMB, 1)
        .append(' MB, rss: ')
        .appendFixed(sample.rssMB, 1)
        .append(' MB, event loop p99: ')
        .appendFixed(sample.eventLoopP99Ms, 2)
        .append(' ms')
        .toString();

}

/**
 * Interval sampler.
 *
 * @example
 * ```typescript
 * const monitor = new PerformanceMonitor((message) => logger.info(message, 'Performance'), 5)
 * monitor.start()
 * // ...
 * monitor.stop()
 * ```
 */
export class PerformanceMonitor {

    #report: (message: string) => void;
    #intervalMs: number;
    #timer: ReturnType<typeof setInterval> | null = null;
    #histogram: IntervalHistogram | null = null;

    constructor(report: (message: string) => void, intervalSeconds: number) {

        this.#report = report;
        this.#intervalMs = Math.max(1, Math.round(intervalSeconds * 1000));

    }

    get isRunning(): boolean {

        return this.#timer !== null;

    }

    start(): void {

        if (this.#timer) {

            return;

        }

        this.#histogram = monitorEventLoopDelay({ resolution: 20 });
        this.#histogram.enable();

        this.#timer = setInterval(() => this.sample(), this.#intervalMs);
        this.#timer.unref();

    }

    /**
     * Take a sample now and report it.
     */
    sample(): PerformanceSample {

        const memory = process.memoryUsage();
        const p99 = this.#histogram ? this.#histogram.percentile(99) / NS_PER_MS : 0;

        this.#histogram?.reset();

        const sample: PerformanceSample = {
            heapUsedMB: memory.heapUsed / BYTES_PER_MB,
            rssMB: memory.rss / BYTES_PER_MB,
            eventLoopP99Ms: Number.isFinite(p99) ? p99 : 0,
        };

        this.#report(formatPerformanceSample(sample));

        return sample;

    }

    stop(): void {

        if (this.#timer) {

            clearInterval(this.#timer);
            this.#timer = null;

        }

        this.#histogram?.disable();
        this.#histogram = null;

    }

}
