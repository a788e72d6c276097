/**
 * Logger Types
 *
 * Type definitions shared by the dispatcher, the async queue
 * and the appenders.
 */

/**
 * Entry severity, ordered from least to most severe.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Minimum severity threshold.
 *
 * `silent` sits above every level: only critical categories get through.
 */
export type MinLevel = LogLevel | 'silent';

/**
 * Numeric priority for levels and thresholds.
 * Higher numbers = more severe.
 */
export const LOG_LEVEL_PRIORITY: Record<MinLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    fatal: 4,
    silent: 5,
};

/**
 * All entry levels in ascending order.
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Category used when the caller does not name one.
 */
export const DEFAULT_CATEGORY = 'General';

/**
 * A single log record.
 *
 * Built once by the dispatcher and never mutated afterwards. The queue
 * owns it until drained, then the appenders read it while writing.
 */
export interface LogEntry {
    readonly level: LogLevel;

    /** Wall-clock time, milliseconds since the Unix epoch */
    readonly timestamp: number;

    /** Message after redaction */
    readonly message: string;

    readonly category: string;

    /** Only captured for warn and above */
    readonly stackTrace?: string;

    /** Worker thread that produced the entry (0 = main thread) */
    readonly threadId: number;
}

/**
 * Output destination for log entries.
 *
 * Implementations own their buffers. The dispatcher isolates every call,
 * so a throwing appender never affects the others.
 */
export interface Appender {

    /** Label used when reporting failures */
    readonly name: string;

    append(entry: LogEntry): void;

    flush(): void;

    dispose(): void;

    /** Resolves once background work (e.g. archival) has settled */
    whenIdle?(): Promise<void>;

}

/**
 * Dispatcher lifecycle.
 */
export type LoggerState = 'idle' | 'running' | 'stopping' | 'stopped';

/**
 * Async queue lifecycle.
 */
export type QueueState = 'uninitialized' | 'running' | 'shutting-down' | 'stopped';

/**
 * Async queue statistics.
 */
export interface QueueStats {

    /** Entries waiting to be drained */
    pending: number;

    capacity: number;

    /** Entries evicted by overflow */
    dropped: number;

    /** Entries handed to the sink */
    written: number;

    /** Drain cycles that wrote at least one entry */
    batches: number;

}

/**
 * Rotation outcome reported by the file appender.
 */
export interface RotationResult {

    oldFile: string;

    newFile: string;

    /** Archive scheduled for the old file, if compression is enabled */
    archive?: string;

    deletedFiles: string[];

}
