/**
 * Logger
 *
 * Dispatcher for leveled, categorized log entries. Each call is
 * filtered against the threshold (critical categories bypass it),
 * redacted, turned into a frozen entry and either enqueued for the
 * writer loop or written straight through the appenders.
 *
 * Log calls never throw. Internal failures are published as
 * `logger:error` events and copied to the emergency channel.
 *
 * @example
 * ```typescript
 * const logger = new Logger()
 *
 * logger.initialize(createConfig({
 *     minLevel: 'info',
 *     enableFileOutput: true,
 *     criticalCategories: ['Network'],
 * }))
 *
 * logger.info('Level loaded', 'World')
 * logger.debug('Socket opened', 'Network')  // critical: bypasses the threshold
 *
 * await logger.shutdown()
 * ```
 */
import { resolve, join } from 'node:path';
import { attempt, attemptSync } from '@logosdx/utils';

import { createObserver, type LoggerObserver } from '../observer.js';
import { isRelease } from '../environment.js';
import { createConfig, LogConfig, type LogConfigInput } from './config.js';
import { ConsoleAppender, type ConsoleSink } from './console.js';
import { EmergencyChannel, EMERGENCY_LOG_FILE } from './emergency.js';
import { captureStackTrace, createEntry } from './entry.js';
import { FileAppender } from './file.js';
import { formatMessage, type MessageProducer, type StructuredMessage } from './message.js';
import { PerformanceMonitor } from './performance.js';
import { AsyncLogQueue } from './queue.js';
import { filterSensitive } from './redact.js';
import {
    DEFAULT_CATEGORY,
    LOG_LEVEL_PRIORITY,
    type Appender,
    type LogEntry,
    type LoggerState,
    type LogLevel,
    type MinLevel,
    type QueueStats,
} from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {

    /** Directory that relative paths resolve against (default: cwd) */
    baseDir?: string;

    /** Display sink for the console appender (default: stdout/stderr) */
    console?: ConsoleSink;

    /** Appenders added after the built-in ones */
    appenders?: Appender[];

    /** Last-resort channel (default: `<baseDir>/logs/emergency.log`) */
    emergency?: EmergencyChannel;

    /** Use the release threshold (default: detected from the environment) */
    release?: boolean;

}

/**
 * Category used by `critical()` when none is given.
 */
export const CRITICAL_CATEGORY = 'Critical';

/**
 * Category of the logger's own announcements. List it as critical to
 * see them at any threshold.
 */
export const SYSTEM_CATEGORY = 'System';

const ERROR_PRIORITY = LOG_LEVEL_PRIORITY.error;
const WARN_PRIORITY = LOG_LEVEL_PRIORITY.warn;

/**
 * Logging dispatcher.
 *
 * Construct one per logging context; instances share nothing.
 */
export class Logger {

    readonly events: LoggerObserver;

    #baseDir: string;
    #consoleSink: ConsoleSink | undefined;
    #extraAppenders: Appender[];
    #emergency: EmergencyChannel;
    #release: boolean;

    #config: LogConfig | null = null;
    #minLevel: MinLevel = 'info';
    #appenders: Appender[] = [];
    #queue: AsyncLogQueue<LogEntry> | null = null;
    #monitor: PerformanceMonitor | null = null;
    #state: LoggerState = 'idle';
    #entriesWritten = 0;

    constructor(options: LoggerOptions = {}) {

        this.#baseDir = resolve(options.baseDir ?? process.cwd());
        this.#consoleSink = options.console;
        this.#extraAppenders = [...(options.appenders ?? [])];
        this.#emergency = options.emergency ?? new EmergencyChannel(join(this.#baseDir, EMERGENCY_LOG_FILE));
        this.#release = options.release ?? isRelease();

        this.events = createObserver();

        this.events.on('logger:error', ({ source, error }) => {

            this.#emergency.report(source, error);

        });

    }

    /**
     * Get the current logger state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * Configuration latched at initialization.
     */
    get config(): LogConfig | null {

        return this.#config;

    }

    /**
     * Current threshold.
     *
     * Read on every call without coordination; a change applies from
     * the next call on.
     */
    get minLevel(): MinLevel {

        return this.#minLevel;

    }

    set minLevel(level: MinLevel) {

        this.#minLevel = level;

    }

    /**
     * Names of the active appenders, in write order.
     */
    get appenderNames(): string[] {

        return this.#appenders.map((appender) => appender.name);

    }

    /**
     * Async queue statistics, or null when writing synchronously.
     */
    get queueStats(): QueueStats | null {

        return this.#queue?.stats ?? null;

    }

    /**
     * Entries handed to the appenders so far.
     */
    get entriesWritten(): number {

        return this.#entriesWritten;

    }

    // ─────────────────────────────────────────────────────────────
    // Lifecycle
    // ─────────────────────────────────────────────────────────────

    /**
     * Latch the configuration and build the pipeline.
     *
     * A missing configuration is reported to the emergency channel and
     * leaves the logger inert. Only an idle logger can be initialized.
     *
     * @returns Whether the logger is now running
     */
    initialize(config: LogConfig | null | undefined): boolean {

        if (this.#state !== 'idle') {

            return this.#state === 'running';

        }

        if (!config) {

            this.#emergency.write('error', 'Logger initialization failed: no configuration provided');

            return false;

        }

        const values = config.values;

        this.#config = config;
        this.#minLevel = config.effectiveMinLevel(this.#release);
        this.#appenders = this.#buildAppenders(config);

        if (values.enableAsync) {

            this.#queue = new AsyncLogQueue<LogEntry>({
                capacity: values.queueSize,
                write: (entry) => this.writeEntry(entry),
                onError: (error) => this.events.emit('logger:error', { source: 'queue', error }),
            });

            this.#queue.start();

        }

        this.#state = 'running';

        if (values.enableAsync && values.enablePerformanceLogging) {

            this.#monitor = new PerformanceMonitor(
                (message) => this.info(message, 'Performance'),
                values.performanceLogInterval,
            );

            this.#monitor.start();

        }

        this.events.emit('logger:started', {
            minLevel: this.#minLevel,
            async: values.enableAsync,
            appenders: this.appenderNames,
        });

        this.log('debug', 'Logging system initialized', SYSTEM_CATEGORY);

        return true;

    }

    /**
     * Drain the queue on the caller and flush every appender.
     */
    flush(): void {

        this.#queue?.flush();

        for (const appender of this.#appenders) {

            const [, err] = attemptSync(() => appender.flush());

            if (err) {

                this.#reportAppender(appender, err);

            }

        }

    }

    /**
     * Stop the pipeline.
     *
     * Stops the performance monitor, shuts the queue down (bounded wait,
     * then a forced drain), flushes and disposes every appender, and
     * waits for background archival. Later calls only reach the
     * emergency channel.
     */
    async shutdown(): Promise<void> {

        if (this.#state !== 'running') {

            return;

        }

        this.#state = 'stopping';

        this.#monitor?.stop();
        this.#monitor = null;

        if (this.#queue) {

            await this.#queue.shutdown();
            this.#queue = null;

        }

        const appenders = this.#appenders;

        for (const appender of appenders) {

            const [, flushErr] = attemptSync(() => appender.flush());

            if (flushErr) {

                this.#reportAppender(appender, flushErr);

            }

            const [, disposeErr] = attemptSync(() => appender.dispose());

            if (disposeErr) {

                this.#reportAppender(appender, disposeErr);

            }

        }

        for (const appender of appenders) {

            const whenIdle = appender.whenIdle;

            if (!whenIdle) {

                continue;

            }

            const [, err] = await attempt(() => whenIdle.call(appender));

            if (err) {

                this.#reportAppender(appender, err);

            }

        }

        this.#appenders = [];
        this.#state = 'stopped';

        this.events.emit('logger:stopped', { entriesWritten: this.#entriesWritten });

    }

    // ─────────────────────────────────────────────────────────────
    // Dispatch
    // ─────────────────────────────────────────────────────────────

    /**
     * Whether a call at this level and category would produce an entry.
     *
     * Before initialization and after shutdown only error and fatal
     * pass (they go to the emergency channel).
     */
    isEnabled(level: LogLevel, category?: string | null): boolean {

        const config = this.#config;

        if (!this.#isAccepting() || !config) {

            return LOG_LEVEL_PRIORITY[level] >= ERROR_PRIORITY;

        }

        if (LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.#minLevel]) {

            return true;

        }

        return config.criticalCategorySet.has(category || DEFAULT_CATEGORY);

    }

    /**
     * Log a message. Never throws.
     */
    log(level: LogLevel, message: string, category?: string | null): void {

        const [, err] = attemptSync(() => this.#dispatch(level, message, category));

        if (err) {

            this.#emergency.report('log', err);

        }

    }

    /**
     * Log a message produced on demand.
     *
     * The producer only runs when the entry would not be filtered out.
     *
     * @example
     * ```typescript
     * logger.logLazy('debug', () => `Path: ${path.nodes.map(String).join(' -> ')}`, 'AI')
     * ```
     */
    logLazy(level: LogLevel, producer: MessageProducer, category?: string | null): void {

        if (!this.isEnabled(level, category)) {

            return;

        }

        const [message, err] = attemptSync(producer);

        if (err) {

            this.events.emit('logger:error', { source: 'message', error: err });

            return;

        }

        this.log(level, message, category);

    }

    /**
     * Log a deferred structured message.
     */
    logStructured(level: LogLevel, message: StructuredMessage, category?: string | null): void {

        this.logLazy(level, () => message.toString(), category);

    }

    /**
     * Log a `{0}`-style template. Arguments are only formatted when the
     * level passes.
     */
    logFormat(level: LogLevel, template: string, ...args: unknown[]): void {

        this.logLazy(level, () => formatMessage(template, args));

    }

    debug(message: string, category?: string | null): void {

        this.log('debug', message, category);

    }

    info(message: string, category?: string | null): void {

        this.log('info', message, category);

    }

    warn(message: string, category?: string | null): void {

        this.log('warn', message, category);

    }

    error(message: string, category?: string | null): void {

        this.log('error', message, category);

    }

    fatal(message: string, category?: string | null): void {

        this.log('fatal', message, category);

    }

    debugStructured(message: StructuredMessage, category?: string | null): void {

        this.logStructured('debug', message, category);

    }

    infoStructured(message: StructuredMessage, category?: string | null): void {

        this.logStructured('info', message, category);

    }

    warnStructured(message: StructuredMessage, category?: string | null): void {

        this.logStructured('warn', message, category);

    }

    errorStructured(message: StructuredMessage, category?: string | null): void {

        this.logStructured('error', message, category);

    }

    fatalStructured(message: StructuredMessage, category?: string | null): void {

        this.logStructured('fatal', message, category);

    }

    /**
     * Log at info level in a category meant to be listed as critical.
     */
    critical(message: string, category: string = CRITICAL_CATEGORY): void {

        this.log('info', message, category);

    }

    /**
     * Log an exception at error level.
     *
     * Format: `[Exception] context: message` followed by the stack frames.
     */
    logException(error: unknown, context?: string): void {

        if (error === null || error === undefined) {

            return;

        }

        const err = error instanceof Error ? error : new Error(String(error));

        let message = '[Exception] ' + (context ? context + ': ' : '') + err.message;
        const frames = stackFrames(err);

        if (frames) {

            message += '\n' + frames;

        }

        this.log('error', message);

    }

    /**
     * Hand an entry to every appender.
     *
     * Each appender is isolated: a throwing appender is reported and the
     * rest still receive the entry. Used by the writer loop and by
     * synchronous logging.
     */
    writeEntry(entry: LogEntry): void {

        for (const appender of this.#appenders) {

            const [, err] = attemptSync(() => appender.append(entry));

            if (err) {

                this.#reportAppender(appender, err);

            }

        }

        this.#entriesWritten++;

    }

    #dispatch(level: LogLevel, message: string, category: string | null | undefined): void {

        const config = this.#config;

        if (!this.#isAccepting() || !config) {

            if (LOG_LEVEL_PRIORITY[level] >= ERROR_PRIORITY) {

                this.#emergency.write(level, `[Logger not initialized][${category || DEFAULT_CATEGORY}] ${message}`);

            }

            return;

        }

        const resolved = category || DEFAULT_CATEGORY;

        if (
            LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.#minLevel]
            && !config.criticalCategorySet.has(resolved)
        ) {

            return;

        }

        const values = config.values;

        const filtered = values.enableSensitiveFilter
            ? filterSensitive(message, config.redactionPatterns)
            : message;

        const stackTrace = values.enableStackTrace && LOG_LEVEL_PRIORITY[level] >= WARN_PRIORITY
            ? captureStackTrace()
            : undefined;

        const entry = createEntry({ level, message: filtered, category: resolved, stackTrace });

        if (this.#queue?.enqueue(entry)) {

            return;

        }

        this.writeEntry(entry);

    }

    /**
     * Running, or stopping while the queue still takes entries. Entries
     * admitted during shutdown are written by the queue's final drain.
     */
    #isAccepting(): boolean {

        if (this.#state === 'running') {

            return true;

        }

        return this.#state === 'stopping' && this.#queue !== null && this.#queue.isAccepting;

    }

    #buildAppenders(config: LogConfig): Appender[] {

        const values = config.values;
        const appenders: Appender[] = [];

        if (values.enableConsole) {

            appenders.push(new ConsoleAppender(this.#consoleSink));

        }

        if (values.enableFileOutput) {

            appenders.push(new FileAppender({
                directory: resolve(this.#baseDir, values.logDirectory),
                prefix: values.fileNamePrefix,
                maxFileSizeBytes: config.maxFileSizeBytes,
                maxFiles: values.maxFiles,
                compress: values.enableCompression,
                includeStackTrace: values.enableFileStackTrace,
                events: this.events,
            }));

        }

        appenders.push(...this.#extraAppenders);

        return appenders;

    }

    #reportAppender(appender: Appender, error: Error): void {

        this.events.emit('logger:error', { source: `appender:${appender.name}`, error });

    }

}

/**
 * Create and initialize a logger in one step.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ minLevel: 'debug', enableAsync: false })
 * ```
 */
export function createLogger(config: LogConfig | LogConfigInput = {}, options: LoggerOptions = {}): Logger {

    const logger = new Logger(options);

    logger.initialize(config instanceof LogConfig ? config : createConfig(config));

    return logger;

}

/**
 * Stack frames of an error, without the `Name: message` header.
 */
function stackFrames(error: Error): string {

    if (!error.stack) {

        return '';

    }

    return error.stack
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.startsWith('at '))
        .join('\n');

}
