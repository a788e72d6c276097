/**
 * Console Appender
 *
 * Routes entries to a display sink at three severities:
 * debug/info → `info`, warn → `warn`, error/fatal → `error`.
 * The sink receives `[category] message` plus an optional stack trace.
 */
import type { Writable } from 'node:stream';

import { isInteractive } from '../environment.js';
import { colorize, type ConsoleSeverity } from './color.js';
import { formatConsoleMessage } from './formatter.js';
import type { Appender, LogEntry, LogLevel } from './types.js';

/**
 * Display collaborator that receives preformatted messages.
 */
export interface ConsoleSink {
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const SEVERITY_BY_LEVEL: Record<LogLevel, ConsoleSeverity> = {
    debug: 'info',
    info: 'info',
    warn: 'warn',
    error: 'error',
    fatal: 'error',
};

/**
 * Appender that forwards to a ConsoleSink.
 */
export class ConsoleAppender implements Appender {

    readonly name = 'console';

    #sink: ConsoleSink;

    constructor(sink: ConsoleSink = createConsoleSink()) {

        this.#sink = sink;

    }

    append(entry: LogEntry): void {

        const message = formatConsoleMessage(entry);

        switch (SEVERITY_BY_LEVEL[entry.level]) {

        case 'info':
            this.#sink.info(message);
            break;
        case 'warn':
            this.#sink.warn(message);
            break;
        case 'error':
            this.#sink.error(message);
            break;

        }

    }

    flush(): void {

        // Sinks write through immediately

    }

    dispose(): void {

        // The sink outlives the appender

    }

}

/**
 * Options for the default console sink.
 */
export interface ConsoleSinkOptions {

    /** Receives info messages (default: process.stdout) */
    stdout?: Writable;

    /** Receives warnings and errors (default: process.stderr) */
    stderr?: Writable;

    /** Color output (default: stdout is a TTY and NO_COLOR is unset) */
    color?: boolean;

}

/**
 * Create the default stream-backed sink.
 *
 * @example
 * ```typescript
 * const sink = createConsoleSink({ color: false })
 * sink.warn('[Audio] Buffer underrun')
 * // stderr: [Audio] Buffer underrun
 * ```
 */
export function createConsoleSink(options: ConsoleSinkOptions = {}): ConsoleSink {

    const stdout = options.stdout ?? process.stdout;
    const stderr = options.stderr ?? process.stderr;
    const color = options.color ?? isInteractive();

    const write = (stream: Writable, severity: ConsoleSeverity, message: string): void => {

        stream.write((color ? colorize(severity, message) : message) + '\n');

    };

    return {
        info: (message) => write(stdout, 'info', message),
        warn: (message) => write(stderr, 'warn', message),
        error: (message) => write(stderr, 'error', message),
    };

}
