/**
 * Line Formatter
 *
 * Converts entries into output lines. The hot path avoids format-string
 * parsing: timestamps are assembled digit by digit and level labels
 * come from a precomputed table.
 *
 * File line grammar:
 *
 * ```
 * [HH:mm:ss.fff] [LEVEL] [category] message
 * ```
 *
 * where LEVEL is padded to five characters.
 */
import type { LogEntry, LogLevel } from './types.js';


/**
 * Five-character level labels.
 */
export const LEVEL_LABELS: Readonly<Record<LogLevel, string>> = {
    debug: 'DEBUG',
    info: 'INFO ',
    warn: 'WARN ',
    error: 'ERROR',
    fatal: 'FATAL',
};

/**
 * Matches one formatted file line (without stack trace).
 */
export const FILE_LINE_PATTERN = /^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[(DEBUG|INFO |WARN |ERROR|FATAL)\] \[[^\]]*\] .*$/;


/**
 * Format a timestamp as local `HH:mm:ss.fff`.
 *
 * @example
 * ```typescript
 * formatTime(new Date(2024, 0, 15, 9, 5, 7, 42).getTime()) // '09:05:07.042'
 * ```
 */
export function formatTime(timestamp: number): string {

    const date = new Date(timestamp);

    return twoDigits(date.getHours()) + ':'
        + twoDigits(date.getMinutes()) + ':'
        + twoDigits(date.getSeconds()) + '.'
        + threeDigits(date.getMilliseconds());

}

const DIGITS = '0123456789';

function twoDigits(value: number): string {

    return DIGITS.charAt((value / 10) | 0) + DIGITS.charAt(value % 10);

}

function threeDigits(value: number): string {

    return DIGITS.charAt((value / 100) | 0) + twoDigits(value % 100);

}


/**
 * Format an entry as a file line.
 *
 * @param entry - Entry to format
 * @param includeStackTrace - Append the stack for error/fatal entries
 * @returns The line, without a trailing newline
 */
export function formatFileLine(entry: LogEntry, includeStackTrace: boolean): string {

    let line = '[' + formatTime(entry.timestamp) + '] ['
        + LEVEL_LABELS[entry.level] + '] ['
        + entry.category + '] '
        + entry.message;

    if (
        includeStackTrace
        && entry.stackTrace
        && (entry.level === 'error' || entry.level === 'fatal')
    ) {

        line += '\n' + entry.stackTrace;

    }

    return line;

}


/**
 * Format an entry for a console sink.
 *
 * Format: `[category] message`, plus the stack trace on following
 * lines when one was captured.
 */
export function formatConsoleMessage(entry: LogEntry): string {

    let message = entry.category
        ? '[' + entry.category + '] ' + entry.message
        : entry.message;

    if (entry.stackTrace) {

        message += '\n' + entry.stackTrace;

    }

    return message;

}
