/**
 * Log Entry construction.
 *
 * Entries are frozen on creation; nothing downstream may change them.
 */
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { threadId } from 'node:worker_threads';

import { DEFAULT_CATEGORY, type LogEntry, type LogLevel } from './types.js';

/**
 * Fields supplied by the dispatcher.
 */
export interface EntryInit {
    level: LogLevel;
    message: string;
    category?: string | null;
    stackTrace?: string;
}

// Frames from this directory belong to the logger, not the caller
const LOGGER_DIR = dirname(fileURLToPath(import.meta.url));

// Error-tuple helpers the dispatcher runs inside
const HELPER_FRAME = /[\\/]node_modules[\\/]@logosdx[\\/]/;

// Headroom for the logger's own frames above the caller
const INTERNAL_FRAMES = 16;

/**
 * Build an immutable entry stamped with the current time and thread.
 *
 * @example
 * ```typescript
 * const entry = createEntry({ level: 'info', message: 'Loaded level 3' })
 * entry.category // 'General'
 * ```
 */
export function createEntry(init: EntryInit, now: number = Date.now()): LogEntry {

    const entry: LogEntry = {
        level: init.level,
        timestamp: now,
        message: init.message,
        category: init.category || DEFAULT_CATEGORY,
        threadId,
        ...(init.stackTrace ? { stackTrace: init.stackTrace } : {}),
    };

    return Object.freeze(entry);

}

/**
 * Capture the caller's stack, starting at the frame that called the
 * logger.
 *
 * The caller keeps the full `Error.stackTraceLimit` worth of frames;
 * the logger's own frames are captured on top of that and dropped.
 *
 * @returns One `at ...` frame per line, or undefined when unavailable
 */
export function captureStackTrace(): string | undefined {

    const limit = Error.stackTraceLimit;

    Error.stackTraceLimit = Number.isFinite(limit) ? limit + INTERNAL_FRAMES : limit;

    const stack = new Error().stack;

    Error.stackTraceLimit = limit;

    if (!stack) {

        return undefined;

    }

    const lines = stack
        .split('\n')
        .slice(1)
        .map((line) => line.trim())
        .filter(Boolean);

    const start = lines.findIndex((line) => !isInternalFrame(line));

    if (start < 0) {

        return undefined;

    }

    const frames = lines.slice(start, start + limit);

    return frames.length > 0 ? frames.join('\n') : undefined;

}

function isInternalFrame(line: string): boolean {

    return line.includes(LOGGER_DIR) || HELPER_FRAME.test(line);

}
