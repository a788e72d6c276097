/**
 * Emergency Channel
 *
 * Last-resort output used when the main pipeline cannot be trusted:
 * logging before initialization, appender failures, shutdown problems.
 *
 * Writes go straight to a fixed file with synchronous appends and do not
 * depend on the configured log directory. Failures here are dropped;
 * there is nowhere further to report them.
 */
import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { attemptSync } from '@logosdx/utils';

import { formatTime, LEVEL_LABELS } from './formatter.js';
import type { LogLevel } from './types.js';

/**
 * Emergency log location, relative to the working directory.
 */
export const EMERGENCY_LOG_FILE = join('logs', 'emergency.log');

/**
 * Best-effort direct file writer.
 *
 * @example
 * ```typescript
 * const emergency = new EmergencyChannel()
 *
 * emergency.write('error', 'Appender "file" failed: EACCES')
 * // logs/emergency.log:
 * // [14:03:22.481] [ERROR] [EMERGENCY] Appender "file" failed: EACCES
 * ```
 */
export class EmergencyChannel {

    readonly #filepath: string;

    constructor(filepath: string = EMERGENCY_LOG_FILE) {

        this.#filepath = filepath;

    }

    get filepath(): string {

        return this.#filepath;

    }

    /**
     * Append one line. Never throws.
     */
    write(level: LogLevel, message: string, now: number = Date.now()): void {

        const line = `[${formatTime(now)}] [${LEVEL_LABELS[level]}] [EMERGENCY] ${message}\n`;

        attemptSync(() => {

            mkdirSync(dirname(this.#filepath), { recursive: true });
            appendFileSync(this.#filepath, line, 'utf-8');

        });

    }

    /**
     * Report an internal failure at error level.
     */
    report(source: string, error: Error): void {

        this.write('error', `${source}: ${error.message}`);

    }

}
