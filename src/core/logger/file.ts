/**
 * File Appender
 *
 * Writes formatted lines to timestamp-named files in the log directory.
 * Lines are buffered and written every `flushEvery` entries. Once the
 * active file grows past the size limit, the next append rotates:
 *
 * 1. flush and close the active file
 * 2. schedule zip archival of the closed file (when enabled)
 * 3. open a new file
 * 4. prune logs and archives beyond `maxFiles`
 *
 * Steps 1, 3 and 4 happen inside the append call. Archival runs in the
 * background; `whenIdle()` resolves once it has settled.
 */
import { closeSync, mkdirSync, openSync, writeSync } from 'node:fs';
import { attemptSync } from '@logosdx/utils';

import type { LoggerObserver } from '../observer.js';
import { formatFileLine } from './formatter.js';
import { archivePathFor, compressFile, nextLogFilePath, pruneLogFiles } from './rotation.js';
import type { Appender, LogEntry, RotationResult } from './types.js';

/**
 * Options for FileAppender.
 */
export interface FileAppenderOptions {

    /** Absolute log directory */
    directory: string;

    /** File name prefix (`<prefix>_yyyyMMdd_HHmmss_fff.log`) */
    prefix: string;

    maxFileSizeBytes: number;

    /** Logs and archives kept after pruning */
    maxFiles: number;

    /** Gzip rotated files */
    compress: boolean;

    /** Append stack traces to error/fatal lines */
    includeStackTrace: boolean;

    /** Receives rotation, archival, pruning and failure events */
    events: LoggerObserver;

    /** Buffered entries per physical write */
    flushEvery?: number;

}

/**
 * Size-rotated file appender.
 *
 * @example
 * ```typescript
 * const appender = new FileAppender({
 *     directory: '/var/log/game',
 *     prefix: 'app',
 *     maxFileSizeBytes: 10 * 1024 * 1024,
 *     maxFiles: 5,
 *     compress: true,
 *     includeStackTrace: false,
 *     events: logger.events,
 * })
 * ```
 */
export class FileAppender implements Appender {

    readonly name = 'file';

    #options: FileAppenderOptions;
    #flushEvery: number;

    #fd: number | null = null;
    #filepath: string | null = null;
    #size = 0;
    #pending: string[] = [];
    #archiving = new Map<string, Promise<void>>();
    #lastRotation: RotationResult | null = null;
    #disposed = false;

    constructor(options: FileAppenderOptions) {

        this.#options = options;
        this.#flushEvery = Math.max(1, options.flushEvery ?? 10);

    }

    /**
     * Active file path, or null before the first append.
     */
    get filepath(): string | null {

        return this.#filepath;

    }

    /**
     * Bytes in the active file, including buffered lines.
     */
    get size(): number {

        return this.#size;

    }

    /**
     * Outcome of the most recent rotation.
     */
    get lastRotation(): RotationResult | null {

        return this.#lastRotation;

    }

    append(entry: LogEntry): void {

        if (this.#disposed) {

            throw new Error('File appender has been disposed');

        }

        if (this.#fd !== null && this.#size > this.#options.maxFileSizeBytes) {

            this.#lastRotation = this.#rotate();

        }

        if (this.#fd === null) {

            this.#open();

        }

        const line = formatFileLine(entry, this.#options.includeStackTrace) + '\n';

        this.#pending.push(line);
        this.#size += Buffer.byteLength(line, 'utf-8');

        if (this.#pending.length >= this.#flushEvery) {

            this.flush();

        }

    }

    /**
     * Write every buffered line.
     */
    flush(): void {

        if (this.#fd === null || this.#pending.length === 0) {

            return;

        }

        const data = this.#pending.join('');
        this.#pending.length = 0;

        writeSync(this.#fd, data);

    }

    dispose(): void {

        if (this.#disposed) {

            return;

        }

        this.#disposed = true;

        this.#close();

    }

    /**
     * Resolve once every scheduled archive has finished (or failed).
     */
    async whenIdle(): Promise<void> {

        while (this.#archiving.size > 0) {

            await Promise.all(this.#archiving.values());

        }

    }

    #open(): string {

        mkdirSync(this.#options.directory, { recursive: true });

        const filepath = nextLogFilePath(this.#options.directory, this.#options.prefix);

        this.#fd = openSync(filepath, 'a');
        this.#filepath = filepath;
        this.#size = 0;

        return filepath;

    }

    #close(): void {

        const fd = this.#fd;

        if (fd === null) {

            return;

        }

        // The handle is released even when the final write fails
        try {

            this.flush();

        }
        finally {

            this.#fd = null;
            this.#pending.length = 0;
            closeSync(fd);

        }

    }

    /**
     * Rotate to a new file. Failures are reported, never thrown, so the
     * append that triggered rotation still goes through.
     */
    #rotate(): RotationResult | null {

        const oldFile = this.#filepath;

        const [, closeErr] = attemptSync(() => this.#close());

        if (closeErr) {

            this.#report(closeErr);

        }

        if (oldFile === null) {

            return null;

        }

        let archive: string | undefined;

        if (this.#options.compress) {

            archive = archivePathFor(oldFile);
            this.#scheduleArchive(oldFile);

        }

        const [newFile, openErr] = attemptSync(() => this.#open());

        if (openErr) {

            this.#report(openErr);

            return null;

        }

        this.#options.events.emit('logger:rotated', { oldFile, newFile });

        const exclude = new Set<string>([newFile, ...this.#archiving.keys()]);
        const [deleted, pruneErr] = attemptSync(() => pruneLogFiles(
            this.#options.directory,
            this.#options.prefix,
            this.#options.maxFiles,
            exclude,
        ));

        if (pruneErr) {

            this.#report(pruneErr);

            return { oldFile, newFile, archive, deletedFiles: [] };

        }

        if (deleted.length > 0) {

            this.#options.events.emit('logger:pruned', { deleted });

        }

        return { oldFile, newFile, archive, deletedFiles: deleted };

    }

    #scheduleArchive(filepath: string): void {

        const task = compressFile(filepath)
            .then(
                (archive) => {

                    this.#options.events.emit('logger:archived', { source: filepath, archive });

                },
                (error: unknown) => {

                    this.#report(error instanceof Error ? error : new Error(String(error)));

                },
            )
            .finally(() => {

                this.#archiving.delete(filepath);

            });

        this.#archiving.set(filepath, task);

    }

    #report(error: Error): void {

        this.#options.events.emit('logger:error', { source: `appender:${this.name}`, error });

    }

}
