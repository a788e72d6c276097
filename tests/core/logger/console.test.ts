import { describe, it, expect, vi } from 'vitest';
import { Writable } from 'node:stream';

import { colorize, stripColor } from '../../../src/core/logger/color.js';
import { ConsoleAppender, createConsoleSink, type ConsoleSink } from '../../../src/core/logger/console.js';
import { createEntry } from '../../../src/core/logger/entry.js';

const spySink = () => ({
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
}) satisfies ConsoleSink;

const collector = (): { stream: Writable; chunks: string[] } => {

    const chunks: string[] = [];

    const stream = new Writable({
        write(chunk: Buffer | string, _encoding, callback) {

            chunks.push(chunk.toString());
            callback();

        },
    });

    return { stream, chunks };

};

describe('logger: console', () => {

    describe('ConsoleAppender', () => {

        it('should route levels to three severities', () => {

            const sink = spySink();
            const appender = new ConsoleAppender(sink);

            appender.append(createEntry({ level: 'debug', message: 'd', category: 'A' }));
            appender.append(createEntry({ level: 'info', message: 'i', category: 'A' }));
            appender.append(createEntry({ level: 'warn', message: 'w', category: 'A' }));
            appender.append(createEntry({ level: 'error', message: 'e', category: 'A' }));
            appender.append(createEntry({ level: 'fatal', message: 'f', category: 'A' }));

            expect(sink.info.mock.calls).toEqual([['[A] d'], ['[A] i']]);
            expect(sink.warn.mock.calls).toEqual([['[A] w']]);
            expect(sink.error.mock.calls).toEqual([['[A] e'], ['[A] f']]);

        });

        it('should pass the stack trace after the message', () => {

            const sink = spySink();
            const appender = new ConsoleAppender(sink);

            appender.append(createEntry({
                level: 'warn',
                message: 'slow',
                category: 'Render',
                stackTrace: 'at draw (render.ts:9:1)',
            }));

            expect(sink.warn).toHaveBeenCalledWith('[Render] slow\nat draw (render.ts:9:1)');

        });

        it('should treat flush and dispose as no-ops', () => {

            const sink = spySink();
            const appender = new ConsoleAppender(sink);

            appender.flush();
            appender.dispose();

            expect(sink.info).not.toHaveBeenCalled();
            expect(appender.name).toBe('console');

        });

    });

    describe('createConsoleSink', () => {

        it('should write info to stdout and the rest to stderr', () => {

            const stdout = collector();
            const stderr = collector();
            const sink = createConsoleSink({ stdout: stdout.stream, stderr: stderr.stream, color: false });

            sink.info('[Net] up');
            sink.warn('[Net] lag');
            sink.error('[Net] down');

            expect(stdout.chunks).toEqual(['[Net] up\n']);
            expect(stderr.chunks).toEqual(['[Net] lag\n', '[Net] down\n']);

        });

        it('should keep the text intact when coloring', () => {

            const stdout = collector();
            const sink = createConsoleSink({ stdout: stdout.stream, color: true });

            sink.info('[Net] up\nat connect (net.ts:1:1)');

            expect(stripColor(stdout.chunks.join(''))).toBe('[Net] up\nat connect (net.ts:1:1)\n');

        });

    });

    describe('colorize', () => {

        it('should preserve every line', () => {

            const colored = colorize('error', 'head\nframe one\nframe two');

            expect(stripColor(colored)).toBe('head\nframe one\nframe two');

        });

    });

});
