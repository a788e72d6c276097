import { describe, it, expect, afterEach, vi } from 'vitest';

import {
    LogRequestBuffer,
    MAX_CATEGORY_BYTES,
    MAX_MESSAGE_BYTES,
    truncateUtf8,
    type LogTarget,
} from '../../../src/core/logger/bridge.js';
import type { LogLevel } from '../../../src/core/logger/types.js';

class RecordingTarget implements LogTarget {

    readonly calls: Array<[LogLevel, string, string | undefined]> = [];

    log(level: LogLevel, message: string, category?: string): void {

        this.calls.push([level, message, category]);

    }

}

describe('logger: bridge', () => {

    afterEach(() => {

        vi.useRealTimers();

    });

    describe('truncateUtf8', () => {

        it('should leave short strings alone', () => {

            expect(truncateUtf8('hello', 5)).toBe('hello');

        });

        it('should cut ASCII at the byte limit', () => {

            expect(truncateUtf8('x'.repeat(600), MAX_MESSAGE_BYTES)).toBe('x'.repeat(512));

        });

        it('should not split a two-byte character', () => {

            expect(truncateUtf8('aé', 2)).toBe('a');

        });

        it('should not split a four-byte character', () => {

            expect(truncateUtf8('😀😀', 6)).toBe('😀');

        });

    });

    describe('LogRequestBuffer', () => {

        it('should replay requests in order', () => {

            const buffer = new LogRequestBuffer();
            const target = new RecordingTarget();

            buffer.request('info', 'spawned', 'World');
            buffer.request('warn', 'fell through floor', 'Physics');
            buffer.request('error', 'desync');

            expect(buffer.pending).toBe(3);
            expect(buffer.pump(target)).toBe(3);
            expect(buffer.pending).toBe(0);
            expect(target.calls).toEqual([
                ['info', 'spawned', 'World'],
                ['warn', 'fell through floor', 'Physics'],
                ['error', 'desync', 'General'],
            ]);

        });

        it('should return 0 when nothing is pending', () => {

            expect(new LogRequestBuffer().pump(new RecordingTarget())).toBe(0);

        });

        it('should drop the oldest requests on overflow', () => {

            const buffer = new LogRequestBuffer(2);
            const target = new RecordingTarget();

            buffer.request('info', 'a');
            buffer.request('info', 'b');
            buffer.request('info', 'c');

            expect(buffer.dropped).toBe(1);

            buffer.pump(target);

            expect(target.calls.map(([, message]) => message)).toEqual(['b', 'c']);

        });

        it('should cap message and category sizes', () => {

            const buffer = new LogRequestBuffer();
            const target = new RecordingTarget();

            buffer.request('info', 'm'.repeat(1000), 'é'.repeat(40));
            buffer.pump(target);

            const [, message, category] = target.calls[0] ?? [];

            expect(message).toBe('m'.repeat(MAX_MESSAGE_BYTES));
            expect(category).toBe('é'.repeat(MAX_CATEGORY_BYTES / 2));

        });

        it('should pump on a schedule until stopped', () => {

            vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });

            const buffer = new LogRequestBuffer();
            const target = new RecordingTarget();
            const stop = buffer.schedule(target, 16);

            buffer.request('debug', 'tick 1');
            vi.advanceTimersByTime(16);

            expect(target.calls).toHaveLength(1);

            stop();
            buffer.request('debug', 'tick 2');
            vi.advanceTimersByTime(32);

            expect(target.calls).toHaveLength(1);
            expect(buffer.pending).toBe(1);

        });

    });

});
