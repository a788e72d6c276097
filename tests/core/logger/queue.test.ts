import { describe, it, expect, afterEach, vi } from 'vitest';

import { AsyncLogQueue, BoundedQueue, WakeSignal } from '../../../src/core/logger/queue.js';

const tick = (ms = 10): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('logger: queue', () => {

    describe('BoundedQueue', () => {

        it('should reject invalid capacities', () => {

            expect(() => new BoundedQueue(0)).toThrow(RangeError);
            expect(() => new BoundedQueue(1.5)).toThrow(RangeError);

        });

        it('should drain in FIFO order', () => {

            const ring = new BoundedQueue<number>(4);
            const batch: number[] = [];

            ring.push(1);
            ring.push(2);
            ring.push(3);

            expect(ring.drainInto(batch)).toBe(3);
            expect(batch).toEqual([1, 2, 3]);
            expect(ring.size).toBe(0);

        });

        it('should evict the oldest item when full', () => {

            const ring = new BoundedQueue<string>(2);

            expect(ring.push('a')).toBeUndefined();
            expect(ring.push('b')).toBeUndefined();
            expect(ring.isFull).toBe(true);
            expect(ring.push('c')).toBe('a');
            expect(ring.push('d')).toBe('b');

            const batch: string[] = [];
            ring.drainInto(batch);

            expect(batch).toEqual(['c', 'd']);

        });

        it('should clear a reused batch before filling it', () => {

            const ring = new BoundedQueue<number>(2);
            const batch = [9, 9, 9];

            ring.push(1);
            ring.drainInto(batch);

            expect(batch).toEqual([1]);

        });

        it('should keep working after wrapping around', () => {

            const ring = new BoundedQueue<number>(3);
            const batch: number[] = [];

            for (let i = 1; i <= 7; i++) {

                ring.push(i);

            }

            ring.drainInto(batch);
            expect(batch).toEqual([5, 6, 7]);

            ring.push(8);
            ring.drainInto(batch);
            expect(batch).toEqual([8]);

        });

    });

    describe('WakeSignal', () => {

        it('should resolve immediately when already set', async () => {

            const signal = new WakeSignal();

            signal.set();

            expect(await signal.wait(1000)).toBe(true);

        });

        it('should auto-reset after a wait', async () => {

            const signal = new WakeSignal();

            signal.set();
            await signal.wait(1000);

            expect(await signal.wait(5)).toBe(false);

        });

        it('should release a pending waiter', async () => {

            const signal = new WakeSignal();
            const waiting = signal.wait(1000);

            signal.set();

            expect(await waiting).toBe(true);

        });

        it('should time out without a signal', async () => {

            const signal = new WakeSignal();

            expect(await signal.wait(5)).toBe(false);

        });

    });

    describe('AsyncLogQueue', () => {

        let queue: AsyncLogQueue<number> | null = null;

        afterEach(async () => {

            await queue?.shutdown();
            queue = null;
            vi.restoreAllMocks();

        });

        const create = (capacity: number, written: number[], errors: Error[] = []): AsyncLogQueue<number> => {

            queue = new AsyncLogQueue<number>({
                capacity,
                write: (entry) => {

                    written.push(entry);

                },
                onError: (error) => {

                    errors.push(error);

                },
            });

            return queue;

        };

        it('should start uninitialized and reject entries', () => {

            const written: number[] = [];
            const q = create(10, written);

            expect(q.state).toBe('uninitialized');
            expect(q.enqueue(1)).toBe(false);
            expect(q.stats.pending).toBe(0);

        });

        it('should write enqueued entries from the writer loop', async () => {

            const written: number[] = [];
            const q = create(10, written);

            q.start();

            expect(q.state).toBe('running');
            expect(q.enqueue(1)).toBe(true);
            expect(q.enqueue(2)).toBe(true);

            // Nothing is written on the caller
            expect(written).toEqual([]);

            await tick();

            expect(written).toEqual([1, 2]);
            expect(q.stats.written).toBe(2);
            expect(q.stats.batches).toBe(1);

        });

        it('should keep exactly capacity entries and drop the oldest', () => {

            const written: number[] = [];
            const q = create(5, written);

            q.start();

            for (let i = 1; i <= 8; i++) {

                q.enqueue(i);

            }

            expect(q.stats.pending).toBe(5);
            expect(q.stats.dropped).toBe(3);

            expect(q.flush()).toBe(5);
            expect(written).toEqual([4, 5, 6, 7, 8]);

        });

        it('should drain everything on shutdown', async () => {

            const written: number[] = [];
            const q = create(100, written);

            q.start();

            for (let i = 0; i < 50; i++) {

                q.enqueue(i);

            }

            await q.shutdown();

            expect(q.state).toBe('stopped');
            expect(written).toHaveLength(50);
            expect(written[0]).toBe(0);
            expect(written[49]).toBe(49);
            expect(q.stats.pending).toBe(0);

        });

        it('should reject entries after shutdown', async () => {

            const written: number[] = [];
            const q = create(10, written);

            q.start();
            await q.shutdown();

            expect(q.enqueue(1)).toBe(false);
            expect(q.isAccepting).toBe(false);

        });

        it('should stop without ever starting', async () => {

            const written: number[] = [];
            const q = create(10, written);

            await q.shutdown();

            expect(q.state).toBe('stopped');

        });

        it('should report write failures and keep going', async () => {

            const errors: Error[] = [];
            const written: number[] = [];

            queue = new AsyncLogQueue<number>({
                capacity: 10,
                write: (entry) => {

                    if (entry === 2) {

                        throw new Error('disk full');

                    }

                    written.push(entry);

                },
                onError: (error) => {

                    errors.push(error);

                },
            });

            queue.start();
            queue.enqueue(1);
            queue.enqueue(2);
            queue.enqueue(3);

            await queue.shutdown();

            expect(written).toEqual([1, 3]);
            expect(errors.map((e) => e.message)).toEqual(['disk full']);

        });

        it('should ignore flush calls made from inside the write path', async () => {

            const written: number[] = [];
            const nested: number[] = [];

            queue = new AsyncLogQueue<number>({
                capacity: 10,
                write: (entry) => {

                    written.push(entry);
                    nested.push(queue?.flush() ?? -1);

                },
            });

            queue.start();
            queue.enqueue(1);
            queue.enqueue(2);

            expect(queue.flush()).toBe(2);
            expect(written).toEqual([1, 2]);
            expect(nested).toEqual([0, 0]);

        });

        it('should admit entries enqueued while draining', async () => {

            const written: number[] = [];

            queue = new AsyncLogQueue<number>({
                capacity: 10,
                write: (entry) => {

                    written.push(entry);

                    if (entry === 1) {

                        queue?.enqueue(99);

                    }

                },
            });

            queue.start();
            queue.enqueue(1);

            await queue.shutdown();

            expect(written).toEqual([1, 99]);

        });

        it('should keep draining when onError throws', async () => {

            const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
            const written: number[] = [];

            queue = new AsyncLogQueue<number>({
                capacity: 10,
                write: (entry) => {

                    if (entry === 2) {

                        throw new Error('disk full');

                    }

                    written.push(entry);

                },
                onError: () => {

                    throw new Error('handler broke');

                },
            });

            queue.start();
            queue.enqueue(1);
            queue.enqueue(2);
            queue.enqueue(3);

            expect(queue.flush()).toBe(3);

            queue.enqueue(4);
            await tick();
            queue.enqueue(5);

            await queue.shutdown();

            expect(written).toEqual([1, 3, 4, 5]);
            expect(queue.stats.written).toBe(5);
            expect(stderr).toHaveBeenCalledTimes(1);
            expect(stderr.mock.calls[0]?.[0]).toBe('[log-queue] onError failed: handler broke (reporting: disk full)');

        });

        it('should report a stalled writer and flush on the caller', async () => {

            // The writer never wakes, so it cannot exit its loop
            vi.spyOn(WakeSignal.prototype, 'wait').mockImplementation(() => new Promise<boolean>(() => undefined));

            const written: number[] = [];
            const errors: Error[] = [];

            queue = new AsyncLogQueue<number>({
                capacity: 10,
                shutdownTimeoutMs: 20,
                write: (entry) => {

                    written.push(entry);

                },
                onError: (error) => {

                    errors.push(error);

                },
            });

            queue.start();
            queue.enqueue(1);
            queue.enqueue(2);

            await queue.shutdown();

            expect(errors.map((e) => e.message)).toEqual([
                'Log writer did not stop within 20ms, flushing remaining entries',
            ]);
            expect(written).toEqual([1, 2]);
            expect(queue.state).toBe('stopped');

        });

    });

});
