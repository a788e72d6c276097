/**
 * Async Log Queue
 *
 * Bridges synchronous callers to a single long-lived writer loop.
 * Entries are enqueued immediately (callers never wait on I/O) and
 * handed to the sink in the order they were enqueued.
 *
 * The queue guarantees:
 * - Order preservation (first enqueued = first written)
 * - Bounded memory (drop-oldest once capacity is reached)
 * - Graceful shutdown (bounded wait, then a forced drain on the caller)
 */
import { attemptSync } from '@logosdx/utils'

import type { QueueState, QueueStats } from './types.js'


/**
 * Fixed-capacity FIFO ring buffer.
 *
 * Pushing onto a full buffer evicts the oldest item.
 *
 * @example
 * ```typescript
 * const ring = new BoundedQueue<string>(2)
 *
 * ring.push('a')
 * ring.push('b')
 * ring.push('c')  // returns 'a'
 *
 * const batch: string[] = []
 * ring.drainInto(batch)  // batch = ['b', 'c']
 * ```
 */
export class BoundedQueue<T> {

    #slots: Array<T | undefined>
    #head = 0
    #size = 0

    constructor(capacity: number) {

        if (!Number.isInteger(capacity) || capacity < 1) {

            throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`)
        }

        this.#slots = new Array<T | undefined>(capacity)
    }


    get capacity(): number {

        return this.#slots.length
    }


    get size(): number {

        return this.#size
    }


    get isFull(): boolean {

        return this.#size === this.#slots.length
    }


    /**
     * Append to the tail.
     *
     * @returns The evicted head when the buffer was full, else undefined
     */
    push(item: T): T | undefined {

        const capacity = this.#slots.length

        if (this.#size < capacity) {

            this.#slots[(this.#head + this.#size) % capacity] = item
            this.#size++

            return undefined
        }

        const evicted = this.#slots[this.#head]

        this.#slots[this.#head] = item
        this.#head = (this.#head + 1) % capacity

        return evicted
    }


    /**
     * Move every item into `batch`, oldest first.
     *
     * The batch is cleared before filling so the caller can reuse it.
     *
     * @returns Number of items moved
     */
    drainInto(batch: T[]): number {

        batch.length = 0

        const capacity = this.#slots.length
        const count = this.#size

        for (let i = 0; i < count; i++) {

            const index = (this.#head + i) % capacity
            const item = this.#slots[index]

            if (item !== undefined) {

                batch.push(item)
            }

            this.#slots[index] = undefined
        }

        this.#head = 0
        this.#size = 0

        return count
    }
}


/**
 * Auto-reset wake event with a timed wait.
 *
 * `set()` releases the pending waiter, or latches until the next
 * `wait()` when nobody is waiting. The wait timer is unref'd so an idle
 * writer never keeps the process alive.
 */
export class WakeSignal {

    #signaled = false
    #release: ((woken: boolean) => void) | null = null


    /**
     * Wake the waiter (or latch the signal for the next wait).
     */
    set(): void {

        const release = this.#release

        if (release) {

            this.#release = null
            release(true)

            return
        }

        this.#signaled = true
    }


    /**
     * Wait for the signal.
     *
     * @returns true when signaled, false on timeout
     */
    wait(timeoutMs: number): Promise<boolean> {

        if (this.#signaled) {

            this.#signaled = false

            return Promise.resolve(true)
        }

        return new Promise((resolve) => {

            const timer = setTimeout(() => {

                this.#release = null
                resolve(false)
            }, timeoutMs)

            timer.unref()

            this.#release = (woken) => {

                clearTimeout(timer)
                resolve(woken)
            }
        })
    }
}


/**
 * Options for AsyncLogQueue.
 */
export interface AsyncLogQueueOptions<T> {

    /** Maximum pending entries before the oldest is evicted */
    capacity: number

    /** Synchronous write path that receives each drained entry */
    write: (entry: T) => void

    /** Maximum time the writer sleeps without a signal */
    drainIntervalMs?: number

    /** How long shutdown waits for the writer before forcing a drain */
    shutdownTimeoutMs?: number

    /** Receives sink failures and shutdown timeouts */
    onError?: (error: Error) => void
}


/**
 * Bounded producer/consumer queue with one writer loop.
 *
 * @example
 * ```typescript
 * const queue = new AsyncLogQueue<LogEntry>({
 *     capacity: 1000,
 *     write: (entry) => logger.writeEntry(entry),
 * })
 *
 * queue.start()
 * queue.enqueue(entry)    // returns immediately
 *
 * await queue.shutdown()  // everything enqueued so far has been written
 * ```
 */
export class AsyncLogQueue<T> {

    #queue: BoundedQueue<T>
    #signal = new WakeSignal()
    #batch: T[] = []
    #write: (entry: T) => void
    #onError: (error: Error) => void
    #drainIntervalMs: number
    #shutdownTimeoutMs: number

    #state: QueueState = 'uninitialized'
    #worker: Promise<void> | null = null
    #draining = false

    #dropped = 0
    #written = 0
    #batches = 0

    constructor(options: AsyncLogQueueOptions<T>) {

        this.#queue = new BoundedQueue<T>(options.capacity)
        this.#write = options.write
        this.#onError = options.onError ?? (() => undefined)
        this.#drainIntervalMs = options.drainIntervalMs ?? 100
        this.#shutdownTimeoutMs = options.shutdownTimeoutMs ?? 1000
    }


    get state(): QueueState {

        return this.#state
    }


    /**
     * Whether `enqueue` currently accepts entries.
     */
    get isAccepting(): boolean {

        return this.#state === 'running' || this.#state === 'shutting-down'
    }


    get stats(): QueueStats {

        return {
            pending: this.#queue.size,
            capacity: this.#queue.capacity,
            dropped: this.#dropped,
            written: this.#written,
            batches: this.#batches,
        }
    }


    /**
     * Start the writer loop. Only the first call has any effect.
     */
    start(): void {

        if (this.#state !== 'uninitialized') {

            return
        }

        this.#state = 'running'
        this.#worker = this.#run()
    }


    /**
     * Admit an entry and wake the writer.
     *
     * @returns false when the queue is not accepting entries
     */
    enqueue(entry: T): boolean {

        if (!this.isAccepting) {

            return false
        }

        const wasFull = this.#queue.isFull

        this.#queue.push(entry)

        if (wasFull) {

            this.#dropped++
        }

        this.#signal.set()

        return true
    }


    /**
     * Drain everything pending through the write path, on the caller.
     *
     * Calls made from inside the write path are ignored; the drain in
     * progress picks up whatever they would have written.
     *
     * @returns Number of entries drained
     */
    flush(): number {

        if (this.#draining) {

            return 0
        }

        return this.#drain()
    }


    /**
     * Stop the writer.
     *
     * Signals the loop, waits up to `shutdownTimeoutMs` for it to exit,
     * then drains whatever is still queued on the caller.
     */
    async shutdown(): Promise<void> {

        if (this.#state === 'uninitialized') {

            this.#state = 'stopped'

            return
        }

        if (this.#state !== 'running') {

            return
        }

        this.#state = 'shutting-down'
        this.#signal.set()

        const exited = await this.#joinWorker()

        if (!exited) {

            this.#report(new Error(
                `Log writer did not stop within ${this.#shutdownTimeoutMs}ms, flushing remaining entries`,
            ))
        }

        this.#state = 'stopped'
        this.flush()
        this.#worker = null
    }


    /**
     * Writer loop: sleep until signaled (or the interval passes), drain.
     */
    async #run(): Promise<void> {

        while (this.#state === 'running') {

            await this.#signal.wait(this.#drainIntervalMs)

            if (!this.#draining) {

                this.#drain()
            }
        }
    }


    #drain(): number {

        const count = this.#queue.drainInto(this.#batch)

        if (count === 0) {

            return 0
        }

        this.#draining = true

        try {

            for (const entry of this.#batch) {

                const [, err] = attemptSync(() => this.#write(entry))

                if (err) {

                    this.#report(err)
                }

                this.#written++
            }

            this.#batches++
        }
        finally {

            this.#batch.length = 0
            this.#draining = false
        }

        return count
    }


    /**
     * Hand an error to `onError`. A throwing handler goes to stderr and
     * the drain in progress still completes.
     */
    #report(error: Error): void {

        const [, handlerErr] = attemptSync(() => this.#onError(error))

        if (handlerErr) {

            console.error(`[log-queue] onError failed: ${handlerErr.message} (reporting: ${error.message})`)
        }
    }


    async #joinWorker(): Promise<boolean> {

        const worker = this.#worker

        if (!worker) {

            return true
        }

        let timer: ReturnType<typeof setTimeout> | undefined

        const timeout = new Promise<boolean>((resolve) => {

            timer = setTimeout(() => resolve(false), this.#shutdownTimeoutMs)
        })

        const exited = await Promise.race([worker.then(() => true), timeout])

        clearTimeout(timer)

        return exited
    }
}
