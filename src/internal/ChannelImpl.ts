import type { Channel, ReadResult } from "../Channel.js"
import { suspendCancellableCoroutine } from "../Common.js"
import { ClosedChannelError, UsageError } from "../Errors.js"
import { Failure } from "../Failure.js"
import { TaskState } from "../Task.js"
import type { CancelFunction, Coroutine, ResultCallback } from "../Types.js"
import { debug } from "./Config.js"
import { Queue } from "./Queue.js"

interface PendingWrite<T> {
    readonly value: T
    readonly resultCallback: ResultCallback<void>
}

/**
 * Creates a channel. With a capacity of 0 a write waits until a reader takes the message. Use Infinity for a channel
 * whose writes never suspend.
 *
 * A channel belongs to no loop, but a loop only counts its own timers, descriptors and awaited promises as things that
 * can wake a task. A producer outside of any task, such as a Node callback, must hand its messages over through a task
 * that waits on it with awaitPromise(). Otherwise Loop.run() rejects with DeadlockError while the readers wait.
 */
export const channel: <T>(capacity?: number) => Channel<T> = (capacity) => new ChannelImpl(capacity)

class ChannelImpl<T> implements Channel<T> {
    readonly #id: string = Math.random().toString(36).substring(7)
    readonly capacity: number
    #isClosed = false
    readonly #buffer: Queue<T> = new Queue()
    readonly #readers: Queue<ResultCallback<T>> = new Queue()
    readonly #writers: Queue<PendingWrite<T>> = new Queue()
    readonly #subscribers: Queue<() => void> = new Queue()

    constructor(capacity: number = 0) {
        if (capacity !== Infinity && !(Number.isInteger(capacity) && capacity >= 0)) {
            throw new UsageError(`Invalid channel capacity ${capacity}`)
        }

        this.capacity = capacity
    }

    get size(): number {
        return this.#buffer.length()
    }

    close(): void {
        if (this.#isClosed) return
        if (debug) console.log(`${this} ${this.constructor.name}.close()`)
        this.#isClosed = true

        for (; ;) {
            const reader = this.#readers.dequeue()
            if (reader === null) break
            reader.value(new Failure(new ClosedChannelError(`${this} was closed`)))
        }

        for (; ;) {
            const writer = this.#writers.dequeue()
            if (writer === null) break
            writer.value.resultCallback(new Failure(new ClosedChannelError(`${this} was closed`)))
        }

        this.#notify()
    }

    isClosed(): boolean {
        return this.#isClosed
    }

    isReadable(): boolean {
        return !this.#isClosed || this.#buffer.length() > 0
    }

    willBlock(): boolean {
        return !this.#isClosed && this.#buffer.length() === 0 && this.#writers.length() === 0
    }

    subscribe(listener: () => void): CancelFunction {
        const ticket = this.#subscribers.enqueue(listener)
        return () => {
            this.#subscribers.remove(ticket)
        }
    }

    * write(value: T): Coroutine<void> {
        if (this.tryWrite(value)) return

        // suspend writer until a reader makes room
        yield* suspendCancellableCoroutine<void>(TaskState.SuspendedChannel, (resultCallback) => {
            const ticket = this.#writers.enqueue({ value, resultCallback })
            this.#notify()
            return () => {
                this.#writers.remove(ticket)
            }
        })
    }

    tryWrite(value: T): boolean {
        if (this.#isClosed) throw new ClosedChannelError(`${this} is closed`)
        const reader = this.#readers.dequeue()

        if (reader !== null) {
            // resume receiver
            reader.value(value)
            return true
        }

        if (this.#buffer.length() < this.capacity) {
            this.#buffer.enqueue(value)
            this.#notify()
            return true
        }

        return false
    }

    * read(): Coroutine<T> {
        const result = this.tryRead()
        if (result.ok) return result.value

        // suspend reader until a message arrives
        return yield* suspendCancellableCoroutine<T>(TaskState.SuspendedChannel, (resultCallback) => {
            const ticket = this.#readers.enqueue(resultCallback)
            return () => {
                this.#readers.remove(ticket)
            }
        })
    }

    tryRead(): ReadResult<T> {
        const buffered = this.#buffer.dequeue()

        if (buffered !== null) {
            // a suspended writer takes the freed slot
            const writer = this.#writers.dequeue()

            if (writer !== null) {
                this.#buffer.enqueue(writer.value.value)
                writer.value.resultCallback(undefined)
            }

            return { ok: true, value: buffered.value }
        }

        const writer = this.#writers.dequeue()

        if (writer !== null) {
            writer.value.resultCallback(undefined)
            return { ok: true, value: writer.value.value }
        }

        if (this.#isClosed) throw new ClosedChannelError(`${this} is closed`)
        return { ok: false }
    }

    #notify() {
        // subscriptions are one-shot
        for (; ;) {
            const subscriber = this.#subscribers.dequeue()
            if (subscriber === null) break
            subscriber.value()
        }
    }

    toString(): string {
        return `Channel@${this.#id}{${this.#buffer.length()}/${this.capacity}${this.#isClosed ? ", closed" : ""}}`
    }
}
