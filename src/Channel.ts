import type { Selectable } from "./Selectable.js"
import type { Coroutine } from "./Types.js"

export type ReadResult<T> = { readonly ok: true, readonly value: T } | { readonly ok: false }

/**
 * The receiving half of a channel.
 */
export interface ReadChannel<T> extends Selectable {
    /**
     * Returns the next message. Buffered messages are still returned after the channel is closed. If no message is
     * available and the channel is open, suspends until one is written or the channel is closed. Throws
     * ClosedChannelError once the channel is closed and drained.
     */
    read(): Coroutine<T>

    /**
     * Like read() but returns `{ ok: false }` instead of suspending.
     */
    tryRead(): ReadResult<T>

    close(): void

    isClosed(): boolean

    /**
     * True while the channel is open or still holds buffered messages.
     */
    isReadable(): boolean
}

/**
 * The sending half of a channel.
 */
export interface WriteChannel<T> {
    /**
     * Hands the message to a waiting reader or buffers it. Suspends while the buffer is full. Throws
     * ClosedChannelError if the channel is or becomes closed.
     */
    write(value: T): Coroutine<void>

    /**
     * Like write() but returns false instead of suspending.
     */
    tryWrite(value: T): boolean

    close(): void

    isClosed(): boolean
}

/**
 * Channels are used to send and receive messages between coroutines. Channels can be buffered so
 * that senders do not suspend if there isn't a receiver waiting to receive the next message.
 * If there are multiple coroutines receiving on the same channel, they receive new values in first
 * come, first served order.
 */
export interface Channel<T> extends ReadChannel<T>, WriteChannel<T> {
    readonly capacity: number

    /**
     * Number of buffered messages.
     */
    readonly size: number
}
