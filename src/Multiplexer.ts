import type { Descriptor, Direction } from "./Descriptor.js"
import type { Task } from "./Task.js"

export interface ReadyEvent {
    readonly descriptor: Descriptor
    readonly direction: Direction
    readonly task: Task
    readonly onReady: () => void
}

/**
 * Waits on many descriptors at once. Each (descriptor, direction) pair holds at most one waiting task.
 */
export interface Multiplexer {
    /**
     * Number of registrations.
     */
    readonly size: number

    /**
     * Throws UsageError if the descriptor is invalid or the pair already has a waiter.
     */
    register(descriptor: Descriptor, direction: Direction, task: Task, onReady: () => void): void

    /**
     * Returns false if there was no registration.
     */
    unregister(descriptor: Descriptor, direction: Direction): boolean

    /**
     * Resolves with the registrations that are ready and removes them. Waits at most `maxWait` milliseconds, without
     * limit if null. Always resolves on a later macrotask, so Node's timers and I/O callbacks run between polls.
     */
    poll(maxWait: number | null): Promise<ReadyEvent[]>

    /**
     * Ends the current poll early. Remembered until the next poll if none is in progress.
     */
    wakeup(): void

    close(): void
}
