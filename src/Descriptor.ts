import type { CancelFunction } from "./Types.js"

export enum Direction {
    Read = "read",
    Write = "write",
}

/**
 * Something a task can wait on to become readable or writable, identified by an integer descriptor.
 */
export interface Descriptor {
    readonly fd: number

    /**
     * True if an operation in `direction` would not block right now. A closed descriptor is ready so that the
     * waiter gets to observe the close.
     */
    poll(direction: Direction): boolean

    /**
     * Calls `listener` whenever readiness in `direction` may have changed, until canceled.
     */
    watch(direction: Direction, listener: () => void): CancelFunction
}
