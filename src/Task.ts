import type { Loop } from "./Loop.js"
import type { Coroutine } from "./Types.js"

export enum TaskState {
    Ready = "Ready",
    Running = "Running",
    SuspendedReadable = "SuspendedReadable",
    SuspendedWritable = "SuspendedWritable",
    SuspendedTimer = "SuspendedTimer",
    SuspendedChannel = "SuspendedChannel",
    SuspendedJoin = "SuspendedJoin",
    SuspendedExternal = "SuspendedExternal",
    Finished = "Finished",
    Failed = "Failed",
}

/**
 * A Task runs one coroutine on a Loop. It runs until the coroutine reaches a suspension point and is resumed by the
 * loop once whatever it waits on is ready. A task that is not finished or failed is active.
 */
export interface Task<T = unknown> {
    readonly id: number
    readonly loop: Loop
    readonly state: TaskState

    isActive(): boolean

    /**
     * A suspended task is resumed with a CancelledError thrown at its suspension point. A task that has not started
     * fails without running. A running or already resumed task sees the CancelledError at its next suspension point.
     * Returns false if the task already completed.
     */
    cancel(): boolean

    /**
     * Suspends until the task completes. Returns its result or throws its failure.
     */
    join(): Coroutine<T>
}
