import type { Failure } from "./Failure.js"
import type { Task, TaskState } from "./Task.js"
import type { YieldTask } from "./internal/YieldTask.js"

/**
 * Instance of a coroutine.
 */
export type Coroutine<T> = Generator<Yield, T, unknown>

/**
 * Data object contains value or error of resolved asynchronous operation.
 */
export type Result<T> = Failure | T

/**
 * Callback function called with result of an asynchronous operation.
 */
export type ResultCallback<T> = (result: Result<T>) => void

/**
 * Function that cancels an asynchronous operation.
 */
export type CancelFunction = () => void

/**
 * Yielded by a coroutine to suspend its task. The task moves to `state` and calls `start` with a callback that
 * resumes it. Only the first call of that callback has an effect. If the task is canceled while suspended, the
 * returned CancelFunction is called to tear down whatever `start` set up.
 */
export interface Suspension {
    readonly state: TaskState

    start(task: Task, resultCallback: ResultCallback<unknown>): CancelFunction | void
}

/**
 * Everything a coroutine may yield. Use yield* on the helpers in Common instead of yielding these directly.
 */
export type Yield = Suspension | typeof YieldTask
