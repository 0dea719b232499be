import type { Descriptor } from "./Descriptor.js"
import { UsageError } from "./Errors.js"
import type { Task, TaskState } from "./Task.js"
import type { CancelFunction, Coroutine, ResultCallback } from "./Types.js"
import { TaskImpl } from "./internal/TaskImpl.js"
import { YieldTask } from "./internal/YieldTask.js"

/**
 * Converts a callback API to a coroutine. The task is shown in `state` while it waits.
 * @param {TaskState} state
 * @param {<T>(resultCallback: ResultCallback<T>) => void} continuation
 * @return {<T>T}
 */
export function* suspendCoroutine<T>(
    state: TaskState,
    continuation: (resultCallback: ResultCallback<T>) => void,
): Coroutine<T> {
    return (yield {
        state,
        start: (_task, resultCallback) => {
            continuation(resultCallback)
        },
    }) as T
}

/**
 * Converts a callback that can be canceled API to a coroutine.
 * @param {TaskState} state
 * @param {<T>(resultCallback: ResultCallback<T>) => CancelFunction} continuation
 * @return {<T>T}
 */
export function* suspendCancellableCoroutine<T>(
    state: TaskState,
    continuation: (resultCallback: ResultCallback<T>) => CancelFunction,
): Coroutine<T> {
    return (yield {
        state,
        start: (_task, resultCallback) => continuation(resultCallback),
    }) as T
}

/**
 * Returns the task running this coroutine. Does not suspend.
 */
export function* currentTask(): Coroutine<Task> {
    const task = yield YieldTask
    if (!(task instanceof TaskImpl)) throw new UsageError("currentTask() was called outside of a task")
    return task
}

/**
 * Spawns a task on the loop of the current task.
 */
export function* spawn<T>(body: () => Coroutine<T>): Coroutine<Task<T>> {
    return (yield* currentTask()).loop.spawn(body)
}

export function* yieldNow(): Coroutine<void> {
    yield* (yield* currentTask()).loop.yield()
}

/**
 * Suspends the coroutine for a given number of milliseconds.
 */
export function* sleep(millis: number): Coroutine<void> {
    yield* (yield* currentTask()).loop.sleep(millis)
}

export function* readable(descriptor: Descriptor, timeout?: number): Coroutine<void> {
    yield* (yield* currentTask()).loop.readable(descriptor, timeout)
}

export function* writable(descriptor: Descriptor, timeout?: number): Coroutine<void> {
    yield* (yield* currentTask()).loop.writable(descriptor, timeout)
}

/**
 * Converts a Promise<T> to a Coroutine<T>. Promise result that is an error is thrown.
 */
export function* awaitPromise<T>(promise: PromiseLike<T>): Coroutine<T> {
    return yield* (yield* currentTask()).loop.awaitPromise(promise)
}
