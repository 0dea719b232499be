import type { Descriptor } from "./Descriptor.js"
import type { Multiplexer } from "./Multiplexer.js"
import type { Task } from "./Task.js"
import type { CancelFunction, Coroutine } from "./Types.js"

/**
 * A Loop drives tasks on the current thread. Tasks that are ready run one after another in the order they became
 * ready, each until its next suspension point. When no task is ready the loop waits in its multiplexer for a
 * descriptor, a timer or a settled promise.
 */
export interface Loop {
    /**
     * Number of spawned tasks that have not completed.
     */
    readonly activeTaskCount: number

    /**
     * Creates a task that starts on the next turn of the loop.
     */
    spawn<T>(body: () => Coroutine<T>): Task<T>

    /**
     * Gives the remainder of this turn to the other ready tasks.
     */
    yield(): Coroutine<void>

    sleep(millis: number): Coroutine<void>

    /**
     * Suspends until the descriptor can be read without blocking. Throws TimeoutError if `timeout` milliseconds pass
     * first, and UsageError if the descriptor is invalid or another task is already waiting to read it.
     */
    readable(descriptor: Descriptor, timeout?: number): Coroutine<void>

    /**
     * Suspends until the descriptor can be written without blocking. Same errors as readable().
     */
    writable(descriptor: Descriptor, timeout?: number): Coroutine<void>

    /**
     * Suspends until the promise settles. Work done off the loop, e.g. in a worker thread, is handed back this way.
     */
    awaitPromise<T>(promise: PromiseLike<T>): Coroutine<T>

    /**
     * Calls `callback` on the loop after `millis` milliseconds.
     */
    addTimer(millis: number, callback: () => void): CancelFunction

    cancel(task: Task): boolean

    /**
     * Runs until no tasks remain. Rejects with DeadlockError if tasks remain that nothing can resume.
     */
    run(): Promise<void>
}

export interface LoopOptions {
    /**
     * Replaces the default multiplexer.
     */
    multiplexer?: Multiplexer

    /**
     * Clock for timers, in milliseconds. Defaults to performance.now().
     */
    now?: () => number

    /**
     * Called when run() returns for every task that failed without anyone joining it. Defaults to console.error().
     */
    onUnobservedFailure?: (task: Task, error: unknown) => void
}
