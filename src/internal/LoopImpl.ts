import { suspendCancellableCoroutine } from "../Common.js"
import { type Descriptor, Direction } from "../Descriptor.js"
import { DeadlockError, TimeoutError, UsageError } from "../Errors.js"
import { Failure } from "../Failure.js"
import type { Loop, LoopOptions } from "../Loop.js"
import type { Multiplexer, ReadyEvent } from "../Multiplexer.js"
import { type Task, TaskState } from "../Task.js"
import type { CancelFunction, Coroutine, Result, Suspension } from "../Types.js"
import { debug } from "./Config.js"
import { MultiplexerImpl } from "./MultiplexerImpl.js"
import { Queue } from "./Queue.js"
import { type Runnable, TaskImpl } from "./TaskImpl.js"
import { TimerHeap } from "./TimerHeap.js"

const yieldSuspension: Suspension = {
    state: TaskState.Ready,
    start: (_task, resultCallback) => {
        resultCallback(undefined)
    },
}

const logUnobservedFailure = (task: Task, error: unknown) => {
    console.error(`Unobserved failure in ${task}`, error)
}

function checkMillis(millis: number, what: string) {
    if (!(millis >= 0)) throw new UsageError(`Invalid ${what} ${millis}`)
}

export class LoopImpl implements Loop {
    readonly #ready: Queue<Runnable> = new Queue()
    readonly #tasks: Map<number, Runnable> = new Map()
    readonly #timers = new TimerHeap()
    readonly #multiplexer: Multiplexer
    readonly #now: () => number
    readonly #onUnobservedFailure: (task: Task, error: unknown) => void
    #failed: Runnable[] = []
    #nextTaskId = 1
    #pendingExternal = 0
    #isRunning = false
    #isPolling = false

    constructor(options: LoopOptions = {}) {
        this.#multiplexer = options.multiplexer ?? new MultiplexerImpl()
        this.#now = options.now ?? (() => performance.now())
        this.#onUnobservedFailure = options.onUnobservedFailure ?? logUnobservedFailure
    }

    get activeTaskCount(): number {
        return this.#tasks.size
    }

    spawn<T>(body: () => Coroutine<T>): Task<T> {
        const task = new TaskImpl(this, this.#nextTaskId++, body)
        if (debug) console.log(`${this}.spawn(${task})`)
        this.#tasks.set(task.id, task)
        this.schedule(task)
        return task
    }

    * yield(): Coroutine<void> {
        yield yieldSuspension
    }

    * sleep(millis: number): Coroutine<void> {
        checkMillis(millis, "sleep duration")

        yield {
            state: TaskState.SuspendedTimer,
            start: (_task, resultCallback) => this.addTimer(millis, () => resultCallback(undefined)),
        }
    }

    readable(descriptor: Descriptor, timeout?: number): Coroutine<void> {
        return this.#awaitDescriptor(descriptor, Direction.Read, TaskState.SuspendedReadable, timeout)
    }

    writable(descriptor: Descriptor, timeout?: number): Coroutine<void> {
        return this.#awaitDescriptor(descriptor, Direction.Write, TaskState.SuspendedWritable, timeout)
    }

    * awaitPromise<T>(promise: PromiseLike<T>): Coroutine<T> {
        return yield* suspendCancellableCoroutine<T>(TaskState.SuspendedExternal, (resultCallback) => {
            let isPending = true
            this.#pendingExternal++

            const settle = (result: Result<T>) => {
                if (!isPending) return
                isPending = false
                this.#pendingExternal--
                resultCallback(result)
            }

            void promise.then((value) => settle(value), (error: unknown) => settle(new Failure(error)))

            return () => {
                if (!isPending) return
                isPending = false
                this.#pendingExternal--
            }
        })
    }

    addTimer(millis: number, callback: () => void): CancelFunction {
        checkMillis(millis, "timer delay")
        const timer = this.#timers.add(this.#now() + millis, callback)
        // an earlier deadline shortens the current poll
        if (this.#isPolling) this.#multiplexer.wakeup()
        return () => this.#timers.cancel(timer)
    }

    cancel(task: Task): boolean {
        return task.cancel()
    }

    async run(): Promise<void> {
        if (this.#isRunning) throw new UsageError(`${this} is already running`)
        this.#isRunning = true
        if (debug) console.log(`${this}.run()`)

        try {
            for (; ;) {
                this.#runReady()
                if (this.#tasks.size === 0) break

                const hasReady = this.#ready.length() > 0

                if (!hasReady && this.#multiplexer.size === 0 && this.#timers.size === 0 && this.#pendingExternal === 0) {
                    throw new DeadlockError([...this.#tasks.keys()])
                }

                let events: ReadyEvent[]
                this.#isPolling = true

                try {
                    events = await this.#multiplexer.poll(hasReady ? 0 : this.#maxWait())
                } finally {
                    this.#isPolling = false
                }

                // readiness wins over a timeout that is due in the same turn
                for (const event of events) {
                    event.onReady()
                }

                this.#fireTimers()
            }
        } finally {
            this.#isRunning = false
            this.#reportUnobservedFailures()
        }
    }

    /**
     * Appends a task to the ready queue.
     */
    schedule(task: Runnable): void {
        this.#ready.enqueue(task)
        if (this.#isPolling) this.#multiplexer.wakeup()
    }

    /**
     * Removes a completed task from the task table.
     */
    settle(task: Runnable): void {
        this.#tasks.delete(task.id)
        if (task.state === TaskState.Failed) this.#failed.push(task)
    }

    * #awaitDescriptor(
        descriptor: Descriptor,
        direction: Direction,
        state: TaskState,
        timeout: number | undefined,
    ): Coroutine<void> {
        if (timeout !== undefined) checkMillis(timeout, "timeout")

        yield {
            state,
            start: (task, resultCallback) => {
                let cancelTimer: CancelFunction | null = null

                this.#multiplexer.register(descriptor, direction, task, () => {
                    if (cancelTimer !== null) cancelTimer()
                    resultCallback(undefined)
                })

                if (descriptor.poll(direction)) {
                    this.#multiplexer.unregister(descriptor, direction)
                    resultCallback(undefined)
                    return
                }

                if (timeout !== undefined) {
                    cancelTimer = this.addTimer(timeout, () => {
                        this.#multiplexer.unregister(descriptor, direction)
                        resultCallback(new Failure(new TimeoutError(
                            `Descriptor ${descriptor.fd} was not ready to ${direction} within ${timeout}ms`,
                        )))
                    })
                }

                return () => {
                    if (cancelTimer !== null) cancelTimer()
                    this.#multiplexer.unregister(descriptor, direction)
                }
            },
        }
    }

    #runReady() {
        // tasks that become ready during this pass run in the next one
        for (let count = this.#ready.length(); count > 0; count--) {
            const slot = this.#ready.dequeue()
            if (slot === null) break
            slot.value.step()
        }
    }

    #fireTimers() {
        for (const callback of this.#timers.takeDue(this.#now())) {
            callback()
        }
    }

    #maxWait(): number | null {
        const deadline = this.#timers.nextDeadline()
        return deadline === null ? null : Math.max(0, deadline - this.#now())
    }

    #reportUnobservedFailures() {
        const failed = this.#failed
        this.#failed = []

        for (const task of failed) {
            const failure = task.unobservedFailure()
            if (failure !== null) this.#onUnobservedFailure(task, failure.value)
        }
    }

    toString(): string {
        return `Loop{tasks=${this.#tasks.size}, ready=${this.#ready.length()}}`
    }
}

/**
 * Creates a Loop. Each loop has its own multiplexer and timers.
 */
export const createLoop: (options?: LoopOptions) => Loop = (options) => new LoopImpl(options)
