import { CancelledError, UsageError } from "../Errors.js"
import { Failure } from "../Failure.js"
import { type Task, TaskState } from "../Task.js"
import type { CancelFunction, Coroutine, Result, ResultCallback, Suspension, Yield } from "../Types.js"
import { debug } from "./Config.js"
import type { LoopImpl } from "./LoopImpl.js"
import { Queue } from "./Queue.js"
import { YieldTask } from "./YieldTask.js"

type Outcome<T> = { readonly value: T } | Failure

/**
 * What the loop needs from a task regardless of its result type.
 */
export interface Runnable extends Task {
    step(): void

    /**
     * The failure of a failed task that nobody has joined. Cancellation is not reported.
     */
    unobservedFailure(): Failure | null
}

export class TaskImpl<T> implements Task<T>, Runnable {
    readonly #coroutine: Coroutine<T>
    #state: TaskState = TaskState.Ready
    #hasStarted = false
    #isCancelRequested = false
    #input: Result<unknown> = undefined
    #resumeCallback: ResultCallback<unknown> | null = null
    #cancelCallback: CancelFunction | null = null
    #outcome: Outcome<T> | null = null
    #isObserved = false
    readonly #joiners: Queue<ResultCallback<void>> = new Queue()

    constructor(readonly loop: LoopImpl, readonly id: number, body: () => Coroutine<T>) {
        this.#coroutine = body()
    }

    get state(): TaskState {
        return this.#state
    }

    isActive(): boolean {
        return this.#outcome === null
    }

    cancel(): boolean {
        if (this.#outcome !== null) return false
        if (debug) console.log(`${this} ${this.constructor.name}.cancel()`)

        const resumeCallback = this.#resumeCallback

        if (resumeCallback !== null) {
            const cancelCallback = this.#cancelCallback
            this.#cancelCallback = null
            if (cancelCallback !== null) cancelCallback()
            resumeCallback(new Failure(new CancelledError(`${this} was canceled`)))
        } else if (!this.#hasStarted) {
            // throwing into a generator that has not started completes it without running its body
            this.#input = new Failure(new CancelledError(`${this} was canceled before it started`))
        } else {
            this.#isCancelRequested = true
        }

        return true
    }

    * join(): Coroutine<T> {
        if (this.#outcome === null) {
            yield {
                state: TaskState.SuspendedJoin,
                start: (task, resultCallback) => {
                    if (task === this) throw new UsageError(`${this} cannot join itself`)
                    const ticket = this.#joiners.enqueue(resultCallback)
                    return () => {
                        this.#joiners.remove(ticket)
                    }
                },
            }
        }

        const outcome = this.#outcome
        if (outcome === null) throw new UsageError(`${this} resumed a joiner before completing`)

        if (outcome instanceof Failure) {
            this.#isObserved = true
            throw outcome.value
        }

        return outcome.value
    }

    /**
     * Runs the coroutine until it suspends, returns or throws.
     */
    step(): void {
        if (this.#outcome !== null) return
        if (debug) console.log(`${this} ${this.constructor.name}.step()`)

        this.#state = TaskState.Running
        this.#hasStarted = true
        let input = this.#input
        this.#input = undefined

        for (; ;) {
            let iteratorResult: IteratorResult<Yield, T>

            try {
                if (input instanceof Failure) {
                    iteratorResult = this.#coroutine.throw(input.value)
                } else {
                    iteratorResult = this.#coroutine.next(input)
                }
            } catch (error) {
                this.#complete(new Failure(error))
                return
            }

            // completed with result
            if (iteratorResult.done === true) {
                this.#complete({ value: iteratorResult.value })
                return
            }

            const instruction = iteratorResult.value

            if (instruction === YieldTask) {
                input = this
                continue
            }

            if (this.#isCancelRequested) {
                this.#isCancelRequested = false
                input = new Failure(new CancelledError(`${this} was canceled`))
                continue
            }

            // suspension point
            try {
                this.#suspend(instruction)
                return
            } catch (error) {
                input = new Failure(error)
            }
        }
    }

    unobservedFailure(): Failure | null {
        const outcome = this.#outcome
        if (!(outcome instanceof Failure) || this.#isObserved) return null
        if (outcome.value instanceof CancelledError) return null
        return outcome
    }

    #suspend(suspension: Suspension) {
        this.#state = suspension.state
        let isCalledOnce = false

        const resumeCallback: ResultCallback<unknown> = (result) => {
            // guard against suspension point calling back more than once
            if (isCalledOnce) return
            isCalledOnce = true
            this.#resumeCallback = null
            this.#cancelCallback = null
            this.#input = result
            this.#state = TaskState.Ready
            this.loop.schedule(this)
        }

        this.#resumeCallback = resumeCallback
        let cancelCallback: CancelFunction | void

        try {
            cancelCallback = suspension.start(this, resumeCallback)
        } catch (error) {
            // suspension point failed to start. The error is thrown at the call site.
            isCalledOnce = true
            this.#resumeCallback = null
            this.#state = TaskState.Running
            throw error
        }

        if (!isCalledOnce && typeof cancelCallback === "function") {
            this.#cancelCallback = cancelCallback
        }
    }

    #complete(outcome: Outcome<T>) {
        this.#outcome = outcome
        this.#state = outcome instanceof Failure ? TaskState.Failed : TaskState.Finished
        if (debug) console.log(`${this} ${this.constructor.name}.complete()`)

        if (outcome instanceof Failure && this.#joiners.length() > 0) {
            this.#isObserved = true
        }

        for (; ;) {
            const joiner = this.#joiners.dequeue()
            if (joiner === null) break
            joiner.value(undefined)
        }

        this.loop.settle(this)
    }

    toString(): string {
        return `Task@${this.id}{${this.#state}}`
    }
}
