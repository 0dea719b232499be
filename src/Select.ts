import { currentTask, suspendCancellableCoroutine } from "./Common.js"
import { TimeoutError, UsageError } from "./Errors.js"
import type { Selectable } from "./Selectable.js"
import { TaskState } from "./Task.js"
import type { CancelFunction, Coroutine } from "./Types.js"

/**
 * Returns the first selectable, from left to right, that can be read without suspending. If all of them would block,
 * suspends until one of them is ready. Throws TimeoutError if none is ready within `timeout` milliseconds.
 * @param {Array<S>} selectables
 * @param {number} [timeout]
 * @return {S}
 */
export function* select<S extends Selectable>(selectables: readonly S[], timeout?: number): Coroutine<S> {
    if (selectables.length === 0) throw new UsageError("select() needs at least one selectable")

    let hasTimedOut = false
    let wake: (() => void) | null = null
    let cancelTimer: CancelFunction | null = null

    if (timeout !== undefined) {
        const task = yield* currentTask()
        cancelTimer = task.loop.addTimer(timeout, () => {
            hasTimedOut = true
            if (wake !== null) wake()
        })
    }

    try {
        for (; ;) {
            for (const selectable of selectables) {
                if (!selectable.willBlock()) return selectable
            }

            if (hasTimedOut) throw new TimeoutError(`No selectable was ready within ${timeout}ms`)

            yield* suspendCancellableCoroutine<void>(TaskState.SuspendedChannel, (resultCallback) => {
                const unsubscribes: CancelFunction[] = []

                const unsubscribeAll = () => {
                    wake = null
                    for (const unsubscribe of unsubscribes) unsubscribe()
                }

                wake = () => {
                    unsubscribeAll()
                    resultCallback(undefined)
                }

                for (const selectable of selectables) {
                    unsubscribes.push(selectable.subscribe(() => {
                        if (wake !== null) wake()
                    }))
                }

                return unsubscribeAll
            })
        }
    } finally {
        if (cancelTimer !== null) cancelTimer()
    }
}
