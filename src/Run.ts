import { Failure } from "./Failure.js"
import type { LoopOptions } from "./Loop.js"
import type { Coroutine } from "./Types.js"
import { createLoop } from "./internal/LoopImpl.js"

/**
 * Runs `body` as the first task of a new loop and resolves with its result once every task on the loop has
 * completed. Rejects with the failure of `body`.
 * @param {<T>() => Coroutine<T>} body
 * @param {LoopOptions} [options]
 * @return {Promise<T>}
 */
export async function run<T>(body: () => Coroutine<T>, options?: LoopOptions): Promise<T> {
    const loop = createLoop(options)
    const main = loop.spawn(body)
    const holder: { outcome: { readonly value: T } | Failure | null } = { outcome: null }

    loop.spawn(function* () {
        try {
            holder.outcome = { value: yield* main.join() }
        } catch (error) {
            holder.outcome = new Failure(error)
        }
    })

    await loop.run()

    const outcome = holder.outcome
    if (outcome === null) throw new Error(`${main} did not complete`)
    if (outcome instanceof Failure) throw outcome.value
    return outcome.value
}
