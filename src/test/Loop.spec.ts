import { assert } from "chai"
import {
    awaitPromise,
    CancelledError,
    type Coroutine,
    createLoop,
    currentTask,
    DeadlockError,
    run,
    sleep,
    spawn,
    suspendCoroutine,
    type Task,
    TaskState,
    UsageError,
    channel,
    yieldNow,
} from "../main.js"
import { expectInstanceOf, rejectionOf } from "./Assert.js"

describe("Loop tests", () => {
    it("spawn() does not run the task synchronously", async () => {
        const loop = createLoop()
        let hasRun = false
        const task = loop.spawn(function* () {
            hasRun = true
        })

        assert(!hasRun)
        assert.strictEqual(task.state, TaskState.Ready)
        assert.strictEqual(loop.activeTaskCount, 1)

        await loop.run()

        assert(hasRun)
        assert.strictEqual(task.state, TaskState.Finished)
        assert(!task.isActive())
        assert.strictEqual(loop.activeTaskCount, 0)
    })

    it("yield() interleaves ready tasks round-robin", async () => {
        const loop = createLoop()
        const order: string[] = []

        loop.spawn(function* () {
            order.push("a1")
            yield* loop.yield()
            order.push("a2")
            yield* loop.yield()
            order.push("a3")
        })

        loop.spawn(function* () {
            order.push("b1")
            yield* loop.yield()
            order.push("b2")
        })

        await loop.run()

        assert.deepEqual(order, ["a1", "b1", "a2", "b2", "a3"])
    })

    it("join() returns the result of a task", async () => {
        const result = await run(function* () {
            const child = yield* spawn(function* () {
                yield* sleep(1)
                return 42
            })

            return (yield* child.join()) + 1
        })

        assert.strictEqual(result, 43)
    })

    it("join() rethrows the failure of a task, which is then not reported", async () => {
        const error = new Error("boom")
        const reported: unknown[] = []

        const caught = await run(function* () {
            const child = yield* spawn(function* (): Coroutine<number> {
                throw error
            })

            try {
                yield* child.join()
                return null
            } catch (e) {
                return e
            }
        }, { onUnobservedFailure: (_task, e) => reported.push(e) })

        assert.strictEqual(caught, error)
        assert.strictEqual(reported.length, 0)
    })

    it("joining a task after it failed still observes the failure", async () => {
        const error = new Error("late")
        const reported: unknown[] = []
        const loop = createLoop({ onUnobservedFailure: (_task, e) => reported.push(e) })
        let caught: unknown = null

        const failing = loop.spawn(function* () {
            throw error
        })

        loop.spawn(function* () {
            yield* loop.sleep(5)

            try {
                yield* failing.join()
            } catch (e) {
                caught = e
            }
        })

        await loop.run()

        assert.strictEqual(caught, error)
        assert.strictEqual(reported.length, 0)
    })

    it("a failure nobody joins is reported when run() returns", async () => {
        const error = new Error("unobserved")
        const reported: Array<[Task, unknown]> = []
        const loop = createLoop({ onUnobservedFailure: (task, e) => reported.push([task, e]) })

        const task = loop.spawn(function* () {
            throw error
        })

        await loop.run()

        assert.strictEqual(task.state, TaskState.Failed)
        assert.strictEqual(reported.length, 1)
        assert.strictEqual(reported[0][0], task)
        assert.strictEqual(reported[0][1], error)
    })

    it("sleep() resumes no earlier than its delay", async () => {
        const start = performance.now()

        await run(function* () {
            yield* sleep(20)
        })

        assert.isAtLeast(performance.now() - start, 20)
    })

    it("timers fire in deadline order", async () => {
        const order: string[] = []

        await run(function* () {
            yield* spawn(function* () {
                yield* sleep(30)
                order.push("c")
            })

            yield* spawn(function* () {
                yield* sleep(10)
                order.push("a")
            })

            yield* spawn(function* () {
                yield* sleep(20)
                order.push("b")
            })
        })

        assert.deepEqual(order, ["a", "b", "c"])
    })

    it("sleep() with a negative delay throws UsageError", async () => {
        const error = await rejectionOf(run(function* () {
            yield* sleep(-1)
        }))

        expectInstanceOf(error, UsageError)
    })

    it("canceling a sleeping task throws CancelledError at its suspension point", async () => {
        const loop = createLoop()
        let caught: unknown = null
        let wasCancelled = false

        const sleeper = loop.spawn(function* () {
            try {
                yield* loop.sleep(10_000)
            } catch (e) {
                caught = e
                throw e
            }
        })

        loop.spawn(function* () {
            yield* loop.yield()
            wasCancelled = loop.cancel(sleeper)
        })

        await loop.run()

        assert(wasCancelled)
        expectInstanceOf(caught, CancelledError)
        assert.strictEqual(sleeper.state, TaskState.Failed)
        assert(!sleeper.cancel())
    })

    it("canceling a task that has not started fails it without running its body", async () => {
        const loop = createLoop()
        let hasRun = false

        const task = loop.spawn(function* () {
            hasRun = true
        })

        assert(task.cancel())
        await loop.run()

        assert(!hasRun)
        assert.strictEqual(task.state, TaskState.Failed)
    })

    it("canceling a running task takes effect at its next suspension point", async () => {
        const loop = createLoop()
        const steps: string[] = []

        const task = loop.spawn(function* () {
            const self = yield* currentTask()
            steps.push(`cancel ${self.cancel()}`)

            try {
                yield* loop.yield()
                steps.push("resumed")
            } catch (e) {
                steps.push(e instanceof CancelledError ? "cancelled" : "other")
            }
        })

        await loop.run()

        assert.deepEqual(steps, ["cancel true", "cancelled"])
        assert.strictEqual(task.state, TaskState.Finished)
    })

    it("run() rejects with DeadlockError when no task can ever resume", async () => {
        const loop = createLoop()
        const messages = channel<number>()

        const task = loop.spawn(function* () {
            yield* messages.read()
        })

        const error = expectInstanceOf(await rejectionOf(loop.run()), DeadlockError)

        assert.deepEqual(error.taskIds, [task.id])
        assert.strictEqual(task.state, TaskState.SuspendedChannel)
    })

    it("run() rejects with UsageError while the loop is already running", async () => {
        const loop = createLoop()
        loop.spawn(function* () {
            yield* loop.sleep(5)
        })

        const first = loop.run()
        expectInstanceOf(await rejectionOf(loop.run()), UsageError)
        await first
    })

    it("awaitPromise() resumes with the resolved value", async () => {
        const result = await run(function* () {
            const value = yield* awaitPromise(new Promise<number>((resolve) => setTimeout(() => resolve(7), 5)))
            return value * 2
        })

        assert.strictEqual(result, 14)
    })

    it("awaitPromise() throws the rejection at the suspension point", async () => {
        const error = new Error("rejected")

        const caught = await rejectionOf(run(function* () {
            yield* awaitPromise(Promise.reject(error))
        }))

        assert.strictEqual(caught, error)
    })

    it("currentTask() outside of a task throws UsageError", () => {
        const coroutine = currentTask()
        coroutine.next()

        assert.throws(() => coroutine.next("not a task"), UsageError)
    })

    it("a task that joins itself fails with UsageError", async () => {
        const error = await rejectionOf(run(function* () {
            const self = yield* currentTask()
            yield* self.join()
        }))

        expectInstanceOf(error, UsageError)
    })

    it("suspendCoroutine() resumes with the value passed to its callback", async () => {
        const value = await run(function* () {
            const task = yield* currentTask()

            return yield* suspendCoroutine<string>(TaskState.SuspendedTimer, (resultCallback) => {
                task.loop.addTimer(1, () => resultCallback("done"))
            })
        })

        assert.strictEqual(value, "done")
    })

    it("a task that keeps yielding does not hold back a settled promise", async () => {
        const start = performance.now()
        let isDone = false
        let spins = 0

        await run(function* () {
            yield* spawn(function* () {
                while (!isDone && performance.now() - start < 2000) {
                    yield* yieldNow()
                    spins++
                }
            })

            yield* awaitPromise(new Promise<void>((resolve) => setTimeout(resolve, 10)))
            isDone = true
        })

        assert.isBelow(performance.now() - start, 1000)
        assert.isAbove(spins, 0)
    })

    it("a channel fed from a Node callback is read through awaitPromise()", async () => {
        const messages = channel<number>(1)

        const value = await run(function* () {
            yield* spawn(function* () {
                const message = yield* awaitPromise(new Promise<number>((resolve) => setTimeout(() => resolve(7), 5)))
                yield* messages.write(message)
            })

            return yield* messages.read()
        })

        assert.strictEqual(value, 7)
    })
})
