import { assert } from "chai"
import { Queue } from "../internal/Queue.js"
import { TimerHeap } from "../internal/TimerHeap.js"

describe("Queue tests", () => {
    it("Queue.dequeue() returns values in insertion order", () => {
        const queue = new Queue<number>()
        queue.enqueue(1)
        queue.enqueue(2)
        queue.enqueue(3)

        assert.strictEqual(queue.dequeue()?.value, 1)
        assert.strictEqual(queue.dequeue()?.value, 2)
        assert.strictEqual(queue.dequeue()?.value, 3)
        assert.strictEqual(queue.dequeue(), null)
    })

    it("Queue.remove() takes out one entry and keeps the order of the rest", () => {
        const queue = new Queue<string>()
        queue.enqueue("a")
        const ticket = queue.enqueue("b")
        queue.enqueue("c")

        assert(queue.remove(ticket))
        assert(!queue.remove(ticket))
        assert.deepEqual([...queue], ["a", "c"])
        assert.strictEqual(queue.length(), 2)

        queue.enqueue("d")
        assert.deepEqual([...queue], ["a", "c", "d"])
    })

    it("Queue holds null values", () => {
        const queue = new Queue<number | null>()
        queue.enqueue(null)

        assert.strictEqual(queue.peek()?.value, null)
        assert.strictEqual(queue.length(), 1)
        const slot = queue.dequeue()
        assert(slot !== null)
        assert.strictEqual(slot.value, null)
        assert.strictEqual(queue.length(), 0)
    })
})

describe("TimerHeap tests", () => {
    it("takeDue() returns due timers by deadline, ties in insertion order", () => {
        const heap = new TimerHeap()
        const order: string[] = []
        heap.add(30, () => order.push("c"))
        heap.add(10, () => order.push("a1"))
        heap.add(20, () => order.push("b"))
        heap.add(10, () => order.push("a2"))

        for (const callback of heap.takeDue(20)) callback()

        assert.deepEqual(order, ["a1", "a2", "b"])
        assert.strictEqual(heap.size, 1)
        assert.strictEqual(heap.nextDeadline(), 30)
    })

    it("canceled timers neither fire nor count", () => {
        const heap = new TimerHeap()
        const timer = heap.add(5, () => assert.fail("canceled timer fired"))
        heap.add(15, () => {
        })

        heap.cancel(timer)
        heap.cancel(timer)

        assert.strictEqual(heap.size, 1)
        assert.strictEqual(heap.nextDeadline(), 15)
        assert.strictEqual(heap.takeDue(100).length, 1)
        assert.strictEqual(heap.size, 0)
        assert.strictEqual(heap.nextDeadline(), null)
    })
})
