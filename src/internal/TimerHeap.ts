export interface Timer {
    readonly deadline: number
    readonly sequence: number
    readonly callback: () => void
    isCancelled: boolean
}

// earlier deadline first, ties in the order the timers were added
const compare = (a: Timer, b: Timer): number => a.deadline - b.deadline || a.sequence - b.sequence

/**
 * Binary min-heap of timers. Canceled timers are dropped lazily when they reach the top.
 */
export class TimerHeap {
    readonly #heap: Timer[] = []
    #sequence = 0
    #live = 0

    /**
     * Number of timers that have neither fired nor been canceled.
     */
    get size(): number {
        return this.#live
    }

    add(deadline: number, callback: () => void): Timer {
        const timer: Timer = { deadline, sequence: this.#sequence++, callback, isCancelled: false }
        this.#heap.push(timer)
        this.#bubbleUp(this.#heap.length - 1)
        this.#live++
        return timer
    }

    cancel(timer: Timer): void {
        if (timer.isCancelled) return
        timer.isCancelled = true
        this.#live--
    }

    nextDeadline(): number | null {
        this.#dropCancelled()
        return this.#heap.length > 0 ? this.#heap[0].deadline : null
    }

    /**
     * Removes every timer due at `now` and returns their callbacks in firing order.
     */
    takeDue(now: number): Array<() => void> {
        const callbacks: Array<() => void> = []

        for (; ;) {
            this.#dropCancelled()
            if (this.#heap.length === 0 || this.#heap[0].deadline > now) break
            const timer = this.#pop()
            if (timer === undefined) break
            this.cancel(timer)
            callbacks.push(timer.callback)
        }

        return callbacks
    }

    #dropCancelled() {
        while (this.#heap.length > 0 && this.#heap[0].isCancelled) {
            this.#pop()
        }
    }

    #pop(): Timer | undefined {
        const last = this.#heap.pop()
        if (last === undefined || this.#heap.length === 0) return last
        const top = this.#heap[0]
        this.#heap[0] = last
        this.#sinkDown(0)
        return top
    }

    #bubbleUp(index: number) {
        let i = index
        while (i > 0) {
            const parent = (i - 1) >> 1
            if (compare(this.#heap[i], this.#heap[parent]) >= 0) break
            this.#swap(i, parent)
            i = parent
        }
    }

    #sinkDown(index: number) {
        const n = this.#heap.length
        let i = index
        for (; ;) {
            let smallest = i
            const left = 2 * i + 1
            const right = 2 * i + 2
            if (left < n && compare(this.#heap[left], this.#heap[smallest]) < 0) smallest = left
            if (right < n && compare(this.#heap[right], this.#heap[smallest]) < 0) smallest = right
            if (smallest === i) break
            this.#swap(i, smallest)
            i = smallest
        }
    }

    #swap(a: number, b: number) {
        const timer = this.#heap[a]
        this.#heap[a] = this.#heap[b]
        this.#heap[b] = timer
    }
}
