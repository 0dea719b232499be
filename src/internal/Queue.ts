/**
 * Holds a value taken out of a Queue. Values may themselves be null or undefined.
 */
export interface Slot<T> {
    readonly value: T
}

/**
 * FIFO queue backed by an insertion ordered arena. `enqueue` hands out a ticket that removes exactly that entry, so
 * a waiter can leave from the middle of the queue without disturbing the order of the others.
 */
export class Queue<T> {
    #nextTicket = 0
    readonly #entries: Map<number, Slot<T>> = new Map()

    enqueue(value: T): number {
        const ticket = this.#nextTicket++
        this.#entries.set(ticket, { value })
        return ticket
    }

    dequeue(): Slot<T> | null {
        for (const [ticket, slot] of this.#entries) {
            this.#entries.delete(ticket)
            return slot
        }

        return null
    }

    peek(): Slot<T> | null {
        for (const slot of this.#entries.values()) {
            return slot
        }

        return null
    }

    remove(ticket: number): boolean {
        return this.#entries.delete(ticket)
    }

    length(): number {
        return this.#entries.size
    }

    * [Symbol.iterator](): Generator<T, void, undefined> {
        for (const slot of this.#entries.values()) {
            yield slot.value
        }
    }
}
