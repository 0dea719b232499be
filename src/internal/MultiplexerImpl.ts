import { type Descriptor, Direction } from "../Descriptor.js"
import { UsageError } from "../Errors.js"
import type { Multiplexer, ReadyEvent } from "../Multiplexer.js"
import type { Task } from "../Task.js"
import type { CancelFunction } from "../Types.js"
import { debug } from "./Config.js"

// largest delay setTimeout() accepts
const MAX_TIMEOUT = 2_147_483_647

interface Registration extends ReadyEvent {
    readonly unwatch: CancelFunction
}

/**
 * Level-triggered multiplexer. A poll probes every registration and, when none is ready, sleeps until a watched
 * descriptor reports a change, wakeup() is called or `maxWait` elapses.
 */
export class MultiplexerImpl implements Multiplexer {
    readonly #registrations: Record<Direction, Map<Descriptor, Registration>> = {
        [Direction.Read]: new Map(),
        [Direction.Write]: new Map(),
    }
    #waker: (() => void) | null = null
    #hasPendingWakeup = false

    get size(): number {
        return this.#registrations[Direction.Read].size + this.#registrations[Direction.Write].size
    }

    register(descriptor: Descriptor, direction: Direction, task: Task, onReady: () => void): void {
        if (debug) console.log(`${this}.register(${descriptor.fd}, ${direction}, ${task})`)

        if (!Number.isInteger(descriptor.fd) || descriptor.fd < 0) {
            throw new UsageError(`Invalid descriptor ${descriptor.fd}`)
        }

        const registrations = this.#registrations[direction]
        const existing = registrations.get(descriptor)

        if (existing !== undefined) {
            throw new UsageError(`Descriptor ${descriptor.fd} already has a ${direction} waiter: ${existing.task}`)
        }

        const unwatch = descriptor.watch(direction, () => this.wakeup())
        registrations.set(descriptor, { descriptor, direction, task, onReady, unwatch })
    }

    unregister(descriptor: Descriptor, direction: Direction): boolean {
        const registrations = this.#registrations[direction]
        const registration = registrations.get(descriptor)
        if (registration === undefined) return false
        if (debug) console.log(`${this}.unregister(${descriptor.fd}, ${direction})`)
        registrations.delete(descriptor)
        registration.unwatch()
        return true
    }

    async poll(maxWait: number | null): Promise<ReadyEvent[]> {
        if (maxWait !== null && !(maxWait >= 0)) throw new UsageError(`Invalid poll wait ${maxWait}`)

        if (debug) console.log(`${this}.poll(${maxWait})`)

        if (maxWait === 0 || this.#hasPendingWakeup || this.#hasReady()) {
            this.#hasPendingWakeup = false
            // every poll lets Node run its pending timers and I/O callbacks
            await this.#nextTurn()
        } else {
            await this.#wait(maxWait)
        }

        return this.#collect()
    }

    wakeup(): void {
        if (this.#waker !== null) {
            this.#waker()
        } else {
            this.#hasPendingWakeup = true
        }
    }

    close(): void {
        for (const registrations of Object.values(this.#registrations)) {
            for (const registration of registrations.values()) {
                registration.unwatch()
            }

            registrations.clear()
        }

        this.wakeup()
    }

    #hasReady(): boolean {
        for (const registrations of Object.values(this.#registrations)) {
            for (const [descriptor, registration] of registrations) {
                if (descriptor.poll(registration.direction)) return true
            }
        }

        return false
    }

    #collect(): ReadyEvent[] {
        const events: ReadyEvent[] = []

        for (const registrations of Object.values(this.#registrations)) {
            for (const [descriptor, registration] of registrations) {
                if (!descriptor.poll(registration.direction)) continue
                registrations.delete(descriptor)
                registration.unwatch()
                const { direction, task, onReady } = registration
                events.push({ descriptor, direction, task, onReady })
            }
        }

        return events
    }

    #wait(maxWait: number | null): Promise<void> {
        return new Promise((resolve) => {
            let timeout: NodeJS.Timeout | null = null

            const waker = () => {
                this.#waker = null
                if (timeout !== null) clearTimeout(timeout)
                resolve()
            }

            this.#waker = waker

            if (maxWait !== null) {
                timeout = setTimeout(waker, Math.min(maxWait, MAX_TIMEOUT))
            }
        })
    }

    // not cut short by wakeup(), which is remembered for the next poll instead
    #nextTurn(): Promise<void> {
        return new Promise((resolve) => {
            setImmediate(resolve)
        })
    }

    toString(): string {
        return `Multiplexer{${this.size}}`
    }
}
