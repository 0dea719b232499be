import type { CancelFunction } from "./Types.js"

/**
 * Anything select() can wait on.
 */
export interface Selectable {
    /**
     * Returns `true` if reading from this object right now would suspend. Has no side effects.
     */
    willBlock(): boolean

    /**
     * Calls `listener` once, the next time this object may have stopped blocking.
     */
    subscribe(listener: () => void): CancelFunction
}
