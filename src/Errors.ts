/**
 * Thrown when a programming contract is violated, e.g. a second waiter on the same descriptor and direction.
 * Never retried.
 */
export class UsageError extends Error {
    name = "UsageError"
}

/**
 * Thrown when an argument is outside of what an operation accepts, e.g. a negative read length.
 */
export class InvalidArgumentError extends UsageError {
    name = "InvalidArgumentError"
}

/**
 * Thrown when writing to a closed channel, or reading from a closed channel that has no buffered messages left.
 */
export class ClosedChannelError extends Error {
    name = "ClosedChannelError"
}

/**
 * Thrown when operating on a stream resource that has been closed or detached.
 */
export class ClosedResourceError extends Error {
    name = "ClosedResourceError"
}

/**
 * Thrown at a suspension point when its timeout elapses before it is resumed.
 */
export class TimeoutError extends Error {
    name = "TimeoutError"
}

/**
 * Thrown when the underlying resource fails. The original error is kept as `cause`.
 */
export class IOError extends Error {
    name = "IOError"
}

/**
 * Thrown at the suspension point of a task that has been canceled.
 */
export class CancelledError extends Error {
    name = "CancelledError"
}

/**
 * Thrown by Loop.run() when tasks remain suspended but no registration, timer or pending promise can wake them.
 */
export class DeadlockError extends Error {
    name = "DeadlockError"

    constructor(readonly taskIds: readonly number[]) {
        super(`All tasks are suspended and nothing can resume them (tasks ${taskIds.join(", ")})`)
    }
}
