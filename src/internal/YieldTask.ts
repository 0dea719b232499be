/**
 * Yielded to ask the running task for itself. The task resumes immediately without giving up its turn.
 */
export const YieldTask: unique symbol = Symbol("YieldTask")
