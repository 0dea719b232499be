/**
 * Trace logging of tasks, loops, channels and multiplexers. Set COROLOOP_DEBUG=1 to enable.
 */
export const debug: boolean = process.env.COROLOOP_DEBUG === "1"
