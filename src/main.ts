export type { Coroutine, Result, ResultCallback, CancelFunction, Suspension, Yield } from "./Types.js"
export { Failure } from "./Failure.js"
export {
    UsageError,
    InvalidArgumentError,
    ClosedChannelError,
    ClosedResourceError,
    TimeoutError,
    IOError,
    CancelledError,
    DeadlockError,
} from "./Errors.js"
export { type Task, TaskState } from "./Task.js"
export type { Loop, LoopOptions } from "./Loop.js"
export { type Descriptor, Direction } from "./Descriptor.js"
export type { Multiplexer, ReadyEvent } from "./Multiplexer.js"
export { createLoop } from "./internal/LoopImpl.js"
export { MultiplexerImpl } from "./internal/MultiplexerImpl.js"
export { run } from "./Run.js"
export {
    suspendCoroutine,
    suspendCancellableCoroutine,
    currentTask,
    spawn,
    yieldNow,
    sleep,
    readable,
    writable,
    awaitPromise,
} from "./Common.js"
export type { Channel, ReadChannel, WriteChannel, ReadResult } from "./Channel.js"
export { channel } from "./internal/ChannelImpl.js"
export type { Selectable } from "./Selectable.js"
export { select } from "./Select.js"
export { type StreamResource, Whence } from "./StreamResource.js"
export { createPipe, PipeReader, PipeWriter } from "./Pipe.js"
export { FileResource } from "./FileResource.js"
export { ResourceStream, type ResourceStreamOptions, type StreamMetadata } from "./ResourceStream.js"
