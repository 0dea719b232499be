import { Direction } from "./Descriptor.js"
import { ClosedResourceError, IOError, UsageError } from "./Errors.js"
import type { StreamResource } from "./StreamResource.js"
import type { CancelFunction } from "./Types.js"

let lastFd = 2

class PipeBuffer {
    buffered: Buffer = Buffer.alloc(0)
    isReaderClosed = false
    isWriterClosed = false
    readonly #listeners: Record<Direction, Set<() => void>> = {
        [Direction.Read]: new Set(),
        [Direction.Write]: new Set(),
    }

    constructor(readonly capacity: number) {
    }

    get free(): number {
        return this.capacity - this.buffered.length
    }

    watch(direction: Direction, listener: () => void): CancelFunction {
        // wrapped so the same listener can be watched twice
        const wrapped = () => listener()
        this.#listeners[direction].add(wrapped)
        return () => {
            this.#listeners[direction].delete(wrapped)
        }
    }

    notify(direction: Direction) {
        for (const listener of [...this.#listeners[direction]]) {
            listener()
        }
    }

    notifyAll() {
        this.notify(Direction.Read)
        this.notify(Direction.Write)
    }
}

abstract class PipeEnd implements StreamResource {
    readonly fd: number = ++lastFd
    abstract readonly mode: string
    readonly seekable = false
    protected position = 0

    constructor(protected readonly pipe: PipeBuffer) {
    }

    abstract isClosed(): boolean

    abstract poll(direction: Direction): boolean

    abstract read(maxBytes: number): Buffer

    abstract write(data: Uint8Array): number

    abstract eof(): boolean

    abstract close(): void

    watch(direction: Direction, listener: () => void): CancelFunction {
        return this.pipe.watch(direction, listener)
    }

    seek(): void {
        throw new IOError(`Pipe ${this.fd} is not seekable`)
    }

    tell(): number {
        if (this.isClosed()) throw new ClosedResourceError(`Pipe ${this.fd} is closed`)
        return this.position
    }

    size(): number | null {
        return null
    }
}

/**
 * Reading end of a pipe. Readable while bytes are buffered, and once the writer has closed.
 */
export class PipeReader extends PipeEnd {
    readonly mode = "r"

    isClosed(): boolean {
        return this.pipe.isReaderClosed
    }

    poll(direction: Direction): boolean {
        if (this.pipe.isReaderClosed) return true
        return direction === Direction.Read && (this.pipe.buffered.length > 0 || this.pipe.isWriterClosed)
    }

    read(maxBytes: number): Buffer {
        if (this.pipe.isReaderClosed) throw new ClosedResourceError(`Pipe ${this.fd} is closed`)
        const chunk = this.pipe.buffered.subarray(0, maxBytes)
        this.pipe.buffered = this.pipe.buffered.subarray(chunk.length)
        this.position += chunk.length
        if (chunk.length > 0) this.pipe.notify(Direction.Write)
        return Buffer.from(chunk)
    }

    write(): number {
        throw new IOError(`Pipe ${this.fd} is not writable`)
    }

    eof(): boolean {
        return this.pipe.isReaderClosed || (this.pipe.isWriterClosed && this.pipe.buffered.length === 0)
    }

    close(): void {
        if (this.pipe.isReaderClosed) return
        this.pipe.isReaderClosed = true
        this.pipe.buffered = Buffer.alloc(0)
        this.pipe.notifyAll()
    }
}

/**
 * Writing end of a pipe. Writable while the pipe has free capacity. Once the reader has closed, writes fail.
 */
export class PipeWriter extends PipeEnd {
    readonly mode = "w"

    isClosed(): boolean {
        return this.pipe.isWriterClosed
    }

    poll(direction: Direction): boolean {
        if (this.pipe.isWriterClosed || this.pipe.isReaderClosed) return true
        return direction === Direction.Write && this.pipe.free > 0
    }

    read(): Buffer {
        throw new IOError(`Pipe ${this.fd} is not readable`)
    }

    write(data: Uint8Array): number {
        if (this.pipe.isWriterClosed) throw new ClosedResourceError(`Pipe ${this.fd} is closed`)
        if (this.pipe.isReaderClosed) throw new IOError(`Broken pipe ${this.fd}`)
        const accepted = data.subarray(0, this.pipe.free)
        if (accepted.length === 0) return 0
        this.pipe.buffered = Buffer.concat([this.pipe.buffered, accepted])
        this.position += accepted.length
        this.pipe.notify(Direction.Read)
        return accepted.length
    }

    eof(): boolean {
        return this.pipe.isWriterClosed
    }

    close(): void {
        if (this.pipe.isWriterClosed) return
        this.pipe.isWriterClosed = true
        this.pipe.notifyAll()
    }
}

/**
 * Creates an in-process pipe holding at most `capacity` bytes.
 */
export function createPipe(capacity: number = 65_536): [PipeReader, PipeWriter] {
    if (!(Number.isInteger(capacity) && capacity > 0)) throw new UsageError(`Invalid pipe capacity ${capacity}`)
    const pipe = new PipeBuffer(capacity)
    return [new PipeReader(pipe), new PipeWriter(pipe)]
}
