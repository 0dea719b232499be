import { closeSync, constants, fstatSync, openSync, readSync, writeSync } from "node:fs"
import type { Direction } from "./Descriptor.js"
import { ClosedResourceError, IOError, UsageError } from "./Errors.js"
import { type StreamResource, Whence } from "./StreamResource.js"
import type { CancelFunction } from "./Types.js"

const FLAGS: Readonly<Record<string, string | number>> = {
    "r": "r",
    "r+": "r+",
    "w": "w",
    "w+": "w+",
    "a": "a",
    "a+": "a+",
    "x": "wx",
    "x+": "wx+",
    "c": constants.O_WRONLY | constants.O_CREAT,
    "c+": constants.O_RDWR | constants.O_CREAT,
}

function toFlags(mode: string): string | number {
    // binary and text flags make no difference here
    const flags = FLAGS[mode.replace(/[bt]/g, "")]
    if (flags === undefined) throw new UsageError(`Unsupported file mode "${mode}"`)
    return flags
}

function io<R>(description: string, operation: () => R): R {
    try {
        return operation()
    } catch (error) {
        throw new IOError(`${description}: ${error instanceof Error ? error.message : String(error)}`, { cause: error })
    }
}

/**
 * A regular file. Files never block, so they are always ready.
 */
export class FileResource implements StreamResource {
    readonly seekable = true
    #position: number
    #isClosed = false
    #isEof = false

    static open(path: string, mode: string): FileResource {
        const flags = toFlags(mode)
        return new FileResource(io(`Unable to open ${path}`, () => openSync(path, flags)), mode)
    }

    constructor(readonly fd: number, readonly mode: string) {
        this.#position = this.#isAppending() ? io("Unable to stat file", () => fstatSync(fd).size) : 0
    }

    isClosed(): boolean {
        return this.#isClosed
    }

    poll(_direction: Direction): boolean {
        return true
    }

    watch(_direction: Direction, _listener: () => void): CancelFunction {
        return () => {
        }
    }

    read(maxBytes: number): Buffer {
        this.#checkOpen()
        const buffer = Buffer.alloc(maxBytes)
        const count = io(`Failed reading from file ${this.fd}`, () => readSync(this.fd, buffer, 0, maxBytes, this.#position))
        this.#position += count
        this.#isEof = count < maxBytes
        return buffer.subarray(0, count)
    }

    write(data: Uint8Array): number {
        this.#checkOpen()
        const count = io(`Failed writing to file ${this.fd}`, () => writeSync(this.fd, data, 0, data.length, this.#position))
        // appends ignore the position
        this.#position = this.#isAppending() ? this.size() : this.#position + count
        return count
    }

    seek(offset: number, whence: Whence): void {
        this.#checkOpen()
        let base: number

        switch (whence) {
            case Whence.Set:
                base = 0
                break
            case Whence.Current:
                base = this.#position
                break
            case Whence.End:
                base = this.size()
                break
            default:
                throw new UsageError(`Invalid whence ${String(whence)}`)
        }

        const position = base + offset
        if (!Number.isInteger(position) || position < 0) throw new IOError(`Unable to seek to ${position}`)
        this.#position = position
        this.#isEof = false
    }

    tell(): number {
        this.#checkOpen()
        return this.#position
    }

    eof(): boolean {
        return this.#isClosed || this.#isEof
    }

    size(): number {
        this.#checkOpen()
        return io("Unable to stat file", () => fstatSync(this.fd).size)
    }

    close(): void {
        if (this.#isClosed) return
        this.#isClosed = true
        io(`Failed closing file ${this.fd}`, () => closeSync(this.fd))
    }

    #checkOpen() {
        if (this.#isClosed) throw new ClosedResourceError(`File ${this.fd} is closed`)
    }

    #isAppending(): boolean {
        return this.mode.startsWith("a")
    }
}
