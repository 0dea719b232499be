import { readable, writable, yieldNow } from "./Common.js"
import { Direction } from "./Descriptor.js"
import { ClosedResourceError, InvalidArgumentError, IOError, UsageError } from "./Errors.js"
import type { Selectable } from "./Selectable.js"
import { type StreamResource, Whence } from "./StreamResource.js"
import type { CancelFunction, Coroutine } from "./Types.js"

const CHUNK_SIZE = 32_768

export interface StreamMetadata {
    readonly fd: number
    readonly mode: string
    readonly seekable: boolean
    readonly eof: boolean
}

export interface ResourceStreamOptions {
    /**
     * Overrides the mode reported by the resource when deciding whether the stream is readable or writable.
     */
    mode?: string

    /**
     * Milliseconds a read or write may wait for the resource before failing with TimeoutError.
     */
    timeout?: number
}

// resource faults that are not already part of the error contract become IOError
function guard<R>(description: string, operation: () => R): R {
    try {
        return operation()
    } catch (error) {
        if (error instanceof IOError || error instanceof ClosedResourceError) throw error
        throw new IOError(description, { cause: error })
    }
}

/**
 * Stream backed by a StreamResource, such as a pipe or a file. Reads and writes suspend the calling task until the
 * resource is ready instead of blocking the loop. If created from another ResourceStream, that stream is detached.
 */
export class ResourceStream implements Selectable {
    #resource: StreamResource | null
    #isClosed = false
    #isDetached = false
    readonly #mode: string | null
    readonly #timeout: number | undefined

    constructor(resource: StreamResource | ResourceStream, options: ResourceStreamOptions = {}) {
        const target = resource instanceof ResourceStream ? resource.detach() : resource
        if (target === null || target.isClosed()) throw new UsageError("Not an open stream resource")
        this.#resource = target
        this.#mode = options.mode ?? null
        this.#timeout = options.timeout
    }

    /**
     * Closes the stream and the underlying resource. Does nothing if already closed or detached.
     */
    close(): void {
        const resource = this.#resource
        if (this.#isClosed || this.#isDetached || resource === null) return
        this.#isClosed = true
        this.#resource = null
        resource.close()
    }

    /**
     * Separates the underlying resource from the stream, which becomes unusable.
     */
    detach(): StreamResource | null {
        const resource = this.#resource
        if (this.#isClosed || this.#isDetached || resource === null) return null
        this.#isDetached = true
        this.#resource = null
        return resource
    }

    getSize(): number | null {
        if (this.#resource === null) return null
        const resource = this.#resource
        return guard("Unable to determine size", () => resource.size())
    }

    tell(): number {
        const resource = this.#open()
        return guard("Unable to tell position", () => resource.tell())
    }

    eof(): boolean {
        if (this.#resource === null) return true
        return this.#resource.eof()
    }

    isSeekable(): boolean {
        return this.#resource?.seekable ?? false
    }

    seek(offset: number, whence: Whence = Whence.Set): void {
        const resource = this.#open()
        if (!resource.seekable) throw new IOError("Stream is not seekable")
        guard("Unable to seek", () => resource.seek(offset, whence))
    }

    rewind(): void {
        this.seek(0)
    }

    isReadable(): boolean {
        const mode = this.#currentMode()
        return mode !== null && (mode.includes("+") || mode.includes("r"))
    }

    isWritable(): boolean {
        const mode = this.#currentMode()
        return mode !== null && /[+xwac]/.test(mode)
    }

    /**
     * Waits until the resource is readable, then returns up to `length` bytes. An empty buffer means nothing was
     * available, e.g. at end of stream.
     */
    * read(length: number): Coroutine<Buffer> {
        const resource = this.#open()
        if (length < 0) throw new InvalidArgumentError("Can't read a negative amount")
        if (!Number.isInteger(length)) throw new InvalidArgumentError(`Invalid read length ${length}`)
        if (!this.isReadable()) throw new UsageError("Stream is not readable")
        yield* readable(resource, this.#timeout)
        // closed by another task while waiting
        const current = this.#open()
        return guard("Failed reading from stream", () => current.read(length))
    }

    /**
     * Waits until the resource is writable, then writes as much of `data` as it accepts and returns the count.
     */
    * write(data: Uint8Array | string): Coroutine<number> {
        const resource = this.#open()
        if (!this.isWritable()) throw new UsageError("Stream is not writable")
        const bytes = typeof data === "string" ? Buffer.from(data) : data
        yield* writable(resource, this.#timeout)
        const current = this.#open()
        return guard("Failed writing to stream", () => current.write(bytes))
    }

    /**
     * Writes all of `data`, waiting for the resource as often as needed.
     */
    * writeAll(data: Uint8Array | string): Coroutine<void> {
        let remaining = typeof data === "string" ? Buffer.from(data) : data

        while (remaining.length > 0) {
            const count = yield* this.write(remaining)
            remaining = remaining.subarray(count)
        }
    }

    /**
     * Returns the remaining contents.
     */
    * getContents(): Coroutine<Buffer> {
        this.#open()
        const chunks: Buffer[] = []

        while (!this.eof()) {
            const chunk = yield* this.read(CHUNK_SIZE)
            if (chunk.length > 0) chunks.push(chunk)
        }

        return Buffer.concat(chunks)
    }

    /**
     * Reads the whole stream from the beginning as text. Returns an empty string when the stream is closed, detached,
     * empty or fails.
     */
    * toText(encoding: BufferEncoding = "utf8"): Coroutine<string> {
        if (this.#resource === null || this.getSize() === 0) return ""

        try {
            if (this.isSeekable()) this.seek(0)
            const chunks: Buffer[] = []

            while (!this.eof()) {
                const chunk = yield* this.read(CHUNK_SIZE)

                if (chunk.length === 0) {
                    yield* yieldNow()
                } else {
                    chunks.push(chunk)
                }
            }

            return Buffer.concat(chunks).toString(encoding)
        } catch (error) {
            if (error instanceof ClosedResourceError || error instanceof IOError) return ""
            throw error
        }
    }

    getMetadata(): StreamMetadata | null
    getMetadata<K extends keyof StreamMetadata>(key: K): StreamMetadata[K] | null
    getMetadata(key?: keyof StreamMetadata): StreamMetadata | StreamMetadata[keyof StreamMetadata] | null {
        const resource = this.#resource
        if (resource === null) return null
        const metadata: StreamMetadata = {
            fd: resource.fd,
            mode: resource.mode,
            seekable: resource.seekable,
            eof: resource.eof(),
        }
        return key === undefined ? metadata : metadata[key]
    }

    willBlock(): boolean {
        // a closed stream fails right away instead of blocking
        if (this.#resource === null) return false
        return !this.#resource.poll(Direction.Read)
    }

    subscribe(listener: () => void): CancelFunction {
        if (this.#resource === null) return () => {
        }

        let isCalledOnce = false
        let unwatch: CancelFunction | null = null

        const unsubscribe = () => {
            isCalledOnce = true
            if (unwatch !== null) unwatch()
        }

        unwatch = this.#resource.watch(Direction.Read, () => {
            if (isCalledOnce) return
            unsubscribe()
            listener()
        })

        return unsubscribe
    }

    #open(): StreamResource {
        if (this.#isClosed || this.#isDetached || this.#resource === null) {
            throw new ClosedResourceError("Stream is closed or detached")
        }

        return this.#resource
    }

    #currentMode(): string | null {
        if (this.#resource === null) return null
        return this.#mode ?? this.#resource.mode
    }
}
