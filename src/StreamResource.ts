import type { Descriptor } from "./Descriptor.js"

export enum Whence {
    Set = 0,
    Current = 1,
    End = 2,
}

/**
 * A byte resource whose operations never block. Callers wait on it as a Descriptor before reading or writing.
 */
export interface StreamResource extends Descriptor {
    /**
     * fopen() style mode, e.g. "r", "w+" or "a".
     */
    readonly mode: string
    readonly seekable: boolean

    isClosed(): boolean

    /**
     * Returns up to `maxBytes` bytes, fewer if fewer are available, none at end of stream.
     */
    read(maxBytes: number): Buffer

    /**
     * Returns the number of bytes accepted, which may be fewer than given.
     */
    write(data: Uint8Array): number

    seek(offset: number, whence: Whence): void

    tell(): number

    eof(): boolean

    /**
     * Size in bytes if known.
     */
    size(): number | null

    close(): void
}
