/**
 * Path: src/protocol/FieldReader.ts
 * Bounds-checked big-endian reads over a binary frame
 */

import { WebSocketError, ErrorCode, ErrorSeverity } from "../errors/types"

export class FieldReader {
    private position = 0

    constructor(private readonly bytes: Buffer) {}

    get length(): number {
        return this.bytes.length
    }

    get offset(): number {
        return this.position
    }

    remaining(): number {
        return this.bytes.length - this.position
    }

    int16At(offset: number): number {
        this.ensureReadable(offset, 2)
        return this.bytes.readInt16BE(offset)
    }

    uint16At(offset: number): number {
        this.ensureReadable(offset, 2)
        return this.bytes.readUInt16BE(offset)
    }

    int32At(offset: number): number {
        this.ensureReadable(offset, 4)
        return this.bytes.readInt32BE(offset)
    }

    uint32At(offset: number): number {
        this.ensureReadable(offset, 4)
        return this.bytes.readUInt32BE(offset)
    }

    /** Reads an unsigned 16-bit value at the cursor and advances it. */
    readUInt16(): number {
        const value = this.uint16At(this.position)
        this.position += 2
        return value
    }

    /** Returns a view (no copy) of the next `length` bytes and advances the cursor. */
    readBytes(length: number): Buffer {
        this.ensureReadable(this.position, length)
        const slice = this.bytes.subarray(this.position, this.position + length)
        this.position += length
        return slice
    }

    private ensureReadable(offset: number, width: number): void {
        if (
            !Number.isInteger(offset) ||
            offset < 0 ||
            width < 0 ||
            offset + width > this.bytes.length
        ) {
            throw new WebSocketError(
                ErrorCode.MALFORMED_FRAME,
                `Read of ${width} bytes at offset ${offset} overruns ${this.bytes.length}-byte buffer`,
                undefined,
                ErrorSeverity.MEDIUM
            )
        }
    }
}
