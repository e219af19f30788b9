/**
 * Path: tests/protocol/FieldReader.test.ts
 * FieldReader 테스트
 */

import { FieldReader } from "../../src/protocol/FieldReader"
import { WebSocketError, ErrorCode } from "../../src/errors/types"

function captureError(fn: () => unknown): unknown {
    try {
        fn()
    } catch (error) {
        return error
    }
    throw new Error("expected an error")
}

describe("FieldReader", () => {
    const bytes = Buffer.from([0xff, 0xfe, 0x00, 0x02, 0x80, 0x00, 0x00, 0x01])

    test("reads signed and unsigned big-endian values at absolute offsets", () => {
        const reader = new FieldReader(bytes)

        expect(reader.int16At(0)).toBe(-2)
        expect(reader.uint16At(0)).toBe(65534)
        expect(reader.uint16At(2)).toBe(2)
        expect(reader.int32At(4)).toBe(-2147483647)
        expect(reader.uint32At(4)).toBe(2147483649)
    })

    test("cursor reads advance the offset", () => {
        const reader = new FieldReader(bytes)

        expect(reader.readUInt16()).toBe(65534)
        expect(reader.offset).toBe(2)

        const slice = reader.readBytes(4)
        expect([...slice]).toEqual([0x00, 0x02, 0x80, 0x00])
        expect(reader.offset).toBe(6)
        expect(reader.remaining()).toBe(2)
    })

    test("absolute reads do not move the cursor", () => {
        const reader = new FieldReader(bytes)
        reader.int32At(4)
        expect(reader.offset).toBe(0)
        expect(reader.length).toBe(8)
    })

    test("a read past the end raises MALFORMED_FRAME", () => {
        const reader = new FieldReader(bytes)

        const error = captureError(() => reader.int32At(6))

        expect(error).toBeInstanceOf(WebSocketError)
        expect(error).toMatchObject({
            code: ErrorCode.MALFORMED_FRAME,
            message: "Read of 4 bytes at offset 6 overruns 8-byte buffer",
        })
    })

    test("readBytes beyond the remaining bytes raises MALFORMED_FRAME and keeps the cursor", () => {
        const reader = new FieldReader(bytes)
        reader.readUInt16()

        expect(() => reader.readBytes(7)).toThrow(
            "Read of 7 bytes at offset 2 overruns 8-byte buffer"
        )
        expect(reader.offset).toBe(2)
    })

    test("negative offsets are rejected", () => {
        const reader = new FieldReader(bytes)
        expect(() => reader.uint16At(-1)).toThrow(WebSocketError)
    })
})
