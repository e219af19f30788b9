/**
 * Path: tests/errors/ErrorHandler.test.ts
 * ErrorHandler 클래스의 테스트
 */

import { ErrorHandler } from "../../src/errors/ErrorHandler"
import {
    WebSocketError,
    ErrorCode,
    ErrorSeverity,
} from "../../src/errors/types"
import { Logger } from "../../src/utils/logger"

describe("ErrorHandler", () => {
    let errorHandler: ErrorHandler
    let logger: Logger

    beforeEach(() => {
        logger = Logger.getInstance("ErrorHandlerTest")
        jest.spyOn(logger, "error").mockImplementation(() => undefined)
        jest.spyOn(logger, "warn").mockImplementation(() => undefined)
        jest.spyOn(logger, "debug").mockImplementation(() => undefined)
        errorHandler = new ErrorHandler(logger)
    })

    afterEach(() => {
        jest.restoreAllMocks()
    })

    test("handleError wraps a generic error", () => {
        const genericError = new Error("A generic error occurred")

        const result = errorHandler.handleError(genericError)

        expect(result).toBeInstanceOf(WebSocketError)
        expect(result.code).toBe(ErrorCode.INTERNAL_ERROR)
        expect(result.message).toBe("A generic error occurred")
        expect(result.originalError).toBe(genericError)
        expect(result.severity).toBe(ErrorSeverity.MEDIUM)
        expect(logger.warn).toHaveBeenCalledWith(
            "WebSocketError[INTERNAL_ERROR]: A generic error occurred",
            { code: ErrorCode.INTERNAL_ERROR }
        )
    })

    test("handleError passes through WebSocketError", () => {
        const wsError = new WebSocketError(
            ErrorCode.CONNECTION_FAILED,
            "Connection failed",
            undefined,
            ErrorSeverity.HIGH
        )

        const result = errorHandler.handleError(wsError)

        expect(result).toBe(wsError)
        expect(logger.error).toHaveBeenCalledWith(
            "WebSocketError[CONNECTION_FAILED]: Connection failed",
            wsError
        )
    })

    test("high severity errors are logged with their cause", () => {
        const cause = new Error("ECONNRESET")
        const wsError = new WebSocketError(
            ErrorCode.CONNECTION_FAILED,
            "Connection failed",
            cause,
            ErrorSeverity.CRITICAL
        )

        errorHandler.handleError(wsError)

        expect(logger.error).toHaveBeenCalledWith(
            "WebSocketError[CONNECTION_FAILED]: Connection failed",
            cause
        )
    })

    test("low severity errors are logged at debug level", () => {
        errorHandler.handleError(
            new WebSocketError(
                ErrorCode.UNKNOWN_MESSAGE_TYPE,
                "Cannot recognize websocket message type \"x\"",
                undefined,
                ErrorSeverity.LOW
            )
        )

        expect(logger.debug).toHaveBeenCalledTimes(1)
        expect(logger.warn).not.toHaveBeenCalled()
        expect(logger.error).not.toHaveBeenCalled()
    })

    test("normalizeError applies the fallback code to plain errors", () => {
        const result = errorHandler.normalizeError(
            new Error("write EPIPE"),
            ErrorCode.SEND_FAILED
        )

        expect(result.code).toBe(ErrorCode.SEND_FAILED)
        expect(result.message).toBe("write EPIPE")
    })

    test("normalizeError keeps string messages", () => {
        const result = errorHandler.normalizeError("socket hang up")

        expect(result.message).toBe("socket hang up")
        expect(result.severity).toBe(ErrorSeverity.LOW)
    })

    test("normalizeError handles unknown values", () => {
        const result = errorHandler.normalizeError({ reason: 42 })

        expect(result.code).toBe(ErrorCode.INTERNAL_ERROR)
        expect(result.message).toBe("Unknown error occurred")
        expect(result.originalError).toBeUndefined()
    })

    test("WebSocketError formats code and message", () => {
        const error = new WebSocketError(ErrorCode.NOT_CONNECTED, "Not connected")

        expect(error.toString()).toBe("WebSocketError[NOT_CONNECTED]: Not connected")
        expect(error.severity).toBe(ErrorSeverity.MEDIUM)
        expect(error).toBeInstanceOf(Error)
    })
})
