/**
 * Path: src/errors/ErrorHandler.ts
 */

import { WebSocketError, ErrorCode, ErrorSeverity } from "./types"
import { Logger } from "../utils/logger"

export interface IErrorHandler {
    handleError(error: unknown): WebSocketError
    normalizeError(error: unknown, fallbackCode?: ErrorCode): WebSocketError
}

export class ErrorHandler implements IErrorHandler {
    constructor(private readonly logger: Logger = Logger.getInstance("ErrorHandler")) {}

    /**
     * Normalizes the error and logs it at a level matching its severity.
     */
    handleError(error: unknown): WebSocketError {
        const wsError = this.normalizeError(error)

        switch (wsError.severity) {
            case ErrorSeverity.CRITICAL:
            case ErrorSeverity.HIGH:
                this.logger.error(wsError.toString(), wsError.originalError ?? wsError)
                break
            case ErrorSeverity.MEDIUM:
                this.logger.warn(wsError.toString(), { code: wsError.code })
                break
            default:
                this.logger.debug(wsError.toString(), { code: wsError.code })
        }

        return wsError
    }

    normalizeError(
        error: unknown,
        fallbackCode: ErrorCode = ErrorCode.INTERNAL_ERROR
    ): WebSocketError {
        if (error instanceof WebSocketError) {
            return error
        }

        if (error instanceof Error) {
            return new WebSocketError(
                fallbackCode,
                error.message,
                error,
                ErrorSeverity.MEDIUM
            )
        }

        return new WebSocketError(
            fallbackCode,
            typeof error === "string" ? error : "Unknown error occurred",
            undefined,
            ErrorSeverity.LOW
        )
    }
}
