// src/utils/logger.ts

import winston from "winston"
import DailyRotateFile from "winston-daily-rotate-file"

type LogMeta = Record<string, unknown>

export class Logger {
    private logger: winston.Logger
    private static instances: Map<string, Logger> = new Map()

    private constructor(module: string) {
        this.logger = winston.createLogger({
            level: process.env.LOG_LEVEL || "info",
            silent: process.env.LOG_SILENT === "true",
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            defaultMeta: { module },
            transports: this.getTransports(),
        })
    }

    static getInstance(module: string): Logger {
        let instance = Logger.instances.get(module)
        if (!instance) {
            instance = new Logger(module)
            Logger.instances.set(module, instance)
        }
        return instance
    }

    private getTransports(): winston.transport[] {
        const transports: winston.transport[] = [
            new winston.transports.Console({
                format: winston.format.combine(
                    winston.format.colorize(),
                    winston.format.simple()
                ),
            }),
        ]

        // file output only when a log directory is configured
        const logDir = process.env.LOG_DIR
        if (logDir) {
            transports.push(
                new DailyRotateFile({
                    filename: `${logDir}/feed-%DATE%.log`,
                    datePattern: "YYYY-MM-DD",
                    zippedArchive: true,
                    maxSize: "20m",
                    maxFiles: "14d",
                }),
                new DailyRotateFile({
                    filename: `${logDir}/error-%DATE%.log`,
                    datePattern: "YYYY-MM-DD",
                    zippedArchive: true,
                    maxSize: "20m",
                    maxFiles: "14d",
                    level: "error",
                })
            )
        }

        return transports
    }

    info(message: string, meta?: LogMeta): void {
        this.logger.info(message, meta)
    }

    error(message: string, error?: unknown): void {
        if (error instanceof Error) {
            this.logger.error(message, {
                error: error.message,
                stack: error.stack,
            })
        } else {
            this.logger.error(message, { error })
        }
    }

    warn(message: string, meta?: LogMeta): void {
        this.logger.warn(message, meta)
    }

    debug(message: string, meta?: LogMeta): void {
        this.logger.debug(message, meta)
    }
}
