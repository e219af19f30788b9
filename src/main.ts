/**
 * Path: src/main.ts
 * Purpose: 환경 변수로 설정한 피드 클라이언트 실행
 * - FEED_TOKENS: 구독할 instrument token 목록 (쉼표 구분)
 * - FEED_MODE: ltp | quote | full (기본 quote)
 */

import { z } from "zod"
import { FeedClient } from "./client/FeedClient"
import { IConfigLoader } from "./config/IConfigLoader"
import { EnvConfigLoader } from "./config/EnvConfigLoader"
import { FeedConfig } from "./config/types"
import { formatIssues } from "./config/schema"
import { ErrorHandler } from "./errors/ErrorHandler"
import { WebSocketError, ErrorCode, ErrorSeverity } from "./errors/types"
import { TickMode } from "./types/tick"
import { Logger } from "./utils/logger"

const METRICS_INTERVAL = 60000

const logger = Logger.getInstance("Application")

const RunSchema = z.object({
    FEED_TOKENS: z
        .string()
        .min(1)
        .transform((value) =>
            value
                .split(",")
                .map((token) => token.trim())
                .filter((token) => token.length > 0)
        )
        .pipe(z.array(z.coerce.number().int().positive()).min(1)),
    FEED_MODE: z.nativeEnum(TickMode).default(TickMode.QUOTE),
})

interface RunOptions {
    tokens: number[]
    mode: TickMode
}

function loadRunOptions(env: NodeJS.ProcessEnv): RunOptions {
    const result = RunSchema.safeParse(env)
    if (!result.success) {
        throw new WebSocketError(
            ErrorCode.INVALID_CONFIG,
            `Invalid environment: ${formatIssues(result.error)}`,
            undefined,
            ErrorSeverity.HIGH
        )
    }
    return { tokens: result.data.FEED_TOKENS, mode: result.data.FEED_MODE }
}

class Application {
    private readonly client: FeedClient
    private metricsTimer?: NodeJS.Timeout
    private isShuttingDown = false // 종료 중인지 여부

    constructor(
        private readonly config: FeedConfig,
        private readonly options: RunOptions
    ) {
        this.client = new FeedClient(config)
        this.bindCallbacks()
    }

    static create(envPath?: string): Application {
        const configLoader: IConfigLoader = new EnvConfigLoader(envPath)
        const config = configLoader.loadConfig()
        return new Application(config, loadRunOptions(process.env))
    }

    start(): void {
        logger.info("Starting feed client", {
            instruments: this.options.tokens.length,
            mode: this.options.mode,
            reconnect: this.config.enableReconnect,
        })
        this.client.connect()
        this.startMetricsMonitoring()
        this.setupSignalHandlers()
    }

    shutdown(): void {
        if (this.metricsTimer) {
            clearInterval(this.metricsTimer)
            this.metricsTimer = undefined
        }
        this.client.stop()
    }

    private bindCallbacks(): void {
        const { tokens, mode } = this.options

        this.client.onConnect = () => {
            // 재연결 시에는 레지스트리에서 구독이 복구됨
            if (this.client.getSubscriptions().size > 0) return
            this.client.subscribe(tokens)
            this.client.setMode(mode, tokens)
        }
        this.client.onTicks = (ticks) => {
            for (const tick of ticks) {
                logger.info("Tick", {
                    token: tick.instrumentToken,
                    mode: tick.mode,
                    lastPrice: tick.lastPrice,
                    netChange: tick.netChange,
                })
            }
        }
        this.client.onOrderUpdate = (postback) => {
            logger.info("Order update", {
                orderId: postback.orderId,
                status: postback.status,
                tradingSymbol: postback.tradingSymbol,
            })
        }
        this.client.onMessage = (message) => {
            logger.info("Message", { message })
        }
        this.client.onError = (code, message) => {
            logger.warn("Feed error", { code, message })
        }
        this.client.onConnectError = () => {
            logger.warn("Connection attempt failed")
        }
        this.client.onTryReconnect = (attempt) => {
            logger.info("Reconnect attempt", { attempt })
        }
        this.client.onReconnectFail = () => {
            logger.error("Giving up after reconnect attempts were exhausted")
            this.shutdown()
            process.exitCode = 1
        }
        this.client.onClose = (code, reason) => {
            logger.info("Connection closed", { code, reason })
        }
    }

    private startMetricsMonitoring(): void {
        this.metricsTimer = setInterval(() => {
            logger.info("Feed metrics", { ...this.client.getMetrics() })
        }, METRICS_INTERVAL)
    }

    private setupSignalHandlers(): void {
        const shutdownHandler = (signal: string) => {
            if (this.isShuttingDown) return // 중복 실행 방지
            this.isShuttingDown = true

            logger.info(`Received ${signal}. Stopping feed client...`)
            this.shutdown()
        }

        process.on("SIGINT", () => shutdownHandler("SIGINT"))
        process.on("SIGTERM", () => shutdownHandler("SIGTERM"))
    }
}

try {
    Application.create().start()
} catch (error) {
    new ErrorHandler(logger).handleError(error)
    process.exitCode = 1
}
