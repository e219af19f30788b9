/**
 * Path: src/config/EnvConfigLoader.ts
 * Builds the feed configuration from environment variables (.env supported)
 */
import dotenv from "dotenv"
import { z } from "zod"
import { FeedConfig } from "./types"
import { IConfigLoader } from "./IConfigLoader"
import { formatIssues, resolveFeedConfig } from "./schema"
import { WebSocketError, ErrorCode, ErrorSeverity } from "../errors/types"

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .transform((value) => value === "true" || value === "1")

const EnvSchema = z.object({
    FEED_API_KEY: z.string().min(1),
    FEED_ACCESS_TOKEN: z.string().optional(),
    FEED_URL_TEMPLATE: z.string().optional(),
    FEED_CONNECT_TIMEOUT: z.coerce.number().optional(),
    FEED_ENABLE_RECONNECT: booleanFlag.optional(),
    FEED_MAX_RECONNECT_DELAY: z.coerce.number().optional(),
    FEED_MAX_RECONNECT_TRIES: z.coerce.number().optional(),
    FEED_PING_INTERVAL: z.coerce.number().optional(),
    FEED_PONG_TIMEOUT: z.coerce.number().optional(),
})

export class EnvConfigLoader implements IConfigLoader {
    constructor(
        envPath?: string,
        private readonly env: NodeJS.ProcessEnv = process.env
    ) {
        if (envPath) {
            dotenv.config({ path: envPath })
        } else {
            dotenv.config()
        }
    }

    loadConfig(): FeedConfig {
        const result = EnvSchema.safeParse(this.env)
        if (!result.success) {
            throw new WebSocketError(
                ErrorCode.INVALID_CONFIG,
                `Invalid environment: ${formatIssues(result.error)}`,
                undefined,
                ErrorSeverity.HIGH
            )
        }

        const env = result.data
        return resolveFeedConfig({
            apiKey: env.FEED_API_KEY,
            accessToken: env.FEED_ACCESS_TOKEN,
            urlTemplate: env.FEED_URL_TEMPLATE,
            connectTimeout: env.FEED_CONNECT_TIMEOUT,
            enableReconnect: env.FEED_ENABLE_RECONNECT,
            maxReconnectDelay: env.FEED_MAX_RECONNECT_DELAY,
            maxReconnectTries: env.FEED_MAX_RECONNECT_TRIES,
            pingInterval: env.FEED_PING_INTERVAL,
            pongTimeout: env.FEED_PONG_TIMEOUT,
        })
    }
}
