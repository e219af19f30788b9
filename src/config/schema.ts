/**
 * Path: src/config/schema.ts
 * Defaults and validation for the feed configuration
 */

import { z } from "zod"
import { FeedClientOptions, FeedConfig } from "./types"
import { WebSocketError, ErrorCode, ErrorSeverity } from "../errors/types"

export const DEFAULT_URL_TEMPLATE =
    "wss://ws.kite.trade/?api_key={apiKey}&access_token={accessToken}"

export const DEFAULT_FEED_CONFIG: Omit<FeedConfig, "apiKey"> = {
    accessToken: "",
    urlTemplate: DEFAULT_URL_TEMPLATE,
    connectTimeout: 5,
    enableReconnect: false,
    initialReconnectDelay: 2,
    maxReconnectDelay: 60,
    maxReconnectTries: 30,
    pingInterval: 3000,
    pongTimeout: 0,
}

const FeedConfigSchema = z
    .object({
        apiKey: z.string().min(1),
        accessToken: z.string(),
        urlTemplate: z
            .string()
            .regex(/^wss?:\/\//, "must start with ws:// or wss://"),
        connectTimeout: z.number().positive(),
        enableReconnect: z.boolean(),
        initialReconnectDelay: z.number().positive(),
        maxReconnectDelay: z.number().positive(),
        maxReconnectTries: z.number().int().nonnegative(),
        pingInterval: z.number().int().nonnegative(),
        pongTimeout: z.number().int().nonnegative(),
    })
    .refine((config) => config.maxReconnectDelay >= config.initialReconnectDelay, {
        message: "must not be below initialReconnectDelay",
        path: ["maxReconnectDelay"],
    })

export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
        .join("; ")
}

/**
 * Merges the options over the defaults and validates the result.
 * @throws WebSocketError INVALID_CONFIG
 */
export function resolveFeedConfig(options: FeedClientOptions): FeedConfig {
    const overrides = Object.fromEntries(
        Object.entries(options).filter(([, value]) => value !== undefined)
    )
    const result = FeedConfigSchema.safeParse({
        ...DEFAULT_FEED_CONFIG,
        ...overrides,
    })

    if (!result.success) {
        throw new WebSocketError(
            ErrorCode.INVALID_CONFIG,
            `Invalid feed configuration: ${formatIssues(result.error)}`,
            undefined,
            ErrorSeverity.HIGH
        )
    }
    return result.data
}

export function buildConnectUrl(
    template: string,
    apiKey: string,
    accessToken: string
): string {
    return template
        .replace("{apiKey}", encodeURIComponent(apiKey))
        .replace("{accessToken}", encodeURIComponent(accessToken))
}
