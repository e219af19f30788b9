/**
 * Path: src/config/types.ts
 * Feed client configuration
 */

import { LifecycleConfig } from "../websocket/types"

export interface FeedConfig extends LifecycleConfig {
    apiKey: string
    accessToken: string
    urlTemplate: string // {apiKey} and {accessToken} are substituted
}

/** Constructor options; everything except the API key has a default. */
export type FeedClientOptions = Pick<FeedConfig, "apiKey"> &
    Partial<Omit<FeedConfig, "apiKey">>
