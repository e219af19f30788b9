import { FeedConfig } from "./types"

/**
 * Path: src/config/IConfigLoader.ts
 */
export interface IConfigLoader {
    loadConfig(): FeedConfig
}
