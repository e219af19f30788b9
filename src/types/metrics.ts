/**
 * Path: src/types/metrics.ts
 * Counters kept by the feed client
 */

export interface FeedMetrics {
    framesReceived: number
    ticksDecoded: number
    heartbeats: number
    malformedFrames: number
    controlMessages: number
    malformedControlMessages: number
    connections: number
    reconnectAttempts: number
    lastUpdated: number
}

export function createInitialMetrics(): FeedMetrics {
    return {
        framesReceived: 0,
        ticksDecoded: 0,
        heartbeats: 0,
        malformedFrames: 0,
        controlMessages: 0,
        malformedControlMessages: 0,
        connections: 0,
        reconnectAttempts: 0,
        lastUpdated: Date.now(),
    }
}
