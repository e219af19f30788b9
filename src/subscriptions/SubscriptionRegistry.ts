/**
 * File: src/subscriptions/SubscriptionRegistry.ts
 * Description: instrument token -> requested mode, replayed after every reconnect
 */

import { TickMode } from "../types/tick"

/** "" means subscribed without an explicit mode; the feed then sends quote ticks. */
export type SubscriptionMode = TickMode | ""

export type ModeGroups = Record<TickMode, number[]>

export class SubscriptionRegistry {
    private readonly instruments = new Map<number, SubscriptionMode>()

    get size(): number {
        return this.instruments.size
    }

    add(tokens: readonly number[], mode: SubscriptionMode): void {
        for (const token of tokens) {
            this.instruments.set(token, mode)
        }
    }

    remove(tokens: readonly number[]): void {
        for (const token of tokens) {
            this.instruments.delete(token)
        }
    }

    has(token: number): boolean {
        return this.instruments.has(token)
    }

    getMode(token: number): SubscriptionMode | undefined {
        return this.instruments.get(token)
    }

    entries(): ReadonlyMap<number, SubscriptionMode> {
        return new Map(this.instruments)
    }

    clear(): void {
        this.instruments.clear()
    }

    groupByMode(): ModeGroups {
        const groups: ModeGroups = {
            [TickMode.LTP]: [],
            [TickMode.QUOTE]: [],
            [TickMode.FULL]: [],
        }
        for (const [token, mode] of this.instruments) {
            groups[mode === "" ? TickMode.QUOTE : mode].push(token)
        }
        return groups
    }

    /**
     * Issues one mode request per non-empty group and returns how many were sent.
     */
    resubscribe(
        sendMode: (mode: TickMode, tokens: number[]) => void
    ): number {
        if (this.instruments.size === 0) return 0

        const groups = this.groupByMode()
        let requests = 0
        for (const mode of [TickMode.LTP, TickMode.QUOTE, TickMode.FULL]) {
            const tokens = groups[mode]
            if (tokens.length > 0) {
                sendMode(mode, tokens)
                requests++
            }
        }
        return requests
    }
}
