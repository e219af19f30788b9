/**
 * Path: src/types/tick.ts
 * Decoded market update types
 */

export enum TickMode {
    LTP = "ltp",
    QUOTE = "quote",
    FULL = "full",
}

export interface Ohlc {
    open: number
    high: number
    low: number
    close: number
}

export interface DepthLevel {
    quantity: number
    price: number
    orderCount: number
}

export interface MarketDepth {
    buy: DepthLevel[]
    sell: DepthLevel[]
}

/**
 * One decoded tick. Which optional fields are set depends on the packet the
 * tick came from, not on the mode that was requested; a field the packet does
 * not carry is left `undefined`.
 */
export interface Tick {
    mode: TickMode
    instrumentToken: number
    isTradable: boolean
    lastPrice: number

    netChange?: number
    ohlc?: Ohlc

    // quote / full
    lastTradedQuantity?: number
    averageTradePrice?: number
    volumeTraded?: number
    totalBuyQuantity?: number
    totalSellQuantity?: number

    // full
    lastTradeTime?: number // epoch seconds
    openInterest?: number
    openInterestDayHigh?: number
    openInterestDayLow?: number
    timestamp?: number // epoch seconds, also sent by 32-byte index packets
    marketDepth?: MarketDepth
}
