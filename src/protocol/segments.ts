/**
 * Path: src/protocol/segments.ts
 * Market segment codes carried in the low byte of an instrument token
 */

export const SEGMENTS = {
    nse: 1,
    nfo: 2,
    cds: 3,
    bse: 4,
    bfo: 5,
    bsecds: 6,
    mcx: 7,
    mcxsx: 8,
    indices: 9,
} as const

export type SegmentName = keyof typeof SEGMENTS

export const CURRENCY_DERIVATIVES_SEGMENT = SEGMENTS.cds
export const INDICES_SEGMENT = SEGMENTS.indices

export const CURRENCY_PRICE_DIVISOR = 10_000_000
export const DEFAULT_PRICE_DIVISOR = 100

export function segmentOf(instrumentToken: number): number {
    return instrumentToken & 0xff
}

export function priceDivisor(segment: number): number {
    return segment === CURRENCY_DERIVATIVES_SEGMENT
        ? CURRENCY_PRICE_DIVISOR
        : DEFAULT_PRICE_DIVISOR
}

// index values are published for reference and cannot be traded
export function isTradableSegment(segment: number): boolean {
    return segment !== INDICES_SEGMENT
}
