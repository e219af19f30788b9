/**
 * Path: src/protocol/BinaryTickDecoder.ts
 * Splits a multiplexed binary frame into packets and decodes each packet into a Tick
 *
 * Frame layout (big-endian):
 *
 *  Offset  Bytes  Field
 *  ------  -----  -----
 *  0       2      packet count n
 *  2       2      length of packet 1
 *  4       len    packet 1
 *  ...            repeated n times
 *
 * Packet shape is chosen by length alone:
 *    8  LTP
 *   28  index quote (no timestamp)
 *   32  index full (28 + timestamp)
 *   44  quote
 *  184  full (quote + OI, timestamps and 10 depth entries)
 */

import { FieldReader } from "./FieldReader"
import { isTradableSegment, priceDivisor, segmentOf } from "./segments"
import { DepthLevel, MarketDepth, Ohlc, Tick, TickMode } from "../types/tick"
import { Logger } from "../utils/logger"

export const LTP_PACKET_LENGTH = 8
export const INDEX_QUOTE_PACKET_LENGTH = 28
export const INDEX_FULL_PACKET_LENGTH = 32
export const QUOTE_PACKET_LENGTH = 44
export const FULL_PACKET_LENGTH = 184

const DEPTH_OFFSET = 64
const DEPTH_ENTRY_LENGTH = 12
const DEPTH_LEVELS_PER_SIDE = 5

export class BinaryTickDecoder {
    private readonly logger = Logger.getInstance("BinaryTickDecoder")

    /**
     * Decodes every packet of the frame in wire order. Throws a
     * MALFORMED_FRAME error when a declared length runs past the frame end.
     */
    decode(frame: Buffer): Tick[] {
        const ticks: Tick[] = []
        for (const packet of this.splitPackets(frame)) {
            const tick = this.decodePacket(packet)
            if (tick) ticks.push(tick)
        }
        return ticks
    }

    splitPackets(frame: Buffer): Buffer[] {
        const reader = new FieldReader(frame)
        const count = reader.readUInt16()

        const packets: Buffer[] = []
        for (let i = 0; i < count; i++) {
            const length = reader.readUInt16()
            packets.push(reader.readBytes(length))
        }

        if (reader.remaining() > 0) {
            this.logger.debug("Trailing bytes after last packet", {
                trailing: reader.remaining(),
            })
        }
        return packets
    }

    decodePacket(packet: Buffer): Tick | undefined {
        switch (packet.length) {
            case LTP_PACKET_LENGTH:
                return this.decodeLtp(new FieldReader(packet))
            case INDEX_QUOTE_PACKET_LENGTH:
            case INDEX_FULL_PACKET_LENGTH:
                return this.decodeIndex(new FieldReader(packet))
            case QUOTE_PACKET_LENGTH:
            case FULL_PACKET_LENGTH:
                return this.decodeQuote(new FieldReader(packet))
            default:
                this.logger.debug("Skipping packet of unknown length", {
                    length: packet.length,
                })
                return undefined
        }
    }

    private decodeLtp(reader: FieldReader): Tick {
        const { instrumentToken, isTradable, divisor } = this.readHeader(reader)
        return {
            mode: TickMode.LTP,
            instrumentToken,
            isTradable,
            lastPrice: reader.int32At(4) / divisor,
        }
    }

    private decodeIndex(reader: FieldReader): Tick {
        const { instrumentToken, isTradable, divisor } = this.readHeader(reader)
        const isFull = reader.length === INDEX_FULL_PACKET_LENGTH

        const tick: Tick = {
            mode: isFull ? TickMode.FULL : TickMode.QUOTE,
            instrumentToken,
            isTradable,
            lastPrice: reader.int32At(4) / divisor,
            ohlc: {
                high: reader.int32At(8) / divisor,
                low: reader.int32At(12) / divisor,
                open: reader.int32At(16) / divisor,
                close: reader.int32At(20) / divisor,
            },
            // index packets carry the change on the wire
            netChange: reader.int32At(24) / divisor,
        }

        if (isFull) {
            tick.timestamp = reader.int32At(28)
        }
        return tick
    }

    private decodeQuote(reader: FieldReader): Tick {
        const { instrumentToken, isTradable, divisor } = this.readHeader(reader)
        const isFull = reader.length === FULL_PACKET_LENGTH

        const lastPrice = reader.int32At(4) / divisor
        const ohlc: Ohlc = {
            open: reader.int32At(28) / divisor,
            high: reader.int32At(32) / divisor,
            low: reader.int32At(36) / divisor,
            close: reader.int32At(40) / divisor,
        }

        const tick: Tick = {
            mode: isFull ? TickMode.FULL : TickMode.QUOTE,
            instrumentToken,
            isTradable,
            lastPrice,
            lastTradedQuantity: reader.int32At(8),
            averageTradePrice: reader.int32At(12) / divisor,
            volumeTraded: reader.int32At(16),
            totalBuyQuantity: reader.int32At(20),
            totalSellQuantity: reader.int32At(24),
            ohlc,
            netChange: percentChange(lastPrice, ohlc.close),
        }

        if (isFull) {
            tick.lastTradeTime = reader.int32At(44)
            tick.openInterest = reader.int32At(48)
            tick.openInterestDayHigh = reader.int32At(52)
            tick.openInterestDayLow = reader.int32At(56)
            tick.timestamp = reader.int32At(60)
            tick.marketDepth = this.readDepth(reader, divisor)
        }
        return tick
    }

    private readDepth(reader: FieldReader, divisor: number): MarketDepth {
        const depth: MarketDepth = { buy: [], sell: [] }

        for (let i = 0; i < DEPTH_LEVELS_PER_SIDE * 2; i++) {
            const offset = DEPTH_OFFSET + i * DEPTH_ENTRY_LENGTH
            const level: DepthLevel = {
                quantity: reader.int32At(offset),
                price: reader.int32At(offset + 4) / divisor,
                orderCount: reader.int16At(offset + 8),
            }
            if (i < DEPTH_LEVELS_PER_SIDE) {
                depth.buy.push(level)
            } else {
                depth.sell.push(level)
            }
        }
        return depth
    }

    private readHeader(reader: FieldReader): {
        instrumentToken: number
        isTradable: boolean
        divisor: number
    } {
        const instrumentToken = reader.uint32At(0)
        const segment = segmentOf(instrumentToken)
        return {
            instrumentToken,
            isTradable: isTradableSegment(segment),
            divisor: priceDivisor(segment),
        }
    }
}

/** Change against the previous close in percent; 0 when there is no close yet. */
export function percentChange(lastPrice: number, close: number): number {
    if (close === 0) return 0
    return ((lastPrice - close) * 100) / close
}
