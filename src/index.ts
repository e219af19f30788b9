// src/index.ts

/**
 * Market feed client
 *
 * 실시간 시세 피드 클라이언트의 공개 API
 * - FeedClient: 연결, 구독, 콜백
 * - 바이너리 틱 디코더 및 제어 메시지 코덱
 * - 설정 로더 및 에러 타입
 */

export { FeedClient } from "./client/FeedClient"

export { FeedConfig, FeedClientOptions } from "./config/types"
export { IConfigLoader } from "./config/IConfigLoader"
export { EnvConfigLoader } from "./config/EnvConfigLoader"
export {
    DEFAULT_FEED_CONFIG,
    DEFAULT_URL_TEMPLATE,
    buildConnectUrl,
    resolveFeedConfig,
} from "./config/schema"

export {
    Tick,
    TickMode,
    Ohlc,
    DepthLevel,
    MarketDepth,
} from "./types/tick"
export { FeedMetrics } from "./types/metrics"

export {
    BinaryTickDecoder,
    percentChange,
    LTP_PACKET_LENGTH,
    INDEX_QUOTE_PACKET_LENGTH,
    INDEX_FULL_PACKET_LENGTH,
    QUOTE_PACKET_LENGTH,
    FULL_PACKET_LENGTH,
} from "./protocol/BinaryTickDecoder"
export {
    ControlChannelCodec,
    ControlRequest,
    InboundControlMessage,
} from "./protocol/ControlChannelCodec"
export { Postback, parsePostback } from "./protocol/postback"
export {
    SEGMENTS,
    SegmentName,
    segmentOf,
    priceDivisor,
    isTradableSegment,
} from "./protocol/segments"

export {
    SubscriptionRegistry,
    SubscriptionMode,
} from "./subscriptions/SubscriptionRegistry"

export { ConnectionState, StateTransitionEvent } from "./states/types"
export { ConnectionLifecycle, LifecycleHooks } from "./websocket/ConnectionLifecycle"
export { IWebSocketClient, WebSocketClientHandlers } from "./websocket/IWebSocketClient"
export { WebSocketClient } from "./websocket/WebSocketClient"
export { LifecycleConfig, ReconnectState } from "./websocket/types"

export { WebSocketError, ErrorCode, ErrorSeverity } from "./errors/types"
export { ErrorHandler, IErrorHandler } from "./errors/ErrorHandler"
