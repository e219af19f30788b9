/**
 * Path: tests/config/EnvConfigLoader.test.ts
 * 환경 변수 설정 로더 테스트
 */

import path from "path"
import { EnvConfigLoader } from "../../src/config/EnvConfigLoader"
import { ErrorCode } from "../../src/errors/types"

// .env 파일이 없는 경로로 지정해 실제 환경 파일을 읽지 않도록 함
const NO_ENV_FILE = path.join(__dirname, "missing.env")

describe("EnvConfigLoader", () => {
    test("maps FEED_* variables onto the config", () => {
        const loader = new EnvConfigLoader(NO_ENV_FILE, {
            FEED_API_KEY: "test-key",
            FEED_ACCESS_TOKEN: "test-token",
            FEED_URL_TEMPLATE: "ws://localhost:9000/?k={apiKey}",
            FEED_CONNECT_TIMEOUT: "10",
            FEED_ENABLE_RECONNECT: "true",
            FEED_MAX_RECONNECT_DELAY: "30",
            FEED_MAX_RECONNECT_TRIES: "5",
            FEED_PING_INTERVAL: "0",
            FEED_PONG_TIMEOUT: "9000",
        })

        expect(loader.loadConfig()).toEqual({
            apiKey: "test-key",
            accessToken: "test-token",
            urlTemplate: "ws://localhost:9000/?k={apiKey}",
            connectTimeout: 10,
            enableReconnect: true,
            initialReconnectDelay: 2,
            maxReconnectDelay: 30,
            maxReconnectTries: 5,
            pingInterval: 0,
            pongTimeout: 9000,
        })
    })

    test("unset variables fall back to defaults", () => {
        const config = new EnvConfigLoader(NO_ENV_FILE, {
            FEED_API_KEY: "test-key",
        }).loadConfig()

        expect(config.enableReconnect).toBe(false)
        expect(config.maxReconnectTries).toBe(30)
        expect(config.accessToken).toBe("")
    })

    test("accepts 1 and 0 as boolean flags", () => {
        const config = new EnvConfigLoader(NO_ENV_FILE, {
            FEED_API_KEY: "test-key",
            FEED_ENABLE_RECONNECT: "1",
        }).loadConfig()

        expect(config.enableReconnect).toBe(true)
    })

    test("a missing api key is an INVALID_CONFIG error", () => {
        const loader = new EnvConfigLoader(NO_ENV_FILE, {})

        let caught: unknown
        try {
            loader.loadConfig()
        } catch (error) {
            caught = error
        }

        expect(caught).toMatchObject({
            code: ErrorCode.INVALID_CONFIG,
            message: "Invalid environment: FEED_API_KEY: Required",
        })
    })

    test("a malformed flag is rejected", () => {
        const loader = new EnvConfigLoader(NO_ENV_FILE, {
            FEED_API_KEY: "test-key",
            FEED_ENABLE_RECONNECT: "yes",
        })

        expect(() => loader.loadConfig()).toThrow(/^Invalid environment: FEED_ENABLE_RECONNECT:/)
    })
})
