/**
 * Path: tests/subscriptions/SubscriptionRegistry.test.ts
 * 구독 레지스트리 테스트
 */

import { SubscriptionRegistry } from "../../src/subscriptions/SubscriptionRegistry"
import { TickMode } from "../../src/types/tick"

describe("SubscriptionRegistry", () => {
    let registry: SubscriptionRegistry

    beforeEach(() => {
        registry = new SubscriptionRegistry()
    })

    test("add records the mode per token and overwrites on re-add", () => {
        registry.add([1, 2], "")
        registry.add([2], TickMode.FULL)

        expect(registry.size).toBe(2)
        expect(registry.getMode(1)).toBe("")
        expect(registry.getMode(2)).toBe(TickMode.FULL)
    })

    test("remove deletes tokens and ignores unknown ones", () => {
        registry.add([1, 2, 3], TickMode.LTP)
        registry.remove([2, 99])

        expect(registry.has(2)).toBe(false)
        expect(registry.has(1)).toBe(true)
        expect(registry.size).toBe(2)
        expect(registry.getMode(99)).toBeUndefined()
    })

    test("entries returns a copy", () => {
        registry.add([1], TickMode.QUOTE)
        const snapshot = registry.entries()
        registry.clear()

        expect(snapshot.get(1)).toBe(TickMode.QUOTE)
        expect(registry.size).toBe(0)
    })

    test("groupByMode puts tokens without a mode under quote", () => {
        registry.add([1, 2], "")
        registry.add([3], TickMode.QUOTE)
        registry.add([4], TickMode.FULL)

        expect(registry.groupByMode()).toEqual({
            [TickMode.LTP]: [],
            [TickMode.QUOTE]: [1, 2, 3],
            [TickMode.FULL]: [4],
        })
    })

    describe("resubscribe", () => {
        test("sends nothing when empty", () => {
            const sendMode = jest.fn()

            expect(registry.resubscribe(sendMode)).toBe(0)
            expect(sendMode).not.toHaveBeenCalled()
        })

        test("sends one request per non-empty mode in ltp, quote, full order", () => {
            registry.add([10], TickMode.FULL)
            registry.add([20, 21], "")
            registry.add([30], TickMode.LTP)
            const sendMode = jest.fn()

            expect(registry.resubscribe(sendMode)).toBe(3)
            expect(sendMode.mock.calls).toEqual([
                [TickMode.LTP, [30]],
                [TickMode.QUOTE, [20, 21]],
                [TickMode.FULL, [10]],
            ])
        })

        test("skips empty groups", () => {
            registry.add([5, 6], TickMode.FULL)
            const sendMode = jest.fn()

            expect(registry.resubscribe(sendMode)).toBe(1)
            expect(sendMode).toHaveBeenCalledWith(TickMode.FULL, [5, 6])
        })
    })
})
