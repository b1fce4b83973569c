/**
 * Tests for channel spec validation and identifier derivation
 */

import { describe, expect, it } from "vitest";
import { InvalidChannelError } from "../errors.js";
import {
	channelIdentifier,
	inboundIdentifier,
	parseChannelSpec,
	subscriptionTarget,
} from "../identifiers.js";

describe("parseChannelSpec", () => {
	it("should accept every supported channel type", () => {
		expect(parseChannelSpec({ type: "allMids" })).toEqual({ type: "allMids" });
		expect(parseChannelSpec({ type: "candle", coin: "BTC", interval: "15m" })).toEqual({
			type: "candle",
			coin: "BTC",
			interval: "15m",
		});
		expect(parseChannelSpec({ type: "userFills", user: "0xAbC" })).toEqual({
			type: "userFills",
			user: "0xAbC",
		});
	});

	it("should reject an unknown channel type", () => {
		expect(() => parseChannelSpec({ type: "fundingRates", coin: "BTC" })).toThrow(InvalidChannelError);
	});

	it("should report the rejected type", () => {
		try {
			parseChannelSpec({ type: "fundingRates" });
			expect.unreachable();
		} catch (error) {
			expect(error).toBeInstanceOf(InvalidChannelError);
			if (error instanceof InvalidChannelError) {
				expect(error.channelType).toBe("fundingRates");
				expect(error.code).toBe("INVALID_CHANNEL");
			}
		}
	});

	it("should reject a spec missing its parameters", () => {
		expect(() => parseChannelSpec({ type: "l2Book" })).toThrow(InvalidChannelError);
		expect(() => parseChannelSpec({ type: "candle", coin: "BTC", interval: "7m" })).toThrow(
			InvalidChannelError
		);
	});

	it("should reject values that are not specs", () => {
		expect(() => parseChannelSpec("l2Book")).toThrow("Channel spec must be an object");
		expect(() => parseChannelSpec(null)).toThrow(InvalidChannelError);
	});
});

describe("channelIdentifier", () => {
	it("should use a fixed identifier for the global feed", () => {
		expect(channelIdentifier({ type: "allMids" })).toBe("allMids");
	});

	it("should lower-case symbols", () => {
		expect(channelIdentifier({ type: "l2Book", coin: "ETH" })).toBe("l2Book:eth");
		expect(channelIdentifier({ type: "trades", coin: "Btc" })).toBe("trades:btc");
		expect(channelIdentifier({ type: "bbo", coin: "SOL" })).toBe("bbo:sol");
		expect(channelIdentifier({ type: "activeAssetCtx", coin: "ETH" })).toBe("activeAssetCtx:eth");
	});

	it("should embed symbol and interval, keeping interval case", () => {
		expect(channelIdentifier({ type: "candle", coin: "BTC", interval: "1m" })).toBe("candle:btc:1m");
		expect(channelIdentifier({ type: "candle", coin: "BTC", interval: "1M" })).toBe("candle:btc:1M");
	});

	it("should embed the lower-cased user key", () => {
		expect(channelIdentifier({ type: "userFills", user: "0xABCdef" })).toBe("userFills:0xabcdef");
		expect(channelIdentifier({ type: "webData2", user: "0xABC" })).toBe("webData2:0xabc");
	});

	it("should use connection-scoped identifiers for user channels without a routing key", () => {
		expect(channelIdentifier({ type: "userEvents", user: "0xABC" })).toBe("userEvents");
		expect(channelIdentifier({ type: "orderUpdates", user: "0xABC" })).toBe("orderUpdates");
		expect(subscriptionTarget({ type: "userEvents", user: "0xABC" })).toBe("userEvents:0xabc");
	});

	it("should ignore book aggregation parameters", () => {
		expect(channelIdentifier({ type: "l2Book", coin: "ETH", nSigFigs: 5 })).toBe("l2Book:eth");
	});
});

describe("inboundIdentifier", () => {
	it("should route per-symbol payloads to the same identifier as registration", () => {
		expect(inboundIdentifier("l2Book", { coin: "ETH", time: 1, levels: [] })).toBe(
			channelIdentifier({ type: "l2Book", coin: "eth" })
		);
		expect(inboundIdentifier("bbo", { coin: "SOL" })).toBe("bbo:sol");
	});

	it("should route trades by the first trade's coin", () => {
		expect(inboundIdentifier("trades", [{ coin: "BTC" }, { coin: "BTC" }])).toBe("trades:btc");
	});

	it("should not route an empty trades batch", () => {
		expect(inboundIdentifier("trades", [])).toBeNull();
	});

	it("should route candles by symbol and interval", () => {
		expect(inboundIdentifier("candle", { s: "BTC", i: "1h" })).toBe("candle:btc:1h");
	});

	it("should map spot asset contexts onto the asset context identifier", () => {
		expect(inboundIdentifier("activeSpotAssetCtx", { coin: "PURR/USDC" })).toBe(
			"activeAssetCtx:purr/usdc"
		);
	});

	it("should map the user channel to userEvents", () => {
		expect(inboundIdentifier("user", { fills: [] })).toBe("userEvents");
	});

	it("should route per-user payloads by their user field", () => {
		expect(inboundIdentifier("userFills", { user: "0xABC", fills: [] })).toBe("userFills:0xabc");
	});

	it("should return null for tags without a rule", () => {
		expect(inboundIdentifier("notification", { notification: "hi" })).toBeNull();
		expect(inboundIdentifier("toString", {})).toBeNull();
	});

	it("should return null when the routing field is missing", () => {
		expect(inboundIdentifier("l2Book", { levels: [] })).toBeNull();
		expect(inboundIdentifier("userFills", "0xabc")).toBeNull();
	});
});
