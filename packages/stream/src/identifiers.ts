/**
 * Canonical channel identifiers.
 *
 * The same derivation keys the registry (from a subscription spec) and routes
 * inbound frames (from the frame's channel tag and payload), so both sides must
 * agree on normalization: symbols and user addresses lower-cased, candle
 * intervals verbatim.
 */

import { z } from "zod";
import { InvalidChannelError } from "./errors.js";
import { type ChannelSpec, ChannelSpecSchema } from "./types.js";

export function normalizeSymbol(symbol: string): string {
	return symbol.toLowerCase();
}

export function normalizeUser(user: string): string {
	return user.toLowerCase();
}

/**
 * Validate an untrusted spec, throwing InvalidChannelError for unknown types
 * or missing parameters.
 */
export function parseChannelSpec(input: unknown): ChannelSpec {
	const result = ChannelSpecSchema.safeParse(input);
	if (result.success) {
		return result.data;
	}

	const type = z.object({ type: z.string() }).safeParse(input);
	if (!type.success) {
		throw new InvalidChannelError("Channel spec must be an object with a string `type`");
	}

	const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "type"}: ${issue.message}`);
	throw new InvalidChannelError(
		`Unsupported subscription ${type.data.type}: ${issues.join("; ")}`,
		type.data.type
	);
}

export function channelIdentifier(spec: ChannelSpec): string {
	switch (spec.type) {
		case "allMids":
			return "allMids";
		case "l2Book":
		case "trades":
		case "bbo":
		case "activeAssetCtx":
			return `${spec.type}:${normalizeSymbol(spec.coin)}`;
		case "candle":
			return `candle:${normalizeSymbol(spec.coin)}:${spec.interval}`;
		// Frames on these channels carry no user, so one connection can only route one of each
		case "userEvents":
		case "orderUpdates":
			return spec.type;
		case "userFills":
		case "userFundings":
		case "userNonFundingLedgerUpdates":
		case "webData2":
			return `${spec.type}:${normalizeUser(spec.user)}`;
	}
}

/**
 * What a subscription actually targets. Differs from the identifier only for
 * connection-scoped channels, where two users would collide on one identifier.
 */
export function subscriptionTarget(spec: ChannelSpec): string {
	if (spec.type === "userEvents" || spec.type === "orderUpdates") {
		return `${spec.type}:${normalizeUser(spec.user)}`;
	}
	return channelIdentifier(spec);
}

// ============================================
// Inbound routing
// ============================================

const CoinPayloadSchema = z.object({ coin: z.string() });
const UserPayloadSchema = z.object({ user: z.string() });
const CandlePayloadSchema = z.object({ s: z.string(), i: z.string() });
const TradesPayloadSchema = z.array(z.object({ coin: z.string() })).nonempty();

type Route = (data: unknown) => string | null;

function byCoin(tag: string): Route {
	return (data) => {
		const result = CoinPayloadSchema.safeParse(data);
		return result.success ? `${tag}:${normalizeSymbol(result.data.coin)}` : null;
	};
}

function byUser(tag: string): Route {
	return (data) => {
		const result = UserPayloadSchema.safeParse(data);
		return result.success ? `${tag}:${normalizeUser(result.data.user)}` : null;
	};
}

const INBOUND_ROUTES: ReadonlyMap<string, Route> = new Map<string, Route>([
	["allMids", () => "allMids"],
	["l2Book", byCoin("l2Book")],
	[
		"trades",
		(data) => {
			const result = TradesPayloadSchema.safeParse(data);
			return result.success ? `trades:${normalizeSymbol(result.data[0].coin)}` : null;
		},
	],
	["bbo", byCoin("bbo")],
	[
		"candle",
		(data) => {
			const result = CandlePayloadSchema.safeParse(data);
			return result.success
				? `candle:${normalizeSymbol(result.data.s)}:${result.data.i}`
				: null;
		},
	],
	["activeAssetCtx", byCoin("activeAssetCtx")],
	["activeSpotAssetCtx", byCoin("activeAssetCtx")],
	["user", () => "userEvents"],
	["orderUpdates", () => "orderUpdates"],
	["userFills", byUser("userFills")],
	["userFundings", byUser("userFundings")],
	["userNonFundingLedgerUpdates", byUser("userNonFundingLedgerUpdates")],
	["webData2", byUser("webData2")],
]);

/**
 * Identifier for an inbound data frame, or null when the tag has no rule or
 * the payload lacks its routing field.
 */
export function inboundIdentifier(channel: string, data: unknown): string | null {
	const route = INBOUND_ROUTES.get(channel);
	return route ? route(data) : null;
}
