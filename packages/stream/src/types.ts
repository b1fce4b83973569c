/**
 * Type definitions and Zod schemas for the feed's channel specs and frames.
 */

import { z } from "zod";

// ============================================
// Constants
// ============================================

export const MAINNET_API_URL = "https://api.hyperliquid.xyz";
export const TESTNET_API_URL = "https://api.hyperliquid-testnet.xyz";
export const WS_ENDPOINT = "/ws";

/** The server drops connections idle for 60s */
export const HEARTBEAT_INTERVAL_MS = 50_000;

export const DEFAULT_MAX_QUEUE_SIZE = 1024;

/** Drop diagnostics are logged on the first drop and every Nth after */
export const DROP_LOG_EVERY = 100;

export const DEFAULT_RECONNECT_CONFIG = {
	baseDelayMs: 1000,
	maxDelayMs: 30_000,
};

export const DEFAULT_DISPATCH_JOIN_TIMEOUT_MS = 5000;
export const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;

/** Plain-text greeting the server sends before any JSON frame */
export const CONNECTION_ESTABLISHED_PREFIX = "Websocket connection established";

// ============================================
// Channel Specs
// ============================================

export const CANDLE_INTERVALS = [
	"1m",
	"3m",
	"5m",
	"15m",
	"30m",
	"1h",
	"2h",
	"4h",
	"8h",
	"12h",
	"1d",
	"3d",
	"1w",
	"1M",
] as const;
export const CandleIntervalSchema = z.enum(CANDLE_INTERVALS);
export type CandleInterval = z.infer<typeof CandleIntervalSchema>;

const coin = z.string().min(1);
const user = z.string().min(1);

export const ChannelSpecSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("allMids"), dex: z.string().optional() }),
	z.object({
		type: z.literal("l2Book"),
		coin,
		nSigFigs: z.number().int().nullable().optional(),
		mantissa: z.number().int().nullable().optional(),
	}),
	z.object({ type: z.literal("trades"), coin }),
	z.object({ type: z.literal("bbo"), coin }),
	z.object({ type: z.literal("candle"), coin, interval: CandleIntervalSchema }),
	z.object({ type: z.literal("activeAssetCtx"), coin }),
	z.object({ type: z.literal("userEvents"), user }),
	z.object({ type: z.literal("orderUpdates"), user }),
	z.object({ type: z.literal("userFills"), user, aggregateByTime: z.boolean().optional() }),
	z.object({ type: z.literal("userFundings"), user }),
	z.object({ type: z.literal("userNonFundingLedgerUpdates"), user }),
	z.object({ type: z.literal("webData2"), user }),
]);
export type ChannelSpec = z.infer<typeof ChannelSpecSchema>;
export type ChannelType = ChannelSpec["type"];

// ============================================
// Frame Schemas
// ============================================

export const InboundFrameSchema = z.object({
	channel: z.string(),
	data: z.unknown(),
});
export type InboundFrame = z.infer<typeof InboundFrameSchema>;

export type SubscriptionMethod = "subscribe" | "unsubscribe";

export type OutboundFrame =
	| { method: SubscriptionMethod; subscription: ChannelSpec }
	| { method: "ping" };

// ============================================
// Callback and State Types
// ============================================

export type SubscriptionHandle = number;

/** Data callback; a returned promise is awaited before the next delivery */
export type SubscriptionCallback = (data: unknown) => void | Promise<void>;

export interface CallbackEntry {
	handle: SubscriptionHandle;
	callback: SubscriptionCallback;
}

export interface QueuedMessage {
	identifier: string;
	payload: unknown;
}

export type ConnectionState = "disconnected" | "connecting" | "connected" | "closing";

export interface LifecycleCallbacks {
	open: () => void;
	close: (code: number, reason: string) => void;
	error: (error: Error) => void;
}
export type LifecycleEvent = keyof LifecycleCallbacks;
