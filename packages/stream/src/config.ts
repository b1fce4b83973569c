/**
 * Client configuration.
 *
 * Validated with Zod once at construction; `loadStreamConfigFromEnv` maps
 * STREAM_* environment variables onto the same shape.
 */

import { z } from "zod";
import { StreamConfigError } from "./errors.js";
import {
	DEFAULT_DISPATCH_JOIN_TIMEOUT_MS,
	DEFAULT_HANDSHAKE_TIMEOUT_MS,
	DEFAULT_MAX_QUEUE_SIZE,
	DEFAULT_RECONNECT_CONFIG,
	HEARTBEAT_INTERVAL_MS,
	MAINNET_API_URL,
	TESTNET_API_URL,
	WS_ENDPOINT,
} from "./types.js";

const positiveInt = z.number().int().positive();

export const StreamConfigSchema = z.object({
	/** Full WebSocket endpoint; overrides baseUrl/testnet */
	url: z.string().url().optional(),
	/** HTTP(S) API base the endpoint is derived from */
	baseUrl: z.string().url().optional(),
	testnet: z.boolean().default(false),
	maxQueueSize: positiveInt.default(DEFAULT_MAX_QUEUE_SIZE),
	heartbeatIntervalMs: positiveInt.default(HEARTBEAT_INTERVAL_MS),
	reconnect: z.boolean().default(true),
	reconnectBaseDelayMs: positiveInt.default(DEFAULT_RECONNECT_CONFIG.baseDelayMs),
	reconnectMaxDelayMs: positiveInt.default(DEFAULT_RECONNECT_CONFIG.maxDelayMs),
	dispatchJoinTimeoutMs: positiveInt.default(DEFAULT_DISPATCH_JOIN_TIMEOUT_MS),
	handshakeTimeoutMs: positiveInt.default(DEFAULT_HANDSHAKE_TIMEOUT_MS),
});

export type StreamConfig = z.input<typeof StreamConfigSchema>;

export type ResolvedStreamConfig = Omit<z.output<typeof StreamConfigSchema>, "url" | "baseUrl"> & {
	url: string;
};

/**
 * Derive the WebSocket endpoint from an API base URL.
 *
 * @example
 * ```ts
 * toWebSocketUrl("https://api.hyperliquid.xyz"); // "wss://api.hyperliquid.xyz/ws"
 * ```
 */
export function toWebSocketUrl(baseUrl: string): string {
	const trimmed = baseUrl.replace(/\/+$/, "");
	return trimmed.replace(/^https:\/\//, "wss://").replace(/^http:\/\//, "ws://") + WS_ENDPOINT;
}

export function resolveStreamConfig(input: StreamConfig = {}): ResolvedStreamConfig {
	const result = StreamConfigSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
		throw new StreamConfigError(`Invalid stream config: ${issues.join("; ")}`, issues);
	}

	const { url, baseUrl, ...rest } = result.data;
	if (rest.reconnectMaxDelayMs < rest.reconnectBaseDelayMs) {
		throw new StreamConfigError(
			"Invalid stream config: reconnectMaxDelayMs must be >= reconnectBaseDelayMs"
		);
	}

	const base = baseUrl ?? (rest.testnet ? TESTNET_API_URL : MAINNET_API_URL);
	return { ...rest, url: url ?? toWebSocketUrl(base) };
}

// ============================================
// Environment
// ============================================

const envBoolean = z
	.enum(["true", "false", "1", "0"])
	.transform((value) => value === "true" || value === "1");

const StreamEnvSchema = z.object({
	STREAM_WS_URL: z.string().url().optional(),
	STREAM_TESTNET: envBoolean.optional(),
	STREAM_MAX_QUEUE_SIZE: z.coerce.number().int().positive().optional(),
	STREAM_HEARTBEAT_INTERVAL_MS: z.coerce.number().int().positive().optional(),
	STREAM_RECONNECT: envBoolean.optional(),
});

/**
 * Read configuration overrides from the environment. Unset variables are
 * left out so that schema defaults apply.
 *
 * @throws {StreamConfigError} If a variable is set to an invalid value
 */
export function loadStreamConfigFromEnv(env: NodeJS.ProcessEnv = process.env): StreamConfig {
	const result = StreamEnvSchema.safeParse(env);
	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
		throw new StreamConfigError(`Invalid stream environment: ${issues.join("; ")}`, issues);
	}

	const parsed = result.data;
	const config: StreamConfig = {};
	if (parsed.STREAM_WS_URL !== undefined) {
		config.url = parsed.STREAM_WS_URL;
	}
	if (parsed.STREAM_TESTNET !== undefined) {
		config.testnet = parsed.STREAM_TESTNET;
	}
	if (parsed.STREAM_MAX_QUEUE_SIZE !== undefined) {
		config.maxQueueSize = parsed.STREAM_MAX_QUEUE_SIZE;
	}
	if (parsed.STREAM_HEARTBEAT_INTERVAL_MS !== undefined) {
		config.heartbeatIntervalMs = parsed.STREAM_HEARTBEAT_INTERVAL_MS;
	}
	if (parsed.STREAM_RECONNECT !== undefined) {
		config.reconnect = parsed.STREAM_RECONNECT;
	}
	return config;
}
