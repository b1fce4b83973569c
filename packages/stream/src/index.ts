/**
 * Managed real-time subscription client.
 *
 * Subscribes to feed channels over a persistent WebSocket, dispatches
 * updates to callbacks from a bounded queue, keeps the connection alive and
 * reconnects with exponential backoff, replaying subscriptions.
 */

// Main client
export { createStreamClient, StreamClient, type StreamClientOptions } from "./client.js";

// Configuration
export {
	loadStreamConfigFromEnv,
	type ResolvedStreamConfig,
	resolveStreamConfig,
	type StreamConfig,
	StreamConfigSchema,
	toWebSocketUrl,
} from "./config.js";

// Engine parts
export { DispatchWorker } from "./dispatcher.js";
export {
	InvalidChannelError,
	StreamConfigError,
	StreamError,
	type StreamErrorCode,
	TransportError,
} from "./errors.js";
export { type DecodedFrame, decodeFrame, type IgnoreReason } from "./handlers.js";
export { type HeartbeatHost, HeartbeatWorker } from "./heartbeat.js";
export {
	channelIdentifier,
	inboundIdentifier,
	normalizeSymbol,
	normalizeUser,
	parseChannelSpec,
	subscriptionTarget,
} from "./identifiers.js";
export { BoundedQueue, type BoundedQueueOptions, QUEUE_CLOSED, type QueueClosed } from "./queue.js";
export {
	type BackoffConfig,
	backoffDelay,
	type ReconnectHost,
	ReconnectionSupervisor,
	type SupervisorState,
} from "./reconnect.js";
export { type ActiveChannel, type Registration, SubscriptionRegistry } from "./registry.js";
export {
	createWebSocketTransport,
	createWebSocketTransportFactory,
	type Transport,
	type TransportFactory,
	type TransportHooks,
	type WebSocketTransportOptions,
} from "./transport.js";

// Types and schemas
export {
	type CallbackEntry,
	CANDLE_INTERVALS,
	type CandleInterval,
	CandleIntervalSchema,
	type ChannelSpec,
	ChannelSpecSchema,
	type ChannelType,
	type ConnectionState,
	// Constants
	DEFAULT_MAX_QUEUE_SIZE,
	DEFAULT_RECONNECT_CONFIG,
	DROP_LOG_EVERY,
	HEARTBEAT_INTERVAL_MS,
	type InboundFrame,
	InboundFrameSchema,
	type LifecycleCallbacks,
	type LifecycleEvent,
	MAINNET_API_URL,
	type OutboundFrame,
	type QueuedMessage,
	type SubscriptionCallback,
	type SubscriptionHandle,
	type SubscriptionMethod,
	TESTNET_API_URL,
	WS_ENDPOINT,
} from "./types.js";
