/**
 * Managed WebSocket client for real-time feed channels.
 *
 * Owns the connection and wires together the subscription registry, the
 * bounded dispatch queue, the dispatch and heartbeat workers and the
 * reconnection supervisor. Subscriptions survive reconnects: they are
 * replayed whenever a new connection opens.
 *
 * @example
 * ```ts
 * const client = createStreamClient({ testnet: true });
 * client.on("error", (error) => console.error(error));
 *
 * const handle = client.subscribe({ type: "l2Book", coin: "ETH" }, (book) => {
 *   console.log(book);
 * });
 * await client.connect();
 * // ...
 * client.unsubscribe(handle);
 * await client.close();
 * ```
 */

import { errorFields, type Logger, withComponent } from "@feedline/logger";
import { type ResolvedStreamConfig, resolveStreamConfig, type StreamConfig } from "./config.js";
import { DispatchWorker } from "./dispatcher.js";
import { StreamError, TransportError } from "./errors.js";
import { decodeFrame } from "./handlers.js";
import { HeartbeatWorker } from "./heartbeat.js";
import { log } from "./logger.js";
import { BoundedQueue } from "./queue.js";
import { ReconnectionSupervisor } from "./reconnect.js";
import { SubscriptionRegistry } from "./registry.js";
import {
	createWebSocketTransportFactory,
	type Transport,
	type TransportFactory,
	type TransportHooks,
} from "./transport.js";
import type {
	ChannelSpec,
	ConnectionState,
	LifecycleCallbacks,
	LifecycleEvent,
	OutboundFrame,
	QueuedMessage,
	SubscriptionCallback,
	SubscriptionHandle,
	SubscriptionMethod,
} from "./types.js";

export interface StreamClientOptions extends StreamConfig {
	/** Opens the underlying connection (default: `ws`) */
	transportFactory?: TransportFactory;
	logger?: Logger;
}

export class StreamClient {
	private readonly config: ResolvedStreamConfig;
	private readonly logger: Logger;
	private readonly transportFactory: TransportFactory;
	private readonly registry = new SubscriptionRegistry();
	private readonly queue: BoundedQueue<QueuedMessage>;
	private readonly dispatcher: DispatchWorker;
	private readonly heartbeat: HeartbeatWorker;
	private readonly supervisor: ReconnectionSupervisor;

	private transport: Transport | null = null;
	/** Bumped per transport; hooks from older transports are ignored */
	private generation = 0;
	private connectionState: ConnectionState = "disconnected";
	private closing = false;
	private opening: Promise<void> | null = null;
	/** Rejects the in-flight opening attempt */
	private cancelOpening: ((error: Error) => void) | null = null;
	private closingPromise: Promise<void> | null = null;
	private lifecycle: Partial<LifecycleCallbacks> = {};

	constructor(options: StreamClientOptions = {}) {
		const { transportFactory, logger, ...config } = options;
		this.config = resolveStreamConfig(config);
		this.logger = (logger ?? log).child({ url: this.config.url });
		this.transportFactory =
			transportFactory ??
			createWebSocketTransportFactory({ handshakeTimeoutMs: this.config.handshakeTimeoutMs });

		this.queue = new BoundedQueue<QueuedMessage>({
			capacity: this.config.maxQueueSize,
			logger: withComponent(this.logger, "queue"),
		});
		this.dispatcher = new DispatchWorker(
			this.queue,
			this.registry,
			withComponent(this.logger, "dispatch")
		);
		this.heartbeat = new HeartbeatWorker(
			{
				isClosing: () => this.closing,
				isConnected: () => this.connectionState === "connected",
				sendPing: () => {
					this.sendFrame({ method: "ping" });
				},
			},
			this.config.heartbeatIntervalMs
		);
		this.supervisor = new ReconnectionSupervisor(
			{
				isClosing: () => this.closing,
				establish: () => this.establish(),
			},
			{
				baseDelayMs: this.config.reconnectBaseDelayMs,
				maxDelayMs: this.config.reconnectMaxDelayMs,
			},
			withComponent(this.logger, "reconnect")
		);
	}

	getConnectionState(): ConnectionState {
		return this.connectionState;
	}

	isConnected(): boolean {
		return this.connectionState === "connected";
	}

	/**
	 * Messages discarded because the dispatch queue was full. Never reset.
	 */
	getDroppedMessageCount(): number {
		return this.queue.droppedCount;
	}

	/**
	 * Canonical identifiers with at least one live subscription.
	 */
	getActiveChannels(): string[] {
		return this.registry.identifiers();
	}

	/**
	 * Register a lifecycle callback. One per event; the last registration wins.
	 */
	on<E extends LifecycleEvent>(event: E, callback: LifecycleCallbacks[E]): void {
		this.lifecycle[event] = callback;
	}

	/**
	 * Open the connection and start the dispatch and heartbeat workers.
	 * Resolves once the connection is open.
	 *
	 * @throws {TransportError} If the connection closes before opening
	 */
	async connect(): Promise<void> {
		if (this.closingPromise) {
			await this.closingPromise;
		}
		if (this.connectionState === "connected") {
			return;
		}
		if (this.opening) {
			return this.opening;
		}

		this.closing = false;
		this.supervisor.reset();
		this.startWorkers();
		return this.establish();
	}

	/**
	 * Subscribe to a channel. Specs that normalize to the same identifier
	 * share one wire subscription.
	 *
	 * @throws {InvalidChannelError} If the spec's type has no identifier rule
	 */
	subscribe(spec: ChannelSpec, callback: SubscriptionCallback): SubscriptionHandle {
		const registration = this.registry.register(spec, callback);

		if (this.connectionState === "connected") {
			if (registration.isNew) {
				this.sendSubscription("subscribe", registration.spec);
			}
			return registration.handle;
		}

		if (registration.isNew) {
			this.registry.markPending(registration.identifier);
		}
		if (this.shouldConnectOnSubscribe()) {
			this.connect().catch((error: unknown) => {
				this.logger.warn(errorFields(error), "Connect on subscribe failed");
			});
		}
		return registration.handle;
	}

	/**
	 * Remove one subscription. Unknown handles are ignored. The wire
	 * unsubscribe is sent only when the last callback for a channel goes.
	 */
	unsubscribe(handle: SubscriptionHandle): void {
		const removed = this.registry.unregister(handle);
		if (removed && this.connectionState === "connected") {
			this.sendSubscription("unsubscribe", removed.spec);
		}
	}

	/**
	 * Stop all workers and close the connection without reconnecting.
	 * Idempotent; concurrent calls share one shutdown.
	 */
	close(): Promise<void> {
		if (!this.closingPromise) {
			this.closingPromise = this.shutdown().finally(() => {
				this.closingPromise = null;
			});
		}
		return this.closingPromise;
	}

	// ============================================
	// Connection management
	// ============================================

	private shouldConnectOnSubscribe(): boolean {
		return (
			this.connectionState === "disconnected" &&
			this.transport === null &&
			this.closingPromise === null &&
			!this.supervisor.isRunning()
		);
	}

	private startWorkers(): void {
		if (this.queue.isClosed) {
			this.queue.reset();
		}
		this.dispatcher.start();
		this.heartbeat.start();
	}

	/**
	 * Open one transport. Used by connect() and by the reconnection
	 * supervisor, which must not restart the workers.
	 */
	private establish(): Promise<void> {
		if (this.connectionState === "connected") {
			return Promise.resolve();
		}
		if (this.opening) {
			return this.opening;
		}

		const generation = ++this.generation;
		const isCurrent = () => generation === this.generation;
		let settled = false;
		this.connectionState = "connecting";

		const opening = new Promise<void>((resolve, reject) => {
			let opened = false;
			let lastError: Error | undefined;
			this.cancelOpening = (error) => settle(error);

			const settle = (error?: Error) => {
				if (settled) {
					return;
				}
				settled = true;
				if (isCurrent()) {
					this.opening = null;
					this.cancelOpening = null;
				}
				if (error) {
					reject(error);
				} else {
					resolve();
				}
			};

			const hooks: TransportHooks = {
				onOpen: () => {
					if (!isCurrent()) {
						return;
					}
					if (this.closing) {
						settle(new TransportError("Client closed before the connection opened"));
						return;
					}
					opened = true;
					this.handleOpen();
					settle();
				},
				onMessage: (data) => {
					if (isCurrent()) {
						this.handleMessage(data);
					}
				},
				onError: (error) => {
					if (!isCurrent()) {
						return;
					}
					lastError = error;
					this.handleError(error);
				},
				onClose: (code, reason) => {
					if (!isCurrent()) {
						return;
					}
					this.handleClose(code, reason);
					if (!opened) {
						settle(new TransportError(`Connection closed before opening (code ${code})`, lastError));
					}
				},
			};

			try {
				this.transport = this.transportFactory(this.config.url, hooks);
			} catch (error) {
				if (!this.closing) {
					this.connectionState = "disconnected";
				}
				settle(new TransportError(`Failed to open ${this.config.url}`, error));
			}
		});

		if (!settled) {
			this.opening = opening;
		}
		return opening;
	}

	private handleOpen(): void {
		this.supervisor.reset();

		const flushed = new Set<string>();
		for (const channel of this.registry.takePending()) {
			this.sendSubscription("subscribe", channel.spec);
			flushed.add(channel.identifier);
		}
		for (const channel of this.registry.activeChannels()) {
			if (!flushed.has(channel.identifier)) {
				this.sendSubscription("subscribe", channel.spec);
			}
		}

		this.connectionState = "connected";
		this.logger.info({ channels: this.registry.identifiers().length }, "Connected");
		this.runLifecycle("open", () => this.lifecycle.open?.());
	}

	private handleMessage(raw: string): void {
		const frame = decodeFrame(raw);
		switch (frame.kind) {
			case "data":
				this.queue.enqueue({ identifier: frame.identifier, payload: frame.payload });
				return;
			case "serverError": {
				this.logger.warn({ message: frame.message }, "Server rejected request");
				const error = new StreamError(frame.message, "SERVER_ERROR");
				this.runLifecycle("error", () => this.lifecycle.error?.(error));
				return;
			}
			case "ignored":
				if (frame.reason === "undecodable" || frame.reason === "unroutable") {
					this.logger.debug({ reason: frame.reason, channel: frame.channel }, "Discarded frame");
				}
				return;
		}
	}

	private handleError(error: Error): void {
		this.logger.warn(errorFields(error), "Transport error");
		this.runLifecycle("error", () => this.lifecycle.error?.(error));
	}

	private handleClose(code: number, reason: string): void {
		const wasConnected = this.connectionState === "connected";
		this.transport = null;
		if (!this.closing) {
			this.connectionState = "disconnected";
		}

		this.logger.info({ code, reason, wasConnected }, "Connection closed");
		this.runLifecycle("close", () => this.lifecycle.close?.(code, reason));

		if (wasConnected && !this.closing && this.config.reconnect) {
			this.supervisor.start();
		}
	}

	private async shutdown(): Promise<void> {
		this.closing = true;
		this.connectionState = "closing";

		// Retire an attempt still opening: its socket's late events are ignored
		// and the next connect() starts a fresh one
		const cancelOpening = this.cancelOpening;
		if (cancelOpening) {
			this.cancelOpening = null;
			this.opening = null;
			this.generation++;
			cancelOpening(new TransportError("Client closed before the connection opened"));
		}

		this.supervisor.stop();
		this.heartbeat.stop();
		this.queue.close();

		const joined = await this.dispatcher.join(this.config.dispatchJoinTimeoutMs);
		if (!joined) {
			this.logger.warn(
				{ timeoutMs: this.config.dispatchJoinTimeoutMs },
				"Dispatch worker still busy at close"
			);
		}

		const transport = this.transport;
		this.transport = null;
		if (transport) {
			try {
				transport.close();
			} catch (error) {
				this.logger.warn(errorFields(error), "Transport close failed");
			}
		}

		this.connectionState = "disconnected";
		this.logger.info("Closed");
	}

	// ============================================
	// Outbound frames
	// ============================================

	private sendSubscription(method: SubscriptionMethod, spec: ChannelSpec): void {
		this.sendFrame({ method, subscription: spec });
	}

	/**
	 * Write failures are logged, not raised: a broken socket surfaces as a
	 * close and is recovered by reconnecting.
	 */
	private sendFrame(frame: OutboundFrame): boolean {
		const transport = this.transport;
		if (!transport) {
			return false;
		}
		try {
			transport.send(JSON.stringify(frame));
			return true;
		} catch (error) {
			this.logger.warn({ method: frame.method, ...errorFields(error) }, "Send error");
			return false;
		}
	}

	private runLifecycle(event: LifecycleEvent, invoke: () => void): void {
		try {
			invoke();
		} catch (error) {
			this.logger.error({ event, ...errorFields(error) }, "Lifecycle callback failed");
		}
	}
}

export function createStreamClient(options?: StreamClientOptions): StreamClient {
	return new StreamClient(options);
}
