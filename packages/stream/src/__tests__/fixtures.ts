/**
 * Shared fixtures and helpers for stream client tests
 */

import { createNodeLogger } from "@feedline/logger";
import { StreamClient, type StreamClientOptions } from "../client.js";
import type { Transport, TransportFactory, TransportHooks } from "../transport.js";

export const silentLogger = createNodeLogger({ service: "stream-test", level: "silent" });

/** When a client-initiated close reports back: next microtask, or a later timer tick as `ws` does mid-handshake */
export type CloseDelivery = "microtask" | "timer";

/**
 * In-process transport that records sent frames and lets tests drive the
 * socket lifecycle.
 */
export class FakeTransport implements Transport {
	readonly sent: string[] = [];
	closed = false;
	failSends = false;

	constructor(
		readonly url: string,
		private readonly hooks: TransportHooks,
		private readonly closeDelivery: CloseDelivery = "microtask"
	) {}

	send(frame: string): void {
		if (this.failSends) {
			throw new Error("socket write failed");
		}
		this.sent.push(frame);
	}

	/** Client-initiated close; the close event follows asynchronously like a real socket */
	close(): void {
		if (this.closed) {
			return;
		}
		this.closed = true;
		if (this.closeDelivery === "timer") {
			setTimeout(() => this.hooks.onClose(1006, ""), 0);
		} else {
			queueMicrotask(() => this.hooks.onClose(1000, "Client close"));
		}
	}

	open(): void {
		this.hooks.onOpen();
	}

	receive(frame: unknown): void {
		this.hooks.onMessage(typeof frame === "string" ? frame : JSON.stringify(frame));
	}

	/** Server-side or network close */
	drop(code = 1006, reason = ""): void {
		this.closed = true;
		this.hooks.onClose(code, reason);
	}

	/** Connection attempt that errors before opening */
	fail(message = "connect ECONNREFUSED"): void {
		this.hooks.onError(new Error(message));
		this.drop(1006, "");
	}

	frames(): unknown[] {
		return this.sent.map((frame) => JSON.parse(frame));
	}

	framesWithMethod(method: string): unknown[] {
		return this.frames().filter(
			(frame) => typeof frame === "object" && frame !== null && "method" in frame && frame.method === method
		);
	}
}

export interface FakeTransportPool {
	factory: TransportFactory;
	transports: FakeTransport[];
	latest(): FakeTransport;
}

export function createFakeTransportPool(closeDelivery: CloseDelivery = "microtask"): FakeTransportPool {
	const transports: FakeTransport[] = [];
	return {
		transports,
		factory: (url, hooks) => {
			const transport = new FakeTransport(url, hooks, closeDelivery);
			transports.push(transport);
			return transport;
		},
		latest() {
			const transport = transports.at(-1);
			if (!transport) {
				throw new Error("No transport has been opened");
			}
			return transport;
		},
	};
}

/**
 * Helper to create clients and track them for cleanup
 */
export function createTrackedClient(
	clients: StreamClient[],
	pool: FakeTransportPool,
	options: StreamClientOptions = {}
): StreamClient {
	const client = new StreamClient({
		transportFactory: pool.factory,
		logger: silentLogger,
		dispatchJoinTimeoutMs: 50,
		...options,
	});
	clients.push(client);
	return client;
}

/**
 * Cleanup all tracked clients
 */
export async function cleanupClients(clients: StreamClient[]): Promise<void> {
	await Promise.all(clients.map((client) => client.close()));
	clients.length = 0;
}

/**
 * Connect a client and open its fake transport
 */
export async function connectClient(client: StreamClient, pool: FakeTransportPool): Promise<FakeTransport> {
	const connecting = client.connect();
	const transport = pool.latest();
	transport.open();
	await connecting;
	return transport;
}

/**
 * Let queued promise continuations (dispatch loop, supervisor) run.
 */
export async function flushMicrotasks(rounds = 50): Promise<void> {
	for (let i = 0; i < rounds; i++) {
		await Promise.resolve();
	}
}

export function l2BookFrame(coin: string, time = 1_700_000_000_000): { channel: string; data: unknown } {
	return {
		channel: "l2Book",
		data: {
			coin,
			time,
			levels: [
				[{ px: "100.5", sz: "2.0", n: 3 }],
				[{ px: "100.6", sz: "1.5", n: 2 }],
			],
		},
	};
}

export function tradesFrame(coin: string, tid = 1): { channel: string; data: unknown } {
	return {
		channel: "trades",
		data: [{ coin, side: "B", px: "100.5", sz: "0.1", time: 1_700_000_000_000, tid }],
	};
}

export function candleFrame(coin: string, interval: string): { channel: string; data: unknown } {
	return {
		channel: "candle",
		data: { t: 1_700_000_000_000, T: 1_700_000_059_999, s: coin, i: interval, o: "1", c: "2", h: "2", l: "1", v: "10", n: 4 },
	};
}
