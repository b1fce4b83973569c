/**
 * Transport seam between the client and the socket library.
 *
 * The client only sees text frames and four lifecycle hooks, so tests can
 * swap in an in-process transport.
 */

import WebSocket from "ws";
import { TransportError } from "./errors.js";

export interface TransportHooks {
	onOpen(): void;
	onMessage(data: string): void;
	onError(error: Error): void;
	onClose(code: number, reason: string): void;
}

export interface Transport {
	/** Throws when the socket cannot take the frame */
	send(frame: string): void;
	close(): void;
}

export type TransportFactory = (url: string, hooks: TransportHooks) => Transport;

export interface WebSocketTransportOptions {
	/** Abort the opening handshake after this long (ms) */
	handshakeTimeoutMs?: number;
}

function rawDataToString(data: WebSocket.RawData): string {
	if (Buffer.isBuffer(data)) {
		return data.toString("utf-8");
	}
	if (Array.isArray(data)) {
		return Buffer.concat(data).toString("utf-8");
	}
	return Buffer.from(data).toString("utf-8");
}

export function createWebSocketTransport(
	url: string,
	hooks: TransportHooks,
	options: WebSocketTransportOptions = {}
): Transport {
	const ws = new WebSocket(url, { handshakeTimeout: options.handshakeTimeoutMs });

	ws.on("open", () => hooks.onOpen());
	ws.on("message", (data: WebSocket.RawData) => hooks.onMessage(rawDataToString(data)));
	ws.on("error", (error: Error) => hooks.onError(error));
	ws.on("close", (code: number, reason: Buffer) => hooks.onClose(code, reason.toString()));

	return {
		send(frame) {
			if (ws.readyState !== WebSocket.OPEN) {
				throw new TransportError("WebSocket not open");
			}
			ws.send(frame);
		},
		close() {
			if (ws.readyState === WebSocket.CLOSED || ws.readyState === WebSocket.CLOSING) {
				return;
			}
			ws.close(1000, "Client close");
		},
	};
}

export function createWebSocketTransportFactory(
	options: WebSocketTransportOptions = {}
): TransportFactory {
	return (url, hooks) => createWebSocketTransport(url, hooks, options);
}
