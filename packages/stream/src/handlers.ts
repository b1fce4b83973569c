/**
 * Inbound frame decoding.
 *
 * Turns raw text frames into routable messages. Greetings, pongs,
 * subscription acknowledgements and anything that cannot be routed are
 * reported as ignored rather than thrown: they are expected noise on a
 * best-effort push feed.
 */

import { inboundIdentifier } from "./identifiers.js";
import { CONNECTION_ESTABLISHED_PREFIX, InboundFrameSchema } from "./types.js";

export type IgnoreReason = "empty" | "greeting" | "undecodable" | "heartbeat" | "ack" | "unroutable";

export type DecodedFrame =
	| { kind: "data"; identifier: string; payload: unknown }
	| { kind: "serverError"; message: string }
	| { kind: "ignored"; reason: IgnoreReason; channel?: string };

function parseJson(raw: string): unknown {
	try {
		return JSON.parse(raw);
	} catch {
		return undefined;
	}
}

export function decodeFrame(raw: string): DecodedFrame {
	if (raw.length === 0) {
		return { kind: "ignored", reason: "empty" };
	}
	if (raw.startsWith(CONNECTION_ESTABLISHED_PREFIX)) {
		return { kind: "ignored", reason: "greeting" };
	}

	const frame = InboundFrameSchema.safeParse(parseJson(raw));
	if (!frame.success) {
		return { kind: "ignored", reason: "undecodable" };
	}

	const { channel, data } = frame.data;
	if (channel === "pong") {
		return { kind: "ignored", reason: "heartbeat", channel };
	}
	if (channel === "subscriptionResponse") {
		return { kind: "ignored", reason: "ack", channel };
	}
	if (channel === "error") {
		return { kind: "serverError", message: typeof data === "string" ? data : JSON.stringify(data ?? null) };
	}

	const identifier = inboundIdentifier(channel, data);
	if (identifier === null) {
		return { kind: "ignored", reason: "unroutable", channel };
	}
	return { kind: "data", identifier, payload: data };
}
