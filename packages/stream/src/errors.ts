/**
 * Error types raised or surfaced by the stream client.
 */

export type StreamErrorCode = "INVALID_CHANNEL" | "TRANSPORT" | "INVALID_CONFIG" | "SERVER_ERROR";

export class StreamError extends Error {
	constructor(
		message: string,
		public readonly code: StreamErrorCode,
		public override readonly cause?: unknown
	) {
		super(message, { cause });
		this.name = "StreamError";
	}
}

/**
 * A channel spec has no identifier rule or is missing its parameters.
 */
export class InvalidChannelError extends StreamError {
	constructor(
		message: string,
		public readonly channelType?: string
	) {
		super(message, "INVALID_CHANNEL");
		this.name = "InvalidChannelError";
	}
}

export class TransportError extends StreamError {
	constructor(message: string, cause?: unknown) {
		super(message, "TRANSPORT", cause);
		this.name = "TransportError";
	}
}

export class StreamConfigError extends StreamError {
	constructor(
		message: string,
		public readonly issues: string[] = []
	) {
		super(message, "INVALID_CONFIG");
		this.name = "StreamConfigError";
	}
}
