/**
 * Reconnection supervisor.
 *
 * Started on an unexpected disconnect. Retries the connection-establishment
 * step with exponential backoff until it succeeds or the client starts
 * closing; subscription replay happens in the client's open handler.
 */

import { errorFields, type Logger } from "@feedline/logger";

export interface ReconnectHost {
	isClosing(): boolean;
	/** Open a new transport; resolves once it is open */
	establish(): Promise<void>;
}

export interface BackoffConfig {
	baseDelayMs: number;
	maxDelayMs: number;
}

export type SupervisorState =
	| { status: "idle" }
	| { status: "backingOff"; attempt: number; delayMs: number }
	| { status: "attempting"; attempt: number }
	| { status: "stopped" };

/**
 * Delay before the given attempt: base * 2^attempt, capped.
 */
export function backoffDelay(attempt: number, config: BackoffConfig): number {
	return Math.min(config.baseDelayMs * 2 ** attempt, config.maxDelayMs);
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal.aborted) {
			resolve();
			return;
		}
		const timer = setTimeout(() => {
			signal.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		signal.addEventListener("abort", onAbort, { once: true });
	});
}

export class ReconnectionSupervisor {
	private state: SupervisorState = { status: "idle" };
	private attempt = 0;
	private loop: Promise<void> | null = null;
	private abort: AbortController | null = null;

	constructor(
		private readonly host: ReconnectHost,
		private readonly backoff: BackoffConfig,
		private readonly logger: Logger
	) {}

	getState(): SupervisorState {
		return this.state;
	}

	isRunning(): boolean {
		return this.loop !== null;
	}

	/**
	 * Begin retrying. A second call while a loop is active is ignored.
	 */
	start(): void {
		if (this.loop || this.host.isClosing()) {
			return;
		}
		const abort = new AbortController();
		this.abort = abort;
		this.loop = this.run(abort.signal).finally(() => {
			this.loop = null;
			if (this.abort === abort) {
				this.abort = null;
			}
		});
	}

	/**
	 * Abort a pending backoff sleep; the loop exits at its next check.
	 */
	stop(): void {
		this.abort?.abort();
		if (this.loop) {
			this.state = { status: "stopped" };
		}
	}

	/**
	 * Called on every successful open.
	 */
	reset(): void {
		this.attempt = 0;
	}

	private async run(signal: AbortSignal): Promise<void> {
		for (;;) {
			if (this.host.isClosing() || signal.aborted) {
				this.state = { status: "stopped" };
				return;
			}

			const delayMs = backoffDelay(this.attempt, this.backoff);
			this.state = { status: "backingOff", attempt: this.attempt, delayMs };
			this.logger.info({ attempt: this.attempt, delayMs }, "Reconnecting after backoff");
			await sleep(delayMs, signal);

			if (this.host.isClosing() || signal.aborted) {
				this.state = { status: "stopped" };
				return;
			}

			this.state = { status: "attempting", attempt: this.attempt };
			try {
				await this.host.establish();
				this.attempt = 0;
				this.state = { status: "idle" };
				return;
			} catch (error) {
				this.logger.warn({ attempt: this.attempt, ...errorFields(error) }, "Reconnect failed");
				this.attempt++;
			}
		}
	}
}
