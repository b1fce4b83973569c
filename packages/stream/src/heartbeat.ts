/**
 * Keep-alive timer. Sends a ping every interval while connected.
 */

export interface HeartbeatHost {
	isClosing(): boolean;
	isConnected(): boolean;
	sendPing(): void;
}

export class HeartbeatWorker {
	private timer: ReturnType<typeof setInterval> | null = null;

	constructor(
		private readonly host: HeartbeatHost,
		private readonly intervalMs: number
	) {}

	start(): void {
		if (this.timer) {
			return;
		}
		this.timer = setInterval(() => this.tick(), this.intervalMs);
	}

	stop(): void {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
	}

	private tick(): void {
		if (this.host.isClosing()) {
			this.stop();
			return;
		}
		if (this.host.isConnected()) {
			this.host.sendPing();
		}
	}
}
