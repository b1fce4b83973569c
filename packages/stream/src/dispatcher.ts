/**
 * Dispatch worker: the single loop that runs subscription callbacks.
 */

import { errorFields, type Logger } from "@feedline/logger";
import { type BoundedQueue, QUEUE_CLOSED } from "./queue.js";
import type { SubscriptionRegistry } from "./registry.js";
import type { QueuedMessage } from "./types.js";

export class DispatchWorker {
	private running: Promise<void> | null = null;

	constructor(
		private readonly queue: BoundedQueue<QueuedMessage>,
		private readonly registry: SubscriptionRegistry,
		private readonly logger: Logger
	) {}

	start(): void {
		if (this.running) {
			return;
		}
		this.running = this.run().finally(() => {
			this.running = null;
		});
	}

	/**
	 * Wait for the loop to exit after the queue was closed. Resolves false if
	 * it is still busy when the timeout elapses.
	 */
	async join(timeoutMs: number): Promise<boolean> {
		const running = this.running;
		if (!running) {
			return true;
		}

		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<boolean>((resolve) => {
			timer = setTimeout(() => resolve(false), timeoutMs);
		});
		try {
			return await Promise.race([running.then(() => true), timeout]);
		} finally {
			clearTimeout(timer);
		}
	}

	/**
	 * Deliver one message to every callback registered for its identifier,
	 * in registration order.
	 */
	async deliver(message: QueuedMessage): Promise<void> {
		const entries = this.registry.callbacksFor(message.identifier);
		if (entries.length === 0) {
			// Unsubscribed after the message was queued
			this.logger.debug({ identifier: message.identifier }, "No callbacks for message");
			return;
		}

		for (const entry of entries) {
			try {
				await entry.callback(message.payload);
			} catch (error) {
				this.logger.error(
					{ identifier: message.identifier, handle: entry.handle, ...errorFields(error) },
					"Subscription callback failed"
				);
			}
		}
	}

	private async run(): Promise<void> {
		for (;;) {
			const message = await this.queue.dequeue();
			if (message === QUEUE_CLOSED) {
				return;
			}
			await this.deliver(message);
		}
	}
}
