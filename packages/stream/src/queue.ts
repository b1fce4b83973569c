/**
 * Bounded dispatch queue.
 *
 * Fixed-capacity ring buffer between the read path and the dispatch worker.
 * When full, the newest item is dropped and the buffered (older) items are
 * kept for draining.
 */

import type { Logger } from "@feedline/logger";
import { DROP_LOG_EVERY } from "./types.js";

export const QUEUE_CLOSED: unique symbol = Symbol("queue closed");
export type QueueClosed = typeof QUEUE_CLOSED;

export interface BoundedQueueOptions {
	capacity: number;
	/** Receives the throttled overflow diagnostics */
	logger?: Pick<Logger, "warn">;
}

export class BoundedQueue<T extends object> {
	readonly capacity: number;
	private readonly slots: Array<T | undefined>;
	private readonly logger: Pick<Logger, "warn"> | undefined;
	private head = 0;
	private length = 0;
	private closed = false;
	private dropped = 0;
	private waiters: Array<(item: T | QueueClosed) => void> = [];

	constructor(options: BoundedQueueOptions) {
		if (!Number.isInteger(options.capacity) || options.capacity < 1) {
			throw new RangeError(`Queue capacity must be a positive integer, got ${options.capacity}`);
		}
		this.capacity = options.capacity;
		this.slots = new Array<T | undefined>(options.capacity).fill(undefined);
		this.logger = options.logger;
	}

	get size(): number {
		return this.length;
	}

	get droppedCount(): number {
		return this.dropped;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Non-blocking push. Returns false when the item was not accepted, either
	 * because the queue is full (counted as a drop) or closed (not counted).
	 */
	enqueue(item: T): boolean {
		if (this.closed) {
			return false;
		}

		// A waiting consumer implies an empty buffer
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter(item);
			return true;
		}

		if (this.length >= this.capacity) {
			this.recordDrop();
			return false;
		}

		this.slots[(this.head + this.length) % this.capacity] = item;
		this.length++;
		return true;
	}

	/**
	 * Resolves with the oldest item, waiting for one if the buffer is empty.
	 * Buffered items are still drained after close; then QUEUE_CLOSED.
	 */
	dequeue(): Promise<T | QueueClosed> {
		const item = this.take();
		if (item !== undefined) {
			return Promise.resolve(item);
		}
		if (this.closed) {
			return Promise.resolve(QUEUE_CLOSED);
		}
		return new Promise((resolve) => {
			this.waiters.push(resolve);
		});
	}

	close(): void {
		if (this.closed) {
			return;
		}
		this.closed = true;
		const waiters = this.waiters;
		this.waiters = [];
		for (const waiter of waiters) {
			waiter(QUEUE_CLOSED);
		}
	}

	/**
	 * Empty the buffer and accept items again. The drop count is kept.
	 */
	reset(): void {
		this.close();
		this.slots.fill(undefined);
		this.head = 0;
		this.length = 0;
		this.closed = false;
	}

	private take(): T | undefined {
		if (this.length === 0) {
			return undefined;
		}
		const item = this.slots[this.head];
		this.slots[this.head] = undefined;
		this.head = (this.head + 1) % this.capacity;
		this.length--;
		return item;
	}

	private recordDrop(): void {
		this.dropped++;
		if (this.dropped === 1 || this.dropped % DROP_LOG_EVERY === 0) {
			this.logger?.warn(
				{ capacity: this.capacity, dropped: this.dropped },
				`Queue full (${this.capacity}). Dropped ${this.dropped} message(s). Callbacks may be too slow.`
			);
		}
	}
}
