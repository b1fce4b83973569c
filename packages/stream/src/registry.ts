/**
 * Subscription registry.
 *
 * Maps canonical identifiers to their callbacks and handles back to the spec
 * they were registered with. Pure in-memory state: callers decide which
 * frames to send from the values returned here. Every method runs to
 * completion without awaiting, so each mutation or snapshot is atomic with
 * respect to the read, dispatch and heartbeat paths.
 */

import { InvalidChannelError } from "./errors.js";
import { channelIdentifier, parseChannelSpec, subscriptionTarget } from "./identifiers.js";
import type {
	CallbackEntry,
	ChannelSpec,
	SubscriptionCallback,
	SubscriptionHandle,
} from "./types.js";

interface ChannelEntry {
	/** Spec of the first registration; the one sent on the wire */
	spec: ChannelSpec;
	callbacks: CallbackEntry[];
}

interface HandleEntry {
	spec: ChannelSpec;
	identifier: string;
}

export interface Registration {
	handle: SubscriptionHandle;
	identifier: string;
	spec: ChannelSpec;
	/** First callback for this identifier: a subscribe frame is due */
	isNew: boolean;
}

export interface ActiveChannel {
	identifier: string;
	spec: ChannelSpec;
}

export class SubscriptionRegistry {
	private readonly channels = new Map<string, ChannelEntry>();
	private readonly handles = new Map<SubscriptionHandle, HandleEntry>();
	private readonly pending = new Set<string>();
	private nextHandle: SubscriptionHandle = 1;

	register(input: unknown, callback: SubscriptionCallback): Registration {
		const spec = parseChannelSpec(input);
		const identifier = channelIdentifier(spec);

		const existing = this.channels.get(identifier);
		if (existing && subscriptionTarget(existing.spec) !== subscriptionTarget(spec)) {
			throw new InvalidChannelError(
				`${identifier} is already subscribed for a different user on this connection`,
				spec.type
			);
		}

		const handle = this.nextHandle++;
		const entry = existing ?? { spec, callbacks: [] };
		entry.callbacks.push({ handle, callback });
		this.channels.set(identifier, entry);
		this.handles.set(handle, { spec, identifier });

		return { handle, identifier, spec: entry.spec, isNew: existing === undefined };
	}

	/**
	 * Remove one registration. Returns the channel when its last callback went
	 * away (an unsubscribe frame is due), otherwise undefined.
	 */
	unregister(handle: SubscriptionHandle): ActiveChannel | undefined {
		const record = this.handles.get(handle);
		if (!record) {
			return undefined;
		}
		this.handles.delete(handle);

		const entry = this.channels.get(record.identifier);
		if (!entry) {
			return undefined;
		}

		entry.callbacks = entry.callbacks.filter((callback) => callback.handle !== handle);
		if (entry.callbacks.length > 0) {
			return undefined;
		}

		this.channels.delete(record.identifier);
		this.pending.delete(record.identifier);
		return { identifier: record.identifier, spec: entry.spec };
	}

	callbacksFor(identifier: string): CallbackEntry[] {
		return [...(this.channels.get(identifier)?.callbacks ?? [])];
	}

	activeSpecs(): ChannelSpec[] {
		return this.activeChannels().map((channel) => channel.spec);
	}

	activeChannels(): ActiveChannel[] {
		return [...this.channels.entries()].map(([identifier, entry]) => ({
			identifier,
			spec: entry.spec,
		}));
	}

	identifiers(): string[] {
		return [...this.channels.keys()];
	}

	get handleCount(): number {
		return this.handles.size;
	}

	/**
	 * Remember an identifier registered while no connection was open.
	 */
	markPending(identifier: string): void {
		if (this.channels.has(identifier)) {
			this.pending.add(identifier);
		}
	}

	/**
	 * Drain the pending list, keeping only identifiers that are still live.
	 */
	takePending(): ActiveChannel[] {
		const drained: ActiveChannel[] = [];
		for (const identifier of this.pending) {
			const entry = this.channels.get(identifier);
			if (entry) {
				drained.push({ identifier, spec: entry.spec });
			}
		}
		this.pending.clear();
		return drained;
	}
}
