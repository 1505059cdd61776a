import type { Filter } from "nostr-tools/filter";

import { ClosedSubscriptionError, UnknownSubscriptionError } from "./errors";
import type { C2RMessage } from "./message";

/** The part of a relay connection the registry talks to. */
export interface ISubscriptionOutlet {
	readonly url: string;
	readonly isConnected: boolean;
	enqueue(msg: C2RMessage): number | undefined;
}

export type SubscriptionRegistryOptions = {
	idPrefix?: string;
	/** how long a closed subscription waits for relays to confirm the CLOSE */
	closeGraceMs?: number;
};

const defaultSubscriptionRegistryOptions: Required<SubscriptionRegistryOptions> = {
	idPrefix: "sub",
	closeGraceMs: 5_000,
};

export interface SubscriptionView {
	readonly id: string;
	readonly filters: readonly Filter[];
	/** relays the subscription is active on */
	readonly relays: ReadonlySet<string>;
	/** relays whose current connection has been sent the subscription */
	readonly served: ReadonlySet<string>;
	/** relays that sent EOSE for the current filters */
	readonly eose: ReadonlySet<string>;
	readonly closed: boolean;
}

class Subscription implements SubscriptionView {
	readonly id: string;
	filters: Filter[];
	relays: Set<string>;
	served = new Set<string>();
	eose = new Set<string>();
	closed = false;
	// relays that still owe a confirmation of CLOSE
	closing = new Set<string>();
	graceTimer: NodeJS.Timeout | undefined;

	constructor(id: string, filters: Filter[], relays: Iterable<string>) {
		this.id = id;
		this.filters = filters;
		this.relays = new Set(relays);
	}
}

/**
 * Tracks every subscription of the pool and the relays it is active on.
 *
 * `REQ` is only ever enqueued on connected relays; a relay that (re)connects is handed the
 * subscriptions active on it through {@link resubscribe}.
 */
export class SubscriptionRegistry {
	#opts: Required<SubscriptionRegistryOptions>;
	#subs = new Map<string, Subscription>();
	#seq = 0;

	constructor(opts: SubscriptionRegistryOptions = {}) {
		this.#opts = { ...defaultSubscriptionRegistryOptions, ...opts };
	}

	get size(): number {
		return this.#subs.size;
	}

	get(id: string): SubscriptionView | undefined {
		return this.#subs.get(id);
	}

	*all(): IterableIterator<SubscriptionView> {
		yield* this.#subs.values();
	}

	/** open subscriptions whose relay set contains `relay` */
	activeOn(relay: string): SubscriptionView[] {
		return [...this.#subs.values()].filter((s) => !s.closed && s.relays.has(relay));
	}

	subscribe(filters: Filter[], targets: readonly ISubscriptionOutlet[]): string {
		// ids are never reused within the lifetime of the registry
		const id = `${this.#opts.idPrefix}:${++this.#seq}`;
		const sub = new Subscription(
			id,
			[...filters],
			targets.map((t) => t.url),
		);
		this.#subs.set(id, sub);
		console.log(`[SubscriptionRegistry] register subscription (id: ${id}, relays: ${sub.relays.size})`);

		for (const outlet of targets) {
			if (outlet.isConnected) {
				this.#sendReq(sub, outlet);
			}
		}
		return id;
	}

	/** re-issues every open subscription active on a relay that just connected */
	resubscribe(outlet: ISubscriptionOutlet): number {
		let n = 0;
		for (const sub of this.#subs.values()) {
			if (sub.closed || !sub.relays.has(outlet.url)) {
				continue;
			}
			sub.eose.delete(outlet.url);
			this.#sendReq(sub, outlet);
			n++;
		}
		if (n > 0) {
			console.log(`[SubscriptionRegistry] re-issued ${n} subscription(s) on ${outlet.url}`);
		}
		return n;
	}

	#sendReq(sub: Subscription, outlet: ISubscriptionOutlet): void {
		if (outlet.enqueue(["REQ", sub.id, ...sub.filters]) !== undefined) {
			sub.served.add(outlet.url);
		}
	}

	updateFilters(id: string, filters: Filter[], outlets: (relay: string) => ISubscriptionOutlet | undefined): void {
		const sub = this.#requireOpen(id);
		sub.filters = [...filters];
		sub.eose.clear();
		for (const relay of sub.served) {
			const outlet = outlets(relay);
			if (outlet?.isConnected) {
				outlet.enqueue(["REQ", sub.id, ...sub.filters]);
			}
		}
	}

	unsubscribe(id: string, outlets: (relay: string) => ISubscriptionOutlet | undefined): void {
		const sub = this.#requireOpen(id);
		sub.closed = true;

		for (const relay of sub.served) {
			const outlet = outlets(relay);
			if (outlet?.isConnected && outlet.enqueue(["CLOSE", sub.id]) !== undefined) {
				sub.closing.add(relay);
			}
		}
		sub.served.clear();
		console.log(`[SubscriptionRegistry] closing subscription (id: ${id}, awaiting: ${sub.closing.size})`);

		if (sub.closing.size === 0) {
			this.#delete(sub);
			return;
		}
		sub.graceTimer = setTimeout(() => {
			sub.graceTimer = undefined;
			if (this.#subs.get(sub.id) === sub) {
				console.log(`[SubscriptionRegistry] close grace period over (id: ${sub.id})`);
				this.#delete(sub);
			}
		}, this.#opts.closeGraceMs);
	}

	markEose(id: string, relay: string): boolean {
		const sub = this.#subs.get(id);
		if (sub === undefined || sub.closed || !sub.served.has(relay)) {
			return false;
		}
		sub.eose.add(relay);
		return true;
	}

	/** whether every relay currently serving the subscription has sent EOSE */
	isEoseComplete(id: string): boolean {
		const sub = this.#subs.get(id);
		if (sub === undefined) {
			return false;
		}
		for (const relay of sub.served) {
			if (!sub.eose.has(relay)) {
				return false;
			}
		}
		return true;
	}

	/**
	 * Handles CLOSED from a relay. For a closing subscription this confirms the CLOSE; for an open
	 * one it means the relay refused or dropped it. Returns which of the two happened.
	 */
	handleClosed(id: string, relay: string): "acknowledged" | "rejected" | "unknown" {
		const sub = this.#subs.get(id);
		if (sub === undefined) {
			return "unknown";
		}
		if (sub.closed) {
			this.#acknowledge(sub, relay);
			return "acknowledged";
		}
		if (!sub.served.delete(relay)) {
			return "unknown";
		}
		sub.eose.delete(relay);
		return "rejected";
	}

	/** the relay's transport is gone: nothing is served there until it reconnects */
	relayDisconnected(relay: string): void {
		for (const sub of [...this.#subs.values()]) {
			sub.served.delete(relay);
			sub.eose.delete(relay);
			if (sub.closed) {
				this.#acknowledge(sub, relay);
			}
		}
	}

	relayRemoved(relay: string): void {
		this.relayDisconnected(relay);
		for (const sub of this.#subs.values()) {
			sub.relays.delete(relay);
		}
	}

	clear(): void {
		for (const sub of this.#subs.values()) {
			if (sub.graceTimer !== undefined) {
				clearTimeout(sub.graceTimer);
			}
		}
		this.#subs.clear();
	}

	#acknowledge(sub: Subscription, relay: string): void {
		sub.closing.delete(relay);
		if (sub.closing.size === 0) {
			this.#delete(sub);
		}
	}

	#delete(sub: Subscription): void {
		if (sub.graceTimer !== undefined) {
			clearTimeout(sub.graceTimer);
			sub.graceTimer = undefined;
		}
		if (this.#subs.get(sub.id) === sub) {
			this.#subs.delete(sub.id);
			console.log(`[SubscriptionRegistry] unregister subscription (id: ${sub.id})`);
		}
	}

	#requireOpen(id: string): Subscription {
		const sub = this.#subs.get(id);
		if (sub === undefined) {
			throw new UnknownSubscriptionError(id);
		}
		if (sub.closed) {
			throw new ClosedSubscriptionError(id);
		}
		return sub;
	}
}
