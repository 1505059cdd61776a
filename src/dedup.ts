import type { NostrEvent } from "nostr-tools/core";

/**
 * Bounded set of delivered event keys, each with the relays that have confirmed it.
 *
 * Eviction is by insertion order: once `capacity` keys are held, inserting a new key evicts the
 * oldest inserted one. Recording another confirmation for a key does not refresh it.
 */
export class SeenEventIndex {
	#capacity: number;
	// Map iteration order is insertion order
	#entries = new Map<string, Set<string>>();

	constructor(capacity: number) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new RangeError(`capacity must be a positive integer: ${capacity}`);
		}
		this.#capacity = capacity;
	}

	get size(): number {
		return this.#entries.size;
	}

	get capacity(): number {
		return this.#capacity;
	}

	has(key: string): boolean {
		return this.#entries.has(key);
	}

	confirmations(key: string): ReadonlySet<string> | undefined {
		return this.#entries.get(key);
	}

	// returns the confirmation set of the newly inserted key
	insert(key: string, relay: string): ReadonlySet<string> {
		while (this.#entries.size >= this.#capacity) {
			const oldest = this.#entries.keys().next();
			if (oldest.done) {
				break;
			}
			this.#entries.delete(oldest.value);
		}
		const relays = new Set([relay]);
		this.#entries.set(key, relays);
		return relays;
	}

	// returns false if the key is not (or no longer) held
	confirm(key: string, relay: string): boolean {
		const relays = this.#entries.get(key);
		if (relays === undefined) {
			return false;
		}
		relays.add(relay);
		return true;
	}

	*keys(): IterableIterator<string> {
		yield* this.#entries.keys();
	}

	clear(): void {
		this.#entries.clear();
	}
}

export type ObserveOutcome = {
	outcome: "delivered" | "duplicate";
	/** live set of relays that have sent this event in this context */
	relays: ReadonlySet<string>;
};

const deliveryKey = (context: string, eventId: string): string => `${context}\u0000${eventId}`;

/**
 * Merges events arriving from several relays into one stream per delivery context (a
 * subscription), letting each event id through once.
 *
 * Authenticity is not checked here: verify events before observing them.
 */
export class EventDeduplicator {
	#index: SeenEventIndex;

	constructor(capacity: number) {
		this.#index = new SeenEventIndex(capacity);
	}

	get size(): number {
		return this.#index.size;
	}

	observe(ev: NostrEvent, sourceRelay: string, context = ""): ObserveOutcome {
		const key = deliveryKey(context, ev.id);
		if (this.#index.confirm(key, sourceRelay)) {
			return { outcome: "duplicate", relays: this.#index.confirmations(key) ?? new Set([sourceRelay]) };
		}
		return { outcome: "delivered", relays: this.#index.insert(key, sourceRelay) };
	}

	/** relays that have confirmed the event in any context still held by the index */
	seenOn(eventId: string): Set<string> {
		const suffix = `\u0000${eventId}`;
		const relays = new Set<string>();
		for (const key of this.#index.keys()) {
			if (key.endsWith(suffix)) {
				for (const r of this.#index.confirmations(key) ?? []) {
					relays.add(r);
				}
			}
		}
		return relays;
	}

	clear(): void {
		this.#index.clear();
	}
}
