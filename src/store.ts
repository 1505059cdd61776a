import { Heap } from "heap-js";
import type { NostrEvent } from "nostr-tools/core";
import { type Filter, matchFilter } from "nostr-tools/filter";

import { compareEvents, eventAddress, getEventHandling, getTagValuesByName } from "./event";
import { isNeverMatchingFilter } from "./filter";
import type { EventStoreSaveError, IEventStore } from "./interfaces";
import { Result } from "./types";

export type MemoryEventStoreOptions = {
	/** upper bound of events returned per filter, whatever the filter's own `limit` */
	maxLimit?: number;
};

const defaultMemoryEventStoreOptions: Required<MemoryEventStoreOptions> = {
	maxLimit: Number.POSITIVE_INFINITY,
};

/**
 * In-memory {@link IEventStore}.
 *
 * Keeps the newest version of replaceable and addressable events, honors deletion requests
 * (kind 5) from the author of the deleted event, and never stores ephemeral events.
 */
export class MemoryEventStore implements IEventStore {
	#options: Required<MemoryEventStoreOptions>;

	#eventsById = new Map<string, NostrEvent>();
	// sorted in ascending order of (created_at, -id), so that appending is the common case
	#sorted: NostrEvent[] = [];
	#latestByAddr = new Map<string, NostrEvent>();
	#deletedIds = new Set<string>();

	constructor(opts: MemoryEventStoreOptions = {}) {
		this.#options = { ...defaultMemoryEventStoreOptions, ...opts };
	}

	get size(): number {
		return this.#eventsById.size;
	}

	has(id: string): boolean {
		return this.#eventsById.has(id);
	}

	save(ev: NostrEvent): Result<object, EventStoreSaveError> {
		if (getEventHandling(ev) === "ephemeral") {
			return Result.err("ephemeral");
		}
		if (this.#eventsById.has(ev.id)) {
			return Result.err("duplicated");
		}
		if (this.#deletedIds.has(ev.id)) {
			return Result.err("deleted");
		}

		const addr = eventAddress(ev);
		if (addr !== undefined) {
			const existing = this.#latestByAddr.get(addr);
			if (existing !== undefined) {
				if (compareEvents(ev, existing) < 0) {
					return Result.err("replaced");
				}
				this.#remove(existing.id);
			}
			this.#latestByAddr.set(addr, ev);
		}

		if (ev.kind === 5) {
			for (const id of getTagValuesByName(ev, "e")) {
				const target = this.#eventsById.get(id);
				if (target !== undefined && target.pubkey === ev.pubkey && target.kind !== 5) {
					console.log(`[MemoryEventStore] deleting event (id: ${id}) on request of ${ev.id}`);
					this.#remove(id);
					this.#deletedIds.add(id);
				}
			}
		}

		this.#insert(ev);
		return Result.ok({});
	}

	// most of time events arrive in chronological order, so insertion sort should be efficient enough
	#insert(ev: NostrEvent): void {
		this.#eventsById.set(ev.id, ev);
		this.#sorted.push(ev);
		for (let i = this.#sorted.length - 1; i > 0; i--) {
			const [e1, e2] = [this.#sorted[i - 1], this.#sorted[i]];
			if (e1 === undefined || e2 === undefined || compareEvents(e1, e2) <= 0) {
				break;
			}
			this.#sorted[i] = e1;
			this.#sorted[i - 1] = e2;
		}
	}

	#remove(id: string): void {
		if (!this.#eventsById.delete(id)) {
			return;
		}
		const idx = this.#sorted.findIndex((e) => e.id === id);
		if (idx >= 0) {
			this.#sorted.splice(idx, 1);
		}
	}

	/**
	 * Returns events matching any of the filters, newest first, without duplicates.
	 * Each filter contributes at most its own `limit` events.
	 */
	query(filters: Filter[]): NostrEvent[] {
		const effective = filters.filter((f) => f.limit !== 0 && !isNeverMatchingFilter(f));
		if (effective.length === 0) {
			return [];
		}
		const iters = effective.map((f) => this.#queryOne(f));
		return [...mergeNewestFirst(iters)];
	}

	*#queryOne(filter: Filter): IterableIterator<NostrEvent> {
		const lim = Math.min(filter.limit ?? this.#options.maxLimit, this.#options.maxLimit);
		let n = 0;
		for (let i = this.#sorted.length - 1; i >= 0 && n < lim; i--) {
			const ev = this.#sorted[i];
			if (ev === undefined) {
				continue;
			}
			if (filter.since !== undefined && ev.created_at < filter.since) {
				break;
			}
			if (matchFilter(filter, ev)) {
				yield ev;
				n++;
			}
		}
	}
}

// merges newest-first streams into one, dropping events already yielded
function* mergeNewestFirst(iters: Iterator<NostrEvent>[]): IterableIterator<NostrEvent> {
	const heads = new Heap<{ src: number; ev: NostrEvent }>((a, b) => -compareEvents(a.ev, b.ev));
	iters.forEach((iter, src) => {
		const next = iter.next();
		if (!next.done) {
			heads.push({ src, ev: next.value });
		}
	});

	const yielded = new Set<string>();
	while (true) {
		const top = heads.pop();
		if (top === undefined) {
			return;
		}
		if (!yielded.has(top.ev.id)) {
			yielded.add(top.ev.id);
			yield top.ev;
		}
		const next = iters[top.src]?.next();
		if (next !== undefined && !next.done) {
			heads.push({ src: top.src, ev: next.value });
		}
	}
}
