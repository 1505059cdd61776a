import type { NostrEvent } from "nostr-tools/core";
import { type Filter, matchFilters } from "nostr-tools/filter";
import { verifyEvent } from "nostr-tools/pure";

import { RelayConnection, type RelayConnectionHandlers, type RelayConnectionOptions } from "./connection";
import { EventDeduplicator } from "./dedup";
import { InvalidRelayUrlError, PoolShutdownError, UnknownRelayError } from "./errors";
import { compareEvents } from "./event";
import { idBatchFilters } from "./filter";
import type {
	ConnectionStatus,
	EventVerifier,
	IEventStore,
	PoolNotification,
	TransportFactory,
} from "./interfaces";
import { type IMessageCodec, type R2CMessage, jsonCodec } from "./message";
import {
	type ReconcileOptions,
	type ReconciliationSession,
	ReconciliationEngine,
	directionIncludesDown,
	directionIncludesUp,
} from "./reconcile";
import { normalizeRelayUrl } from "./relay-url";
import { Broadcaster, type SlowConsumerPolicy, type StreamConsumer } from "./stream";
import { SubscriptionRegistry, type SubscriptionView } from "./subscription";
import { webSocketTransportFactory } from "./transport";
import { Result, type RelayTarget } from "./types";

export type RelayPoolOptions = {
	createTransport?: TransportFactory;
	codec?: IMessageCodec;
	/** `false` turns signature checks of received events off */
	verifyEvent?: EventVerifier | false;
	/** delivered and published events are saved here; reconciliation compares against it */
	store?: IEventStore;
	/** capacity of the index of delivered events */
	seenCapacity?: number;
	/** per-consumer buffer size of the event and notification streams */
	streamCapacity?: number;
	slowConsumerPolicy?: SlowConsumerPolicy;
	publishTimeoutMs?: number;
	closeGraceMs?: number;
	subscriptionIdPrefix?: string;
	/** defaults for every relay added to the pool */
	relayDefaults?: RelayConnectionOptions;
};

type ResolvedRelayPoolOptions = Required<Omit<RelayPoolOptions, "store" | "verifyEvent">>;

const defaultRelayPoolOptions: ResolvedRelayPoolOptions = {
	createTransport: webSocketTransportFactory(),
	codec: jsonCodec,
	seenCapacity: 10_000,
	streamCapacity: 4096,
	slowConsumerPolicy: "drop-oldest",
	publishTimeoutMs: 10_000,
	closeGraceMs: 5_000,
	subscriptionIdPrefix: "sub",
	relayDefaults: {},
};

/** An event delivered to the unified stream, once per subscription. */
export type Delivery = {
	subscriptionId: string;
	event: NostrEvent;
	/** relays that have sent the event for this subscription so far; keeps growing after delivery */
	relays: ReadonlySet<string>;
};

export type PublishOutcome =
	| { status: "accepted"; message: string }
	| { status: "rejected"; reason: string }
	| { status: "not-attempted"; reason: "disconnected" | "not-writable" };

export type PublishReport = Map<string, PublishOutcome>;

/** What {@link RelayPool.fetchEvents} does once every relay has sent EOSE. */
export type EoseAction =
	| { type: "exit" }
	/** keep collecting until this many more events have arrived */
	| { type: "wait-for-events"; count: number }
	/** keep collecting for this long */
	| { type: "wait-duration"; ms: number };

export type FetchOptions = {
	relays?: RelayTarget;
	/** bounds the whole fetch, waiting after EOSE included */
	timeoutMs?: number;
	/** default: exit */
	afterEose?: EoseAction;
};

export type SyncOptions = ReconcileOptions & {
	relays?: RelayTarget;
	/** ids per REQ when fetching missing events */
	batchSize?: number;
	/** fall back to a plain subscription for the filter when reconciliation is aborted */
	fallback?: boolean;
	/** timeout of each fetch that follows reconciliation */
	fetchTimeoutMs?: number;
};

export type SyncReport = {
	session: ReconciliationSession;
	/** events fetched from the relay */
	received: number;
	/** local events the relay accepted */
	sent: number;
	fellBack: boolean;
};

type PendingPublish = {
	relay: string;
	eventId: string;
	ticket: number;
	timer: NodeJS.Timeout;
	resolve: (o: PublishOutcome) => void;
};

type Collector = {
	onEvent: (d: Delivery) => void;
	onEoseComplete: () => void;
	finish: () => void;
};

const nullStore: IEventStore = {
	save: () => Result.ok({}),
	query: () => [],
};

/**
 * Client side of the Nostr protocol over many relays at once.
 *
 * @example
 * const pool = new RelayPool();
 * pool.addRelay("wss://relay.example.com");
 * await pool.connect();
 * const subId = pool.subscribe([{ kinds: [1], limit: 20 }]);
 * for await (const { event, relays } of pool.events()) {
 *   console.log(event.content, [...relays]);
 * }
 */
export class RelayPool {
	#opts: ResolvedRelayPoolOptions;
	#verify: EventVerifier | undefined;
	#store: IEventStore | undefined;

	#relays = new Map<string, RelayConnection>();
	#registry: SubscriptionRegistry;
	#dedup: EventDeduplicator;
	#engine: ReconciliationEngine;
	#events: Broadcaster<Delivery>;
	#notifications: Broadcaster<PoolNotification>;

	#pendingPublishes = new Map<string, PendingPublish[]>();
	#collectors = new Map<string, Collector>();
	// filters replaced by updateFilters, until every relay has answered the new ones
	#supersededFilters = new Map<string, readonly Filter[]>();
	#shutDown = false;

	constructor(opts: RelayPoolOptions = {}) {
		const { store, verifyEvent: verifier, ...rest } = opts;
		const d = defaultRelayPoolOptions;
		this.#opts = {
			createTransport: rest.createTransport ?? d.createTransport,
			codec: rest.codec ?? d.codec,
			seenCapacity: rest.seenCapacity ?? d.seenCapacity,
			streamCapacity: rest.streamCapacity ?? d.streamCapacity,
			slowConsumerPolicy: rest.slowConsumerPolicy ?? d.slowConsumerPolicy,
			publishTimeoutMs: rest.publishTimeoutMs ?? d.publishTimeoutMs,
			closeGraceMs: rest.closeGraceMs ?? d.closeGraceMs,
			subscriptionIdPrefix: rest.subscriptionIdPrefix ?? d.subscriptionIdPrefix,
			relayDefaults: rest.relayDefaults ?? d.relayDefaults,
		};
		this.#verify = verifier === false ? undefined : (verifier ?? verifyEvent);
		this.#store = store;

		this.#registry = new SubscriptionRegistry({
			idPrefix: this.#opts.subscriptionIdPrefix,
			closeGraceMs: this.#opts.closeGraceMs,
		});
		this.#dedup = new EventDeduplicator(this.#opts.seenCapacity);
		this.#engine = new ReconciliationEngine(store ?? nullStore, (session) => {
			this.#notify({
				type: "reconciliation-abort",
				relay: session.relay,
				sessionId: session.id,
				reason: session.reason ?? "",
			});
		});

		const streamOpts = { capacity: this.#opts.streamCapacity, policy: this.#opts.slowConsumerPolicy };
		this.#events = new Broadcaster<Delivery>(streamOpts, (info) => {
			this.#notify({ type: "consumer-overflow", stream: "events", ...info });
		});
		this.#notifications = new Broadcaster<PoolNotification>(streamOpts, (info) => {
			console.error(
				`[RelayPool] notification consumer "${info.consumer}" overflowed (policy: ${info.policy}, dropped: ${info.dropped})`,
			);
		});
	}

	get isShutDown(): boolean {
		return this.#shutDown;
	}

	/* relays */

	/** Adds a relay, or returns the existing connection if the (normalized) url is already in the pool. */
	addRelay(url: string, opts: RelayConnectionOptions = {}): RelayConnection {
		this.#assertAlive();
		const normalized = this.#normalize(url);
		const existing = this.#relays.get(normalized);
		if (existing !== undefined) {
			return existing;
		}
		const conn = new RelayConnection(
			normalized,
			{ ...this.#opts.relayDefaults, ...opts },
			{ codec: this.#opts.codec, createTransport: this.#opts.createTransport, handlers: this.#connHandlers },
		);
		this.#relays.set(normalized, conn);
		console.log(`[RelayPool] added relay ${normalized}`);
		return conn;
	}

	removeRelay(url: string): void {
		this.#assertAlive();
		const conn = this.#requireRelay(url);
		this.#relays.delete(conn.url);

		this.#registry.relayRemoved(conn.url);
		this.#engine.abortRelay(conn.url, "relay removed");
		this.#settlePublishesOf(conn.url, { status: "rejected", reason: "relay removed" });
		conn.terminate();
		this.#checkCollectors();
		console.log(`[RelayPool] removed relay ${conn.url}`);
	}

	relay(url: string): RelayConnection {
		return this.#requireRelay(url);
	}

	relays(): RelayConnection[] {
		return [...this.#relays.values()];
	}

	/** Snapshot of every relay's connection status. */
	status(): Map<string, ConnectionStatus> {
		return new Map([...this.#relays.values()].map((c): [string, ConnectionStatus] => [c.url, c.status]));
	}

	/** Starts connecting every relay that is not connected yet; resolves when all attempts are settled. */
	async connect(): Promise<void> {
		this.#assertAlive();
		await Promise.all([...this.#relays.values()].map((c) => c.connect()));
	}

	connectRelay(url: string): Promise<void> {
		this.#assertAlive();
		return this.#requireRelay(url).connect();
	}

	/* publish */

	/**
	 * Sends a signed event to the target relays. Relays that are not connected are skipped, not
	 * queued: retrying is up to the caller.
	 */
	publish(ev: NostrEvent, target: RelayTarget = "all"): Promise<PublishReport> {
		this.#assertAlive();
		const report: PublishReport = new Map();
		const conns = this.#resolveTargets(target, "write", (skipped) => {
			report.set(skipped.url, { status: "not-attempted", reason: "not-writable" });
		});
		this.#saveToStore(ev);

		const attempts = conns.map(async (conn) => [conn.url, await this.#publishTo(conn, ev)] as const);
		return Promise.all(attempts).then((outcomes) => {
			for (const [url, outcome] of outcomes) {
				report.set(url, outcome);
			}
			return report;
		});
	}

	#publishTo(conn: RelayConnection, ev: NostrEvent): Promise<PublishOutcome> {
		if (!conn.isConnected) {
			return Promise.resolve({ status: "not-attempted", reason: "disconnected" });
		}
		return new Promise((resolve) => {
			const ticket = conn.enqueue(["EVENT", ev]);
			if (ticket === undefined) {
				resolve({ status: "not-attempted", reason: "disconnected" });
				return;
			}
			const pending: PendingPublish = {
				relay: conn.url,
				eventId: ev.id,
				ticket,
				resolve,
				timer: setTimeout(() => {
					conn.withdraw(ticket);
					this.#settlePublish(pending, { status: "rejected", reason: "timeout" });
				}, this.#opts.publishTimeoutMs),
			};
			const key = pendingKey(conn.url, ev.id);
			this.#pendingPublishes.set(key, [...(this.#pendingPublishes.get(key) ?? []), pending]);
		});
	}

	#settlePublish(pending: PendingPublish, outcome: PublishOutcome): void {
		clearTimeout(pending.timer);
		const key = pendingKey(pending.relay, pending.eventId);
		const rest = (this.#pendingPublishes.get(key) ?? []).filter((p) => p !== pending);
		if (rest.length > 0) {
			this.#pendingPublishes.set(key, rest);
		} else {
			this.#pendingPublishes.delete(key);
		}
		pending.resolve(outcome);
	}

	#settlePublishesOf(relay: string, outcome: PublishOutcome): void {
		const conn = this.#relays.get(relay);
		for (const list of [...this.#pendingPublishes.values()]) {
			for (const pending of list) {
				if (pending.relay === relay) {
					conn?.withdraw(pending.ticket);
					this.#settlePublish(pending, outcome);
				}
			}
		}
	}

	/* subscriptions */

	/** Opens a subscription and returns its id. Its events appear on {@link events}. */
	subscribe(filters: Filter[], target: RelayTarget = "all"): string {
		this.#assertAlive();
		const conns = this.#resolveTargets(target, "read");
		return this.#registry.subscribe(filters, conns);
	}

	unsubscribe(subId: string): void {
		this.#assertAlive();
		this.#registry.unsubscribe(subId, (url) => this.#relays.get(url));
		this.#supersededFilters.delete(subId);
		this.#collectors.get(subId)?.finish();
	}

	/** Replaces the filters of an open subscription on every relay serving it. */
	updateFilters(subId: string, filters: Filter[]): void {
		this.#assertAlive();
		const previous = this.#registry.get(subId)?.filters;
		this.#registry.updateFilters(subId, filters, (url) => this.#relays.get(url));
		if (previous !== undefined) {
			this.#supersededFilters.set(subId, previous);
		}
	}

	subscription(subId: string): SubscriptionView | undefined {
		return this.#registry.get(subId);
	}

	/**
	 * Collects the events stored by the target relays: subscribes, waits for EOSE from every
	 * connected target (or the timeout), then closes the subscription. Newest first.
	 *
	 * With `afterEose`, the subscription stays open after EOSE for a number of further events
	 * or for a while; `timeoutMs` still bounds the whole fetch.
	 */
	fetchEvents(filters: Filter[], opts: FetchOptions = {}): Promise<NostrEvent[]> {
		this.#assertAlive();
		const conns = this.#resolveTargets(opts.relays ?? "all", "read").filter((c) => c.isConnected);
		if (conns.length === 0) {
			return Promise.resolve([]);
		}

		const afterEose: EoseAction = opts.afterEose ?? { type: "exit" };
		const subId = this.#registry.subscribe(filters, conns);
		return new Promise((resolve) => {
			const events: NostrEvent[] = [];
			let eoseReached = false;
			let sinceEose = 0;
			let graceTimer: NodeJS.Timeout | undefined;
			const timer = setTimeout(() => collector.finish(), opts.timeoutMs ?? 10_000);
			const collector: Collector = {
				onEvent: (d) => {
					events.push(d.event);
					if (eoseReached && afterEose.type === "wait-for-events" && ++sinceEose >= afterEose.count) {
						collector.finish();
					}
				},
				onEoseComplete: () => {
					if (eoseReached) {
						return;
					}
					eoseReached = true;
					switch (afterEose.type) {
						case "exit":
							collector.finish();
							break;
						case "wait-for-events":
							if (afterEose.count <= 0) {
								collector.finish();
							}
							break;
						case "wait-duration":
							graceTimer = setTimeout(() => collector.finish(), afterEose.ms);
							break;
					}
				},
				finish: () => {
					clearTimeout(timer);
					clearTimeout(graceTimer);
					if (!this.#collectors.delete(subId)) {
						return;
					}
					this.#supersededFilters.delete(subId);
					const sub = this.#registry.get(subId);
					if (sub !== undefined && !sub.closed && !this.#shutDown) {
						this.#registry.unsubscribe(subId, (url) => this.#relays.get(url));
					}
					resolve(events.sort((a, b) => compareEvents(b, a)));
				},
			};
			this.#collectors.set(subId, collector);
		});
	}

	#checkCollectors(): void {
		for (const [subId, collector] of [...this.#collectors]) {
			// no relay left to hear from
			if (this.#registry.get(subId)?.served.size === 0) {
				collector.finish();
			} else if (this.#registry.isEoseComplete(subId)) {
				collector.onEoseComplete();
			}
		}
	}

	/* reconciliation */

	/** Runs one negentropy session against a relay and reports the difference found. */
	reconcile(url: string, filter: Filter, opts: ReconcileOptions = {}): Promise<ReconciliationSession> {
		this.#assertAlive();
		return this.#engine.reconcile(this.#requireRelay(url), filter, opts);
	}

	/**
	 * Reconciles with every target relay concurrently, then fetches what is missing locally and,
	 * if the direction includes "up", publishes what the relay is missing.
	 */
	sync(filter: Filter, opts: SyncOptions = {}): Promise<Map<string, SyncReport>> {
		this.#assertAlive();
		const conns = this.#resolveTargets(opts.relays ?? "all", "read");
		const runs = conns.map(async (conn) => [conn.url, await this.#syncWith(conn, filter, opts)] as const);
		return Promise.all(runs).then((reports) => new Map(reports));
	}

	// a failure of one relay's run ends up in its own report, never rejecting the whole sync
	async #syncWith(conn: RelayConnection, filter: Filter, opts: SyncOptions): Promise<SyncReport> {
		const session = await this.#engine.reconcile(conn, filter, opts);
		const report: SyncReport = { session, received: 0, sent: 0, fellBack: false };
		try {
			await this.#transferDifference(conn, filter, opts, report);
		} catch (err) {
			session.status = "aborted";
			session.reason = `sync failed: ${err instanceof Error ? err.message : String(err)}`;
			console.error(`[RelayPool] sync with ${conn.url} failed:`, err);
			this.#notify({ type: "reconciliation-abort", relay: conn.url, sessionId: session.id, reason: session.reason });
		}
		return report;
	}

	async #transferDifference(conn: RelayConnection, filter: Filter, opts: SyncOptions, report: SyncReport): Promise<void> {
		const { session } = report;
		const batchSize = opts.batchSize ?? 50;
		const fetchOpts = { relays: [conn.url], timeoutMs: opts.fetchTimeoutMs };

		if (session.status === "aborted" && opts.fallback === true) {
			if (!this.#shutDown && this.#relays.has(conn.url)) {
				console.log(`[RelayPool] falling back to plain fetch on ${conn.url}`);
				report.fellBack = true;
				report.received = (await this.fetchEvents([filter], fetchOpts)).length;
			}
			return;
		}

		if (directionIncludesDown(session.direction)) {
			for (const idFilter of idBatchFilters(session.need, batchSize)) {
				if (this.#shutDown || !this.#relays.has(conn.url)) {
					return;
				}
				report.received += (await this.fetchEvents([idFilter], fetchOpts)).length;
			}
		}

		if (directionIncludesUp(session.direction) && this.#store !== undefined && session.have.length > 0) {
			const toSend = await this.#store.query(idBatchFilters(session.have, batchSize));
			for (const ev of toSend) {
				if (this.#shutDown || !this.#relays.has(conn.url)) {
					return;
				}
				const outcome = (await this.publish(ev, [conn.url])).get(conn.url);
				if (outcome?.status === "accepted") {
					report.sent++;
				}
			}
		}
	}

	/* streams */

	/** A new consumer of the unified, deduplicated event stream. */
	events(name?: string): StreamConsumer<Delivery> {
		return this.#events.subscribe(name);
	}

	/** A new consumer of diagnostics: status changes, notices, errors, overflows. */
	notifications(name?: string): StreamConsumer<PoolNotification> {
		return this.#notifications.subscribe(name);
	}

	/** Relays that have sent the event, across subscriptions still remembered by the deduplicator. */
	seenOn(eventId: string): Set<string> {
		return this.#dedup.seenOn(eventId);
	}

	/* shutdown */

	/** Terminates every relay and releases all state. Idempotent. */
	async shutdown(): Promise<void> {
		if (this.#shutDown) {
			return;
		}
		this.#shutDown = true;
		console.log("[RelayPool] shutting down...");

		this.#engine.abortAll("pool shut down");
		for (const collector of [...this.#collectors.values()]) {
			collector.finish();
		}
		for (const list of [...this.#pendingPublishes.values()]) {
			for (const pending of list) {
				this.#settlePublish(pending, { status: "rejected", reason: "pool shut down" });
			}
		}
		for (const conn of this.#relays.values()) {
			conn.terminate();
		}
		this.#relays.clear();
		this.#registry.clear();
		this.#supersededFilters.clear();
		this.#dedup.clear();

		this.#events.close();
		this.#notifications.close();
	}

	/* inbound */

	#connHandlers: RelayConnectionHandlers = {
		onStatusChange: (conn, from, to) => {
			this.#notify({ type: "status", relay: conn.url, from, to });
			// terminated from outside the pool: removeRelay and shutdown clean up on their own
			if (to === "terminated" && !this.#shutDown && this.#relays.get(conn.url) === conn) {
				this.#relayGone(conn, "relay terminated", "relay terminated");
			}
		},
		onConnected: (conn) => {
			this.#registry.resubscribe(conn);
		},
		onDisconnected: (conn, reason) => {
			this.#relayGone(conn, `connection lost: ${reason}`, "connection lost");
		},
		onMessage: (conn, msg) => {
			this.#route(conn, msg);
		},
		onProtocolError: (conn, message) => {
			this.#notify({ type: "protocol-error", relay: conn.url, message });
		},
		onTransportError: (conn, message) => {
			this.#notify({ type: "transport-error", relay: conn.url, message });
		},
	};

	// the relay serves nothing anymore until it connects again
	#relayGone(conn: RelayConnection, abortReason: string, publishReason: string): void {
		this.#registry.relayDisconnected(conn.url);
		this.#engine.abortRelay(conn.url, abortReason);
		this.#settlePublishesOf(conn.url, { status: "rejected", reason: publishReason });
		this.#checkCollectors();
	}

	#route(conn: RelayConnection, msg: R2CMessage): void {
		switch (msg[0]) {
			case "EVENT": {
				this.#handleEvent(conn, msg[1], msg[2]);
				break;
			}
			case "OK": {
				const [, eventId, ok, message] = msg;
				const pending = this.#pendingPublishes.get(pendingKey(conn.url, eventId))?.[0];
				if (pending === undefined) {
					console.log(`[RelayPool] unexpected OK for ${eventId} from ${conn.url}`);
					break;
				}
				this.#settlePublish(pending, ok ? { status: "accepted", message } : { status: "rejected", reason: message });
				break;
			}
			case "EOSE": {
				const subId = msg[1];
				if (this.#registry.markEose(subId, conn.url)) {
					if (this.#registry.isEoseComplete(subId)) {
						this.#supersededFilters.delete(subId);
					}
					this.#notify({ type: "eose", relay: conn.url, subId });
					this.#checkCollectors();
				}
				break;
			}
			case "CLOSED": {
				const [, subId, message] = msg;
				const res = this.#registry.handleClosed(subId, conn.url);
				if (res === "rejected") {
					console.log(`[RelayPool] ${conn.url} closed subscription ${subId}: ${message}`);
					this.#notify({ type: "closed", relay: conn.url, subId, message });
					this.#checkCollectors();
				}
				break;
			}
			case "NOTICE": {
				this.#notify({ type: "notice", relay: conn.url, message: msg[1] });
				break;
			}
			case "AUTH": {
				this.#notify({ type: "auth", relay: conn.url, challenge: msg[1] });
				break;
			}
			case "NEG-MSG":
			case "NEG-ERR": {
				if (!this.#engine.handleMessage(conn.url, [msg[0], msg[1], msg[2]])) {
					this.#protocolError(conn, `${msg[0]} for unknown session ${msg[1]}`);
				}
				break;
			}
		}
	}

	#handleEvent(conn: RelayConnection, subId: string, ev: NostrEvent): void {
		const sub = this.#registry.get(subId);
		if (sub === undefined) {
			this.#protocolError(conn, `event for unknown subscription ${subId}`);
			return;
		}
		// stragglers of a closing subscription, or of one the relay is no longer serving
		if (sub.closed || !sub.served.has(conn.url)) {
			return;
		}
		if (this.#verify !== undefined && !this.#verify(ev)) {
			this.#protocolError(conn, `invalid signature (event: ${ev.id})`);
			return;
		}
		if (!matchFilters([...sub.filters], ev)) {
			const previous = this.#supersededFilters.get(subId);
			if (previous !== undefined && matchFilters([...previous], ev)) {
				console.log(`[RelayPool] dropping event ${ev.id} sent by ${conn.url} for the previous filters of ${subId}`);
				return;
			}
			this.#protocolError(conn, `event ${ev.id} does not match the filters of ${subId}`);
			return;
		}

		const { outcome, relays } = this.#dedup.observe(ev, conn.url, subId);
		if (outcome === "duplicate") {
			return;
		}
		this.#saveToStore(ev);
		const delivery: Delivery = { subscriptionId: subId, event: ev, relays };
		this.#events.push(delivery);
		this.#collectors.get(subId)?.onEvent(delivery);
	}

	/* helpers */

	#notify(n: PoolNotification): void {
		this.#notifications.push(n);
	}

	#protocolError(conn: RelayConnection, message: string): void {
		console.log(`[RelayPool] protocol error from ${conn.url}: ${message}`);
		this.#notify({ type: "protocol-error", relay: conn.url, message });
	}

	#saveToStore(ev: NostrEvent): void {
		const store = this.#store;
		if (store === undefined) {
			return;
		}
		Promise.resolve()
			.then(() => store.save(ev))
			.catch((err: unknown) => {
				console.error(`[RelayPool] failed to save event ${ev.id}:`, err);
			});
	}

	#normalize(url: string): string {
		const res = normalizeRelayUrl(url);
		if (!res.ok) {
			throw new InvalidRelayUrlError(url, res.err);
		}
		return res.val;
	}

	#requireRelay(url: string): RelayConnection {
		const normalized = this.#normalize(url);
		const conn = this.#relays.get(normalized);
		if (conn === undefined) {
			throw new UnknownRelayError(normalized);
		}
		return conn;
	}

	// explicit lists must only name relays of the pool; "all" picks relays with the given flag
	#resolveTargets(
		target: RelayTarget,
		flag: "read" | "write",
		onSkipped: (conn: RelayConnection) => void = () => {},
	): RelayConnection[] {
		if (target === "all") {
			return [...this.#relays.values()].filter((c) => {
				const ok = flag === "read" ? c.readable : c.writable;
				if (!ok) {
					onSkipped(c);
				}
				return ok;
			});
		}
		const conns = new Map<string, RelayConnection>();
		for (const url of target) {
			const conn = this.#requireRelay(url);
			conns.set(conn.url, conn);
		}
		return [...conns.values()];
	}

	#assertAlive(): void {
		if (this.#shutDown) {
			throw new PoolShutdownError();
		}
	}
}

const pendingKey = (relay: string, eventId: string): string => `${relay}\u0000${eventId}`;
