import type { Filter } from "nostr-tools/filter";
import { finalizeEvent, generateSecretKey } from "nostr-tools/pure";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { InvalidRelayUrlError, PoolShutdownError, UnknownRelayError, UnknownSubscriptionError } from "./errors";
import { type RelayPoolOptions, RelayPool } from "./pool";
import { MemoryEventStore } from "./store";
import { FakeRelay, fakeRelayTransportFactory } from "./testing/fake-relay";
import { settle } from "./testing/helpers";

const sk = generateSecretKey();
const note = (content: string, createdAt: number) =>
	finalizeEvent({ kind: 1, created_at: createdAt, tags: [], content }, sk);

const e1 = note("first", 100);
const e2 = note("second", 200);
const e3 = note("third", 300);

describe("RelayPool", () => {
	let a: FakeRelay;
	let b: FakeRelay;
	let pool: RelayPool;

	const newPool = (opts: RelayPoolOptions = {}) =>
		new RelayPool({
			createTransport: fakeRelayTransportFactory(a, b),
			relayDefaults: { backoff: { random: () => 0 } },
			...opts,
		});

	beforeEach(() => {
		a = new FakeRelay("wss://a.example.com");
		b = new FakeRelay("wss://b.example.com");
		pool = newPool();
	});

	afterEach(async () => {
		await pool.shutdown();
		vi.useRealTimers();
	});

	describe("relays", () => {
		test("addRelay is idempotent per normalized url", () => {
			const conn = pool.addRelay("wss://a.example.com");
			expect(pool.addRelay("WSS://A.example.com/")).toBe(conn);
			expect(pool.relays()).toHaveLength(1);
			expect(pool.status()).toEqual(new Map([["wss://a.example.com", "initialized"]]));
		});

		test("invalid and unknown urls are rejected", () => {
			expect(() => pool.addRelay("ftp://a.example.com")).toThrow(InvalidRelayUrlError);
			expect(() => pool.removeRelay(a.url)).toThrow(UnknownRelayError);
			expect(() => pool.relay(b.url)).toThrow(UnknownRelayError);
		});

		test("removeRelay terminates the relay and takes it out of every subscription", async () => {
			pool.addRelay(a.url);
			pool.addRelay(b.url);
			await pool.connect();
			const subId = pool.subscribe([{ kinds: [1] }]);
			const conn = pool.relay(a.url);

			pool.removeRelay(a.url);
			expect(conn.status).toBe("terminated");
			expect(a.isConnected).toBe(false);
			expect(pool.subscription(subId)?.relays).toEqual(new Set([b.url]));
			expect([...pool.status().keys()]).toEqual([b.url]);
		});

		test("a relay terminated directly gives up its subscriptions and publishes at once", async () => {
			a.muted = true;
			pool.addRelay(a.url);
			pool.addRelay(b.url);
			await pool.connect();
			const subId = pool.subscribe([{ kinds: [1] }]);
			const pending = pool.publish(e1, [a.url]);
			await settle();

			pool.relay(a.url).terminate();
			await expect(pending).resolves.toEqual(new Map([[a.url, { status: "rejected", reason: "relay terminated" }]]));
			expect(pool.subscription(subId)?.served).toEqual(new Set([b.url]));
			expect(pool.status().get(a.url)).toBe("terminated");
		});
	});

	describe("subscriptions", () => {
		test("an event sent by several relays is delivered once, with every relay that sent it", async () => {
			a.seed(e1);
			b.seed(e1, e2);
			pool.addRelay(a.url);
			pool.addRelay(b.url);
			await pool.connect();

			const events = pool.events();
			const notes = pool.notifications();
			const subId = pool.subscribe([{ kinds: [1] }]);
			await settle();

			const deliveries = events.drain();
			expect(deliveries.map((d) => d.event.id).sort()).toEqual([e1.id, e2.id].sort());
			const first = deliveries.find((d) => d.event.id === e1.id);
			expect(first?.subscriptionId).toBe(subId);
			expect(first?.relays).toEqual(new Set([a.url, b.url]));
			expect(pool.seenOn(e1.id)).toEqual(new Set([a.url, b.url]));

			expect(notes.drain().filter((n) => n.type === "eose")).toEqual([
				{ type: "eose", relay: a.url, subId },
				{ type: "eose", relay: b.url, subId },
			]);
		});

		test("subscriptions are re-issued after a reconnect without redelivering events", async () => {
			vi.useFakeTimers();
			a.seed(e1);
			pool.addRelay(a.url);
			await pool.connect();
			const events = pool.events();
			const subId = pool.subscribe([{ kinds: [1] }]);
			await settle();
			expect(events.drain().map((d) => d.event.id)).toEqual([e1.id]);

			a.sever();
			expect(pool.status().get(a.url)).toBe("disconnected");

			await vi.advanceTimersByTimeAsync(5000);
			await settle();
			expect(pool.status().get(a.url)).toBe("connected");
			expect(a.receivedOfType("REQ").map((m) => m[1])).toEqual([subId, subId]);
			expect(events.drain()).toEqual([]);

			a.broadcast(e2);
			await settle();
			expect(events.drain().map((d) => d.event.id)).toEqual([e2.id]);
		});

		test("events that fail checks are reported, not delivered", async () => {
			pool.addRelay(a.url);
			await pool.connect();
			const events = pool.events();
			const subId = pool.subscribe([{ kinds: [1] }]);
			await settle();
			const notes = pool.notifications();

			const reaction = finalizeEvent({ kind: 7, created_at: 100, tags: [], content: "+" }, sk);
			a.inject(["EVENT", subId, { ...e1, content: "tampered" }]);
			a.inject(["EVENT", subId, reaction]);
			a.inject(["EVENT", "nope", e1]);
			await settle();

			expect(notes.drain()).toEqual([
				{ type: "protocol-error", relay: a.url, message: `invalid signature (event: ${e1.id})` },
				{ type: "protocol-error", relay: a.url, message: `event ${reaction.id} does not match the filters of ${subId}` },
				{ type: "protocol-error", relay: a.url, message: "event for unknown subscription nope" },
			]);
			expect(events.drain()).toEqual([]);
		});

		test("events in flight for replaced filters are dropped without a protocol error", async () => {
			pool.addRelay(a.url);
			await pool.connect();
			const events = pool.events();
			const subId = pool.subscribe([{ kinds: [1] }]);
			await settle();
			const notes = pool.notifications();

			a.muted = true;
			pool.updateFilters(subId, [{ kinds: [7] }]);
			a.inject(["EVENT", subId, e1]);
			await settle();
			expect(notes.drain()).toEqual([]);
			expect(events.drain()).toEqual([]);

			// once the relay has answered the new filters, the old ones excuse nothing
			a.inject(["EOSE", subId]);
			a.inject(["EVENT", subId, e2]);
			await settle();
			expect(notes.drain()).toEqual([
				{ type: "eose", relay: a.url, subId },
				{ type: "protocol-error", relay: a.url, message: `event ${e2.id} does not match the filters of ${subId}` },
			]);
		});

		test("a subscription refused by a relay stays active on the others", async () => {
			b.opts = { closeReqsWith: "auth-required: test" };
			pool.addRelay(a.url);
			pool.addRelay(b.url);
			await pool.connect();
			const notes = pool.notifications();
			const subId = pool.subscribe([{ kinds: [1] }]);
			await settle();

			expect(notes.drain().filter((n) => n.type === "closed")).toEqual([
				{ type: "closed", relay: b.url, subId, message: "auth-required: test" },
			]);
			expect(pool.subscription(subId)?.served).toEqual(new Set([a.url]));
		});

		test("updateFilters and unsubscribe reach the relay", async () => {
			pool.addRelay(a.url);
			await pool.connect();
			const subId = pool.subscribe([{ kinds: [1] }]);

			pool.updateFilters(subId, [{ kinds: [7] }]);
			expect(a.receivedOfType("REQ").at(-1)).toEqual(["REQ", subId, { kinds: [7] }]);

			pool.unsubscribe(subId);
			await settle();
			expect(a.openSubscriptions).toEqual([]);
			expect(pool.subscription(subId)).toBeUndefined();
			expect(() => pool.unsubscribe(subId)).toThrow(UnknownSubscriptionError);
		});

		test("fetchEvents collects until every relay sent EOSE, then closes", async () => {
			a.seed(e1);
			b.seed(e1, e2);
			pool.addRelay(a.url);
			pool.addRelay(b.url);
			await pool.connect();

			const got = await pool.fetchEvents([{ kinds: [1] }]);
			expect(got.map((e) => e.id)).toEqual([e2.id, e1.id]);

			await settle();
			expect(a.openSubscriptions).toEqual([]);
			expect(b.openSubscriptions).toEqual([]);
		});

		test("fetchEvents can wait for a number of events after EOSE", async () => {
			a.seed(e1);
			pool.addRelay(a.url);
			await pool.connect();

			const pending = pool.fetchEvents([{ kinds: [1] }], { afterEose: { type: "wait-for-events", count: 2 } });
			await settle();
			a.broadcast(e2);
			await settle();
			expect(a.openSubscriptions).toHaveLength(1);

			a.broadcast(e3);
			const got = await pending;
			expect(got.map((e) => e.id)).toEqual([e3.id, e2.id, e1.id]);
			await settle();
			expect(a.openSubscriptions).toEqual([]);
		});

		test("fetchEvents can keep collecting for a while after EOSE", async () => {
			vi.useFakeTimers();
			a.seed(e1);
			pool.addRelay(a.url);
			await pool.connect();

			const pending = pool.fetchEvents([{ kinds: [1] }], { afterEose: { type: "wait-duration", ms: 1000 } });
			await settle();
			a.broadcast(e2);
			await vi.advanceTimersByTimeAsync(999);
			expect(a.openSubscriptions).toHaveLength(1);

			await vi.advanceTimersByTimeAsync(1);
			expect((await pending).map((e) => e.id)).toEqual([e2.id, e1.id]);
		});

		test("waiting after EOSE is still bounded by the timeout", async () => {
			vi.useFakeTimers();
			a.seed(e1);
			pool.addRelay(a.url);
			await pool.connect();

			const pending = pool.fetchEvents([{ kinds: [1] }], {
				timeoutMs: 500,
				afterEose: { type: "wait-for-events", count: 10 },
			});
			await vi.advanceTimersByTimeAsync(500);
			expect((await pending).map((e) => e.id)).toEqual([e1.id]);
		});

		test("fetchEvents without connected relays yields nothing", async () => {
			pool.addRelay(a.url);
			await expect(pool.fetchEvents([{ kinds: [1] }])).resolves.toEqual([]);
		});
	});

	describe("publish", () => {
		test("reports an outcome for every target relay", async () => {
			pool.addRelay(a.url);
			pool.addRelay(b.url);
			await pool.connect();
			pool.relay(b.url).terminate();

			const report = await pool.publish(e1);
			expect(report).toEqual(
				new Map([
					[a.url, { status: "accepted", message: "" }],
					[b.url, { status: "not-attempted", reason: "disconnected" }],
				]),
			);
			expect(a.store.has(e1.id)).toBe(true);
		});

		test("relay rejections and relays without the write flag", async () => {
			a.opts = { rejectEventsWith: "blocked: test" };
			pool.addRelay(a.url);
			pool.addRelay(b.url, { write: false });
			await pool.connect();

			const report = await pool.publish(e1);
			expect(report).toEqual(
				new Map([
					[a.url, { status: "rejected", reason: "blocked: test" }],
					[b.url, { status: "not-attempted", reason: "not-writable" }],
				]),
			);
			expect(b.receivedOfType("EVENT")).toEqual([]);
		});

		test("an unanswered publish times out", async () => {
			vi.useFakeTimers();
			a.muted = true;
			pool.addRelay(a.url);
			await pool.connect();

			const pending = pool.publish(e1, [a.url]);
			await vi.advanceTimersByTimeAsync(10_000);
			await expect(pending).resolves.toEqual(new Map([[a.url, { status: "rejected", reason: "timeout" }]]));
		});

		test("a publish in flight fails when the connection is lost", async () => {
			a.muted = true;
			pool.addRelay(a.url);
			await pool.connect();

			const pending = pool.publish(e1, [a.url]);
			await settle();
			a.sever();
			await expect(pending).resolves.toEqual(new Map([[a.url, { status: "rejected", reason: "connection lost" }]]));
		});

		test("targets outside the pool are rejected synchronously", () => {
			expect(() => pool.publish(e1, ["wss://c.example.com"])).toThrow(UnknownRelayError);
		});
	});

	describe("sync", () => {
		test("fetches what is missing locally and sends what the relay lacks", async () => {
			const store = new MemoryEventStore();
			store.save(e1);
			store.save(e2);
			pool = newPool({ store });
			a.seed(e2, e3);
			pool.addRelay(a.url);
			await pool.connect();

			const reports = await pool.sync({ kinds: [1] }, { direction: "both" });
			const report = reports.get(a.url);
			expect(report?.session.status).toBe("complete");
			expect(report?.session.need).toEqual([e3.id]);
			expect(report?.session.have).toEqual([e1.id]);
			expect(report?.received).toBe(1);
			expect(report?.sent).toBe(1);
			expect(report?.fellBack).toBe(false);

			await settle();
			expect(store.has(e3.id)).toBe(true);
			expect(a.store.has(e1.id)).toBe(true);
		});

		test("local events with an out-of-range created_at do not break reconciliation", async () => {
			const store = new MemoryEventStore();
			store.save(e1);
			store.save({ ...note("from the past", 100), created_at: -5 });
			pool = newPool({ store });
			a.seed(e2);
			pool.addRelay(a.url);
			await pool.connect();

			const report = (await pool.sync({ kinds: [1] })).get(a.url);
			expect(report?.session.status).toBe("complete");
			expect(report?.session.need).toEqual([e2.id]);
			expect(report?.received).toBe(1);
		});

		test("a failure after reconciliation is reported for that relay only", async () => {
			class StoreFailingIdLookups extends MemoryEventStore {
				override query(filters: Filter[]) {
					if (filters.some((f) => f.ids !== undefined)) {
						throw new Error("store is closed");
					}
					return super.query(filters);
				}
			}
			const store = new StoreFailingIdLookups();
			store.save(e1);
			store.save(e2);
			pool = newPool({ store });
			a.seed(e2, e3);
			b.seed(e1, e2);
			pool.addRelay(a.url);
			pool.addRelay(b.url);
			await pool.connect();

			const reports = await pool.sync({ kinds: [1] }, { direction: "both" });
			const failed = reports.get(a.url);
			expect(failed?.session.status).toBe("aborted");
			expect(failed?.session.reason).toBe("sync failed: store is closed");
			expect(failed?.received).toBe(1);
			expect(reports.get(b.url)?.session.status).toBe("complete");
		});

		test("falls back to a plain query on relays without negentropy", async () => {
			b.opts = { negentropy: "error" };
			b.seed(e1, e2);
			pool.addRelay(b.url);
			await pool.connect();
			const notes = pool.notifications();

			const reports = await pool.sync({ kinds: [1] }, { fallback: true });
			const report = reports.get(b.url);
			expect(report?.session.status).toBe("aborted");
			expect(report?.session.reason).toBe("relay error: blocked: negentropy disabled");
			expect(report?.fellBack).toBe(true);
			expect(report?.received).toBe(2);
			expect(notes.drain().filter((n) => n.type === "reconciliation-abort")).toEqual([
				{
					type: "reconciliation-abort",
					relay: b.url,
					sessionId: report?.session.id,
					reason: "relay error: blocked: negentropy disabled",
				},
			]);
		});
	});

	describe("shutdown", () => {
		test("ends the streams, settles publishes and refuses further use", async () => {
			a.muted = true;
			pool.addRelay(a.url);
			await pool.connect();
			const events = pool.events();
			const pending = pool.publish(e1, [a.url]);

			await pool.shutdown();
			await pool.shutdown();

			await expect(pending).resolves.toEqual(new Map([[a.url, { status: "rejected", reason: "pool shut down" }]]));
			await expect(events.next()).resolves.toEqual({ done: true, value: undefined });
			expect(a.isConnected).toBe(false);
			expect(pool.isShutDown).toBe(true);
			expect(() => pool.subscribe([{}])).toThrow(PoolShutdownError);
			expect(() => pool.addRelay(b.url)).toThrow(PoolShutdownError);
		});
	});
});
