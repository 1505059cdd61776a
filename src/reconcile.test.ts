import { afterEach, describe, expect, test, vi } from "vitest";

import type { C2RMessage } from "./message";
import { Negentropy, NegentropyStorage } from "./negentropy";
import { type IReconcileOutlet, ReconciliationEngine } from "./reconcile";
import { MemoryEventStore } from "./store";
import { hexId, settle, unsignedEvent } from "./testing/helpers";
import { Result } from "./types";

type Behavior = "answer" | "error" | "silent";

// answers NEG-* messages like a relay holding `items` would
class NegentropyPeer implements IReconcileOutlet {
	readonly url = "wss://relay.example.com";
	isConnected = true;
	readonly sent: C2RMessage[] = [];
	engine: ReconciliationEngine | undefined;
	#neg: Negentropy;

	constructor(
		items: { ts: number; id: string }[],
		public behavior: Behavior = "answer",
	) {
		const storage = new NegentropyStorage();
		for (const { ts, id } of items) {
			storage.insert(ts, id);
		}
		storage.seal();
		this.#neg = new Negentropy(storage);
	}

	enqueue(msg: C2RMessage): number {
		this.sent.push(msg);
		queueMicrotask(() => this.#answer(msg));
		return this.sent.length;
	}

	#answer(msg: C2RMessage): void {
		if (this.behavior === "silent" || this.engine === undefined) {
			return;
		}
		let sessionId: string;
		let payload: string;
		switch (msg[0]) {
			case "NEG-OPEN":
				[, sessionId, , payload] = msg;
				break;
			case "NEG-MSG":
				[, sessionId, payload] = msg;
				break;
			default:
				return;
		}
		if (this.behavior === "error") {
			this.engine.handleMessage(this.url, ["NEG-ERR", sessionId, "blocked: not allowed"]);
			return;
		}
		this.engine.handleMessage(this.url, ["NEG-MSG", sessionId, this.#neg.reconcile(payload).output ?? ""]);
	}
}

const e1 = unsignedEvent(hexId(1), 100);
const e2 = unsignedEvent(hexId(2), 200);
const e3 = unsignedEvent(hexId(3), 300);

const setup = (relayItems: { ts: number; id: string }[], behavior: Behavior = "answer") => {
	const store = new MemoryEventStore();
	store.save(e1);
	store.save(e2);
	const onAbort = vi.fn();
	const engine = new ReconciliationEngine(store, onAbort);
	const peer = new NegentropyPeer(relayItems, behavior);
	peer.engine = engine;
	return { engine, peer, onAbort };
};

const relayHolding = [
	{ ts: e2.created_at, id: e2.id },
	{ ts: e3.created_at, id: e3.id },
];

describe("ReconciliationEngine", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	test("finds what each side lacks and closes the session", async () => {
		const { engine, peer, onAbort } = setup(relayHolding);
		const session = await engine.reconcile(peer, { kinds: [1], limit: 1 }, { direction: "both" });

		expect(session.status).toBe("complete");
		expect(session.need).toEqual([e3.id]);
		expect(session.have).toEqual([e1.id]);
		expect(session.rounds).toBe(1);
		expect(peer.sent[0]).toEqual(["NEG-OPEN", session.id, { kinds: [1] }, expect.any(String)]);
		expect(peer.sent.at(-1)).toEqual(["NEG-CLOSE", session.id]);
		expect(onAbort).not.toHaveBeenCalled();
		expect(engine.activeSessions).toBe(0);
	});

	test("direction down does not collect what the relay lacks", async () => {
		const { engine, peer } = setup(relayHolding);
		const session = await engine.reconcile(peer, { kinds: [1] });
		expect(session.direction).toBe("down");
		expect(session.need).toEqual([e3.id]);
		expect(session.have).toEqual([]);
	});

	test("NEG-ERR aborts without NEG-CLOSE", async () => {
		const { engine, peer, onAbort } = setup(relayHolding, "error");
		const session = await engine.reconcile(peer, { kinds: [1] });

		expect(session.status).toBe("aborted");
		expect(session.reason).toBe("relay error: blocked: not allowed");
		expect(peer.sent.map((m) => m[0])).toEqual(["NEG-OPEN"]);
		expect(onAbort).toHaveBeenCalledWith(session);
	});

	test("a relay that never answers is given up on after the initial timeout", async () => {
		vi.useFakeTimers();
		const { engine, peer } = setup(relayHolding, "silent");
		const pending = engine.reconcile(peer, { kinds: [1] }, { initialTimeoutMs: 2000 });
		await settle();
		expect(engine.activeSessions).toBe(1);

		await vi.advanceTimersByTimeAsync(2000);
		const session = await pending;
		expect(session.status).toBe("aborted");
		expect(session.reason).toBe("no response (NIP-77 unsupported?)");
		expect(peer.sent.at(-1)).toEqual(["NEG-CLOSE", session.id]);
	});

	test("a relay that is not connected is not asked", async () => {
		const { engine, peer } = setup(relayHolding);
		peer.isConnected = false;
		const session = await engine.reconcile(peer, { kinds: [1] });
		expect(session.status).toBe("aborted");
		expect(session.reason).toBe("relay not connected");
		expect(peer.sent).toEqual([]);
	});

	test("abortRelay ends the sessions running against that relay", async () => {
		const { engine, peer } = setup(relayHolding, "silent");
		const pending = engine.reconcile(peer, { kinds: [1] });
		await settle();

		engine.abortRelay(peer.url, "connection lost");
		const session = await pending;
		expect(session.status).toBe("aborted");
		expect(session.reason).toBe("connection lost");
		expect(engine.activeSessions).toBe(0);
	});

	test("an undecodable NEG-MSG aborts the session", async () => {
		const { engine, peer } = setup(relayHolding, "silent");
		const pending = engine.reconcile(peer, { kinds: [1] });
		await settle();

		const opened = peer.sent[0];
		if (opened === undefined || opened[0] !== "NEG-OPEN") {
			throw new Error("NEG-OPEN expected");
		}
		expect(engine.handleMessage(peer.url, ["NEG-MSG", opened[1], "zz"])).toBe(true);
		const session = await pending;
		expect(session.status).toBe("aborted");
		expect(session.reason).toBe("invalid NEG-MSG: message is not valid hex");
	});

	test("local events outside the timestamp range are left out of the session", async () => {
		const { peer } = setup(relayHolding);
		const store = new MemoryEventStore();
		store.save(e1);
		store.save(unsignedEvent(hexId(9), -5));
		const withBadEvent = new ReconciliationEngine(store);
		peer.engine = withBadEvent;

		const session = await withBadEvent.reconcile(peer, { kinds: [1] }, { direction: "both" });
		expect(session.status).toBe("complete");
		expect(session.need).toEqual([e2.id, e3.id]);
		expect(session.have).toEqual([e1.id]);
	});

	test("a failing local store aborts the session before anything is sent", async () => {
		const { peer } = setup(relayHolding);
		const broken = {
			save: () => Result.ok({}),
			query: () => {
				throw new Error("store is closed");
			},
		};
		const onAbort = vi.fn();
		const engine = new ReconciliationEngine(broken, onAbort);
		peer.engine = engine;

		const session = await engine.reconcile(peer, { kinds: [1] });
		expect(session.status).toBe("aborted");
		expect(session.reason).toBe("local store query failed: store is closed");
		expect(peer.sent).toEqual([]);
		expect(onAbort).toHaveBeenCalledWith(session);
	});

	test("a session that does not converge within maxRounds is given up", async () => {
		const store = new MemoryEventStore();
		const relayItems: { ts: number; id: string }[] = [];
		for (let i = 1; i <= 1000; i++) {
			store.save(unsignedEvent(hexId(i), i));
			// the relay lacks every tenth event
			if (i % 10 !== 0) {
				relayItems.push({ ts: i, id: hexId(i) });
			}
		}
		const engine = new ReconciliationEngine(store);
		const peer = new NegentropyPeer(relayItems);
		peer.engine = engine;

		const session = await engine.reconcile(peer, { kinds: [1] }, { maxRounds: 1 });
		expect(session.status).toBe("aborted");
		expect(session.reason).toBe("gave up after 1 round(s)");
		expect(session.rounds).toBe(1);
		expect(peer.sent.at(-1)).toEqual(["NEG-CLOSE", session.id]);
	});

	test("messages for unknown sessions are not handled", () => {
		const { engine, peer } = setup(relayHolding);
		expect(engine.handleMessage(peer.url, ["NEG-MSG", "neg:42", "61"])).toBe(false);
	});
});
