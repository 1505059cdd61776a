import type { Filter } from "nostr-tools/filter";

import { withoutLimit } from "./filter";
import type { IEventStore } from "./interfaces";
import type { C2RMessage } from "./message";
import { Negentropy, NegentropyStorage, isNegentropyTimestamp } from "./negentropy";

export type NegentropyDirection = "down" | "up" | "both";

export const directionIncludesDown = (d: NegentropyDirection): boolean => d === "down" || d === "both";
export const directionIncludesUp = (d: NegentropyDirection): boolean => d === "up" || d === "both";

export type ReconcileOptions = {
	direction?: NegentropyDirection;
	/** how long to wait for the first answer; relays without NIP-77 support usually never answer */
	initialTimeoutMs?: number;
	roundTimeoutMs?: number;
	/** the session is given up once the relay has answered this many times without converging */
	maxRounds?: number;
};

const defaultReconcileOptions: Required<ReconcileOptions> = {
	direction: "down",
	initialTimeoutMs: 10_000,
	roundTimeoutMs: 30_000,
	maxRounds: 100,
};

export type ReconciliationSession = {
	id: string;
	relay: string;
	filter: Filter;
	direction: NegentropyDirection;
	status: "complete" | "aborted";
	/** abort reason */
	reason?: string;
	/** ids the relay has and the local store lacks */
	need: string[];
	/** ids the local store has and the relay lacks; only collected when the direction includes "up" */
	have: string[];
	rounds: number;
};

/** The part of a relay connection the engine talks to. */
export interface IReconcileOutlet {
	readonly url: string;
	readonly isConnected: boolean;
	enqueue(msg: C2RMessage): number | undefined;
}

type ActiveSession = {
	result: ReconciliationSession;
	outlet: IReconcileOutlet;
	neg: Negentropy;
	timer: NodeJS.Timeout | undefined;
	roundTimeoutMs: number;
	maxRounds: number;
	resolve: (s: ReconciliationSession) => void;
};

/**
 * Runs negentropy sessions (NEG-OPEN / NEG-MSG / NEG-CLOSE) against relays, each session
 * independent of the others.
 */
export class ReconciliationEngine {
	#store: IEventStore;
	#onAbort: (session: ReconciliationSession) => void;
	#idPrefix: string;

	#sessions = new Map<string, ActiveSession>();
	#seq = 0;

	constructor(
		store: IEventStore,
		onAbort: (session: ReconciliationSession) => void = () => {},
		idPrefix = "neg",
	) {
		this.#store = store;
		this.#onAbort = onAbort;
		this.#idPrefix = idPrefix;
	}

	get activeSessions(): number {
		return this.#sessions.size;
	}

	/**
	 * Finds the difference between the local store and the relay for `filter`.
	 * Never rejects because of the relay: a failed exchange resolves to an "aborted" session
	 * with whatever difference was established before the failure.
	 */
	async reconcile(outlet: IReconcileOutlet, filter: Filter, opts: ReconcileOptions = {}): Promise<ReconciliationSession> {
		const d = defaultReconcileOptions;
		const direction = opts.direction ?? d.direction;
		const initialTimeoutMs = opts.initialTimeoutMs ?? d.initialTimeoutMs;
		const roundTimeoutMs = opts.roundTimeoutMs ?? d.roundTimeoutMs;
		const maxRounds = opts.maxRounds ?? d.maxRounds;
		const result: ReconciliationSession = {
			id: `${this.#idPrefix}:${++this.#seq}`,
			relay: outlet.url,
			filter,
			direction,
			status: "aborted",
			need: [],
			have: [],
			rounds: 0,
		};

		const storage = new NegentropyStorage();
		try {
			let skipped = 0;
			for (const ev of await this.#store.query([withoutLimit(filter)])) {
				if (!isNegentropyTimestamp(ev.created_at)) {
					skipped++;
					continue;
				}
				storage.insert(ev.created_at, ev.id);
			}
			if (skipped > 0) {
				console.log(`[Reconciliation] ${skipped} local event(s) with out-of-range created_at left out of ${result.id}`);
			}
		} catch (err) {
			result.reason = `local store query failed: ${err instanceof Error ? err.message : String(err)}`;
			console.error(`[Reconciliation] session ${result.id} on ${outlet.url} aborted: ${result.reason}`);
			this.#onAbort(result);
			return result;
		}
		storage.seal();

		if (!outlet.isConnected) {
			result.reason = "relay not connected";
			this.#onAbort(result);
			return result;
		}

		const neg = new Negentropy(storage);
		const initialMessage = neg.initiate();
		console.log(
			`[Reconciliation] opening session ${result.id} on ${outlet.url} (local items: ${storage.size}, direction: ${direction})`,
		);

		return new Promise((resolve) => {
			const session: ActiveSession = { result, outlet, neg, timer: undefined, roundTimeoutMs, maxRounds, resolve };
			this.#sessions.set(result.id, session);
			if (outlet.enqueue(["NEG-OPEN", result.id, withoutLimit(filter), initialMessage]) === undefined) {
				this.#abort(session, "relay connection terminated", false);
				return;
			}
			this.#arm(session, initialTimeoutMs);
		});
	}

	/** routes NEG-MSG / NEG-ERR; returns false if no session of that relay has the id */
	handleMessage(relay: string, msg: ["NEG-MSG" | "NEG-ERR", string, string]): boolean {
		const [type, sessionId, payload] = msg;
		const session = this.#sessions.get(sessionId);
		if (session === undefined || session.outlet.url !== relay) {
			return false;
		}

		if (type === "NEG-ERR") {
			// the relay has already dropped the session: no NEG-CLOSE
			this.#abort(session, `relay error: ${payload}`, false);
			return true;
		}

		let step: ReturnType<Negentropy["reconcile"]>;
		try {
			step = session.neg.reconcile(payload);
		} catch (err) {
			this.#abort(session, `invalid NEG-MSG: ${err instanceof Error ? err.message : String(err)}`, true);
			return true;
		}

		const { result } = session;
		result.rounds++;
		result.need.push(...step.need);
		if (result.direction !== "down") {
			result.have.push(...step.have);
		}

		if (step.output === undefined) {
			result.status = "complete";
			console.log(
				`[Reconciliation] session ${result.id} on ${relay} complete (rounds: ${result.rounds}, need: ${result.need.length}, have: ${result.have.length})`,
			);
			session.outlet.enqueue(["NEG-CLOSE", result.id]);
			this.#finish(session);
			return true;
		}

		if (result.rounds >= session.maxRounds) {
			this.#abort(session, `gave up after ${result.rounds} round(s)`, true);
			return true;
		}
		if (session.outlet.enqueue(["NEG-MSG", result.id, step.output]) === undefined) {
			this.#abort(session, "relay connection terminated", false);
			return true;
		}
		this.#arm(session, session.roundTimeoutMs);
		return true;
	}

	/** abandons every session running against `relay` */
	abortRelay(relay: string, reason: string): void {
		for (const session of [...this.#sessions.values()]) {
			if (session.outlet.url === relay) {
				this.#abort(session, reason, false);
			}
		}
	}

	abortAll(reason: string): void {
		for (const session of [...this.#sessions.values()]) {
			this.#abort(session, reason, false);
		}
	}

	#arm(session: ActiveSession, ms: number): void {
		if (session.timer !== undefined) {
			clearTimeout(session.timer);
		}
		session.timer = setTimeout(() => {
			session.timer = undefined;
			this.#abort(session, session.result.rounds === 0 ? "no response (NIP-77 unsupported?)" : "timed out", true);
		}, ms);
	}

	#abort(session: ActiveSession, reason: string, sendClose: boolean): void {
		if (!this.#sessions.has(session.result.id)) {
			return;
		}
		const { result } = session;
		result.status = "aborted";
		result.reason = reason;
		console.log(`[Reconciliation] session ${result.id} on ${result.relay} aborted: ${reason}`);
		if (sendClose && session.outlet.isConnected) {
			session.outlet.enqueue(["NEG-CLOSE", result.id]);
		}
		this.#finish(session);
		this.#onAbort(result);
	}

	#finish(session: ActiveSession): void {
		if (session.timer !== undefined) {
			clearTimeout(session.timer);
			session.timer = undefined;
		}
		this.#sessions.delete(session.result.id);
		session.resolve(session.result);
	}
}
