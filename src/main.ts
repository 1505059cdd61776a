import { jack } from "jackspeak";
import type { Filter } from "nostr-tools/filter";

import { PoolError } from "./errors";
import { isReqFilter } from "./filter";
import type { PoolNotification } from "./interfaces";
import { RelayPool } from "./pool";
import type { NegentropyDirection } from "./reconcile";
import { MemoryEventStore } from "./store";
import { Result } from "./types";

const isDirection = (s: string): s is NegentropyDirection => s === "down" || s === "up" || s === "both";

// each argument is one filter as JSON; no argument means "everything"
export const parseFilterArgs = (raws: readonly string[]): Result<Filter[], string> => {
	if (raws.length === 0) {
		return Result.ok([{}]);
	}
	const filters: Filter[] = [];
	for (const raw of raws) {
		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch {
			return Result.err(`filter is not a JSON: ${raw}`);
		}
		if (!isReqFilter(parsed)) {
			return Result.err(`invalid filter: ${raw}`);
		}
		filters.push(parsed);
	}
	return Result.ok(filters);
};

export const describeNotification = (n: PoolNotification): string | undefined => {
	switch (n.type) {
		case "status":
			return `${n.relay}: ${n.from} -> ${n.to}`;
		case "notice":
			return `${n.relay}: NOTICE ${n.message}`;
		case "closed":
			return `${n.relay}: subscription ${n.subId} closed by relay: ${n.message}`;
		case "protocol-error":
		case "transport-error":
			return `${n.relay}: ${n.type}: ${n.message}`;
		case "reconciliation-abort":
			return `${n.relay}: reconciliation ${n.sessionId} aborted: ${n.reason}`;
		case "consumer-overflow":
			return `${n.stream} consumer "${n.consumer}" overflowed (dropped: ${n.dropped})`;
		case "auth":
		case "eose":
			return undefined;
	}
};

export interface SignalSource {
	once(signal: NodeJS.Signals, listener: () => void): unknown;
	off(signal: NodeJS.Signals, listener: () => void): unknown;
}

const shutdownSignals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

/**
 * Shuts the pool down on SIGINT / SIGTERM, whatever it is busy with. `interrupted` resolves once
 * the shutdown has completed.
 */
export const shutDownOnSignals = (
	pool: RelayPool,
	source: SignalSource = process,
): { interrupted: Promise<void>; dispose: () => void } => {
	let onSignal: () => void = () => {};
	const interrupted = new Promise<void>((resolve) => {
		onSignal = () => {
			console.error("[multipool] interrupted, shutting down...");
			pool.shutdown().then(resolve, (err: unknown) => {
				console.error("[multipool] shutdown failed:", err);
				resolve();
			});
		};
	});
	for (const signal of shutdownSignals) {
		source.once(signal, onSignal);
	}
	return {
		interrupted,
		dispose: () => {
			for (const signal of shutdownSignals) {
				source.off(signal, onSignal);
			}
		},
	};
};

export const main = async (): Promise<void> => {
	const j = jack({ envPrefix: "MULTIPOOL" })
		.optList({
			relay: { description: "relay to connect to (repeatable)", short: "r", hint: "url" },
			filter: { description: "filter as JSON (repeatable)", short: "f", hint: "json" },
		})
		.opt({
			direction: { description: "direction of --sync: down, up or both", default: "down", hint: "dir" },
		})
		.num({
			timeout: { description: "seconds to wait for relays", default: 10, short: "t", hint: "seconds" },
		})
		.flag({
			sync: { description: "reconcile with the relays (NIP-77) instead of a plain query", default: false },
			follow: { description: "keep the subscription open until interrupted", default: false },
			help: { description: "show help", default: false },
		});

	const args = j.parse(process.argv);
	if (args.values.help) {
		console.log(j.usage());
		return;
	}

	const relays = args.values.relay ?? [];
	if (relays.length === 0) {
		console.error("at least one --relay is required");
		process.exitCode = 1;
		return;
	}
	const filters = parseFilterArgs(args.values.filter ?? []);
	if (!filters.ok) {
		console.error(filters.err);
		process.exitCode = 1;
		return;
	}
	const direction = args.values.direction ?? "down";
	if (!isDirection(direction)) {
		console.error(`invalid direction: ${direction}`);
		process.exitCode = 1;
		return;
	}
	const timeoutMs = (args.values.timeout ?? 10) * 1000;

	const store = new MemoryEventStore();
	const pool = new RelayPool({ store, relayDefaults: { connectTimeoutMs: timeoutMs } });
	try {
		for (const url of relays) {
			pool.addRelay(url);
		}
	} catch (err) {
		if (err instanceof PoolError) {
			console.error(err.message);
			process.exitCode = 1;
			await pool.shutdown();
			return;
		}
		throw err;
	}

	const printing = (async () => {
		for await (const { event } of pool.events("stdout")) {
			process.stdout.write(`${JSON.stringify(event)}\n`);
		}
	})();
	const reporting = (async () => {
		for await (const n of pool.notifications("stderr")) {
			const line = describeNotification(n);
			if (line !== undefined) {
				console.error(`[multipool] ${line}`);
			}
		}
	})();

	const signals = shutDownOnSignals(pool);
	try {
		await pool.connect();
		if (args.values.sync === true) {
			for (const filter of filters.val) {
				if (pool.isShutDown) {
					break;
				}
				const reports = await pool.sync(filter, { direction, fallback: true, fetchTimeoutMs: timeoutMs });
				for (const [relay, r] of reports) {
					console.error(
						`[multipool] ${relay}: sync ${r.session.status}${r.fellBack ? " (fell back to REQ)" : ""}, need: ${r.session.need.length}, have: ${r.session.have.length}, received: ${r.received}, sent: ${r.sent}`,
					);
				}
			}
		} else if (args.values.follow === true) {
			if (!pool.isShutDown) {
				pool.subscribe(filters.val);
			}
			await signals.interrupted;
		} else if (!pool.isShutDown) {
			await pool.fetchEvents(filters.val, { timeoutMs });
		}
	} finally {
		signals.dispose();
	}

	await pool.shutdown();
	await Promise.all([printing, reporting]);
};
