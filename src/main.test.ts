import { EventEmitter } from "node:events";

import { describe, expect, test } from "vitest";

import { describeNotification, parseFilterArgs, shutDownOnSignals } from "./main";
import { RelayPool } from "./pool";

describe("parseFilterArgs", () => {
	test("no filter means everything", () => {
		expect(parseFilterArgs([])).toEqual({ ok: true, val: [{}] });
	});

	test("each argument is one filter", () => {
		expect(parseFilterArgs(['{"kinds":[1],"limit":10}', '{"#t":["nostr"]}'])).toEqual({
			ok: true,
			val: [{ kinds: [1], limit: 10 }, { "#t": ["nostr"] }],
		});
	});

	test("rejects what is not a filter", () => {
		expect(parseFilterArgs(["{kinds:1}"])).toEqual({ ok: false, err: "filter is not a JSON: {kinds:1}" });
		expect(parseFilterArgs(['{"kinds":"1"}'])).toEqual({ ok: false, err: 'invalid filter: {"kinds":"1"}' });
	});
});

describe("describeNotification", () => {
	test("formats diagnostics worth showing", () => {
		expect(describeNotification({ type: "status", relay: "wss://a.example.com", from: "connecting", to: "connected" })).toBe(
			"wss://a.example.com: connecting -> connected",
		);
		expect(
			describeNotification({ type: "transport-error", relay: "wss://a.example.com", message: "connection reset" }),
		).toBe("wss://a.example.com: transport-error: connection reset");
	});

	test("skips routine ones", () => {
		expect(describeNotification({ type: "eose", relay: "wss://a.example.com", subId: "sub:1" })).toBeUndefined();
	});
});

describe("shutDownOnSignals", () => {
	test.each(["SIGINT", "SIGTERM"])("%s shuts the pool down", async (signal) => {
		const pool = new RelayPool();
		const signals = new EventEmitter();
		const { interrupted } = shutDownOnSignals(pool, signals);

		signals.emit(signal);
		await interrupted;
		expect(pool.isShutDown).toBe(true);
	});

	test("signals after dispose are left alone", () => {
		const pool = new RelayPool();
		const signals = new EventEmitter();
		shutDownOnSignals(pool, signals).dispose();

		signals.emit("SIGINT");
		expect(pool.isShutDown).toBe(false);
		expect(signals.listenerCount("SIGINT")).toBe(0);
	});
});
