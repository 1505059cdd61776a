import { describe, expect, test } from "vitest";

import { describeParseError, jsonCodec, parseC2RMessage, parseR2CMessage } from "./message";
import { hexId, unsignedEvent } from "./testing/helpers";

describe("parseR2CMessage", () => {
	const ev = unsignedEvent(hexId(1));

	test("EVENT", () => {
		expect(parseR2CMessage(JSON.stringify(["EVENT", "sub:1", ev]))).toEqual({ ok: true, val: ["EVENT", "sub:1", ev] });
	});

	test("EVENT with a malformed event", () => {
		const bad = { ...ev, id: "not-hex" };
		expect(parseR2CMessage(JSON.stringify(["EVENT", "sub:1", bad]))).toEqual({
			ok: false,
			err: { errType: "malformed", reason: "EVENT: invalid event structure" },
		});
	});

	test("EVENT with a created_at before the epoch", () => {
		const bad = { ...ev, created_at: -5 };
		expect(parseR2CMessage(JSON.stringify(["EVENT", "sub:1", bad]))).toEqual({
			ok: false,
			err: { errType: "malformed", reason: "EVENT: invalid event structure" },
		});
	});

	test("OK without a message part", () => {
		expect(parseR2CMessage(`["OK","${ev.id}",true]`)).toEqual({ ok: true, val: ["OK", ev.id, true, ""] });
	});

	test("EOSE, CLOSED, NOTICE, AUTH", () => {
		expect(parseR2CMessage('["EOSE","s"]')).toEqual({ ok: true, val: ["EOSE", "s"] });
		expect(parseR2CMessage('["CLOSED","s","error: shutting down"]')).toEqual({
			ok: true,
			val: ["CLOSED", "s", "error: shutting down"],
		});
		expect(parseR2CMessage('["NOTICE","hello"]')).toEqual({ ok: true, val: ["NOTICE", "hello"] });
		expect(parseR2CMessage('["AUTH","challenge"]')).toEqual({ ok: true, val: ["AUTH", "challenge"] });
	});

	test("NEG-MSG and NEG-ERR", () => {
		expect(parseR2CMessage('["NEG-MSG","neg:1","61"]')).toEqual({ ok: true, val: ["NEG-MSG", "neg:1", "61"] });
		expect(parseR2CMessage('["NEG-ERR","neg:1","blocked"]')).toEqual({ ok: true, val: ["NEG-ERR", "neg:1", "blocked"] });
	});

	test("COUNT is known but unsupported", () => {
		expect(parseR2CMessage('["COUNT","s",{"count":1}]')).toEqual({
			ok: false,
			err: { errType: "unsupported", msgType: "COUNT" },
		});
	});

	test("malformed input", () => {
		expect(parseR2CMessage("not json")).toEqual({ ok: false, err: { errType: "malformed", reason: "not a JSON" } });
		expect(parseR2CMessage('{"a":1}')).toEqual({ ok: false, err: { errType: "malformed", reason: "not an array" } });
		expect(parseR2CMessage('["FOO"]')).toEqual({
			ok: false,
			err: { errType: "malformed", reason: "unknown message type" },
		});
		expect(parseR2CMessage('["EOSE"]')).toEqual({
			ok: false,
			err: { errType: "malformed", reason: "EOSE: expected subscription id" },
		});
	});
});

describe("describeParseError", () => {
	test("formats both kinds of errors", () => {
		expect(describeParseError({ errType: "malformed", reason: "not a JSON" })).toBe("malformed message: not a JSON");
		expect(describeParseError({ errType: "unsupported", msgType: "COUNT" })).toBe("unsupported message type: COUNT");
	});
});

describe("jsonCodec", () => {
	test("encodes client messages as JSON arrays", () => {
		expect(jsonCodec.encode(["REQ", "sub:1", { kinds: [1] }, { authors: ["ab"] }])).toBe(
			'["REQ","sub:1",{"kinds":[1]},{"authors":["ab"]}]',
		);
		expect(jsonCodec.encode(["NEG-CLOSE", "neg:1"])).toBe('["NEG-CLOSE","neg:1"]');
	});
});

describe("parseC2RMessage", () => {
	test("parses what the codec encodes", () => {
		const raw = jsonCodec.encode(["NEG-OPEN", "neg:1", { kinds: [1] }, "6100"]);
		expect(parseC2RMessage(raw)).toEqual({ ok: true, val: ["NEG-OPEN", "neg:1", { kinds: [1] }, "6100"] });
	});

	test("rejects invalid filters", () => {
		expect(parseC2RMessage('["REQ","s",{"kinds":"1"}]')).toEqual({ ok: false, err: "REQ: invalid" });
	});
});
