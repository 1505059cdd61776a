import type { NostrEvent } from "nostr-tools/core";
import type { Filter } from "nostr-tools/filter";

import { isNostrEvent } from "./event";
import { isReqFilter } from "./filter";
import { Result } from "./types";

/* client to relay (C2R) messages */
export type C2RMessage =
	| [type: "EVENT", ev: NostrEvent]
	| [type: "REQ", subId: string, ...filters: Filter[]]
	| [type: "CLOSE", subId: string]
	| [type: "NEG-OPEN", subId: string, filter: Filter, initialMessage: string]
	| [type: "NEG-MSG", subId: string, message: string]
	| [type: "NEG-CLOSE", subId: string];

export type C2RMessageType = C2RMessage[0];

/* relay to client (R2C) message parsing */
const r2cMsgNames = ["EVENT", "OK", "EOSE", "CLOSED", "NOTICE", "AUTH", "COUNT", "NEG-MSG", "NEG-ERR"] as const;
type R2CMsgName = (typeof r2cMsgNames)[number];

const isR2CMsgName = (s: string): s is R2CMsgName => (r2cMsgNames as readonly string[]).includes(s);

const supportedR2CMsgNames = ["EVENT", "OK", "EOSE", "CLOSED", "NOTICE", "AUTH", "NEG-MSG", "NEG-ERR"] as const;
type SupportedR2CMsgName = (typeof supportedR2CMsgNames)[number];

const isSupportedR2CMsgName = (s: R2CMsgName): s is SupportedR2CMsgName =>
	(supportedR2CMsgNames as readonly string[]).includes(s);

export type R2CMessage =
	| [type: "EVENT", subId: string, ev: NostrEvent]
	| [type: "OK", eventId: string, ok: boolean, message: string]
	| [type: "EOSE", subId: string]
	| [type: "CLOSED", subId: string, message: string]
	| [type: "NOTICE", message: string]
	| [type: "AUTH", challenge: string]
	| [type: "NEG-MSG", subId: string, message: string]
	| [type: "NEG-ERR", subId: string, reason: string];

export type ParseR2CMessageError = { errType: "malformed"; reason: string } | { errType: "unsupported"; msgType: string };

const malformed = (reason: string) => Result.err<ParseR2CMessageError>({ errType: "malformed", reason });
const parsedR2C = (msg: R2CMessage) => Result.ok(msg);

export const parseR2CMessage = (s: string): Result<R2CMessage, ParseR2CMessageError> => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(s);
	} catch {
		return malformed("not a JSON");
	}
	if (!Array.isArray(parsed)) {
		return malformed("not an array");
	}
	const msg: unknown[] = parsed;
	const [msgType] = msg;
	if (typeof msgType !== "string" || !isR2CMsgName(msgType)) {
		return malformed("unknown message type");
	}
	if (!isSupportedR2CMsgName(msgType)) {
		return Result.err({ errType: "unsupported", msgType });
	}

	switch (msgType) {
		case "EVENT": {
			const [, subId, ev] = msg;
			if (msg.length !== 3 || typeof subId !== "string") {
				return malformed("EVENT: expected subscription id and event");
			}
			if (!isNostrEvent(ev)) {
				return malformed("EVENT: invalid event structure");
			}
			return parsedR2C(["EVENT", subId, ev]);
		}
		case "OK": {
			const [, eventId, ok, message] = msg;
			if (msg.length < 3 || typeof eventId !== "string" || typeof ok !== "boolean") {
				return malformed("OK: expected event id and boolean");
			}
			// some relays omit the message part
			return parsedR2C(["OK", eventId, ok, typeof message === "string" ? message : ""]);
		}
		case "EOSE": {
			const [, subId] = msg;
			if (typeof subId !== "string") {
				return malformed("EOSE: expected subscription id");
			}
			return parsedR2C(["EOSE", subId]);
		}
		case "CLOSED": {
			const [, subId, message] = msg;
			if (typeof subId !== "string") {
				return malformed("CLOSED: expected subscription id");
			}
			return parsedR2C(["CLOSED", subId, typeof message === "string" ? message : ""]);
		}
		case "NOTICE": {
			const [, message] = msg;
			if (typeof message !== "string") {
				return malformed("NOTICE: expected message");
			}
			return parsedR2C(["NOTICE", message]);
		}
		case "AUTH": {
			const [, challenge] = msg;
			if (typeof challenge !== "string") {
				return malformed("AUTH: expected challenge");
			}
			return parsedR2C(["AUTH", challenge]);
		}
		case "NEG-MSG": {
			const [, subId, payload] = msg;
			if (msg.length !== 3 || typeof subId !== "string" || typeof payload !== "string") {
				return malformed("NEG-MSG: expected subscription id and hex payload");
			}
			return parsedR2C(["NEG-MSG", subId, payload]);
		}
		case "NEG-ERR": {
			const [, subId, reason] = msg;
			if (msg.length !== 3 || typeof subId !== "string" || typeof reason !== "string") {
				return malformed("NEG-ERR: expected subscription id and reason");
			}
			return parsedR2C(["NEG-ERR", subId, reason]);
		}
	}
};

/**
 * Encodes outbound messages and decodes inbound ones.
 * The pool never looks at raw frames, so alternative encodings can be plugged in.
 */
export interface IMessageCodec {
	encode(msg: C2RMessage): string;
	decode(raw: string): Result<R2CMessage, ParseR2CMessageError>;
}

export const jsonCodec: IMessageCodec = {
	encode: (msg) => JSON.stringify(msg),
	decode: parseR2CMessage,
};

export const describeParseError = (err: ParseR2CMessageError): string => {
	switch (err.errType) {
		case "malformed":
			return `malformed message: ${err.reason}`;
		case "unsupported":
			return `unsupported message type: ${err.msgType}`;
	}
};

/* C2R parsing: needed only by in-process relay stand-ins */
const parsedC2R = (msg: C2RMessage) => Result.ok(msg);

export const parseC2RMessage = (s: string): Result<C2RMessage, string> => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(s);
	} catch {
		return Result.err("not a JSON");
	}
	if (!Array.isArray(parsed)) {
		return Result.err("not an array");
	}
	const msg: unknown[] = parsed;
	const [msgType, second, third, fourth] = msg;
	switch (msgType) {
		case "EVENT":
			return isNostrEvent(second) ? parsedC2R(["EVENT", second]) : Result.err("EVENT: invalid event");
		case "REQ": {
			const filters = msg.slice(2);
			if (typeof second !== "string" || !filters.every(isReqFilter)) {
				return Result.err("REQ: invalid");
			}
			return parsedC2R(["REQ", second, ...filters]);
		}
		case "CLOSE":
			return typeof second === "string" ? parsedC2R(["CLOSE", second]) : Result.err("CLOSE: invalid");
		case "NEG-OPEN":
			if (typeof second !== "string" || !isReqFilter(third) || typeof fourth !== "string") {
				return Result.err("NEG-OPEN: invalid");
			}
			return parsedC2R(["NEG-OPEN", second, third, fourth]);
		case "NEG-MSG":
			if (typeof second !== "string" || typeof third !== "string") {
				return Result.err("NEG-MSG: invalid");
			}
			return parsedC2R(["NEG-MSG", second, third]);
		case "NEG-CLOSE":
			return typeof second === "string" ? parsedC2R(["NEG-CLOSE", second]) : Result.err("NEG-CLOSE: invalid");
		default:
			return Result.err(`unknown message type: ${String(msgType)}`);
	}
};
