import type { NostrEvent } from "nostr-tools/core";

export type { NostrEvent };

const regexp32BytesHexStr = /^[a-f0-9]{64}$/;
const regexp64BytesHexStr = /^[a-f0-9]{128}$/;

export const is32BytesHexStr = (s: string): boolean => regexp32BytesHexStr.test(s);
const is64BytesHexStr = (s: string): boolean => regexp64BytesHexStr.test(s);

export const isRecord = (v: unknown): v is Record<string, unknown> =>
	typeof v === "object" && v !== null && !Array.isArray(v);

// schema validation for events received from relays
export const isNostrEvent = (raw: unknown): raw is NostrEvent => {
	if (!isRecord(raw)) {
		return false;
	}

	// id: 32-bytes lowercase hex-encoded sha256
	if (typeof raw["id"] !== "string" || !is32BytesHexStr(raw["id"])) {
		return false;
	}
	// pubkey: 32-bytes lowercase hex-encoded public key
	if (typeof raw["pubkey"] !== "string" || !is32BytesHexStr(raw["pubkey"])) {
		return false;
	}
	// created_at: unix timestamp in seconds
	if (typeof raw["created_at"] !== "number" || !Number.isSafeInteger(raw["created_at"]) || raw["created_at"] < 0) {
		return false;
	}
	if (typeof raw["kind"] !== "number" || !Number.isInteger(raw["kind"])) {
		return false;
	}
	// tags: array of arrays of strings
	const tags = raw["tags"];
	if (!Array.isArray(tags) || tags.some((tag) => !Array.isArray(tag) || tag.some((e) => typeof e !== "string"))) {
		return false;
	}
	if (typeof raw["content"] !== "string") {
		return false;
	}
	// sig: 64-bytes hex of the schnorr signature
	if (typeof raw["sig"] !== "string" || !is64BytesHexStr(raw["sig"])) {
		return false;
	}
	return true;
};

export const getTagValuesByName = (ev: NostrEvent, tagName: string): string[] =>
	ev.tags.filter((t) => t[0] === tagName).map((t) => t[1] ?? "");

export type EventHandling = "regular" | "replaceable" | "addressable" | "ephemeral";

export const getEventHandling = (ev: NostrEvent): EventHandling => {
	if (ev.kind === 0 || ev.kind === 3 || (10000 <= ev.kind && ev.kind < 20000)) {
		return "replaceable";
	}
	if (20000 <= ev.kind && ev.kind < 30000) {
		return "ephemeral";
	}
	if (30000 <= ev.kind && ev.kind < 40000) {
		return "addressable";
	}
	return "regular";
};

/**
 * Address under which a replaceable or addressable event supersedes older versions
 * (`<kind>:<pubkey>:<d-tag>`). `undefined` for other events.
 */
export const eventAddress = (ev: NostrEvent): string | undefined => {
	switch (getEventHandling(ev)) {
		case "replaceable":
			return `${ev.kind}:${ev.pubkey}:`;
		case "addressable":
			return `${ev.kind}:${ev.pubkey}:${getTagValuesByName(ev, "d")[0] ?? ""}`;
		default:
			return undefined;
	}
};

// returns whether e1 should be sorted before or after e2.
// - negative ... e1 is "older" than e2
// - positive ... e1 is "newer" than e2
// - 0        ... e1 and e2 are the same event
//
// for the same timestamp, the event with the lowest id counts as the newer one (NIP-01).
export const compareEvents = (e1: NostrEvent, e2: NostrEvent): number => {
	const caDiff = e1.created_at - e2.created_at;
	if (caDiff !== 0) {
		return caDiff;
	}
	if (e1.id < e2.id) {
		return 1;
	}
	if (e1.id > e2.id) {
		return -1;
	}
	return 0;
};
