import type { Filter } from "nostr-tools/filter";

import { isRecord } from "./event";

export type { Filter };

type TagQueryKey = `#${string}`;

// checks if `s` has the pattern of tag query key (e.g. "#" + single letter)
export const isTagQueryKey = (s: string): s is TagQueryKey => {
	return s.startsWith("#") && s.length === 2;
};

const isStringArray = (v: unknown): v is string[] => Array.isArray(v) && v.every((e) => typeof e === "string");

export const isReqFilter = (raw: unknown): raw is Filter => {
	if (!isRecord(raw)) {
		return false;
	}
	if ("ids" in raw && !isStringArray(raw["ids"])) {
		return false;
	}
	if ("kinds" in raw && !(Array.isArray(raw["kinds"]) && raw["kinds"].every((k) => typeof k === "number"))) {
		return false;
	}
	if ("authors" in raw && !isStringArray(raw["authors"])) {
		return false;
	}
	if ("since" in raw && typeof raw["since"] !== "number") {
		return false;
	}
	if ("until" in raw && typeof raw["until"] !== "number") {
		return false;
	}
	if ("limit" in raw && typeof raw["limit"] !== "number") {
		return false;
	}
	if ("search" in raw && typeof raw["search"] !== "string") {
		return false;
	}
	for (const tqk of Object.keys(raw).filter((k) => isTagQueryKey(k))) {
		if (!isStringArray(raw[tqk])) {
			return false;
		}
	}
	return true;
};

export const isNeverMatchingFilter = (f: Filter): boolean => {
	if (f.since !== undefined && f.until !== undefined && f.since > f.until) {
		return true;
	}
	if (f.ids !== undefined && f.ids.length === 0) {
		return true;
	}
	if (f.authors !== undefined && f.authors.length === 0) {
		return true;
	}
	if (f.kinds !== undefined && f.kinds.length === 0) {
		return true;
	}
	for (const tqk of Object.keys(f).filter(isTagQueryKey)) {
		const tq = f[tqk];
		if (tq !== undefined && tq.length === 0) {
			return true;
		}
	}
	return false;
};

// filter for a set reconciliation range: the whole matching set, regardless of `limit`
export const withoutLimit = (f: Filter): Filter => {
	const { limit: _, ...rest } = f;
	return rest;
};

// splits ids into `{ ids }` filters of at most `batchSize` entries
export const idBatchFilters = (ids: readonly string[], batchSize: number): Filter[] => {
	const filters: Filter[] = [];
	for (let i = 0; i < ids.length; i += batchSize) {
		filters.push({ ids: ids.slice(i, i + batchSize) });
	}
	return filters;
};
