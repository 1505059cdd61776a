import { Result } from "./types";

export type RelayUrlError = "invalid-url" | "unsupported-scheme" | "credentials-not-allowed";

const schemeRewrites: Record<string, string> = {
	"ws:": "ws:",
	"wss:": "wss:",
	"http:": "ws:",
	"https:": "wss:",
};

/**
 * Normalizes a relay URL so that equal endpoints compare equal:
 * lowercase scheme and host, no default port, no hash, sorted query, no trailing slash.
 * `http(s)` URLs are taken as `ws(s)`. URLs carrying credentials (`user:pass@`) are rejected.
 */
export const normalizeRelayUrl = (raw: string): Result<string, RelayUrlError> => {
	let url: URL;
	try {
		url = new URL(raw.trim());
	} catch {
		return Result.err("invalid-url");
	}
	const scheme = schemeRewrites[url.protocol];
	if (scheme === undefined) {
		return Result.err("unsupported-scheme");
	}
	if (url.hostname === "") {
		return Result.err("invalid-url");
	}
	if (url.username !== "" || url.password !== "") {
		return Result.err("credentials-not-allowed");
	}

	url.hash = "";
	url.searchParams.sort();
	const path = url.pathname.replace(/\/+/g, "/").replace(/\/$/, "");
	const port = url.port === "" || isDefaultPort(scheme, url.port) ? "" : `:${url.port}`;

	return Result.ok(`${scheme}//${url.hostname}${port}${path}${url.search}`);
};

const isDefaultPort = (scheme: string, port: string): boolean =>
	(scheme === "ws:" && port === "80") || (scheme === "wss:" && port === "443");
