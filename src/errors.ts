export type PoolErrorCode =
	| "invalid-relay-url"
	| "unknown-relay"
	| "unknown-subscription"
	| "closed-subscription"
	| "pool-shutdown";

/**
 * Base class of errors thrown synchronously for misuse of the pool API.
 *
 * Failures of individual relays are never thrown: they are reported in per-relay outcomes and
 * through the notification stream.
 */
export class PoolError extends Error {
	readonly code: PoolErrorCode;

	constructor(code: PoolErrorCode, message: string) {
		super(message);
		this.name = new.target.name;
		this.code = code;
	}
}

export class InvalidRelayUrlError extends PoolError {
	constructor(readonly url: string, reason: string) {
		super("invalid-relay-url", `invalid relay url "${url}": ${reason}`);
	}
}

export class UnknownRelayError extends PoolError {
	constructor(readonly url: string) {
		super("unknown-relay", `relay is not in the pool: ${url}`);
	}
}

export class UnknownSubscriptionError extends PoolError {
	constructor(readonly subId: string) {
		super("unknown-subscription", `no such subscription: ${subId}`);
	}
}

export class ClosedSubscriptionError extends PoolError {
	constructor(readonly subId: string) {
		super("closed-subscription", `subscription is already closed: ${subId}`);
	}
}

export class PoolShutdownError extends PoolError {
	constructor() {
		super("pool-shutdown", "relay pool has been shut down");
	}
}
