export type Result<T, E> =
	| {
			ok: true;
			val: T;
	  }
	| {
			ok: false;
			err: E;
	  };

export const Result = {
	ok<T>(val: T): Result<T, never> {
		return { ok: true, val };
	},
	err<E>(err: E): Result<never, E> {
		return { ok: false, err };
	},
};

/**
 * Relays an operation is routed to: an explicit list of relay URLs, or every relay in the pool
 * that has the flag relevant to the operation (`read` for subscriptions, `write` for publishes).
 */
export type RelayTarget = "all" | readonly string[];

export type Awaitable<T> = T | Promise<T>;
