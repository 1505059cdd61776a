export type BackoffOptions = {
	/** delay before the first retry, and the delay after a successful connection resets the curve */
	minDelayMs?: number;
	maxDelayMs?: number;
	multiplier?: number;
	/** fraction of the delay that is randomized away: the delay is drawn from `[base * (1 - jitter), base]` */
	jitter?: number;
	random?: () => number;
};

export const defaultBackoffOptions: Required<BackoffOptions> = {
	minDelayMs: 5_000,
	maxDelayMs: 60_000,
	multiplier: 2,
	jitter: 0.25,
	random: Math.random,
};

/**
 * Exponential backoff with jitter, capped at `maxDelayMs`.
 */
export class Backoff {
	#opts: Required<BackoffOptions>;
	#attempts = 0;

	constructor(opts: BackoffOptions = {}) {
		const merged = { ...defaultBackoffOptions, ...opts };
		if (merged.minDelayMs < 0 || merged.maxDelayMs < merged.minDelayMs) {
			throw new RangeError(`invalid backoff range: [${merged.minDelayMs}, ${merged.maxDelayMs}]`);
		}
		if (merged.multiplier < 1) {
			throw new RangeError(`backoff multiplier must be >= 1: ${merged.multiplier}`);
		}
		if (merged.jitter < 0 || merged.jitter > 1) {
			throw new RangeError(`backoff jitter must be within [0, 1]: ${merged.jitter}`);
		}
		this.#opts = merged;
	}

	get attempts(): number {
		return this.#attempts;
	}

	// delay for the next attempt, without jitter
	peekBase(): number {
		const { minDelayMs, maxDelayMs, multiplier } = this.#opts;
		return Math.min(maxDelayMs, minDelayMs * multiplier ** this.#attempts);
	}

	next(): number {
		const base = this.peekBase();
		this.#attempts++;
		const delay = base - base * this.#opts.jitter * this.#opts.random();
		return Math.round(Math.min(this.#opts.maxDelayMs, delay));
	}

	reset(): void {
		this.#attempts = 0;
	}
}
