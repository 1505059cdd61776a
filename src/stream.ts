export type SlowConsumerPolicy = "drop-oldest" | "disconnect";

export type BroadcasterOptions = {
	/** per-consumer buffer size */
	capacity?: number;
	policy?: SlowConsumerPolicy;
};

const defaultBroadcasterOptions: Required<BroadcasterOptions> = {
	capacity: 4096,
	policy: "drop-oldest",
};

export type OverflowInfo = {
	consumer: string;
	policy: SlowConsumerPolicy;
	/** total number of items this consumer has lost so far */
	dropped: number;
};

/**
 * Fans items out to any number of consumers without ever waiting on them.
 *
 * Each consumer owns a bounded buffer. When a consumer falls `capacity` items behind, the
 * configured policy applies: `drop-oldest` discards its oldest buffered item, `disconnect` ends
 * its iteration. Either way `onOverflow` is told about it.
 */
export class Broadcaster<T> {
	#options: Required<BroadcasterOptions>;
	#onOverflow: (info: OverflowInfo) => void;

	#consumers = new Set<StreamConsumer<T>>();
	#nextConsumerSeq = 0;
	#closed = false;

	constructor(opts: BroadcasterOptions = {}, onOverflow: (info: OverflowInfo) => void = () => {}) {
		this.#options = { ...defaultBroadcasterOptions, ...opts };
		if (!Number.isInteger(this.#options.capacity) || this.#options.capacity <= 0) {
			throw new RangeError(`capacity must be a positive integer: ${this.#options.capacity}`);
		}
		this.#onOverflow = onOverflow;
	}

	get closed(): boolean {
		return this.#closed;
	}

	get consumerCount(): number {
		return this.#consumers.size;
	}

	subscribe(name?: string): StreamConsumer<T> {
		const consumer = new StreamConsumer<T>(
			name ?? `consumer-${++this.#nextConsumerSeq}`,
			this.#options.capacity,
			(c) => this.#consumers.delete(c),
		);
		if (this.#closed) {
			consumer.end();
			return consumer;
		}
		this.#consumers.add(consumer);
		return consumer;
	}

	push(item: T): void {
		if (this.#closed) {
			return;
		}
		for (const consumer of [...this.#consumers]) {
			if (consumer.offer(item)) {
				continue;
			}
			// buffer is full
			switch (this.#options.policy) {
				case "drop-oldest":
					consumer.dropOldestAndOffer(item);
					break;
				case "disconnect":
					consumer.disconnect();
					break;
			}
			this.#onOverflow({ consumer: consumer.name, policy: this.#options.policy, dropped: consumer.dropped });
		}
	}

	close(): void {
		if (this.#closed) {
			return;
		}
		this.#closed = true;
		for (const consumer of [...this.#consumers]) {
			consumer.end();
		}
		this.#consumers.clear();
	}
}

type Waiter<T> = (res: IteratorResult<T, undefined>) => void;

/**
 * Async-iterable view of a {@link Broadcaster}. Items pushed before the consumer is drained wait
 * in its buffer; buffered items remain readable after the broadcaster closes.
 */
export class StreamConsumer<T> implements AsyncIterableIterator<T> {
	readonly name: string;
	#capacity: number;
	#detach: (c: StreamConsumer<T>) => void;

	#buffer: T[] = [];
	#waiters: Waiter<T>[] = [];
	#ended = false;
	#disconnected = false;
	#dropped = 0;

	constructor(name: string, capacity: number, detach: (c: StreamConsumer<T>) => void) {
		this.name = name;
		this.#capacity = capacity;
		this.#detach = detach;
	}

	/** number of items lost to overflow */
	get dropped(): number {
		return this.#dropped;
	}

	/** whether this consumer was cut off for falling behind */
	get disconnected(): boolean {
		return this.#disconnected;
	}

	get buffered(): number {
		return this.#buffer.length;
	}

	// returns false if the buffer is full
	offer(item: T): boolean {
		if (this.#ended) {
			return true;
		}
		const waiter = this.#waiters.shift();
		if (waiter !== undefined) {
			waiter({ done: false, value: item });
			return true;
		}
		if (this.#buffer.length >= this.#capacity) {
			return false;
		}
		this.#buffer.push(item);
		return true;
	}

	dropOldestAndOffer(item: T): void {
		this.#buffer.shift();
		this.#dropped++;
		this.#buffer.push(item);
	}

	disconnect(): void {
		// what is already buffered stays readable; the overflowing item is lost
		this.#disconnected = true;
		this.#dropped++;
		this.end();
	}

	end(): void {
		if (this.#ended) {
			return;
		}
		this.#ended = true;
		this.#detach(this);
		for (const waiter of this.#waiters) {
			waiter({ done: true, value: undefined });
		}
		this.#waiters = [];
	}

	/** takes every buffered item without waiting */
	drain(): T[] {
		const items = this.#buffer;
		this.#buffer = [];
		return items;
	}

	next(): Promise<IteratorResult<T, undefined>> {
		const item = this.#buffer.shift();
		if (item !== undefined) {
			return Promise.resolve({ done: false, value: item });
		}
		if (this.#ended) {
			return Promise.resolve({ done: true, value: undefined });
		}
		return new Promise((resolve) => {
			this.#waiters.push(resolve);
		});
	}

	return(): Promise<IteratorResult<T, undefined>> {
		this.#buffer = [];
		this.end();
		return Promise.resolve({ done: true, value: undefined });
	}

	[Symbol.asyncIterator](): StreamConsumer<T> {
		return this;
	}
}
