import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

/*
 * Range-based set reconciliation (negentropy, protocol version 1), as carried by NIP-77.
 *
 * Both sides hold their items sorted by (timestamp, id). A message is a list of consecutive
 * ranges, each closed by an upper bound and summarized in one of three modes:
 *
 * - Skip: nothing to do for the range
 * - Fingerprint: 16-byte digest of the ids in the range (plus their count)
 * - IdList: the ids themselves
 *
 * A side whose fingerprint disagrees answers with a finer breakdown of that range. Small ranges
 * are sent as id lists, which settle them in one round trip.
 */

export const PROTOCOL_VERSION = 0x61;

const ID_SIZE = 32;
const FINGERPRINT_SIZE = 16;
const BUCKETS = 16;
// ranges smaller than this are sent as id lists instead of being split into buckets
const ID_LIST_THRESHOLD = BUCKETS * 2;

export const MAX_TIMESTAMP = Number.MAX_SAFE_INTEGER;

/** whether an item with this timestamp can be put in a {@link NegentropyStorage} */
export const isNegentropyTimestamp = (timestamp: number): boolean =>
	Number.isSafeInteger(timestamp) && timestamp >= 0 && timestamp < MAX_TIMESTAMP;

const Mode = {
	Skip: 0,
	Fingerprint: 1,
	IdList: 2,
} as const;

type Item = {
	timestamp: number;
	id: Uint8Array;
};

type Bound = {
	timestamp: number;
	idPrefix: Uint8Array;
};

const EMPTY = new Uint8Array(0);
const ZERO_BOUND: Bound = { timestamp: 0, idPrefix: EMPTY };
const INFINITY_BOUND: Bound = { timestamp: MAX_TIMESTAMP, idPrefix: EMPTY };

const compareBytes = (a: Uint8Array, b: Uint8Array): number => {
	const len = Math.min(a.length, b.length);
	for (let i = 0; i < len; i++) {
		const d = (a[i] ?? 0) - (b[i] ?? 0);
		if (d !== 0) {
			return d;
		}
	}
	return a.length - b.length;
};

const compareItems = (a: Item, b: Item): number =>
	a.timestamp !== b.timestamp ? a.timestamp - b.timestamp : compareBytes(a.id, b.id);

const compareItemToBound = (item: Item, bound: Bound): number =>
	item.timestamp !== bound.timestamp ? item.timestamp - bound.timestamp : compareBytes(item.id, bound.idPrefix);

const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean => compareBytes(a, b) === 0;

/* byte-level encoding */

export const encodeVarint = (n: number): number[] => {
	if (!Number.isSafeInteger(n) || n < 0) {
		throw new RangeError(`cannot encode ${n} as varint`);
	}
	if (n === 0) {
		return [0];
	}
	const digits: number[] = [];
	let rest = n;
	while (rest > 0) {
		digits.push(rest % 128);
		rest = Math.floor(rest / 128);
	}
	digits.reverse();
	// high bit marks "more bytes follow"
	return digits.map((d, i) => (i < digits.length - 1 ? d | 0x80 : d));
};

class ByteWriter {
	#bytes: number[] = [];

	get length(): number {
		return this.#bytes.length;
	}

	byte(b: number): void {
		this.#bytes.push(b);
	}

	bytes(bs: Uint8Array): void {
		for (const b of bs) {
			this.#bytes.push(b);
		}
	}

	varint(n: number): void {
		for (const b of encodeVarint(n)) {
			this.#bytes.push(b);
		}
	}

	toBytes(): Uint8Array {
		return Uint8Array.from(this.#bytes);
	}
}

export class NegentropyDecodeError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "NegentropyDecodeError";
	}
}

class ByteReader {
	#buf: Uint8Array;
	#pos = 0;

	constructor(buf: Uint8Array) {
		this.#buf = buf;
	}

	get remaining(): number {
		return this.#buf.length - this.#pos;
	}

	byte(): number {
		const b = this.#buf[this.#pos];
		if (b === undefined) {
			throw new NegentropyDecodeError("unexpected end of message");
		}
		this.#pos++;
		return b;
	}

	bytes(n: number): Uint8Array {
		if (this.remaining < n) {
			throw new NegentropyDecodeError("unexpected end of message");
		}
		const bs = this.#buf.slice(this.#pos, this.#pos + n);
		this.#pos += n;
		return bs;
	}

	varint(): number {
		let res = 0;
		while (true) {
			const b = this.byte();
			res = res * 128 + (b & 0x7f);
			if (res > Number.MAX_SAFE_INTEGER) {
				throw new NegentropyDecodeError("varint overflow");
			}
			if ((b & 0x80) === 0) {
				return res;
			}
		}
	}
}

/* fingerprints */

// sum of ids as 256-bit little-endian integers, mod 2^256
class Accumulator {
	#sum = new Uint8Array(ID_SIZE);

	add(id: Uint8Array): void {
		let carry = 0;
		for (let i = 0; i < ID_SIZE; i++) {
			const s = (this.#sum[i] ?? 0) + (id[i] ?? 0) + carry;
			this.#sum[i] = s & 0xff;
			carry = s >> 8;
		}
	}

	fingerprint(count: number): Uint8Array {
		const input = new Uint8Array([...this.#sum, ...encodeVarint(count)]);
		return sha256(input).subarray(0, FINGERPRINT_SIZE);
	}
}

/**
 * Sorted set of (timestamp, id) items one side of a reconciliation holds.
 * Insert everything, then {@link seal} before handing it to {@link Negentropy}.
 */
export class NegentropyStorage {
	#items: Item[] = [];
	#sealed = false;

	get size(): number {
		return this.#items.length;
	}

	get sealed(): boolean {
		return this.#sealed;
	}

	insert(timestamp: number, id: string | Uint8Array): void {
		if (this.#sealed) {
			throw new Error("storage already sealed");
		}
		if (!isNegentropyTimestamp(timestamp)) {
			throw new RangeError(`invalid timestamp: ${timestamp}`);
		}
		const idBytes = typeof id === "string" ? hexToBytes(id) : id;
		if (idBytes.length !== ID_SIZE) {
			throw new RangeError(`id must be ${ID_SIZE} bytes`);
		}
		this.#items.push({ timestamp, id: idBytes });
	}

	seal(): void {
		if (this.#sealed) {
			throw new Error("storage already sealed");
		}
		this.#sealed = true;
		this.#items.sort(compareItems);
		// drop duplicate items
		this.#items = this.#items.filter((item, i, items) => {
			const prev = items[i - 1];
			return prev === undefined || compareItems(prev, item) !== 0;
		});
	}

	item(i: number): Item {
		const item = this.#items[i];
		if (item === undefined) {
			throw new RangeError(`item index out of range: ${i}`);
		}
		return item;
	}

	// index of the first item in [begin, end) that is >= bound, or `end` if there is none
	findLowerBound(begin: number, end: number, bound: Bound): number {
		let [lo, hi] = [begin, end];
		while (lo < hi) {
			const mid = Math.floor((lo + hi) / 2);
			if (compareItemToBound(this.item(mid), bound) < 0) {
				lo = mid + 1;
			} else {
				hi = mid;
			}
		}
		return lo;
	}

	fingerprint(begin: number, end: number): Uint8Array {
		const acc = new Accumulator();
		for (let i = begin; i < end; i++) {
			acc.add(this.item(i).id);
		}
		return acc.fingerprint(end - begin);
	}
}

type IncomingRange =
	| { upperBound: Bound; mode: typeof Mode.Skip }
	| { upperBound: Bound; mode: typeof Mode.Fingerprint; fingerprint: Uint8Array }
	| { upperBound: Bound; mode: typeof Mode.IdList; ids: Uint8Array[] };

export type ReconcileStep = {
	/** next message to send (hex); `undefined` once the initiator has nothing left to ask */
	output: string | undefined;
	/** ids this side has and the other side lacks (initiator only) */
	have: string[];
	/** ids the other side has and this side lacks (initiator only) */
	need: string[];
};

/**
 * One side of a reconciliation exchange.
 *
 * The initiator calls {@link initiate} once and feeds every reply to {@link reconcile} until
 * it returns no output. A responder only ever calls {@link reconcile}.
 */
export class Negentropy {
	#storage: NegentropyStorage;
	#isInitiator = false;
	#lastTimestampIn = 0;
	#lastTimestampOut = 0;

	constructor(storage: NegentropyStorage) {
		if (!storage.sealed) {
			throw new Error("storage must be sealed");
		}
		this.#storage = storage;
	}

	get isInitiator(): boolean {
		return this.#isInitiator;
	}

	initiate(): string {
		if (this.#isInitiator) {
			throw new Error("already initiated");
		}
		this.#isInitiator = true;
		this.#lastTimestampOut = 0;

		const out = new ByteWriter();
		out.byte(PROTOCOL_VERSION);
		this.#splitRange(0, this.#storage.size, INFINITY_BOUND, out);
		return bytesToHex(out.toBytes());
	}

	reconcile(msgHex: string): ReconcileStep {
		let msg: Uint8Array;
		try {
			msg = hexToBytes(msgHex);
		} catch {
			throw new NegentropyDecodeError("message is not valid hex");
		}
		const reader = new ByteReader(msg);
		this.#lastTimestampIn = 0;
		this.#lastTimestampOut = 0;

		const out = new ByteWriter();
		out.byte(PROTOCOL_VERSION);

		const version = reader.byte();
		if (version !== PROTOCOL_VERSION) {
			if (this.#isInitiator) {
				throw new NegentropyDecodeError(`unsupported protocol version: 0x${version.toString(16)}`);
			}
			// a responder answers with its own version only
			return { output: bytesToHex(out.toBytes()), have: [], need: [] };
		}

		const queue = this.#decodeRanges(reader);
		const have: string[] = [];
		const need: string[] = [];

		let prevIndex = 0;
		let prevBound = ZERO_BOUND;
		let skip = false;
		const flushSkip = () => {
			if (skip) {
				skip = false;
				this.#encodeBound(prevBound, out);
				out.varint(Mode.Skip);
			}
		};

		for (const range of queue) {
			const lower = prevIndex;
			const upper = this.#storage.findLowerBound(prevIndex, this.#storage.size, range.upperBound);

			switch (range.mode) {
				case Mode.Skip: {
					skip = true;
					break;
				}
				case Mode.Fingerprint: {
					if (bytesEqual(range.fingerprint, this.#storage.fingerprint(lower, upper))) {
						skip = true;
					} else {
						flushSkip();
						this.#splitRange(lower, upper, range.upperBound, out);
					}
					break;
				}
				case Mode.IdList: {
					const theirs = new Set(range.ids.map((id) => bytesToHex(id)));
					for (let i = lower; i < upper; i++) {
						const id = bytesToHex(this.#storage.item(i).id);
						if (!theirs.delete(id) && this.#isInitiator) {
							have.push(id);
						}
					}
					if (this.#isInitiator) {
						skip = true;
						need.push(...theirs);
					} else {
						flushSkip();
						this.#encodeIdList(lower, upper, range.upperBound, out);
					}
					break;
				}
			}

			prevIndex = upper;
			prevBound = range.upperBound;
		}

		if (this.#isInitiator && out.length === 1) {
			return { output: undefined, have, need };
		}
		return { output: bytesToHex(out.toBytes()), have, need };
	}

	#decodeRanges(reader: ByteReader): IncomingRange[] {
		const ranges: IncomingRange[] = [];
		while (reader.remaining > 0) {
			const upperBound = this.#decodeBound(reader);
			const mode = reader.varint();
			switch (mode) {
				case Mode.Skip:
					ranges.push({ upperBound, mode: Mode.Skip });
					break;
				case Mode.Fingerprint:
					ranges.push({ upperBound, mode: Mode.Fingerprint, fingerprint: reader.bytes(FINGERPRINT_SIZE) });
					break;
				case Mode.IdList: {
					const numIds = reader.varint();
					const ids: Uint8Array[] = [];
					for (let i = 0; i < numIds; i++) {
						ids.push(reader.bytes(ID_SIZE));
					}
					ranges.push({ upperBound, mode: Mode.IdList, ids });
					break;
				}
				default:
					throw new NegentropyDecodeError(`unexpected mode: ${mode}`);
			}
		}
		return ranges;
	}

	#splitRange(lower: number, upper: number, upperBound: Bound, out: ByteWriter): void {
		const numItems = upper - lower;
		if (numItems < ID_LIST_THRESHOLD) {
			this.#encodeIdList(lower, upper, upperBound, out);
			return;
		}

		const itemsPerBucket = Math.floor(numItems / BUCKETS);
		const bucketsWithExtra = numItems % BUCKETS;
		let curr = lower;
		for (let i = 0; i < BUCKETS; i++) {
			const bucketSize = itemsPerBucket + (i < bucketsWithExtra ? 1 : 0);
			const fingerprint = this.#storage.fingerprint(curr, curr + bucketSize);
			curr += bucketSize;

			const nextBound =
				curr === upper ? upperBound : minimalBound(this.#storage.item(curr - 1), this.#storage.item(curr));
			this.#encodeBound(nextBound, out);
			out.varint(Mode.Fingerprint);
			out.bytes(fingerprint);
		}
	}

	#encodeIdList(lower: number, upper: number, upperBound: Bound, out: ByteWriter): void {
		this.#encodeBound(upperBound, out);
		out.varint(Mode.IdList);
		out.varint(upper - lower);
		for (let i = lower; i < upper; i++) {
			out.bytes(this.#storage.item(i).id);
		}
	}

	// timestamps are delta-encoded against the previous bound of the same message; 0 is "infinity"
	#encodeBound(bound: Bound, out: ByteWriter): void {
		if (bound.timestamp === MAX_TIMESTAMP) {
			this.#lastTimestampOut = MAX_TIMESTAMP;
			out.varint(0);
		} else {
			const delta = bound.timestamp - this.#lastTimestampOut;
			this.#lastTimestampOut = bound.timestamp;
			out.varint(delta + 1);
		}
		out.varint(bound.idPrefix.length);
		out.bytes(bound.idPrefix);
	}

	#decodeBound(reader: ByteReader): Bound {
		const raw = reader.varint();
		let timestamp = raw === 0 ? MAX_TIMESTAMP : raw - 1;
		if (this.#lastTimestampIn === MAX_TIMESTAMP || timestamp === MAX_TIMESTAMP) {
			timestamp = MAX_TIMESTAMP;
		} else {
			timestamp += this.#lastTimestampIn;
		}
		this.#lastTimestampIn = timestamp;

		const len = reader.varint();
		if (len > ID_SIZE) {
			throw new NegentropyDecodeError("bound id prefix too long");
		}
		return { timestamp, idPrefix: reader.bytes(len) };
	}
}

// shortest bound that separates `prev` from `curr`
const minimalBound = (prev: Item, curr: Item): Bound => {
	if (curr.timestamp !== prev.timestamp) {
		return { timestamp: curr.timestamp, idPrefix: EMPTY };
	}
	let shared = 0;
	while (shared < ID_SIZE && prev.id[shared] === curr.id[shared]) {
		shared++;
	}
	return { timestamp: curr.timestamp, idPrefix: curr.id.slice(0, shared + 1) };
};
