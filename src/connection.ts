import { Backoff, type BackoffOptions } from "./backoff";
import type { ConnectionStatus, ITransport, TransportFactory } from "./interfaces";
import { type C2RMessage, type C2RMessageType, type IMessageCodec, type R2CMessage, describeParseError } from "./message";

export type RelayConnectionOptions = {
	/** subscriptions targeting "all" relays use this relay */
	read?: boolean;
	/** publishes targeting "all" relays use this relay */
	write?: boolean;
	reconnect?: boolean;
	connectTimeoutMs?: number;
	backoff?: BackoffOptions;
};

export const defaultRelayConnectionOptions: Required<Omit<RelayConnectionOptions, "backoff">> = {
	read: true,
	write: true,
	reconnect: true,
	connectTimeoutMs: 10_000,
};

export interface RelayConnectionHandlers {
	onStatusChange(conn: RelayConnection, from: ConnectionStatus, to: ConnectionStatus): void;
	// after queued messages are flushed on every transition to "connected"
	onConnected(conn: RelayConnection): void;
	onDisconnected(conn: RelayConnection, reason: string): void;
	onMessage(conn: RelayConnection, msg: R2CMessage): void;
	onProtocolError(conn: RelayConnection, message: string): void;
	onTransportError(conn: RelayConnection, message: string): void;
}

type QueuedMessage = {
	ticket: number;
	type: C2RMessageType;
	data: string;
	onSent?: () => void;
};

// messages that only make sense on the transport they were queued for
const transportBoundTypes: ReadonlySet<C2RMessageType> = new Set(["REQ", "CLOSE", "NEG-OPEN", "NEG-MSG", "NEG-CLOSE"]);

export type RelayConnectionStats = {
	attempts: number;
	connectedAt: number | undefined;
	sent: number;
	received: number;
};

/**
 * Lifecycle of the connection to one relay:
 *
 * initialized -> connecting -> connected -> disconnected -> connecting -> ... ; any -> terminated
 *
 * Outbound messages are queued and written to the transport in FIFO order, only while connected.
 */
export class RelayConnection {
	readonly url: string;

	#opts: Required<Omit<RelayConnectionOptions, "backoff">>;
	#codec: IMessageCodec;
	#createTransport: TransportFactory;
	#handlers: RelayConnectionHandlers;
	#backoff: Backoff;

	#status: ConnectionStatus = "initialized";
	#transport: ITransport | undefined;
	#queue: QueuedMessage[] = [];
	#nextTicket = 0;
	// transport a flush loop is currently writing to
	#flushingOn: ITransport | undefined;
	#reconnectTimer: NodeJS.Timeout | undefined;
	#stats: RelayConnectionStats = { attempts: 0, connectedAt: undefined, sent: 0, received: 0 };

	constructor(
		url: string,
		opts: RelayConnectionOptions,
		deps: { codec: IMessageCodec; createTransport: TransportFactory; handlers: RelayConnectionHandlers },
	) {
		this.url = url;
		const d = defaultRelayConnectionOptions;
		this.#opts = {
			read: opts.read ?? d.read,
			write: opts.write ?? d.write,
			reconnect: opts.reconnect ?? d.reconnect,
			connectTimeoutMs: opts.connectTimeoutMs ?? d.connectTimeoutMs,
		};
		this.#backoff = new Backoff(opts.backoff);
		this.#codec = deps.codec;
		this.#createTransport = deps.createTransport;
		this.#handlers = deps.handlers;
	}

	get status(): ConnectionStatus {
		return this.#status;
	}

	get isConnected(): boolean {
		return this.#status === "connected";
	}

	get readable(): boolean {
		return this.#opts.read;
	}

	get writable(): boolean {
		return this.#opts.write;
	}

	get queueLength(): number {
		return this.#queue.length;
	}

	get stats(): Readonly<RelayConnectionStats> {
		return { ...this.#stats };
	}

	/** whether a reconnect attempt is waiting for its backoff delay */
	get reconnectPending(): boolean {
		return this.#reconnectTimer !== undefined;
	}

	/**
	 * Opens a transport. Resolves once the attempt is settled, whatever its outcome:
	 * a failed attempt leaves the connection "disconnected" with a reconnect scheduled.
	 */
	async connect(): Promise<void> {
		if (this.status !== "initialized" && this.status !== "disconnected") {
			return;
		}
		this.#clearReconnectTimer();
		this.#setStatus("connecting");
		this.#stats.attempts++;

		const transport = this.#createTransport(this.url);
		this.#transport = transport;
		try {
			await withTimeout(
				transport.connect({
					onMessage: (data) => this.#handleInbound(transport, data),
					onClose: (reason) => this.#handleTransportClosed(transport, reason),
				}),
				this.#opts.connectTimeoutMs,
				"connect timed out",
			);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			transport.close();
			// terminated (or superseded) while connecting
			if (this.#transport !== transport || this.#status !== "connecting") {
				return;
			}
			this.#transport = undefined;
			console.log(`[RelayConnection] failed to connect to ${this.url}: ${message}`);
			this.#handlers.onTransportError(this, `connect failed: ${message}`);
			this.#setStatus("disconnected");
			this.#scheduleReconnect();
			return;
		}

		if (this.#transport !== transport || this.#status !== "connecting") {
			transport.close();
			return;
		}
		this.#backoff.reset();
		this.#stats.connectedAt = Date.now();
		this.#setStatus("connected");
		this.#scheduleFlush();
		this.#handlers.onConnected(this);
	}

	/**
	 * Queues a message for the relay. Returns a ticket for {@link withdraw}, or `undefined` if the
	 * connection is terminated.
	 */
	enqueue(msg: C2RMessage, onSent?: () => void): number | undefined {
		if (this.#status === "terminated") {
			return undefined;
		}
		const ticket = ++this.#nextTicket;
		this.#queue.push({ ticket, type: msg[0], data: this.#codec.encode(msg), onSent });
		if (this.#status === "connected") {
			this.#scheduleFlush();
		}
		return ticket;
	}

	// returns true if the message was still waiting in the queue
	withdraw(ticket: number): boolean {
		const idx = this.#queue.findIndex((m) => m.ticket === ticket);
		if (idx < 0) {
			return false;
		}
		this.#queue.splice(idx, 1);
		return true;
	}

	terminate(): void {
		if (this.#status === "terminated") {
			return;
		}
		this.#clearReconnectTimer();
		this.#queue = [];
		const transport = this.#transport;
		this.#transport = undefined;
		this.#setStatus("terminated");
		transport?.close();
	}

	#scheduleFlush(): void {
		this.#flush().catch((err: unknown) => {
			console.error(`[RelayConnection] flush failed on ${this.url}:`, err);
		});
	}

	// one loop per transport: a loop still awaiting a send on a lost transport never holds up the next one
	async #flush(): Promise<void> {
		const transport = this.#transport;
		if (transport === undefined || this.#flushingOn === transport) {
			return;
		}
		this.#flushingOn = transport;
		try {
			while (this.#status === "connected" && this.#transport === transport) {
				const next = this.#queue.shift();
				if (next === undefined) {
					return;
				}
				try {
					await transport.send(next.data);
				} catch (err) {
					const message = err instanceof Error ? err.message : String(err);
					this.#handleTransportClosed(transport, `send failed: ${message}`);
					return;
				}
				this.#stats.sent++;
				next.onSent?.();
			}
		} finally {
			if (this.#flushingOn === transport) {
				this.#flushingOn = undefined;
			}
		}
	}

	#handleInbound(transport: ITransport, data: string): void {
		if (transport !== this.#transport || this.#status !== "connected") {
			return;
		}
		this.#stats.received++;

		const res = this.#codec.decode(data);
		if (!res.ok) {
			console.log(`[RelayConnection] ${describeParseError(res.err)} (relay: ${this.url})`);
			this.#handlers.onProtocolError(this, describeParseError(res.err));
			return;
		}
		this.#handlers.onMessage(this, res.val);
	}

	#handleTransportClosed(transport: ITransport, reason: string): void {
		if (transport !== this.#transport) {
			return;
		}
		this.#transport = undefined;
		transport.close();
		if (this.#status === "terminated") {
			return;
		}
		console.log(`[RelayConnection] connection to ${this.url} lost: ${reason}`);
		this.#queue = this.#queue.filter((m) => !transportBoundTypes.has(m.type));
		this.#handlers.onTransportError(this, reason);
		this.#setStatus("disconnected");
		this.#handlers.onDisconnected(this, reason);
		this.#scheduleReconnect();
	}

	#scheduleReconnect(): void {
		if (!this.#opts.reconnect || this.#status !== "disconnected" || this.#reconnectTimer !== undefined) {
			return;
		}
		const delay = this.#backoff.next();
		console.log(`[RelayConnection] reconnecting to ${this.url} in ${delay}ms`);
		this.#reconnectTimer = setTimeout(() => {
			this.#reconnectTimer = undefined;
			this.connect().catch((err: unknown) => {
				console.error(`[RelayConnection] reconnect to ${this.url} failed:`, err);
			});
		}, delay);
	}

	#clearReconnectTimer(): void {
		if (this.#reconnectTimer !== undefined) {
			clearTimeout(this.#reconnectTimer);
			this.#reconnectTimer = undefined;
		}
	}

	#setStatus(to: ConnectionStatus): void {
		const from = this.#status;
		if (from === to) {
			return;
		}
		this.#status = to;
		this.#handlers.onStatusChange(this, from, to);
	}
}

const withTimeout = <T>(p: Promise<T>, ms: number, message: string): Promise<T> =>
	new Promise((resolve, reject) => {
		const timer = setTimeout(() => reject(new Error(message)), ms);
		p.then(
			(v) => {
				clearTimeout(timer);
				resolve(v);
			},
			(err: unknown) => {
				clearTimeout(timer);
				reject(err);
			},
		);
	});
