import type { NostrEvent } from "nostr-tools/core";
import type { Filter } from "nostr-tools/filter";

import type { Awaitable, Result } from "./types";

export type ConnectionStatus = "initialized" | "connecting" | "connected" | "disconnected" | "terminated";

export type TransportHandlers = {
	onMessage: (data: string) => void;
	// called once, when the channel is gone for whatever reason
	onClose: (reason: string) => void;
};

/**
 * Message-oriented duplex channel to one relay. A transport is used for a single connection
 * attempt: reconnecting creates a fresh one through the {@link TransportFactory}.
 */
export interface ITransport {
	connect(handlers: TransportHandlers): Promise<void>;
	send(data: string): Promise<void>;
	close(): void;
}

export type TransportFactory = (url: string) => ITransport;

export type EventStoreSaveError = "duplicated" | "deleted" | "replaced" | "ephemeral";

export interface IEventStore {
	save(ev: NostrEvent): Awaitable<Result<object, EventStoreSaveError>>;
	query(filters: Filter[]): Awaitable<NostrEvent[]>;
}

export type EventVerifier = (ev: NostrEvent) => boolean;

export type PoolNotification =
	| { type: "status"; relay: string; from: ConnectionStatus; to: ConnectionStatus }
	| { type: "notice"; relay: string; message: string }
	| { type: "auth"; relay: string; challenge: string }
	| { type: "eose"; relay: string; subId: string }
	| { type: "closed"; relay: string; subId: string; message: string }
	| { type: "protocol-error"; relay: string; message: string }
	| { type: "transport-error"; relay: string; message: string }
	| { type: "consumer-overflow"; stream: "events" | "notifications"; consumer: string; policy: string; dropped: number }
	| { type: "reconciliation-abort"; relay: string; sessionId: string; reason: string };

export type PoolNotificationType = PoolNotification["type"];
