export { Backoff, type BackoffOptions, defaultBackoffOptions } from "./backoff";
export {
	RelayConnection,
	type RelayConnectionHandlers,
	type RelayConnectionOptions,
	type RelayConnectionStats,
	defaultRelayConnectionOptions,
} from "./connection";
export { EventDeduplicator, type ObserveOutcome, SeenEventIndex } from "./dedup";
export {
	ClosedSubscriptionError,
	InvalidRelayUrlError,
	PoolError,
	type PoolErrorCode,
	PoolShutdownError,
	UnknownRelayError,
	UnknownSubscriptionError,
} from "./errors";
export { type NostrEvent, compareEvents, isNostrEvent } from "./event";
export { type Filter, idBatchFilters, isReqFilter } from "./filter";
export type {
	ConnectionStatus,
	EventStoreSaveError,
	EventVerifier,
	IEventStore,
	ITransport,
	PoolNotification,
	PoolNotificationType,
	TransportFactory,
	TransportHandlers,
} from "./interfaces";
export {
	type C2RMessage,
	type IMessageCodec,
	type ParseR2CMessageError,
	type R2CMessage,
	jsonCodec,
	parseR2CMessage,
} from "./message";
export {
	Negentropy,
	NegentropyDecodeError,
	NegentropyStorage,
	type ReconcileStep,
	isNegentropyTimestamp,
} from "./negentropy";
export {
	type Delivery,
	type EoseAction,
	type FetchOptions,
	type PublishOutcome,
	type PublishReport,
	RelayPool,
	type RelayPoolOptions,
	type SyncOptions,
	type SyncReport,
} from "./pool";
export {
	type NegentropyDirection,
	type ReconcileOptions,
	ReconciliationEngine,
	type ReconciliationSession,
} from "./reconcile";
export { normalizeRelayUrl, type RelayUrlError } from "./relay-url";
export { MemoryEventStore, type MemoryEventStoreOptions } from "./store";
export { Broadcaster, type OverflowInfo, type SlowConsumerPolicy, StreamConsumer } from "./stream";
export { SubscriptionRegistry, type SubscriptionView } from "./subscription";
export { WebSocketTransport, type WebSocketTransportOptions, webSocketTransportFactory } from "./transport";
export { Result, type RelayTarget } from "./types";
