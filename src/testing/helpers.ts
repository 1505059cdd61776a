import type { NostrEvent } from "nostr-tools/core";

// lets chains of resolved promises and queued microtasks run to completion
export const settle = async (rounds = 100): Promise<void> => {
	for (let i = 0; i < rounds; i++) {
		await Promise.resolve();
	}
};

export const hexId = (n: number): string => n.toString(16).padStart(64, "0");

// structurally valid, unsigned event; for code paths that never check signatures
export const unsignedEvent = (id: string, createdAt = 1_000, kind = 1): NostrEvent => ({
	id,
	pubkey: "f".repeat(64),
	created_at: createdAt,
	kind,
	tags: [],
	content: "",
	sig: "0".repeat(128),
});
