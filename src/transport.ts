import WebSocket from "ws";

import type { ITransport, TransportHandlers } from "./interfaces";

export type WebSocketTransportOptions = {
	/** extra headers for the opening handshake */
	headers?: Record<string, string>;
	maxPayload?: number;
};

/**
 * {@link ITransport} over a `ws` WebSocket client.
 */
export class WebSocketTransport implements ITransport {
	#url: string;
	#opts: WebSocketTransportOptions;
	#ws: WebSocket | undefined;
	#closed = false;

	constructor(url: string, opts: WebSocketTransportOptions = {}) {
		this.#url = url;
		this.#opts = opts;
	}

	connect(handlers: TransportHandlers): Promise<void> {
		if (this.#ws !== undefined) {
			return Promise.reject(new Error("transport is single-use"));
		}
		return new Promise((resolve, reject) => {
			const ws = new WebSocket(this.#url, { headers: this.#opts.headers, maxPayload: this.#opts.maxPayload });
			this.#ws = ws;

			let opened = false;
			ws.once("open", () => {
				opened = true;
				resolve();
			});
			ws.on("message", (data, isBinary) => {
				if (isBinary) {
					console.log(`[WebSocketTransport] ignoring binary frame from ${this.#url}`);
					return;
				}
				handlers.onMessage(data.toString());
			});
			ws.on("error", (err) => {
				console.error(`[WebSocketTransport] WebSocket error on ${this.#url}: ${err.message}`);
				if (!opened) {
					reject(err);
				}
			});
			ws.once("close", (code, reason) => {
				const why = `socket closed (code: ${code}${reason.length > 0 ? `, reason: ${reason.toString()}` : ""})`;
				if (!opened) {
					reject(new Error(why));
					return;
				}
				if (!this.#closed) {
					this.#closed = true;
					handlers.onClose(why);
				}
			});
		});
	}

	send(data: string): Promise<void> {
		const ws = this.#ws;
		if (ws === undefined || ws.readyState !== WebSocket.OPEN) {
			return Promise.reject(new Error("socket is not open"));
		}
		return new Promise((resolve, reject) => {
			ws.send(data, (err) => {
				if (err !== undefined && err !== null) {
					reject(err);
					return;
				}
				resolve();
			});
		});
	}

	close(): void {
		this.#closed = true;
		const ws = this.#ws;
		if (ws === undefined) {
			return;
		}
		if (ws.readyState === WebSocket.CONNECTING) {
			ws.terminate();
			return;
		}
		ws.close();
	}
}

export const webSocketTransportFactory =
	(opts: WebSocketTransportOptions = {}) =>
	(url: string): ITransport =>
		new WebSocketTransport(url, opts);
