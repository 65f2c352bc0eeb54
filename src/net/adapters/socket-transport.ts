import { connect } from "node:net";
import type { Duplex } from "node:stream";
import type { TransportAdapter } from "../types";

/**
 * Transport adapter over a Node duplex stream, typically a TCP socket to a
 * live relay
 */
export class SocketTransport implements TransportAdapter {
	private socket: Duplex;
	private messageHandlers: Array<(data: Uint8Array) => void> = [];
	private closeHandlers: Array<() => void> = [];
	private errorHandlers: Array<(error: Error) => void> = [];

	constructor(socket: Duplex) {
		this.socket = socket;
		this.setupHandlers();
	}

	onMessage(handler: (data: Uint8Array) => void): void {
		this.messageHandlers.push(handler);
	}

	onClose(handler: () => void): void {
		this.closeHandlers.push(handler);
	}

	onError(handler: (error: Error) => void): void {
		this.errorHandlers.push(handler);
	}

	close(): void {
		this.socket.destroy();
	}

	private setupHandlers(): void {
		this.socket.on("data", (chunk: Buffer | string) => {
			if (typeof chunk === "string") {
				// Warn about text-mode streams
				const error = new Error("Unexpected string chunk; the socket must not set an encoding");
				for (const handler of this.errorHandlers) {
					handler(error);
				}
				return;
			}
			for (const handler of this.messageHandlers) {
				handler(chunk);
			}
		});

		this.socket.on("close", () => {
			for (const handler of this.closeHandlers) {
				handler();
			}
		});

		this.socket.on("error", (error: Error) => {
			for (const handler of this.errorHandlers) {
				handler(error);
			}
		});
	}

	/**
	 * Static factory method to connect to a relay
	 */
	static connect(host: string, port: number): Promise<SocketTransport> {
		return new Promise((resolve, reject) => {
			const socket = connect({ host, port });

			socket.once("connect", () => {
				socket.off("error", reject);
				resolve(new SocketTransport(socket));
			});

			socket.once("error", reject);
		});
	}
}
