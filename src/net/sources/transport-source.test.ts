import { describe, expect, test } from "vitest";
import type { TransportAdapter } from "../types";
import { createTransportSource } from "./transport-source";

// Mock transport adapter
class MockTransportAdapter implements TransportAdapter {
	messageHandler: ((data: Uint8Array) => void) | null = null;
	closeHandler: (() => void) | null = null;
	errorHandler: ((error: Error) => void) | null = null;
	public closed = false;

	onMessage(handler: (data: Uint8Array) => void): void {
		this.messageHandler = handler;
	}

	onClose(handler: () => void): void {
		this.closeHandler = handler;
	}

	onError(handler: (error: Error) => void): void {
		this.errorHandler = handler;
	}

	close(): void {
		this.closed = true;
	}

	// Test helper: simulate receiving a message
	simulateMessage(data: Uint8Array): void {
		this.messageHandler?.(data);
	}

	// Test helper: simulate disconnection
	simulateDisconnect(): void {
		this.closeHandler?.();
	}

	// Test helper: simulate a transport failure
	simulateError(error: Error): void {
		this.errorHandler?.(error);
	}
}

describe("createTransportSource", () => {
	test("queues incoming messages", async () => {
		const transport = new MockTransportAdapter();
		const source = createTransportSource(transport);

		transport.simulateMessage(new Uint8Array([1, 2]));

		expect(await source.read()).toEqual(new Uint8Array([1, 2]));
	});

	test("ends when the transport closes", async () => {
		const transport = new MockTransportAdapter();
		const source = createTransportSource(transport);

		transport.simulateDisconnect();

		expect(await source.read()).toBeNull();
	});

	test("transport errors fail the source", async () => {
		const transport = new MockTransportAdapter();
		const source = createTransportSource(transport);

		transport.simulateError(new Error("relay dropped"));

		await expect(source.read()).rejects.toThrow("relay dropped");
	});

	test("closing the source closes the transport", async () => {
		const transport = new MockTransportAdapter();
		const source = createTransportSource(transport);

		await source.close();

		expect(transport.closed).toBe(true);
	});
});
