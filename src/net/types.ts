/**
 * Core types for the transport boundary of the frame stream
 */

/**
 * Pull-style byte source the frame stream reads from.
 * Chunks carry no framing; record boundaries may fall anywhere.
 */
export interface StreamSource {
	/**
	 * Wait for the next chunk.
	 * Resolves null once the source has ended.
	 */
	read(): Promise<Uint8Array | null>;

	/**
	 * Take the next chunk that is already buffered, or null when there is none
	 */
	poll(): Uint8Array | null;

	/**
	 * Stop reading and release the underlying transport
	 */
	close(): void | Promise<void>;
}

/**
 * Push-style transport adapter - implement this to feed the frame stream from
 * any transport layer (TCP socket, WebSocket, IPC pipe, etc.)
 */
export interface TransportAdapter {
	/**
	 * Register a callback for incoming binary data
	 */
	onMessage(handler: (data: Uint8Array) => void): void;

	/**
	 * Register a callback for connection close/disconnect
	 */
	onClose(handler: () => void): void;

	/**
	 * Register a callback for transport errors (optional)
	 */
	onError?(handler: (error: Error) => void): void;

	/**
	 * Close the connection
	 */
	close(): void | Promise<void>;
}

/**
 * Configuration for the frame stream
 */
export interface FrameStreamConfig {
	/**
	 * Enable debug logging
	 */
	debug?: boolean;

	/**
	 * Only consume data the source already holds; `step()` resolves null
	 * instead of waiting (default: false)
	 */
	pollingMode?: boolean;

	/**
	 * Decode streams older than the minimum version, synthesizing frame
	 * boundaries from frame-index changes (default: false)
	 */
	allowOldVersion?: boolean;
}
