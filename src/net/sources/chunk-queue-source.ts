import type { StreamSource } from "../types";

interface PendingRead {
	resolve(chunk: Uint8Array | null): void;
	reject(error: Error): void;
}

/**
 * Bridges push-style producers to the pull-style {@link StreamSource}.
 *
 * @example
 * ```ts
 * const source = new ChunkQueueSource();
 * socket.on("data", (chunk) => source.push(chunk));
 * socket.on("end", () => source.end());
 * ```
 */
export class ChunkQueueSource implements StreamSource {
	private chunks: Uint8Array[] = [];
	private pending: PendingRead[] = [];
	private ended = false;
	private failure: Error | null = null;

	/**
	 * @param onClose Called once when the source is closed by its reader
	 */
	constructor(private readonly onClose?: () => void | Promise<void>) {}

	/**
	 * Queue a chunk, or hand it straight to a waiting reader
	 */
	push(chunk: Uint8Array): void {
		if (this.ended || chunk.byteLength === 0) return;

		const reader = this.pending.shift();
		if (reader) {
			reader.resolve(chunk);
		} else {
			this.chunks.push(chunk);
		}
	}

	/**
	 * Mark the end of input. Buffered chunks can still be read.
	 */
	end(): void {
		if (this.ended) return;
		this.ended = true;
		for (const reader of this.pending.splice(0)) {
			reader.resolve(null);
		}
	}

	/**
	 * End the source with an error. Readers reject once the buffered chunks
	 * are drained.
	 */
	fail(error: Error): void {
		if (this.ended) return;
		this.failure = error;
		this.ended = true;
		for (const reader of this.pending.splice(0)) {
			reader.reject(error);
		}
	}

	read(): Promise<Uint8Array | null> {
		const chunk = this.chunks.shift();
		if (chunk) return Promise.resolve(chunk);
		if (this.failure) return Promise.reject(this.failure);
		if (this.ended) return Promise.resolve(null);

		return new Promise((resolve, reject) => {
			this.pending.push({ resolve, reject });
		});
	}

	poll(): Uint8Array | null {
		const chunk = this.chunks.shift();
		if (chunk) return chunk;
		if (this.failure) throw this.failure;
		return null;
	}

	close(): void | Promise<void> {
		const alreadyEnded = this.ended;
		this.chunks = [];
		this.end();
		if (!alreadyEnded && this.onClose) {
			return this.onClose();
		}
	}

	/**
	 * Whether input has ended (reading may still return buffered chunks)
	 */
	isEnded(): boolean {
		return this.ended;
	}

	/**
	 * Number of chunks waiting to be read
	 */
	get bufferedChunks(): number {
		return this.chunks.length;
	}
}
