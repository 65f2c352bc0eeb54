import { createReadStream } from "node:fs";
import type { Readable } from "node:stream";
import { ChunkQueueSource } from "./chunk-queue-source";

export interface FileSourceOptions {
	/** Read size in bytes (default: 64KB) */
	chunkSize?: number;
}

/**
 * Adapts a Node readable stream of bytes into a {@link ChunkQueueSource}.
 * Closing the source destroys the stream.
 */
export function fromReadable(stream: Readable): ChunkQueueSource {
	const source = new ChunkQueueSource(() => {
		stream.destroy();
	});

	stream.on("data", (chunk: Buffer | string) => {
		source.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
	});
	stream.on("end", () => source.end());
	stream.on("error", (error: Error) => source.fail(error));

	return source;
}

/**
 * Opens a recorded raw event stream from disk.
 */
export function openFileSource(path: string, options: FileSourceOptions = {}): ChunkQueueSource {
	return fromReadable(createReadStream(path, { highWaterMark: options.chunkSize ?? 65536 }));
}
