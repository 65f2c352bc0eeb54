import type { TransportAdapter } from "../types";
import { ChunkQueueSource } from "./chunk-queue-source";

/**
 * Feeds a push-style transport into a pull-style stream source.
 * Closing the source closes the transport.
 */
export function createTransportSource(transport: TransportAdapter): ChunkQueueSource {
	const source = new ChunkQueueSource(() => transport.close());

	transport.onMessage((data) => source.push(data));
	transport.onClose(() => source.end());

	// Setup error handler if transport supports it
	if (transport.onError) {
		transport.onError((error) => source.fail(error));
	}

	return source;
}
