/**
 * @module net
 *
 * Transport boundary and the host-facing frame stream.
 *
 * @example
 * ```typescript
 * import { FrameStream, SocketTransport, createTransportSource } from "slp-stream";
 *
 * const transport = await SocketTransport.connect("127.0.0.1", 51441);
 * const stream = new FrameStream({ source: createTransportSource(transport) });
 *
 * for await (const snapshot of stream) {
 *   console.log(snapshot.frame, snapshot.players.get(1)?.percent);
 * }
 * ```
 */

export * from "./types";
export * from "./frame-stream";
export * from "./sources";
export * from "./adapters/socket-transport";
