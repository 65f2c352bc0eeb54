/**
 * slp-stream
 *
 * Decodes a live or recorded game event stream into frame snapshots:
 * - Binary field primitives with tolerant reads for short records
 * - Record framing driven by the stream's payload descriptor
 * - Per-record field decoders, gameplay and menus
 * - Frame assembly with lookback corrections
 * - Pull-style stream sources over files, sockets and custom transports
 */

// Core utilities
export * from "./core";

// Record framing and decoders
export * from "./protocol";

// Snapshot model and frame assembly
export * from "./game";

// Sources and the frame stream
export * from "./net";
