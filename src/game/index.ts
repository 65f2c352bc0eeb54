/**
 * @module game
 *
 * Game-side model: snapshots, id enums, static tables, and the per-stream
 * state that turns decoded records into finished frames.
 */

export * from "./enums";
export * from "./snapshot";
export * from "./tables";
export * from "./session";
export * from "./frame-assembler";
export * from "./post-frame-corrector";
