export { DecoderSession } from "./decoder-session";
export type { DecoderSessionOptions } from "./decoder-session";
