/**
 * Protocol Layer - record framing and field decoding
 *
 * Every record starts with a command byte. Record lengths are not carried
 * inline; they come from the payload descriptor at the start of the stream,
 * which fills the {@link EventSizeTable}.
 *
 * @example Dispatching a buffer by hand
 * ```ts
 * const session = new DecoderSession(loadStaticTables(), { allowOldVersion: false });
 * const dispatcher = new EventDispatcher(session, {
 *   onSessionStart: (record) => decodeSessionStart(session, record),
 *   onPostFrame: (record) => decodePostFrame(session, record, snapshot),
 *   // ...
 * });
 *
 * const result = dispatcher.dispatch(bytes);
 * if (result.status === DispatchStatus.FrameComplete) {
 *   // snapshot is complete
 * }
 * ```
 */

export * from "./commands";
export * from "./errors";
export * from "./event-size-table";
export * from "./decoders";
export * from "./dispatcher";
