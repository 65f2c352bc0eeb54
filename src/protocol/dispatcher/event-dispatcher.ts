import { BinaryCodec, RecordView } from "../../core/binary-codec";
import type { DecoderSession } from "../../game/session";
import { FRAME_NOT_STARTED } from "../../game/snapshot";
import { Command } from "../commands";

const FRAME_INDEX = 0x1;

export enum DispatchStatus {
  /** The buffer ends inside a record */
  NeedMoreData = "need-more-data",
  /** Every byte was consumed without completing a frame */
  Exhausted = "exhausted",
  /** A frame-completion signal fired */
  FrameComplete = "frame-complete",
}

/**
 * What completed the frame.
 * - `bookend`: a frame bookend record
 * - `menu`: a menu frame, which is a complete frame on its own
 * - `legacy`: a frame-index change seen in legacy mode
 * - `session-end`: the end of a legacy stream flushes the pending frame
 */
export type CompletionSignal = "bookend" | "menu" | "legacy" | "session-end";

export interface DispatchResult {
  status: DispatchStatus;
  /** Bytes the caller must drop from the front of the buffer */
  consumed: number;
  signal?: CompletionSignal;
}

/**
 * Record handlers, one per recognized command.
 * Each receives a view over exactly one record.
 */
export interface EventHandlers {
  onSessionStart(record: RecordView): void;
  onSessionEnd(record: RecordView): void;
  onPreFrame(record: RecordView): void;
  onPostFrame(record: RecordView): void;
  onItemUpdate(record: RecordView): void;
  onFrameBookend(record: RecordView): void;
  onMenuFrame(record: RecordView): void;
  /** A registered command this decoder does not interpret */
  onSkipped?(command: number, length: number): void;
}

/**
 * Splits a byte buffer into records and routes each one to its handler.
 *
 * Dispatch stops right after the record that completes a frame, so the
 * caller can hand the snapshot out before feeding the remainder back in.
 *
 * @example
 * ```ts
 * const dispatcher = new EventDispatcher(session, handlers);
 * const result = dispatcher.dispatch(buffer);
 * buffer = buffer.subarray(result.consumed);
 * ```
 */
export class EventDispatcher {
  constructor(
    private readonly session: DecoderSession,
    private readonly handlers: EventHandlers
  ) {}

  /**
   * Dispatches records from the front of `buf`.
   * @throws UnknownCommandError when a command byte has no registered length
   */
  dispatch(buf: Uint8Array): DispatchResult {
    let offset = 0;

    while (offset < buf.byteLength) {
      const length = this.session.eventSizes.recordLength(buf, offset);
      if (length === null || offset + length > buf.byteLength) {
        return { status: DispatchStatus.NeedMoreData, consumed: offset };
      }

      const record = new RecordView(buf.subarray(offset, offset + length));

      // The record that changes the frame index opens the next frame, so it stays unconsumed
      if (this.crossesLegacyBoundary(record)) {
        return { status: DispatchStatus.FrameComplete, consumed: offset, signal: "legacy" };
      }

      offset += length;
      const signal = this.route(record);
      if (signal) {
        return { status: DispatchStatus.FrameComplete, consumed: offset, signal };
      }
    }

    return { status: DispatchStatus.Exhausted, consumed: offset };
  }

  private crossesLegacyBoundary(record: RecordView): boolean {
    if (!this.session.legacyBookends) return false;
    if (record.command !== Command.PreFrameUpdate && record.command !== Command.PostFrameUpdate) {
      return false;
    }

    const frame = record.read(BinaryCodec.i32, FRAME_INDEX);
    if (frame === this.session.lastSeenFrame) return false;

    const previous = this.session.lastSeenFrame;
    this.session.lastSeenFrame = frame;
    return previous !== FRAME_NOT_STARTED;
  }

  private route(record: RecordView): CompletionSignal | null {
    switch (record.command) {
      case Command.PayloadDescriptor:
        this.session.eventSizes.loadDescriptor(record);
        return null;
      case Command.SessionStart:
        this.handlers.onSessionStart(record);
        return null;
      case Command.PreFrameUpdate:
        this.handlers.onPreFrame(record);
        return null;
      case Command.PostFrameUpdate:
        this.handlers.onPostFrame(record);
        return null;
      case Command.ItemUpdate:
        this.handlers.onItemUpdate(record);
        return null;
      case Command.FrameBookend:
        this.handlers.onFrameBookend(record);
        return "bookend";
      case Command.MenuFrame:
        this.handlers.onMenuFrame(record);
        return "menu";
      case Command.SessionEnd:
        this.handlers.onSessionEnd(record);
        return this.session.legacyBookends ? "session-end" : null;
      case Command.MessageSplitter:
      case Command.FrameStart:
      case Command.CodeList:
        return null;
      default:
        this.handlers.onSkipped?.(record.command, record.length);
        return null;
    }
  }
}
