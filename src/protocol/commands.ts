/**
 * Command bytes that open each record in the event stream.
 */
export enum Command {
  /** Fragment of an oversized record; skipped */
  MessageSplitter = 0x10,
  /** Declares the length of every other command */
  PayloadDescriptor = 0x35,
  SessionStart = 0x36,
  PreFrameUpdate = 0x37,
  PostFrameUpdate = 0x38,
  SessionEnd = 0x39,
  /** Skipped */
  FrameStart = 0x3a,
  ItemUpdate = 0x3b,
  FrameBookend = 0x3c,
  /** Skipped */
  CodeList = 0x3d,
  MenuFrame = 0x3e,
}
