import { BinaryCodec, type RecordView } from "../../core/binary-codec";
import { Command } from "../commands";
import { UnknownCommandError } from "../errors";

/** Offset of the first (command, length) entry in a payload descriptor */
const DESCRIPTOR_ENTRIES_OFFSET = 0x2;
/** Each entry is a u8 command followed by a u16 length */
const DESCRIPTOR_ENTRY_SIZE = 3;

/**
 * Registry of record lengths, keyed by command byte.
 *
 * Filled from the payload descriptor at the start of every stream. Stored
 * lengths include the command byte, so a record spans exactly
 * `sizeOf(command)` bytes.
 *
 * Payload descriptor layout:
 * ```
 * ┌─────────┬──────────┬─────────┬──────────┬─────┐
 * │ 0x35    │ size (n) │ command │ length   │ ... │
 * │ (u8)    │ (u8)     │ (u8)    │ (u16)    │     │
 * └─────────┴──────────┴─────────┴──────────┴─────┘
 * ```
 * The descriptor itself is `n + 1` bytes and holds `(n - 1) / 3` entries.
 */
export class EventSizeTable {
  private sizes = new Map<number, number>();

  /**
   * Length of a payload descriptor starting at `offset`, or null when the
   * size byte has not arrived yet.
   */
  static descriptorLength(buf: Uint8Array, offset: number = 0): number | null {
    if (buf.byteLength - offset < 2) return null;
    return buf[offset + 1] + 1;
  }

  /**
   * Register the declared payload length of a command.
   * The command byte is added on top.
   */
  register(command: number, payloadLength: number): void {
    this.sizes.set(command, payloadLength + 1);
  }

  /**
   * Load every entry of a payload descriptor record.
   * @returns Number of entries registered
   */
  loadDescriptor(record: RecordView): number {
    const payloadSize = record.read(BinaryCodec.u8, 0x1);
    const count = Math.floor((payloadSize - 1) / DESCRIPTOR_ENTRY_SIZE);

    let cursor = DESCRIPTOR_ENTRIES_OFFSET;
    for (let i = 0; i < count; i++) {
      const command = record.read(BinaryCodec.u8, cursor);
      const length = record.read(BinaryCodec.u16, cursor + 1);
      this.register(command, length);
      cursor += DESCRIPTOR_ENTRY_SIZE;
    }
    return count;
  }

  /**
   * Total record length for a command, command byte included.
   * @throws UnknownCommandError when the command was never registered
   */
  sizeOf(command: number): number {
    const size = this.sizes.get(command);
    if (size === undefined) {
      throw new UnknownCommandError(command);
    }
    return size;
  }

  /**
   * Total length of the record starting at `offset`, or null when not enough
   * bytes are buffered to tell.
   */
  recordLength(buf: Uint8Array, offset: number): number | null {
    const command = buf[offset];
    if (command === Command.PayloadDescriptor) {
      return EventSizeTable.descriptorLength(buf, offset);
    }
    return this.sizeOf(command);
  }

  has(command: number): boolean {
    return this.sizes.has(command);
  }

  clear(): void {
    this.sizes.clear();
  }

  getCommands(): number[] {
    return Array.from(this.sizes.keys());
  }
}
