import { BinaryCodec, type RecordView } from "../../core/binary-codec";

const END_METHOD = 0x1;

export interface SessionEndInfo {
  /** How the game ended; 0 when the record predates the field */
  endMethod: number;
}

export function decodeSessionEnd(record: RecordView): SessionEndInfo {
  return { endMethod: record.readOr(BinaryCodec.u8, END_METHOD, 0) };
}
