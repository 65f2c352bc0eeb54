import { BinaryCodec, type RecordView } from "../../core/binary-codec";
import { activePorts, type Snapshot } from "../../game/snapshot";

const FRAME = 0x1;

/**
 * Decodes a frame bookend, the last record of a frame's event group.
 */
export function decodeFrameBookend(record: RecordView, snapshot: Snapshot): void {
  snapshot.frame = record.read(BinaryCodec.i32, FRAME);
}

/**
 * Euclidean distance between the two lowest-numbered active ports.
 * Zero when fewer than two ports are active.
 */
export function playerDistance(snapshot: Snapshot): number {
  const [first, second] = activePorts(snapshot);
  if (first === undefined || second === undefined) return 0;

  const a = snapshot.players.get(first);
  const b = snapshot.players.get(second);
  if (!a || !b) return 0;

  return Math.hypot(a.x - b.x, a.y - b.y);
}
