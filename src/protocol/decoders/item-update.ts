import { BinaryCodec, type RecordView } from "../../core/binary-codec";
import { NO_OWNER } from "../../game/enums";
import type { DecoderSession } from "../../game/session";
import { createProjectile, type Snapshot } from "../../game/snapshot";

export const ITEM_UPDATE_OFFSETS = {
  subtype: 0x5,
  speedX: 0xc,
  speedY: 0x10,
  x: 0x14,
  y: 0x18,
  owner: 0x2a,
} as const;

/**
 * Converts the zero-based owner byte into a port, or -1 when the item has no
 * owning port.
 */
export function toOwner(raw: number): number {
  const owner = raw + 1;
  return owner > 4 ? NO_OWNER : owner;
}

/**
 * Decodes an item update and appends it to the snapshot's projectiles.
 */
export function decodeItemUpdate(session: DecoderSession, record: RecordView, snapshot: Snapshot): void {
  const projectile = createProjectile();
  projectile.subtype = session.tables.projectileSubtype(record.read(BinaryCodec.u16, ITEM_UPDATE_OFFSETS.subtype));
  projectile.speedX = record.read(BinaryCodec.f32, ITEM_UPDATE_OFFSETS.speedX);
  projectile.speedY = record.read(BinaryCodec.f32, ITEM_UPDATE_OFFSETS.speedY);
  projectile.x = record.read(BinaryCodec.f32, ITEM_UPDATE_OFFSETS.x);
  projectile.y = record.read(BinaryCodec.f32, ITEM_UPDATE_OFFSETS.y);

  const owner = record.readOr(BinaryCodec.u8, ITEM_UPDATE_OFFSETS.owner, null);
  projectile.owner = owner === null ? NO_OWNER : toOwner(owner);

  snapshot.projectiles.push(projectile);
}
