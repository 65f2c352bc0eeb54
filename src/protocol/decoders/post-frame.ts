import { BinaryCodec, BinaryPrimitives, type RecordView } from "../../core/binary-codec";
import { Character, isCharacter, toPort } from "../../game/enums";
import type { DecoderSession } from "../../game/session";
import { playerAt, type Snapshot, type Vec2 } from "../../game/snapshot";

export const POST_FRAME_OFFSETS = {
  frame: 0x1,
  port: 0x5,
  character: 0x7,
  action: 0x8,
  position: 0xa,
  facing: 0x12,
  percent: 0x16,
  shield: 0x1a,
  stock: 0x21,
  actionFrame: 0x22,
  // Tail fields; older revisions stop before some or all of these
  stateFlags2: 0x27,
  hitstun: 0x2b,
  airborne: 0x2f,
  jumpsLeft: 0x32,
  hurtboxStatus: 0x34,
  speedAirXSelf: 0x35,
  speedYSelf: 0x39,
  speedXAttack: 0x3d,
  speedYAttack: 0x41,
  speedGroundXSelf: 0x45,
  ecbTop: 0x49,
  ecbBottom: 0x51,
  ecbLeft: 0x59,
  ecbRight: 0x61,
} as const;

const HITLAG_FLAG = 0x20;

/**
 * Reads an x/y pair; each half falls back to 0 on its own.
 */
function readPairOr(record: RecordView, offset: number): Vec2 {
  return {
    x: record.readOr(BinaryCodec.f32, offset, 0),
    y: record.readOr(BinaryCodec.f32, offset + 4, 0),
  };
}

/**
 * Decodes a post-frame update: the physics state of one port after the
 * game processed the frame.
 *
 * The fixed head must be present. Each tail field falls back to its own
 * default when the record ends before it.
 */
export function decodePostFrame(session: DecoderSession, record: RecordView, snapshot: Snapshot): void {
  snapshot.stage = session.stage;
  snapshot.frame = record.read(BinaryCodec.i32, POST_FRAME_OFFSETS.frame);

  const port = toPort(record.read(BinaryCodec.u8, POST_FRAME_OFFSETS.port));
  if (port === null) return;
  const player = playerAt(snapshot, port);

  const position = record.read(BinaryPrimitives.vec2, POST_FRAME_OFFSETS.position);
  player.x = position.x;
  player.y = position.y;

  const character = record.read(BinaryCodec.u8, POST_FRAME_OFFSETS.character);
  player.character = isCharacter(character) ? character : Character.UNKNOWN_CHARACTER;
  player.action = session.tables.action(record.read(BinaryCodec.u16, POST_FRAME_OFFSETS.action));

  // Stored as a float sign rather than a flag
  player.facing = record.read(BinaryCodec.f32, POST_FRAME_OFFSETS.facing) > 0;
  player.percent = Math.trunc(record.read(BinaryCodec.f32, POST_FRAME_OFFSETS.percent));
  player.shieldStrength = record.read(BinaryCodec.f32, POST_FRAME_OFFSETS.shield);
  player.stock = record.read(BinaryCodec.u8, POST_FRAME_OFFSETS.stock);
  player.actionFrame = Math.trunc(record.read(BinaryCodec.f32, POST_FRAME_OFFSETS.actionFrame));

  player.hitlag = (record.readOr(BinaryCodec.u8, POST_FRAME_OFFSETS.stateFlags2, 0) & HITLAG_FLAG) !== 0;
  const hitstun = Math.trunc(record.readOr(BinaryCodec.f32, POST_FRAME_OFFSETS.hitstun, 0));
  player.hitstunFramesLeft = Number.isFinite(hitstun) ? hitstun : 0;
  player.onGround = !record.readOr(BinaryPrimitives.bool, POST_FRAME_OFFSETS.airborne, false);
  player.jumpsLeft = record.readOr(BinaryCodec.u8, POST_FRAME_OFFSETS.jumpsLeft, 1);
  player.invulnerable = record.readOr(BinaryPrimitives.bool, POST_FRAME_OFFSETS.hurtboxStatus, false);

  player.speedAirXSelf = record.readOr(BinaryCodec.f32, POST_FRAME_OFFSETS.speedAirXSelf, 0);
  player.speedYSelf = record.readOr(BinaryCodec.f32, POST_FRAME_OFFSETS.speedYSelf, 0);
  player.speedXAttack = record.readOr(BinaryCodec.f32, POST_FRAME_OFFSETS.speedXAttack, 0);
  player.speedYAttack = record.readOr(BinaryCodec.f32, POST_FRAME_OFFSETS.speedYAttack, 0);
  player.speedGroundXSelf = record.readOr(BinaryCodec.f32, POST_FRAME_OFFSETS.speedGroundXSelf, 0);

  player.ecbTop = readPairOr(record, POST_FRAME_OFFSETS.ecbTop);
  player.ecbBottom = readPairOr(record, POST_FRAME_OFFSETS.ecbBottom);
  player.ecbLeft = readPairOr(record, POST_FRAME_OFFSETS.ecbLeft);
  player.ecbRight = readPairOr(record, POST_FRAME_OFFSETS.ecbRight);
}
