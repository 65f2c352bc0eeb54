import { describe, expect, test } from "vitest";
import { Action, Character, Stage } from "../../game/enums";
import { DecoderSession } from "../../game/session";
import { createSnapshot } from "../../game/snapshot";
import { RecordBuilder, testTables } from "../../testing/stream-builder";
import { Command } from "../commands";
import { decodePostFrame } from "./post-frame";

function newSession(): DecoderSession {
  const session = new DecoderSession(testTables(), { allowOldVersion: false });
  session.stage = Stage.BATTLEFIELD;
  return session;
}

/** Fixed head only: everything through the action frame */
function headRecord(length: number = 0x26): RecordBuilder {
  return new RecordBuilder(Command.PostFrameUpdate, length)
    .i32(0x1, 120)
    .u8(0x5, 1)
    .u8(0x7, Character.FOX)
    .u16(0x8, Action.DASHING)
    .f32(0xa, 10.5)
    .f32(0xe, -3)
    .f32(0x12, -1)
    .f32(0x16, 12.75)
    .f32(0x1a, 42.5)
    .u8(0x21, 3)
    .f32(0x22, 4.5);
}

describe("decodePostFrame", () => {
  test("decodes the fixed head", () => {
    const snapshot = createSnapshot();
    decodePostFrame(newSession(), headRecord().view(), snapshot);

    expect(snapshot.frame).toBe(120);
    expect(snapshot.stage).toBe(Stage.BATTLEFIELD);

    const player = snapshot.players.get(2);
    expect(player).toMatchObject({
      x: 10.5,
      y: -3,
      facing: false,
      character: Character.FOX,
      action: Action.DASHING,
      percent: 12,
      shieldStrength: 42.5,
      stock: 3,
      actionFrame: 4,
    });
  });

  test("tail fields take their defaults on short records", () => {
    const snapshot = createSnapshot();
    decodePostFrame(newSession(), headRecord().view(), snapshot);

    expect(snapshot.players.get(2)).toMatchObject({
      hitlag: false,
      hitstunFramesLeft: 0,
      onGround: true,
      jumpsLeft: 1,
      invulnerable: false,
      speedAirXSelf: 0,
      speedGroundXSelf: 0,
      ecbTop: { x: 0, y: 0 },
      ecbRight: { x: 0, y: 0 },
    });
  });

  test("decodes the tail when present", () => {
    const snapshot = createSnapshot();
    const record = headRecord(0x69)
      .u8(0x27, 0x20)
      .f32(0x2b, 7.5)
      .u8(0x2f, 1)
      .u8(0x32, 2)
      .u8(0x34, 1)
      .f32(0x35, 1.25)
      .f32(0x39, -2.5)
      .f32(0x3d, 3)
      .f32(0x41, 4)
      .f32(0x45, 0.75)
      .f32(0x49, 0)
      .f32(0x4d, 12)
      .f32(0x61, 3.5)
      .f32(0x65, 6);

    decodePostFrame(newSession(), record.view(), snapshot);

    expect(snapshot.players.get(2)).toMatchObject({
      hitlag: true,
      hitstunFramesLeft: 7,
      onGround: false,
      jumpsLeft: 2,
      invulnerable: true,
      speedAirXSelf: 1.25,
      speedYSelf: -2.5,
      speedXAttack: 3,
      speedYAttack: 4,
      speedGroundXSelf: 0.75,
      ecbTop: { x: 0, y: 12 },
      ecbRight: { x: 3.5, y: 6 },
    });
  });

  test("a record ending mid ECB pair defaults only the missing half", () => {
    const snapshot = createSnapshot();
    decodePostFrame(newSession(), headRecord(0x4d).f32(0x49, 2).view(), snapshot);
    expect(snapshot.players.get(2)?.ecbTop).toEqual({ x: 2, y: 0 });
  });

  test("NaN hitstun becomes 0", () => {
    const snapshot = createSnapshot();
    decodePostFrame(newSession(), headRecord(0x69).f32(0x2b, Number.NaN).view(), snapshot);
    expect(snapshot.players.get(2)?.hitstunFramesLeft).toBe(0);
  });

  test("unknown ids map to sentinels", () => {
    const snapshot = createSnapshot();
    decodePostFrame(newSession(), headRecord().u8(0x7, 200).u16(0x8, 0x3ff).view(), snapshot);

    expect(snapshot.players.get(2)?.character).toBe(Character.UNKNOWN_CHARACTER);
    expect(snapshot.players.get(2)?.action).toBe(Action.UNKNOWN_ANIMATION);
  });

  test("throws on a record missing the fixed head", () => {
    const record = new RecordBuilder(Command.PostFrameUpdate, 0x20).i32(0x1, 120).u8(0x5, 1);
    expect(() => decodePostFrame(newSession(), record.view(), createSnapshot())).toThrow(RangeError);
  });
});
