import { describe, expect, test } from "vitest";
import { NO_OWNER, UNKNOWN_PROJECTILE } from "../../game/enums";
import { DecoderSession } from "../../game/session";
import { createSnapshot } from "../../game/snapshot";
import { RecordBuilder, testTables } from "../../testing/stream-builder";
import { Command } from "../commands";
import { decodeItemUpdate, toOwner } from "./item-update";

function item(subtype: number, owner: number, length: number = 0x2c): RecordBuilder {
  return new RecordBuilder(Command.ItemUpdate, length)
    .u16(0x5, subtype)
    .f32(0xc, 1.5)
    .f32(0x10, -0.5)
    .f32(0x14, 20)
    .f32(0x18, 8)
    .u8(0x2a, owner);
}

describe("decodeItemUpdate", () => {
  const session = new DecoderSession(testTables(), { allowOldVersion: false });

  test("appends a projectile", () => {
    const snapshot = createSnapshot();
    decodeItemUpdate(session, item(53, 0).view(), snapshot);
    decodeItemUpdate(session, item(53, 3).view(), snapshot);

    expect(snapshot.projectiles).toEqual([
      { x: 20, y: 8, speedX: 1.5, speedY: -0.5, owner: 1, subtype: 53 },
      { x: 20, y: 8, speedX: 1.5, speedY: -0.5, owner: 4, subtype: 53 },
    ]);
  });

  test("unknown item ids get the unknown subtype", () => {
    const snapshot = createSnapshot();
    decodeItemUpdate(session, item(999, 0).view(), snapshot);
    expect(snapshot.projectiles[0]?.subtype).toBe(UNKNOWN_PROJECTILE);
  });

  test("owner is -1 when out of range or missing", () => {
    const snapshot = createSnapshot();
    decodeItemUpdate(session, item(53, 4).view(), snapshot);
    decodeItemUpdate(session, new RecordBuilder(Command.ItemUpdate, 0x2a).u16(0x5, 53).view(), snapshot);

    expect(snapshot.projectiles.map((p) => p.owner)).toEqual([NO_OWNER, NO_OWNER]);
  });
});

describe("toOwner", () => {
  test("converts zero-based port bytes", () => {
    expect(toOwner(0)).toBe(1);
    expect(toOwner(3)).toBe(4);
    expect(toOwner(4)).toBe(NO_OWNER);
    expect(toOwner(0xff)).toBe(NO_OWNER);
  });
});
