import { describe, expect, test } from "vitest";
import { Stage } from "../../game/enums";
import { DecoderSession } from "../../game/session";
import { FRAME_NOT_STARTED } from "../../game/snapshot";
import { RecordBuilder, testTables } from "../../testing/stream-builder";
import { Command } from "../commands";
import { UnsupportedVersionError } from "../errors";
import { decodeSessionStart } from "./session-start";

function sessionStart(major: number, minor: number, build: number, stage: number): RecordBuilder {
  return new RecordBuilder(Command.SessionStart, 0x140)
    .u8(0x1, major)
    .u8(0x2, minor)
    .u8(0x3, build)
    .u16(0x13, stage);
}

describe("decodeSessionStart", () => {
  test("reads version and maps the external stage id", () => {
    const session = new DecoderSession(testTables(), { allowOldVersion: false });
    const info = decodeSessionStart(session, sessionStart(3, 12, 0, 32).view());

    expect(info).toEqual({ version: "3.12.0", legacyBookends: false, stage: Stage.FINAL_DESTINATION });
    expect(session.version).toBe("3.12.0");
    expect(session.stage).toBe(Stage.FINAL_DESTINATION);
  });

  test("unmapped stage ids become NO_STAGE", () => {
    const session = new DecoderSession(testTables(), { allowOldVersion: false });
    decodeSessionStart(session, sessionStart(3, 0, 0, 999).view());
    expect(session.stage).toBe(Stage.NO_STAGE);
  });

  test("fills costume and CPU side tables per port", () => {
    const session = new DecoderSession(testTables(), { allowOldVersion: false });
    const record = sessionStart(3, 12, 0, 31)
      // port 1: human with a stray CPU level byte
      .u8(0x66, 0)
      .u8(0x68, 2)
      .u8(0x74, 9)
      // port 2: CPU level 7
      .u8(0x66 + 0x24, 1)
      .u8(0x68 + 0x24, 3)
      .u8(0x74 + 0x24, 7);

    decodeSessionStart(session, record.view());

    expect(session.costumes).toEqual([2, 3, 0, 0]);
    expect(session.cpuLevels).toEqual([0, 7, 0, 0]);
  });

  test("short records leave side tables at their defaults", () => {
    const session = new DecoderSession(testTables(), { allowOldVersion: false });
    const record = new RecordBuilder(Command.SessionStart, 0x20).u8(0x1, 3).u16(0x13, 32);

    decodeSessionStart(session, record.view());

    expect(session.costumes).toEqual([0, 0, 0, 0]);
    expect(session.cpuLevels).toEqual([0, 0, 0, 0]);
  });

  test("resets frame progress", () => {
    const session = new DecoderSession(testTables(), { allowOldVersion: false });
    session.lastDeliveredFrame = 500;
    session.lastSeenFrame = 500;

    decodeSessionStart(session, sessionStart(3, 12, 0, 32).view());

    expect(session.lastDeliveredFrame).toBe(FRAME_NOT_STARTED);
    expect(session.lastSeenFrame).toBe(FRAME_NOT_STARTED);
  });

  test("rejects old streams without opt-in", () => {
    const session = new DecoderSession(testTables(), { allowOldVersion: false });
    expect(() => decodeSessionStart(session, sessionStart(2, 0, 1, 32).view())).toThrow(UnsupportedVersionError);
    expect(session.version).toBe("unknown");
  });

  test("old streams switch to legacy bookends when allowed", () => {
    const session = new DecoderSession(testTables(), { allowOldVersion: true });
    const info = decodeSessionStart(session, sessionStart(2, 0, 1, 32).view());

    expect(info.legacyBookends).toBe(true);
    expect(session.legacyBookends).toBe(true);
    expect(info.version).toBe("2.0.1");
  });
});
