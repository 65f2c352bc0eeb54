import { describe, expect, test } from "vitest";
import { createSnapshot, playerAt } from "../../game/snapshot";
import { RecordBuilder } from "../../testing/stream-builder";
import { Command } from "../commands";
import { decodeFrameBookend, playerDistance } from "./frame-bookend";

describe("decodeFrameBookend", () => {
  test("sets the frame index", () => {
    const snapshot = createSnapshot();
    decodeFrameBookend(new RecordBuilder(Command.FrameBookend, 9).i32(0x1, -123).view(), snapshot);
    expect(snapshot.frame).toBe(-123);
  });
});

describe("playerDistance", () => {
  test("uses the two lowest-numbered active ports", () => {
    const snapshot = createSnapshot();
    Object.assign(playerAt(snapshot, 4), { x: 100, y: 100 });
    Object.assign(playerAt(snapshot, 3), { x: 3, y: 4 });
    Object.assign(playerAt(snapshot, 1), { x: 0, y: 0 });

    expect(playerDistance(snapshot)).toBe(5);
  });

  test("is 0 with fewer than two ports", () => {
    const snapshot = createSnapshot();
    expect(playerDistance(snapshot)).toBe(0);
    playerAt(snapshot, 2).x = 50;
    expect(playerDistance(snapshot)).toBe(0);
  });
});
