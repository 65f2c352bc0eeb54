import { describe, expect, test, beforeEach } from "vitest";
import { RecordView } from "../../core/binary-codec";
import { Command } from "../commands";
import { UnknownCommandError } from "../errors";
import { EventSizeTable } from "./event-size-table";

describe("EventSizeTable", () => {
  let table: EventSizeTable;

  beforeEach(() => {
    table = new EventSizeTable();
  });

  test("stores lengths with the command byte included", () => {
    table.register(0x37, 0x3f);
    expect(table.sizeOf(0x37)).toBe(0x40);
    expect(table.has(0x37)).toBe(true);
  });

  test("loads every entry of a payload descriptor", () => {
    // n = 7: two entries of (u8 command, u16 length)
    const descriptor = new Uint8Array([0x35, 0x07, 0x36, 0x01, 0x3f, 0x3c, 0x00, 0x08]);
    const count = table.loadDescriptor(new RecordView(descriptor));

    expect(count).toBe(2);
    expect(table.sizeOf(0x36)).toBe(0x140);
    expect(table.sizeOf(0x3c)).toBe(9);
    expect(table.getCommands()).toEqual([0x36, 0x3c]);
  });

  test("throws UnknownCommandError for unregistered commands", () => {
    expect(() => table.sizeOf(0x99)).toThrow(UnknownCommandError);
    expect(() => table.sizeOf(0x99)).toThrow("No event size registered for command 0x99");
  });

  test("descriptor length comes from its own size byte", () => {
    const buf = new Uint8Array([0x00, 0x35, 0x04]);
    expect(EventSizeTable.descriptorLength(buf, 1)).toBe(5);
    expect(table.recordLength(buf, 1)).toBe(5);
  });

  test("descriptor length is unknown until the size byte arrives", () => {
    expect(EventSizeTable.descriptorLength(new Uint8Array([Command.PayloadDescriptor]))).toBeNull();
    expect(table.recordLength(new Uint8Array([Command.PayloadDescriptor]), 0)).toBeNull();
  });

  test("clear() forgets all registrations", () => {
    table.register(0x38, 0x68);
    table.clear();
    expect(table.has(0x38)).toBe(false);
    expect(table.getCommands()).toEqual([]);
  });
});
