import { describe, expect, test } from "vitest";
import fc from "fast-check";
import { BinaryCodec, BinaryPrimitives, RecordView } from "./binary-codec";

describe("BinaryPrimitives", () => {
  test("multi-byte values are big-endian", () => {
    const buf = new Uint8Array(4);
    BinaryCodec.writeAt(BinaryCodec.u16, buf, 0, 0x1234);
    expect(Array.from(buf.subarray(0, 2))).toEqual([0x12, 0x34]);

    BinaryCodec.writeAt(BinaryCodec.i32, buf, 0, -2);
    expect(Array.from(buf)).toEqual([0xff, 0xff, 0xff, 0xfe]);
  });

  test("f32 reads back what was written for exactly representable values", () => {
    fc.assert(
      fc.property(fc.integer({ min: -100000, max: 100000 }), (n) => {
        const buf = new Uint8Array(4);
        const value = n / 4;
        BinaryCodec.writeAt(BinaryCodec.f32, buf, 0, value);
        expect(new RecordView(buf).read(BinaryCodec.f32, 0)).toBe(value);
      })
    );
  });

  test("vec2 packs x then y", () => {
    const buf = new Uint8Array(8);
    BinaryCodec.writeAt(BinaryPrimitives.vec2, buf, 0, { x: 1.5, y: -2 });
    const view = new RecordView(buf);
    expect(view.read(BinaryCodec.f32, 0)).toBe(1.5);
    expect(view.read(BinaryCodec.f32, 4)).toBe(-2);
    expect(view.read(BinaryPrimitives.vec2, 0)).toEqual({ x: 1.5, y: -2 });
  });

  test("bool treats any non-zero byte as true", () => {
    const view = new RecordView(new Uint8Array([0, 1, 0x80]));
    expect(view.read(BinaryPrimitives.bool, 0)).toBe(false);
    expect(view.read(BinaryPrimitives.bool, 1)).toBe(true);
    expect(view.read(BinaryPrimitives.bool, 2)).toBe(true);
  });
});

describe("RecordView", () => {
  test("exposes the command byte and length", () => {
    const view = new RecordView(new Uint8Array([0x38, 0, 0]));
    expect(view.command).toBe(0x38);
    expect(view.length).toBe(3);
  });

  test("respects the byte offset of a subarray", () => {
    const backing = new Uint8Array([0xaa, 0x3c, 0x00, 0x00, 0x00, 0x07]);
    const view = new RecordView(backing.subarray(1));
    expect(view.command).toBe(0x3c);
    expect(view.read(BinaryCodec.i32, 1)).toBe(7);
  });

  test("has() checks that the whole field fits", () => {
    const view = new RecordView(new Uint8Array(5));
    expect(view.has(BinaryCodec.i32, 1)).toBe(true);
    expect(view.has(BinaryCodec.i32, 2)).toBe(false);
    expect(view.has(BinaryCodec.u8, -1)).toBe(false);
  });

  test("read() throws past the end of the record", () => {
    const view = new RecordView(new Uint8Array(3));
    expect(() => view.read(BinaryCodec.f32, 1)).toThrow(RangeError);
    expect(() => view.read(BinaryCodec.f32, 1)).toThrow("Record too small: field at 0x1 needs 5 bytes, got 3");
  });

  test("readOr() falls back instead of reading past the end", () => {
    const view = new RecordView(new Uint8Array([0x38, 0x09]));
    expect(view.readOr(BinaryCodec.u8, 1, 0)).toBe(9);
    expect(view.readOr(BinaryCodec.u8, 2, 42)).toBe(42);
    expect(view.readOr(BinaryCodec.u16, 1, null)).toBeNull();
  });
});

describe("BinaryCodec.writeAt", () => {
  test("throws when the buffer is too small", () => {
    expect(() => BinaryCodec.writeAt(BinaryCodec.u16, new Uint8Array(2), 1, 5)).toThrow(
      "Buffer too small: expected 3 bytes, got 2"
    );
  });
});
