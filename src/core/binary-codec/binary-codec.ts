/**
 * A binary field descriptor.
 * Defines how a single value is serialized/deserialized
 * at a fixed byte size.
 */
export type Field<T> = {
  /** Size of the field in bytes */
  size: number;

  /**
   * Writes a value into a DataView at the given offset.
   * @param dv DataView to write into
   * @param o Byte offset
   * @param v Value to write
   */
  write(dv: DataView, o: number, v: T): void;

  /**
   * Reads a value from a DataView at the given offset.
   * @param dv DataView to read from
   * @param o Byte offset
   */
  read(dv: DataView, o: number): T;
};

/**
 * Built-in big-endian field definitions.
 * Every multi-byte value in the event stream is big-endian.
 */
export class BinaryPrimitives {
  /** Unsigned 8-bit integer */
  static readonly u8: Field<number> = {
    size: 1,
    write: (dv, o, v) => dv.setUint8(o, v),
    read: (dv, o) => dv.getUint8(o),
  };

  /** Unsigned 16-bit integer (big-endian) */
  static readonly u16: Field<number> = {
    size: 2,
    write: (dv, o, v) => dv.setUint16(o, v, false),
    read: (dv, o) => dv.getUint16(o, false),
  };

  /** Signed 32-bit integer (big-endian) */
  static readonly i32: Field<number> = {
    size: 4,
    write: (dv, o, v) => dv.setInt32(o, v, false),
    read: (dv, o) => dv.getInt32(o, false),
  };

  /** 32-bit floating point number (IEEE 754, big-endian) */
  static readonly f32: Field<number> = {
    size: 4,
    write: (dv, o, v) => dv.setFloat32(o, v, false),
    read: (dv, o) => dv.getFloat32(o, false),
  };

  /** Boolean stored as 1 byte (0 = false, anything else = true) */
  static readonly bool: Field<boolean> = {
    size: 1,
    write: (dv, o, v) => dv.setUint8(o, v ? 1 : 0),
    read: (dv, o) => dv.getUint8(o) !== 0,
  };

  /** 2D vector of f32 (x, y) */
  static readonly vec2: Field<{ x: number; y: number }> = {
    size: 8,
    write(dv, o, v) {
      dv.setFloat32(o, v.x, false);
      dv.setFloat32(o + 4, v.y, false);
    },
    read(dv, o) {
      return { x: dv.getFloat32(o, false), y: dv.getFloat32(o + 4, false) };
    },
  };
}

/**
 * Read-only window over a single record.
 *
 * Offsets are relative to the record's first byte (the command byte), which
 * is how every record layout in the protocol is documented.
 *
 * Records from older protocol revisions are shorter than current ones, so
 * besides the strict {@link RecordView.read} there is {@link RecordView.readOr},
 * which resolves to a fallback instead of reading past the end.
 */
export class RecordView {
  private readonly view: DataView;

  constructor(readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get length(): number {
    return this.bytes.byteLength;
  }

  /** The command byte */
  get command(): number {
    return this.bytes[0] ?? 0;
  }

  /**
   * Whether the record is long enough to hold `field` at `offset`.
   */
  has<T>(field: Field<T>, offset: number): boolean {
    return offset >= 0 && offset + field.size <= this.bytes.byteLength;
  }

  /**
   * Reads a field that every protocol revision carries.
   * @throws RangeError when the record is too short
   */
  read<T>(field: Field<T>, offset: number): T {
    if (!this.has(field, offset)) {
      throw new RangeError(
        `Record too small: field at 0x${offset.toString(16)} needs ${offset + field.size} bytes, got ${this.bytes.byteLength}`
      );
    }
    return field.read(this.view, offset);
  }

  /**
   * Reads an optional trailing field, or returns `fallback` when the record
   * ends before it.
   */
  readOr<T, F = T>(field: Field<T>, offset: number, fallback: F): T | F {
    return this.has(field, offset) ? field.read(this.view, offset) : fallback;
  }
}

/**
 * Public codec API.
 * Re-exports primitives used throughout the decoders.
 */
export class BinaryCodec {
  static readonly u8 = BinaryPrimitives.u8;
  static readonly u16 = BinaryPrimitives.u16;
  static readonly i32 = BinaryPrimitives.i32;
  static readonly f32 = BinaryPrimitives.f32;

  /**
   * Writes `value` into `buf` at `offset`.
   */
  static writeAt<T>(field: Field<T>, buf: Uint8Array, offset: number, value: T): void {
    if (offset < 0 || offset + field.size > buf.byteLength) {
      throw new RangeError(
        `Buffer too small: expected ${offset + field.size} bytes, got ${buf.byteLength}`
      );
    }
    const view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
    field.write(view, offset, value);
  }
}
