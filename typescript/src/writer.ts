import { EncodeError } from "./errors";
import {
  EXTENDED_TAG_MARKER,
  MAX_COMPACT_TAG,
  MAX_STRING1_LENGTH,
  MAX_TAG,
  MaxInt64,
  MinInt64,
  SIMPLE_LIST_ELEMENT_BYTE,
  TAG_SHIFT,
  TypeCode,
} from "./types";

const INITIAL_CAPACITY = 128;
const GROWTH_FACTOR = 2;

const INT8_MIN = -0x80;
const INT8_MAX = 0x7f;
const INT16_MIN = -0x8000;
const INT16_MAX = 0x7fff;
const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;
const MAX_STRING4_LENGTH = 0xffffffff;

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

/**
 * Options for Writer construction.
 */
export interface WriterOptions {
  /** Write multi-byte values little-endian. Default: false */
  littleEndian?: boolean;
  /** Initial buffer capacity. Default: 128 */
  initialCapacity?: number;
}

/**
 * Writer encodes JCE fields into a growable binary buffer.
 *
 * Writing never fails on well-typed input; values that cannot be
 * represented (out-of-range integers, invalid tags) are rejected before
 * any byte is appended.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  readonly littleEndian: boolean;

  constructor(options: WriterOptions = {}) {
    this.buffer = new Uint8Array(options.initialCapacity ?? INITIAL_CAPACITY);
    this.view = new DataView(this.buffer.buffer);
    this.pos = 0;
    this.littleEndian = options.littleEndian ?? false;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   *
   * The result is a view into the internal buffer and is invalidated by
   * the next write or reset.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Returns a copy of the encoded bytes.
   */
  toBytes(): Uint8Array {
    return this.buffer.slice(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has room for the specified number of bytes.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = Math.max(this.buffer.length, 1) * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
    this.view = new DataView(this.buffer.buffer);
  }

  /**
   * Writes a field header.
   */
  writeHead(tag: number, type: TypeCode): void {
    if (!Number.isInteger(tag) || tag < 0 || tag > MAX_TAG) {
      throw new EncodeError(`Tag ${tag} is out of range 0-${MAX_TAG}`);
    }
    if (tag <= MAX_COMPACT_TAG) {
      this.writeByte((tag << TAG_SHIFT) | type);
    } else {
      this.ensureCapacity(2);
      this.buffer[this.pos++] = (EXTENDED_TAG_MARKER << TAG_SHIFT) | type;
      this.buffer[this.pos++] = tag;
    }
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes.
   */
  writeRaw(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes an integer field using the narrowest encoding.
   *
   * Zero is written as a bare ZeroTag header.
   */
  writeInt(tag: number, value: number | bigint): void {
    if (typeof value === "bigint") {
      this.writeBigInt(tag, value);
      return;
    }
    if (!Number.isInteger(value)) {
      throw new EncodeError(`Cannot write ${value} as an integer`);
    }

    if (value === 0) {
      this.writeHead(tag, TypeCode.ZeroTag);
    } else if (value >= INT8_MIN && value <= INT8_MAX) {
      this.writeHead(tag, TypeCode.Int1);
      this.ensureCapacity(1);
      this.view.setInt8(this.pos, value);
      this.pos += 1;
    } else if (value >= INT16_MIN && value <= INT16_MAX) {
      this.writeHead(tag, TypeCode.Int2);
      this.ensureCapacity(2);
      this.view.setInt16(this.pos, value, this.littleEndian);
      this.pos += 2;
    } else if (value >= INT32_MIN && value <= INT32_MAX) {
      this.writeHead(tag, TypeCode.Int4);
      this.ensureCapacity(4);
      this.view.setInt32(this.pos, value, this.littleEndian);
      this.pos += 4;
    } else {
      this.writeBigInt(tag, BigInt(value));
    }
  }

  private writeBigInt(tag: number, value: bigint): void {
    if (value < MinInt64 || value > MaxInt64) {
      throw new EncodeError(
        `Integer ${value} is outside the 64-bit signed range [${MinInt64}, ${MaxInt64}]`
      );
    }
    if (value >= BigInt(INT32_MIN) && value <= BigInt(INT32_MAX)) {
      this.writeInt(tag, Number(value));
      return;
    }
    this.writeHead(tag, TypeCode.Int8);
    this.ensureCapacity(8);
    this.view.setBigInt64(this.pos, value, this.littleEndian);
    this.pos += 8;
  }

  /**
   * Writes a 32-bit float field (IEEE 754).
   */
  writeFloat(tag: number, value: number): void {
    this.writeHead(tag, TypeCode.Float);
    this.ensureCapacity(4);
    this.view.setFloat32(this.pos, value, this.littleEndian);
    this.pos += 4;
  }

  /**
   * Writes a 64-bit float field (IEEE 754).
   */
  writeDouble(tag: number, value: number): void {
    this.writeHead(tag, TypeCode.Double);
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value, this.littleEndian);
    this.pos += 8;
  }

  /**
   * Writes a UTF-8 string field.
   *
   * Strings up to 255 bytes use String1, longer ones String4.
   */
  writeString(tag: number, value: string): void {
    const bytes = textEncoder.encode(value);
    if (bytes.length <= MAX_STRING1_LENGTH) {
      this.writeHead(tag, TypeCode.String1);
      this.writeByte(bytes.length);
    } else {
      if (bytes.length > MAX_STRING4_LENGTH) {
        throw new EncodeError(`String of ${bytes.length} bytes is too long`);
      }
      this.writeHead(tag, TypeCode.String4);
      this.ensureCapacity(4);
      this.view.setUint32(this.pos, bytes.length, this.littleEndian);
      this.pos += 4;
    }
    this.writeRaw(bytes);
  }

  /**
   * Writes a byte array field (SimpleList).
   *
   * Format: [head] [element type: 0] [count: int field, tag 0] [bytes]
   */
  writeBytes(tag: number, value: Uint8Array): void {
    this.writeHead(tag, TypeCode.SimpleList);
    this.writeByte(SIMPLE_LIST_ELEMENT_BYTE);
    this.writeInt(0, value.length);
    this.writeRaw(value);
  }
}
