import { BufferOverflowError, DecodeError, DepthExceededError } from "./errors";
import {
  type FieldHead,
  MAX_DEPTH,
  SIMPLE_LIST_ELEMENT_BYTE,
  TypeCode,
  decodeHead,
  isIntegerType,
} from "./types";

// Module-level singleton to avoid repeated instantiation
const textDecoder = new TextDecoder("utf-8", { fatal: true });

const MAX_SIZE = 0x7fffffff;

/**
 * Reader decodes JCE fields from a binary buffer.
 *
 * All reads are bounds-checked; running past the end throws a
 * BufferOverflowError carrying the offset of the failed read.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;
  private depth: number;
  readonly littleEndian: boolean;

  constructor(data: Uint8Array, littleEndian: boolean = false) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
    this.depth = 0;
    this.littleEndian = littleEndian;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new BufferOverflowError(this.pos);
    }
  }

  /**
   * Reads a field header.
   */
  readHead(): FieldHead {
    const { tag, type, bytesRead } = decodeHead(this.buffer, this.pos);
    this.pos += bytesRead;
    return { tag, type };
  }

  /**
   * Reads a field header without advancing.
   */
  peekHead(): FieldHead {
    const { tag, type } = decodeHead(this.buffer, this.pos);
    return { tag, type };
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads raw bytes.
   *
   * The result is a view into the source buffer, not a copy.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.subarray(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Reads an integer payload of the given type.
   *
   * Int8 values outside the safe-integer range are returned as bigint.
   */
  readInt(type: TypeCode): number | bigint {
    let value: number | bigint;
    switch (type) {
      case TypeCode.ZeroTag:
        return 0;
      case TypeCode.Int1:
        this.checkAvailable(1);
        value = this.view.getInt8(this.pos);
        this.pos += 1;
        return value;
      case TypeCode.Int2:
        this.checkAvailable(2);
        value = this.view.getInt16(this.pos, this.littleEndian);
        this.pos += 2;
        return value;
      case TypeCode.Int4:
        this.checkAvailable(4);
        value = this.view.getInt32(this.pos, this.littleEndian);
        this.pos += 4;
        return value;
      case TypeCode.Int8: {
        this.checkAvailable(8);
        const wide = this.view.getBigInt64(this.pos, this.littleEndian);
        this.pos += 8;
        if (wide >= BigInt(Number.MIN_SAFE_INTEGER) && wide <= BigInt(Number.MAX_SAFE_INTEGER)) {
          return Number(wide);
        }
        return wide;
      }
      default:
        throw new DecodeError(this.pos, `Cannot read int from type ${TypeCode[type]}`);
    }
  }

  /**
   * Reads a 32-bit float (IEEE 754).
   */
  readFloat(): number {
    this.checkAvailable(4);
    const value = this.view.getFloat32(this.pos, this.littleEndian);
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readDouble(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos, this.littleEndian);
    this.pos += 8;
    return value;
  }

  /**
   * Reads a length-prefixed string payload.
   *
   * Invalid UTF-8 is a DecodeError, never a replacement character.
   */
  readString(type: TypeCode): string {
    let length: number;
    if (type === TypeCode.String1) {
      length = this.readByte();
    } else if (type === TypeCode.String4) {
      this.checkAvailable(4);
      length = this.view.getUint32(this.pos, this.littleEndian);
      this.pos += 4;
    } else {
      throw new DecodeError(this.pos, `Cannot read string from type ${TypeCode[type]}`);
    }

    const start = this.pos;
    const bytes = this.readBytes(length);
    try {
      return textDecoder.decode(bytes);
    } catch (e) {
      this.pos = start;
      throw new DecodeError(start, `Invalid UTF-8 string: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  /**
   * Reads a container size: a header followed by an integer payload.
   */
  readSize(): number {
    const offset = this.pos;
    const { type } = this.readHead();
    if (!isIntegerType(type)) {
      throw new DecodeError(offset, `Invalid size type ${TypeCode[type]}`);
    }
    const size = this.readInt(type);
    if (typeof size === "bigint" || size < 0 || size > MAX_SIZE) {
      throw new DecodeError(offset, `Invalid size ${size}`);
    }
    return size;
  }

  /**
   * Reads the element-type byte and count that open a SimpleList payload.
   *
   * @returns the number of bytes that follow
   */
  readSimpleListLength(): number {
    const offset = this.pos;
    const element = this.readByte();
    if (element !== SIMPLE_LIST_ELEMENT_BYTE) {
      throw new DecodeError(offset, `SimpleList must contain Byte (0), got ${element}`);
    }
    return this.readSize();
  }

  /**
   * Skips a field payload based on its type, recursing into containers.
   *
   * @throws DepthExceededError if nesting passes the depth limit
   */
  skipField(type: TypeCode): void {
    if (this.depth > MAX_DEPTH) {
      throw new DepthExceededError(MAX_DEPTH);
    }
    this.depth++;
    try {
      this.doSkipField(type);
    } finally {
      this.depth--;
    }
  }

  private doSkipField(type: TypeCode): void {
    switch (type) {
      case TypeCode.Int1:
        this.skip(1);
        break;
      case TypeCode.Int2:
        this.skip(2);
        break;
      case TypeCode.Int4:
      case TypeCode.Float:
        this.skip(4);
        break;
      case TypeCode.Int8:
      case TypeCode.Double:
        this.skip(8);
        break;
      case TypeCode.String1:
        this.skip(this.readByte());
        break;
      case TypeCode.String4: {
        this.checkAvailable(4);
        const length = this.view.getUint32(this.pos, this.littleEndian);
        this.pos += 4;
        this.skip(length);
        break;
      }
      case TypeCode.Map: {
        const size = this.readSize();
        for (let i = 0; i < size * 2; i++) {
          this.skipField(this.readHead().type);
        }
        break;
      }
      case TypeCode.List: {
        const size = this.readSize();
        for (let i = 0; i < size; i++) {
          this.skipField(this.readHead().type);
        }
        break;
      }
      case TypeCode.SimpleList:
        this.skip(this.readSimpleListLength());
        break;
      case TypeCode.StructBegin:
        for (;;) {
          const { type: inner } = this.readHead();
          if (inner === TypeCode.StructEnd) {
            break;
          }
          this.skipField(inner);
        }
        break;
      case TypeCode.StructEnd:
      case TypeCode.ZeroTag:
        break;
    }
  }

  /**
   * Advances past length bytes.
   */
  private skip(length: number): void {
    this.checkAvailable(length);
    this.pos += length;
  }

  /**
   * Creates a sub-reader over the next length bytes.
   */
  subReader(length: number): Reader {
    const sub = new Reader(this.readBytes(length), this.littleEndian);
    return sub;
  }
}
