import {
  EXTENDED_TAG_MARKER,
  MAX_DEPTH,
  SIMPLE_LIST_ELEMENT_BYTE,
  TAG_SHIFT,
  TYPE_MASK,
  TypeCode,
  isTypeCode,
} from "./types";

const INVALID = -1;

/**
 * Scanner walks a buffer and checks that it is a structurally valid
 * struct body without materializing any value.
 *
 * It shares the traversal grammar of Reader.skipField but never throws
 * and never allocates; every step reports failure through its return value.
 */
export class Scanner {
  private readonly buffer: Uint8Array;
  private readonly view: DataView;
  private readonly littleEndian: boolean;
  private pos: number;
  private depth: number;

  constructor(data: Uint8Array, littleEndian: boolean = false) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.littleEndian = littleEndian;
    this.pos = 0;
    this.depth = 0;
  }

  /**
   * Offset at which scanning stopped.
   */
  get position(): number {
    return this.pos;
  }

  get isEnd(): boolean {
    return this.pos >= this.buffer.length;
  }

  /**
   * Validates a struct body up to its StructEnd.
   *
   * At the outermost level the input may also end without a StructEnd,
   * which is how a bare packet of fields looks.
   */
  validateStruct(): boolean {
    if (this.depth > MAX_DEPTH) {
      return false;
    }
    this.depth++;

    while (!this.isEnd) {
      const type = this.readType();
      if (type === INVALID) {
        return false;
      }
      if (type === TypeCode.StructEnd) {
        this.depth--;
        return true;
      }
      if (!this.skipField(type)) {
        return false;
      }
    }

    const atRoot = this.depth === 1;
    this.depth--;
    return atRoot;
  }

  /**
   * Reads a header and returns its type code, or INVALID.
   */
  private readType(): number {
    if (this.pos >= this.buffer.length) {
      return INVALID;
    }
    const b = this.buffer[this.pos++];
    if (b >> TAG_SHIFT === EXTENDED_TAG_MARKER) {
      if (this.pos >= this.buffer.length) {
        return INVALID;
      }
      this.pos++;
    }
    const code = b & TYPE_MASK;
    return isTypeCode(code) ? code : INVALID;
  }

  private skipField(type: TypeCode): boolean {
    switch (type) {
      case TypeCode.Int1:
        return this.skip(1);
      case TypeCode.Int2:
        return this.skip(2);
      case TypeCode.Int4:
      case TypeCode.Float:
        return this.skip(4);
      case TypeCode.Int8:
      case TypeCode.Double:
        return this.skip(8);
      case TypeCode.String1: {
        if (this.pos >= this.buffer.length) {
          return false;
        }
        return this.skip(this.buffer[this.pos++]);
      }
      case TypeCode.String4: {
        if (this.pos + 4 > this.buffer.length) {
          return false;
        }
        const length = this.view.getUint32(this.pos, this.littleEndian);
        this.pos += 4;
        return this.skip(length);
      }
      case TypeCode.Map:
        return this.skipElements(2);
      case TypeCode.List:
        return this.skipElements(1);
      case TypeCode.SimpleList: {
        if (this.pos >= this.buffer.length || this.buffer[this.pos] !== SIMPLE_LIST_ELEMENT_BYTE) {
          return false;
        }
        this.pos++;
        const size = this.readSize();
        return size !== INVALID && this.skip(size);
      }
      case TypeCode.StructBegin:
        return this.validateNested();
      case TypeCode.StructEnd:
      case TypeCode.ZeroTag:
        return true;
    }
  }

  /**
   * Validates a nested struct, which must close with StructEnd.
   */
  private validateNested(): boolean {
    if (this.depth > MAX_DEPTH) {
      return false;
    }
    this.depth++;
    while (!this.isEnd) {
      const type = this.readType();
      if (type === INVALID) {
        return false;
      }
      if (type === TypeCode.StructEnd) {
        this.depth--;
        return true;
      }
      if (!this.skipField(type)) {
        return false;
      }
    }
    return false;
  }

  private skipElements(perEntry: number): boolean {
    const size = this.readSize();
    if (size === INVALID) {
      return false;
    }
    if (this.depth > MAX_DEPTH) {
      return false;
    }
    this.depth++;
    for (let i = 0; i < size * perEntry; i++) {
      const type = this.readType();
      if (type === INVALID || !this.skipField(type)) {
        return false;
      }
    }
    this.depth--;
    return true;
  }

  /**
   * Reads a container size, or INVALID if it is malformed or negative.
   */
  private readSize(): number {
    const type = this.readType();
    let size: number;
    switch (type) {
      case TypeCode.ZeroTag:
        return 0;
      case TypeCode.Int1:
        if (this.pos + 1 > this.buffer.length) return INVALID;
        size = this.view.getInt8(this.pos);
        this.pos += 1;
        break;
      case TypeCode.Int2:
        if (this.pos + 2 > this.buffer.length) return INVALID;
        size = this.view.getInt16(this.pos, this.littleEndian);
        this.pos += 2;
        break;
      case TypeCode.Int4:
        if (this.pos + 4 > this.buffer.length) return INVALID;
        size = this.view.getInt32(this.pos, this.littleEndian);
        this.pos += 4;
        break;
      case TypeCode.Int8: {
        if (this.pos + 8 > this.buffer.length) return INVALID;
        const wide = this.view.getBigInt64(this.pos, this.littleEndian);
        this.pos += 8;
        if (wide < 0n || wide > 0x7fffffffn) return INVALID;
        size = Number(wide);
        break;
      }
      default:
        return INVALID;
    }
    return size < 0 ? INVALID : size;
  }

  private skip(length: number): boolean {
    if (this.pos + length > this.buffer.length) {
      return false;
    }
    this.pos += length;
    return true;
  }
}

/**
 * Returns true if data is a structurally valid struct body that is
 * consumed completely.
 */
export function probeStruct(data: Uint8Array, littleEndian: boolean = false): boolean {
  const scanner = new Scanner(data, littleEndian);
  return scanner.validateStruct() && scanner.isEnd;
}
