import { describe, it, expect } from 'vitest';
import { BufferOverflowError, DecodeError, DepthExceededError } from './errors';
import { Reader } from './reader';
import { TypeCode } from './types';
import { Writer } from './writer';

function nestedLists(levels: number): Uint8Array {
  const bytes: number[] = [];
  for (let i = 0; i < levels; i++) {
    bytes.push(0x09, 0x00, 0x01);
  }
  bytes.push(0x0c);
  return new Uint8Array(bytes);
}

describe('Reader', () => {
  describe('int', () => {
    it('reads ZeroTag as 0 without consuming payload', () => {
      const reader = new Reader(new Uint8Array([0x0c]));
      const { type } = reader.readHead();
      expect(reader.readInt(type)).toBe(0);
      expect(reader.hasMore).toBe(false);
    });

    it('reads each width big-endian', () => {
      const writer = new Writer();
      writer.writeInt(0, -5);
      writer.writeInt(1, 300);
      writer.writeInt(2, -70000);
      writer.writeInt(3, 2 ** 40);
      const reader = new Reader(writer.bytes());
      const values: Array<number | bigint> = [];
      while (reader.hasMore) {
        values.push(reader.readInt(reader.readHead().type));
      }
      expect(values).toEqual([-5, 300, -70000, 2 ** 40]);
    });

    it('reads little-endian payloads', () => {
      const reader = new Reader(new Uint8Array([0x01, 0xc8, 0x00]), true);
      expect(reader.readInt(reader.readHead().type)).toBe(200);
    });

    it('returns bigint for Int8 values beyond the safe range', () => {
      const writer = new Writer();
      writer.writeInt(0, 2n ** 62n);
      const reader = new Reader(writer.bytes());
      expect(reader.readInt(reader.readHead().type)).toBe(2n ** 62n);
    });

    it('rejects non-integer types', () => {
      const reader = new Reader(new Uint8Array([0x00]));
      expect(() => reader.readInt(TypeCode.String1)).toThrow(DecodeError);
    });

    it('reports the offset of a truncated payload', () => {
      const reader = new Reader(new Uint8Array([0x02, 0x00, 0x01]));
      reader.readHead();
      expect(() => reader.readInt(TypeCode.Int4)).toThrow(new BufferOverflowError(1));
    });
  });

  describe('string', () => {
    it('reads String1 and String4', () => {
      const writer = new Writer();
      writer.writeString(0, 'hello');
      writer.writeString(1, 'y'.repeat(300));
      const reader = new Reader(writer.bytes());
      expect(reader.readString(reader.readHead().type)).toBe('hello');
      expect(reader.readString(reader.readHead().type)).toBe('y'.repeat(300));
    });

    it('rejects invalid UTF-8 with the offset of the string bytes', () => {
      const reader = new Reader(new Uint8Array([0x06, 0x02, 0xc3, 0x28]));
      const { type } = reader.readHead();
      expect(() => reader.readString(type)).toThrow(/^Error at offset 2: Invalid UTF-8 string/);
    });
  });

  describe('float', () => {
    it('reads float and double', () => {
      const writer = new Writer();
      writer.writeFloat(0, 0.5);
      writer.writeDouble(1, -2.25);
      const reader = new Reader(writer.bytes());
      reader.readHead();
      expect(reader.readFloat()).toBe(0.5);
      reader.readHead();
      expect(reader.readDouble()).toBe(-2.25);
    });
  });

  describe('size', () => {
    it('reads a ZeroTag size', () => {
      expect(new Reader(new Uint8Array([0x0c])).readSize()).toBe(0);
    });

    it('rejects negative sizes', () => {
      const reader = new Reader(new Uint8Array([0x00, 0xff]));
      expect(() => reader.readSize()).toThrow(new DecodeError(0, 'Invalid size -1'));
    });

    it('rejects sizes that are not integers', () => {
      const reader = new Reader(new Uint8Array([0x06, 0x00]));
      expect(() => reader.readSize()).toThrow(DecodeError);
    });
  });

  describe('simple list', () => {
    it('reads the byte count', () => {
      const reader = new Reader(new Uint8Array([0x0d, 0x00, 0x00, 0x03, 0x61, 0x62, 0x63]));
      reader.readHead();
      const length = reader.readSimpleListLength();
      expect(length).toBe(3);
      expect(reader.readBytes(length)).toEqual(new Uint8Array([0x61, 0x62, 0x63]));
    });

    it('rejects element types other than byte', () => {
      const reader = new Reader(new Uint8Array([0x0d, 0x02, 0x00, 0x01, 0x00, 0x00, 0x00, 0x01]));
      reader.readHead();
      expect(() => reader.readSimpleListLength()).toThrow(
        new DecodeError(1, 'SimpleList must contain Byte (0), got 2')
      );
    });
  });

  describe('skipField', () => {
    it('skips containers and nested structs', () => {
      const writer = new Writer();
      writer.writeHead(0, TypeCode.Map);
      writer.writeInt(0, 1);
      writer.writeString(0, 'k');
      writer.writeHead(1, TypeCode.List);
      writer.writeInt(0, 2);
      writer.writeInt(0, 1);
      writer.writeDouble(0, 2);
      writer.writeHead(1, TypeCode.StructBegin);
      writer.writeBytes(0, new Uint8Array([1, 2]));
      writer.writeHead(0, TypeCode.StructEnd);
      writer.writeInt(2, 42);

      const reader = new Reader(writer.bytes());
      reader.skipField(reader.readHead().type);
      reader.skipField(reader.readHead().type);
      expect(reader.readHead()).toEqual({ tag: 2, type: TypeCode.Int1 });
      expect(reader.readInt(TypeCode.Int1)).toBe(42);
    });

    it('fails on a struct without StructEnd', () => {
      const reader = new Reader(new Uint8Array([0x0a, 0x00, 0x01]));
      expect(() => reader.skipField(reader.readHead().type)).toThrow(BufferOverflowError);
    });

    it('stops at the depth limit', () => {
      const reader = new Reader(nestedLists(150));
      expect(() => reader.skipField(reader.readHead().type)).toThrow(DepthExceededError);
    });

    it('skips nesting within the depth limit', () => {
      const data = nestedLists(50);
      const reader = new Reader(data);
      reader.skipField(reader.readHead().type);
      expect(reader.position).toBe(data.length);
    });
  });

  it('creates sub-readers over a slice', () => {
    const reader = new Reader(new Uint8Array([0x00, 0x01, 0x10, 0x02]));
    const sub = reader.subReader(2);
    expect(sub.readHead()).toEqual({ tag: 0, type: TypeCode.Int1 });
    expect(reader.readHead()).toEqual({ tag: 1, type: TypeCode.Int1 });
  });
});
