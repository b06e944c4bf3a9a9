import { describe, it, expect } from 'vitest';
import { BufferOverflowError, InvalidTypeError } from './errors';
import { TypeCode, decodeHead, encodeHead, isTypeCode, typeName } from './types';

describe('field header', () => {
  it('packs tags below 15 into one byte', () => {
    expect(encodeHead(0, TypeCode.Int1)).toEqual(new Uint8Array([0x00]));
    expect(encodeHead(1, TypeCode.String1)).toEqual(new Uint8Array([0x16]));
    expect(encodeHead(14, TypeCode.SimpleList)).toEqual(new Uint8Array([0xed]));
  });

  it('uses the extended form for tags 15 and above', () => {
    expect(encodeHead(15, TypeCode.Int1)).toEqual(new Uint8Array([0xf0, 0x0f]));
    expect(encodeHead(255, TypeCode.StructEnd)).toEqual(new Uint8Array([0xfb, 0xff]));
  });

  it('decodes compact and extended headers', () => {
    expect(decodeHead(new Uint8Array([0x16]))).toEqual({ tag: 1, type: TypeCode.String1, bytesRead: 1 });
    expect(decodeHead(new Uint8Array([0xf0, 0x0f]))).toEqual({ tag: 15, type: TypeCode.Int1, bytesRead: 2 });
  });

  it('decodes at an offset', () => {
    expect(decodeHead(new Uint8Array([0x00, 0x01, 0x2c]), 2)).toEqual({
      tag: 2,
      type: TypeCode.ZeroTag,
      bytesRead: 1,
    });
  });

  it('roundtrips every tag and type', () => {
    for (let tag = 0; tag <= 255; tag += 17) {
      for (let type = TypeCode.Int1; type <= TypeCode.SimpleList; type++) {
        const head = encodeHead(tag, type);
        expect(decodeHead(head)).toEqual({ tag, type, bytesRead: head.length });
      }
    }
  });

  it('rejects unknown type codes', () => {
    const error = captureError(() => decodeHead(new Uint8Array([0x0e])));
    expect(error).toBeInstanceOf(InvalidTypeError);
    expect(error).toMatchObject({ offset: 0, code: 14 });
  });

  it('reports the offset of a missing extended tag byte', () => {
    const error = captureError(() => decodeHead(new Uint8Array([0x00, 0xf2]), 1));
    expect(error).toBeInstanceOf(BufferOverflowError);
    expect(error).toMatchObject({ offset: 2 });
  });

  it('fails on empty input', () => {
    expect(() => decodeHead(new Uint8Array(0))).toThrow(BufferOverflowError);
  });
});

describe('type codes', () => {
  it('recognizes the fourteen wire codes', () => {
    expect(isTypeCode(0)).toBe(true);
    expect(isTypeCode(13)).toBe(true);
    expect(isTypeCode(14)).toBe(false);
    expect(isTypeCode(255)).toBe(false);
  });

  it('names types for display', () => {
    expect(typeName(TypeCode.Int1)).toBe('Byte');
    expect(typeName(TypeCode.String4)).toBe('Str');
    expect(typeName(TypeCode.StructBegin)).toBe('Struct');
    expect(typeName(TypeCode.ZeroTag)).toBe('Zero');
  });
});

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected an error');
}
