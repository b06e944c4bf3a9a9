import { describe, it, expect } from 'vitest';
import { Scanner, probeStruct } from './scanner';
import { TypeCode } from './types';
import { Writer } from './writer';

function sampleStruct(): Uint8Array {
  const writer = new Writer();
  writer.writeInt(0, 1);
  writer.writeString(1, 'name');
  writer.writeHead(2, TypeCode.List);
  writer.writeInt(0, 2);
  writer.writeInt(0, 10);
  writer.writeInt(0, 20);
  writer.writeHead(3, TypeCode.StructBegin);
  writer.writeDouble(0, 1.5);
  writer.writeHead(0, TypeCode.StructEnd);
  writer.writeBytes(4, new Uint8Array([0xff, 0x00]));
  return writer.toBytes();
}

describe('Scanner', () => {
  it('accepts a well-formed struct body', () => {
    const data = sampleStruct();
    const scanner = new Scanner(data);
    expect(scanner.validateStruct()).toBe(true);
    expect(scanner.isEnd).toBe(true);
    expect(scanner.position).toBe(data.length);
  });

  it('accepts an empty body', () => {
    expect(probeStruct(new Uint8Array(0))).toBe(true);
  });

  it('stops at a top-level StructEnd', () => {
    const scanner = new Scanner(new Uint8Array([0x00, 0x01, 0x0b, 0x00]));
    expect(scanner.validateStruct()).toBe(true);
    expect(scanner.position).toBe(3);
    expect(scanner.isEnd).toBe(false);
  });

  it('rejects truncated input', () => {
    const data = sampleStruct();
    for (const cut of [1, 4, data.length - 1]) {
      expect(probeStruct(data.subarray(0, cut))).toBe(false);
    }
  });

  it('rejects a nested struct without StructEnd', () => {
    expect(probeStruct(new Uint8Array([0x0a, 0x00, 0x01]))).toBe(false);
  });

  it('rejects unknown type codes', () => {
    expect(probeStruct(new Uint8Array([0x0e]))).toBe(false);
  });

  it('rejects negative container sizes', () => {
    expect(probeStruct(new Uint8Array([0x09, 0x00, 0xff]))).toBe(false);
  });

  it('rejects a SimpleList whose element type is not byte', () => {
    expect(probeStruct(new Uint8Array([0x0d, 0x01, 0x00, 0x01, 0x00]))).toBe(false);
  });

  it('rejects trailing bytes after a top-level StructEnd', () => {
    expect(probeStruct(new Uint8Array([0x0b, 0x0c]))).toBe(false);
  });

  it('rejects nesting beyond the depth limit', () => {
    const bytes: number[] = [];
    for (let i = 0; i < 120; i++) {
      bytes.push(0x0a);
    }
    for (let i = 0; i < 120; i++) {
      bytes.push(0x0b);
    }
    expect(probeStruct(new Uint8Array(bytes))).toBe(false);
  });

  it('accepts nesting within the depth limit', () => {
    const bytes: number[] = [];
    for (let i = 0; i < 20; i++) {
      bytes.push(0x0a);
    }
    for (let i = 0; i < 20; i++) {
      bytes.push(0x0b);
    }
    expect(probeStruct(new Uint8Array(bytes))).toBe(true);
  });

  it('reads little-endian String4 lengths', () => {
    const writer = new Writer({ littleEndian: true });
    writer.writeString(0, 'z'.repeat(300));
    expect(probeStruct(writer.bytes(), true)).toBe(true);
    expect(probeStruct(writer.bytes(), false)).toBe(false);
  });
});
