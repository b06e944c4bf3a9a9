import { describe, it, expect } from 'vitest';
import { encodeWithScratch } from './scratch';

describe('encodeWithScratch', () => {
  it('returns a copy that later encodes do not overwrite', () => {
    const first = encodeWithScratch(false, (writer) => writer.writeInt(0, 1));
    const second = encodeWithScratch(false, (writer) => writer.writeInt(0, 2));
    expect(first).toEqual(new Uint8Array([0x00, 0x01]));
    expect(second).toEqual(new Uint8Array([0x00, 0x02]));
  });

  it('gives a nested call its own writer', () => {
    const outer = encodeWithScratch(false, (writer) => {
      writer.writeInt(0, 1);
      const inner = encodeWithScratch(false, (nested) => nested.writeInt(1, 2));
      expect(inner).toEqual(new Uint8Array([0x10, 0x02]));
      writer.writeRaw(inner);
    });
    expect(outer).toEqual(new Uint8Array([0x00, 0x01, 0x10, 0x02]));
  });

  it('uses the requested byte order', () => {
    const little = encodeWithScratch(true, (writer) => writer.writeInt(0, 300));
    expect(little).toEqual(new Uint8Array([0x01, 0x2c, 0x01]));
  });

  it('releases the scratch writer after a failed encode', () => {
    expect(() =>
      encodeWithScratch(false, () => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    const next = encodeWithScratch(false, (writer) => writer.writeInt(0, 3));
    expect(next).toEqual(new Uint8Array([0x00, 0x03]));
  });
});
