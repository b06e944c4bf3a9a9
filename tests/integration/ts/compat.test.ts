/**
 * Schema evolution tests.
 *
 * Packets written with one version of a schema must stay readable by
 * readers holding an older or newer version.
 */

import { describe, it, expect } from 'vitest';
import {
  type FieldDescriptor,
  INFER_TYPE,
  JceError,
  Option,
  StreamDecoder,
  StreamEncoder,
  StructValue,
  TypeCode,
  decodeGeneric,
  decodeNodes,
  decodeStruct,
  encodeStruct,
  noopLogger,
  schemaSymbol,
} from '../../../typescript/src';

const AccountV1: FieldDescriptor[] = [
  { name: 'id', tag: 0, type: TypeCode.Int8 },
  { name: 'name', tag: 1, type: TypeCode.String1, defaultValue: '' },
];

const AccountV2: FieldDescriptor[] = [
  ...AccountV1,
  { name: 'email', tag: 2, type: TypeCode.String1, defaultValue: 'none' },
  { name: 'roles', tag: 3, type: TypeCode.List, defaultValue: [] },
  { name: 'meta', tag: 20, type: INFER_TYPE },
];

const AccountV3: FieldDescriptor[] = [
  { name: 'id', tag: 0, type: TypeCode.String1 },
  { name: 'name', tag: 1, type: TypeCode.String1, defaultValue: '' },
];

describe('schema evolution', () => {
  it('fills fields added after the packet was written', () => {
    const packet = encodeStruct({ id: 42, name: 'ada' }, AccountV1);
    expect(decodeStruct(packet, AccountV2)).toEqual({
      id: 42,
      name: 'ada',
      email: 'none',
      roles: [],
      meta: null,
    });
  });

  it('skips fields the reader does not know', () => {
    const packet = encodeStruct(
      { id: 42, name: 'ada', email: 'ada@example.com', roles: ['admin'], meta: new Map([['k', 1]]) },
      AccountV2
    );
    expect(decodeStruct(packet, AccountV1)).toEqual({ id: 42, name: 'ada' });
  });

  it('keeps a field whose declared type changed', () => {
    const packet = encodeStruct({ id: 42, name: 'ada' }, AccountV1);
    expect(decodeStruct(packet, AccountV3)).toEqual({ id: 42, name: 'ada' });
  });

  it('reads the same packet without any schema', () => {
    const packet = encodeStruct({ id: 42, name: 'ada', roles: ['a', 'b'] }, AccountV2);
    expect(decodeGeneric(packet)).toEqual(
      new StructValue([
        [0, 42],
        [1, 'ada'],
        [3, ['a', 'b']],
      ])
    );
  });

  it('encodes schema-carrying objects held in inferred fields', () => {
    const owner = { [schemaSymbol]: AccountV1, id: 1, name: 'root' };
    const packet = encodeStruct({ id: 2, meta: [owner] }, AccountV2);
    const meta = decodeStruct(packet, AccountV2).meta;
    expect(meta).toEqual([new StructValue([[0, 1], [1, 'root']])]);
  });

  it('inspects a packet as a node tree', () => {
    const packet = encodeStruct({ id: 7, meta: 'x' }, AccountV2);
    expect(decodeNodes(packet)).toEqual([
      { tag: 0, type: TypeCode.Int1, typeName: 'Byte', value: 7 },
      { tag: 20, type: TypeCode.String1, typeName: 'Str', value: 'x', length: 1 },
    ]);
  });
});

describe('streams across versions', () => {
  it('carries little-endian packets from a new writer to an old reader', () => {
    const encoder = new StreamEncoder({ lengthFieldWidth: 2, littleEndian: true, flags: Option.LittleEndian });
    encoder.writeStruct({ id: 1000, name: 'a', email: 'a@example.com' }, AccountV2);
    encoder.writeStruct({ id: 2000, name: 'b' }, AccountV2);

    const decoder = new StreamDecoder({
      schema: AccountV1,
      lengthFieldWidth: 2,
      littleEndian: true,
      flags: Option.LittleEndian,
      logger: noopLogger,
    });
    decoder.feed(encoder.bytes());
    expect([...decoder]).toEqual([
      { id: 1000, name: 'a' },
      { id: 2000, name: 'b' },
    ]);
  });

  it('raises codec errors under a common base class', () => {
    const decoder = new StreamDecoder({ logger: noopLogger, maxFrameSize: 8 });
    decoder.feed(new Uint8Array([0x00, 0x00, 0x01, 0x00]));
    expect(() => decoder.next()).toThrow(JceError);
  });
});
