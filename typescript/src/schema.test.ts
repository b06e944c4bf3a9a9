import { describe, it, expect, beforeEach } from 'vitest';
import { DuplicateTagError, SchemaError } from './errors';
import { SchemaRegistry } from './registry';
import { CompiledSchema, type FieldDescriptor, compileSchema, isSchemaCarrier, schemaSymbol } from './schema';
import { INFER_TYPE, TypeCode } from './types';

const User: FieldDescriptor[] = [
  { name: 'id', tag: 0, type: TypeCode.Int4 },
  { name: 'name', tag: 1, type: TypeCode.String1, defaultValue: '' },
  { name: 'extra', tag: 200, type: INFER_TYPE },
];

describe('compileSchema', () => {
  it('indexes descriptors by tag', () => {
    const schema = compileSchema(User);
    expect(schema.fields.map((f) => f.name)).toEqual(['id', 'name', 'extra']);
    expect(schema.indexOfTag(200)).toBe(2);
    expect(schema.fieldForTag(1)?.name).toBe('name');
    expect(schema.fieldForTag(5)).toBeUndefined();
    expect(schema.indexOfTag(5)).toBe(-1);
  });

  it('freezes its copy of the descriptors', () => {
    const schema = compileSchema(User);
    expect(Object.isFrozen(schema.fields)).toBe(true);
    expect(Object.isFrozen(schema.fields[0])).toBe(true);
    expect(schema.fields[0]).not.toBe(User[0]);
  });

  it('rejects duplicate tags', () => {
    const error = captureError(() =>
      compileSchema([
        { name: 'a', tag: 3, type: TypeCode.Int1 },
        { name: 'b', tag: 3, type: TypeCode.Int2 },
      ])
    );
    expect(error).toBeInstanceOf(DuplicateTagError);
    expect(error).toMatchObject({ tag: 3, message: 'Duplicate tag 3 in schema' });
  });

  it('rejects out-of-range tags', () => {
    expect(() => compileSchema([{ name: 'a', tag: 256, type: TypeCode.Int1 }])).toThrow(SchemaError);
    expect(() => compileSchema([{ name: 'a', tag: -1, type: TypeCode.Int1 }])).toThrow(SchemaError);
  });

  it('rejects type codes a field cannot declare', () => {
    expect(() => compileSchema([{ name: 'a', tag: 0, type: TypeCode.StructEnd }])).toThrow(
      new SchemaError('Field "a" has unsupported type code 11')
    );
    expect(() => compileSchema([{ name: 'a', tag: 0, type: TypeCode.ZeroTag }])).toThrow(SchemaError);
  });
});

describe('SchemaRegistry', () => {
  let registry: SchemaRegistry;

  beforeEach(() => {
    registry = new SchemaRegistry();
  });

  it('compiles a descriptor list once', () => {
    const first = registry.resolve(User);
    expect(registry.resolve(User)).toBe(first);
  });

  it('returns compiled schemas unchanged', () => {
    const compiled = compileSchema(User);
    expect(registry.resolve(compiled)).toBe(compiled);
  });

  it('registers schemas by name', () => {
    const compiled = registry.register('User', User);
    expect(registry.isRegistered('User')).toBe(true);
    expect(registry.get('User')).toBe(compiled);
    expect(compiled).toBeInstanceOf(CompiledSchema);
  });

  it('throws for unregistered names', () => {
    expect(() => registry.get('Missing')).toThrow(new SchemaError('Schema not registered: Missing'));
  });

  it('clears names and cache', () => {
    const first = registry.register('User', User);
    registry.clear();
    expect(registry.isRegistered('User')).toBe(false);
    expect(registry.resolve(User)).not.toBe(first);
  });
});

describe('isSchemaCarrier', () => {
  it('accepts objects exposing a schema', () => {
    expect(isSchemaCarrier({ [schemaSymbol]: User })).toBe(true);
    expect(isSchemaCarrier({ [schemaSymbol]: compileSchema(User) })).toBe(true);
  });

  it('rejects everything else', () => {
    expect(isSchemaCarrier({ [schemaSymbol]: 'User' })).toBe(false);
    expect(isSchemaCarrier({})).toBe(false);
    expect(isSchemaCarrier(null)).toBe(false);
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
