import { type FieldAccessor, recordAccessor } from "./accessor";
import { type EncodeContext, readGenericStruct, writeGenericField, writeGenericStruct } from "./generic";
import { Reader } from "./reader";
import type { SchemaRegistry } from "./registry";
import { type CompiledSchema, type SchemaLike, resolveSchema } from "./schema";
import { encodeWithScratch } from "./scratch";
import { type DecodeContext, type StructRecord, readStructFields, writeStructFields } from "./struct";
import { BytesMode, Option } from "./types";
import { StructValue } from "./value";

/**
 * Host-facing capabilities used by struct encode and decode.
 */
export interface CodecContext {
  /** Field access for host objects. Default: recordAccessor */
  accessor?: FieldAccessor;
  /** Compiles and caches raw descriptor lists. Default: compile on every call */
  registry?: SchemaRegistry;
}

function isLittleEndian(flags: number): boolean {
  return (flags & Option.LittleEndian) !== 0;
}

function resolverFor(registry: SchemaRegistry | undefined): (schema: SchemaLike) => CompiledSchema {
  return registry ? (schema) => registry.resolve(schema) : (schema) => resolveSchema(schema);
}

function encodeContext(flags: number, context: CodecContext): EncodeContext {
  return {
    flags,
    accessor: context.accessor ?? recordAccessor,
    resolve: resolverFor(context.registry),
  };
}

/**
 * Encodes an object's fields as a struct body, without StructBegin/StructEnd.
 *
 * @example
 * ```typescript
 * const User = [
 *   { name: "id", tag: 0, type: TypeCode.Int4 },
 *   { name: "name", tag: 1, type: TypeCode.String1 },
 * ];
 * const bytes = encodeStruct({ id: 1, name: "a" }, User);
 * // 00 01 16 01 61
 * ```
 */
export function encodeStruct(
  value: object,
  schema: SchemaLike,
  flags: number = 0,
  context: CodecContext = {}
): Uint8Array {
  const ctx = encodeContext(flags, context);
  const compiled = ctx.resolve(schema);
  return encodeWithScratch(isLittleEndian(flags), (writer) => {
    writeStructFields(writer, value, compiled, ctx, 0);
  });
}

/**
 * Encodes a value without a schema.
 *
 * A StructValue is written as bare struct fields; any other value as a
 * single field under tag 0.
 */
export function encodeGeneric(value: unknown, flags: number = 0, context: CodecContext = {}): Uint8Array {
  const ctx = encodeContext(flags, context);
  return encodeWithScratch(isLittleEndian(flags), (writer) => {
    if (value instanceof StructValue) {
      writeGenericStruct(writer, value, ctx, 0);
    } else {
      writeGenericField(writer, 0, value, ctx, 0);
    }
  });
}

/**
 * Decodes a struct body into a new plain record.
 */
export function decodeStruct(
  data: Uint8Array,
  schema: SchemaLike,
  flags: number = 0,
  context: CodecContext = {}
): StructRecord {
  const record: StructRecord = {};
  return decodeStructInto(data, schema, record, flags, { ...context, accessor: recordAccessor });
}

/**
 * Decodes a struct body into target, storing fields through the accessor.
 */
export function decodeStructInto<T extends object>(
  data: Uint8Array,
  schema: SchemaLike,
  target: T,
  flags: number = 0,
  context: CodecContext = {}
): T {
  const resolve = resolverFor(context.registry);
  const ctx: DecodeContext = { accessor: context.accessor ?? recordAccessor, resolve };
  readStructFields(new Reader(data, isLittleEndian(flags)), resolve(schema), target, ctx, 0, false);
  return target;
}

/**
 * Decodes a struct body without a schema.
 */
export function decodeGeneric(
  data: Uint8Array,
  flags: number = 0,
  bytesMode: BytesMode = BytesMode.Auto
): StructValue {
  return readGenericStruct(new Reader(data, isLittleEndian(flags)), bytesMode, 0, false);
}
