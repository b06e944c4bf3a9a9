import { type FieldAccessor, recordAccessor } from "./accessor";
import { BufferOverflowError, DepthExceededError, EncodeError } from "./errors";
import {
  type EncodeContext,
  readGenericStruct,
  readGenericValue,
  writeGenericField,
  writeGenericList,
  writeGenericMap,
  writeGenericStruct,
} from "./generic";
import type { Reader } from "./reader";
import { encodeWithScratch } from "./scratch";
import {
  type CompiledSchema,
  type FieldDescriptor,
  FieldFlag,
  type SchemaLike,
  isSchemaCarrier,
  schemaSymbol,
} from "./schema";
import { BytesMode, INFER_TYPE, MAX_DEPTH, Option, TypeCode } from "./types";
import { StructValue, classify, cloneDefault, valuesEqual } from "./value";
import type { Writer } from "./writer";

/**
 * A struct decoded into named fields.
 */
export type StructRecord = Record<string, unknown>;

/**
 * State threaded through a schema-driven decode call.
 */
export interface DecodeContext {
  readonly accessor: FieldAccessor;
  readonly resolve: (schema: SchemaLike) => CompiledSchema;
}

function checkDepth(depth: number): void {
  if (depth > MAX_DEPTH) {
    throw new DepthExceededError(MAX_DEPTH);
  }
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Writes the fields of target in declaration order, without the
 * surrounding StructBegin/StructEnd markers.
 */
export function writeStructFields(
  writer: Writer,
  target: object,
  schema: CompiledSchema,
  ctx: EncodeContext,
  depth: number
): void {
  checkDepth(depth);
  const { accessor, flags } = ctx;
  const excludeUnset = (flags & Option.ExcludeUnset) !== 0;
  const omitDefault = (flags & Option.OmitDefault) !== 0;

  for (const field of schema.fields) {
    if (excludeUnset && accessor.isSet && !accessor.isSet(target, field.name)) {
      continue;
    }
    let value = accessor.get(target, field.name);
    if (((field.flags ?? 0) & FieldFlag.CustomSerializer) !== 0 && accessor.serialize) {
      value = accessor.serialize(target, field.name, value);
    }
    if (value === null || value === undefined) {
      continue;
    }
    if (omitDefault && field.defaultValue !== undefined && valuesEqual(value, field.defaultValue)) {
      continue;
    }

    if (field.type === INFER_TYPE) {
      writeGenericField(writer, field.tag, value, ctx, depth + 1);
    } else {
      writeTypedField(writer, field, field.type, value, ctx, depth + 1);
    }
  }
}

function mismatch(field: FieldDescriptor, expected: string, value: unknown): EncodeError {
  let actual: string = typeof value;
  if (typeof value === "object" && value !== null) {
    actual = value.constructor?.name ?? "object";
  }
  return new EncodeError(`Field "${field.name}" (tag ${field.tag}) expects ${expected}, got ${actual}`);
}

function writeTypedField(
  writer: Writer,
  field: FieldDescriptor,
  type: TypeCode,
  value: unknown,
  ctx: EncodeContext,
  depth: number
): void {
  const { tag } = field;
  switch (type) {
    case TypeCode.Int1:
    case TypeCode.Int2:
    case TypeCode.Int4:
    case TypeCode.Int8: {
      const classified = classify(value);
      if (classified.kind !== "int") {
        throw mismatch(field, "an integer", value);
      }
      writer.writeInt(tag, classified.value);
      return;
    }
    case TypeCode.Float:
    case TypeCode.Double:
      if (typeof value !== "number") {
        throw mismatch(field, "a number", value);
      }
      if (type === TypeCode.Float) {
        writer.writeFloat(tag, value);
      } else {
        writer.writeDouble(tag, value);
      }
      return;
    case TypeCode.String1:
    case TypeCode.String4:
      if (typeof value !== "string") {
        throw mismatch(field, "a string", value);
      }
      writer.writeString(tag, value);
      return;
    case TypeCode.Map:
      if (value instanceof Map) {
        writeGenericMap(writer, tag, value, ctx, depth);
      } else if (isPlainRecord(value)) {
        writeGenericMap(writer, tag, new Map(Object.entries(value)), ctx, depth);
      } else {
        throw mismatch(field, "a Map or plain object", value);
      }
      return;
    case TypeCode.List:
      if (!Array.isArray(value)) {
        throw mismatch(field, "an array", value);
      }
      writeGenericList(writer, tag, value, ctx, depth);
      return;
    case TypeCode.SimpleList:
      if (value instanceof Uint8Array) {
        writer.writeBytes(tag, value);
      } else {
        const blob = encodeWithScratch(writer.littleEndian, (scratch) => {
          if (!writeAsStruct(scratch, field, value, ctx, depth)) {
            writeGenericField(scratch, 0, value, ctx, depth + 1);
          }
        });
        writer.writeBytes(tag, blob);
      }
      return;
    case TypeCode.StructBegin:
      writer.writeHead(tag, TypeCode.StructBegin);
      if (!writeAsStruct(writer, field, value, ctx, depth)) {
        throw mismatch(field, "a struct", value);
      }
      writer.writeHead(0, TypeCode.StructEnd);
      return;
    case TypeCode.StructEnd:
    case TypeCode.ZeroTag:
      throw new EncodeError(`Field "${field.name}" has undeclarable type ${TypeCode[type]}`);
  }
}

/**
 * Writes value as bare struct fields if it is struct-shaped.
 *
 * @returns false when value is not a struct, leaving the writer untouched
 */
function writeAsStruct(
  writer: Writer,
  field: FieldDescriptor,
  value: unknown,
  ctx: EncodeContext,
  depth: number
): boolean {
  if (value instanceof StructValue) {
    writeGenericStruct(writer, value, ctx, depth);
    return true;
  }
  if (isSchemaCarrier(value)) {
    writeStructFields(writer, value, ctx.resolve(value[schemaSymbol]), ctx, depth);
    return true;
  }
  if (field.schema !== undefined && typeof value === "object" && value !== null) {
    writeStructFields(writer, value, ctx.resolve(field.schema), ctx, depth);
    return true;
  }
  return false;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// ============================================================================
// Decoding
// ============================================================================

/**
 * Whether a wire type may be read as the declared type.
 */
export function isCompatible(declared: TypeCode, wire: TypeCode): boolean {
  switch (declared) {
    case TypeCode.Int1:
    case TypeCode.Int2:
    case TypeCode.Int4:
    case TypeCode.Int8:
      return (
        wire === TypeCode.Int1 ||
        wire === TypeCode.Int2 ||
        wire === TypeCode.Int4 ||
        wire === TypeCode.Int8 ||
        wire === TypeCode.ZeroTag
      );
    case TypeCode.Double:
      return wire === TypeCode.Double || wire === TypeCode.Float;
    case TypeCode.String1:
    case TypeCode.String4:
      return wire === TypeCode.String1 || wire === TypeCode.String4;
    default:
      return declared === wire;
  }
}

/**
 * Reads struct fields into target through the accessor.
 *
 * Unknown tags are skipped. Fields absent from the wire receive a copy of
 * their default, or null. A repeated tag overwrites the earlier value.
 */
export function readStructFields(
  reader: Reader,
  schema: CompiledSchema,
  target: object,
  ctx: DecodeContext,
  depth: number,
  nested: boolean
): void {
  checkDepth(depth);
  const seen = new Uint8Array(schema.fields.length);
  let closed = false;

  while (reader.hasMore) {
    const { tag, type } = reader.readHead();
    if (type === TypeCode.StructEnd) {
      closed = true;
      break;
    }
    const index = schema.indexOfTag(tag);
    const field = schema.fields[index];
    if (index < 0 || field === undefined) {
      reader.skipField(type);
      continue;
    }
    ctx.accessor.set(target, field.name, readTypedField(reader, field, type, ctx, depth + 1));
    seen[index] = 1;
  }
  if (nested && !closed) {
    throw new BufferOverflowError(reader.position);
  }

  schema.fields.forEach((field, index) => {
    if (seen[index] === 0) {
      ctx.accessor.set(target, field.name, cloneDefault(field.defaultValue ?? null));
    }
  });
}

function readTypedField(
  reader: Reader,
  field: FieldDescriptor,
  wire: TypeCode,
  ctx: DecodeContext,
  depth: number
): unknown {
  const declared = field.type;
  if (declared === INFER_TYPE || !isCompatible(declared, wire)) {
    return readGenericValue(reader, wire, BytesMode.Auto, depth);
  }

  switch (wire) {
    case TypeCode.SimpleList:
      return reader.readBytes(reader.readSimpleListLength()).slice();
    case TypeCode.StructBegin:
      if (field.schema !== undefined) {
        const record: StructRecord = {};
        const nestedCtx: DecodeContext = { accessor: recordAccessor, resolve: ctx.resolve };
        readStructFields(reader, ctx.resolve(field.schema), record, nestedCtx, depth, true);
        return record;
      }
      return readGenericStruct(reader, BytesMode.Auto, depth, true);
    default:
      return readGenericValue(reader, wire, BytesMode.Auto, depth);
  }
}
