import type { FieldAccessor } from "./accessor";
import { BufferOverflowError, DecodeError, DepthExceededError, JceError } from "./errors";
import { Reader } from "./reader";
import { probeStruct } from "./scanner";
import { type CompiledSchema, type SchemaLike, schemaSymbol } from "./schema";
import { writeStructFields } from "./struct";
import { BytesMode, MAX_DEPTH, TypeCode } from "./types";
import { StructValue, type Value, classify, decodeSafeText, decodeUtf8 } from "./value";
import type { Writer } from "./writer";

/**
 * State threaded through an encode call.
 */
export interface EncodeContext {
  readonly flags: number;
  readonly accessor: FieldAccessor;
  readonly resolve: (schema: SchemaLike) => CompiledSchema;
}

function checkDepth(depth: number): void {
  if (depth > MAX_DEPTH) {
    throw new DepthExceededError(MAX_DEPTH);
  }
}

/**
 * Writes one value under a tag, choosing the wire type from the value.
 */
export function writeGenericField(
  writer: Writer,
  tag: number,
  value: unknown,
  ctx: EncodeContext,
  depth: number
): void {
  checkDepth(depth);
  const classified = classify(value);
  switch (classified.kind) {
    case "int":
      writer.writeInt(tag, classified.value);
      break;
    case "float":
      writer.writeDouble(tag, classified.value);
      break;
    case "bytes":
      writer.writeBytes(tag, classified.value);
      break;
    case "text":
      writer.writeString(tag, classified.value);
      break;
    case "list":
      writeGenericList(writer, tag, classified.value, ctx, depth);
      break;
    case "map":
      writeGenericMap(writer, tag, classified.value, ctx, depth);
      break;
    case "struct":
      writer.writeHead(tag, TypeCode.StructBegin);
      writeGenericStruct(writer, classified.value, ctx, depth);
      writer.writeHead(0, TypeCode.StructEnd);
      break;
    case "schema": {
      const schema = ctx.resolve(classified.value[schemaSymbol]);
      writer.writeHead(tag, TypeCode.StructBegin);
      writeStructFields(writer, classified.value, schema, ctx, depth);
      writer.writeHead(0, TypeCode.StructEnd);
      break;
    }
  }
}

export function writeGenericList(
  writer: Writer,
  tag: number,
  items: readonly unknown[],
  ctx: EncodeContext,
  depth: number
): void {
  writer.writeHead(tag, TypeCode.List);
  writer.writeInt(0, items.length);
  for (const item of items) {
    writeGenericField(writer, 0, item, ctx, depth + 1);
  }
}

export function writeGenericMap(
  writer: Writer,
  tag: number,
  entries: ReadonlyMap<unknown, unknown>,
  ctx: EncodeContext,
  depth: number
): void {
  writer.writeHead(tag, TypeCode.Map);
  writer.writeInt(0, entries.size);
  for (const [key, item] of entries) {
    writeGenericField(writer, 0, key, ctx, depth + 1);
    writeGenericField(writer, 1, item, ctx, depth + 1);
  }
}

/**
 * Writes the fields of a StructValue in ascending tag order, without the
 * surrounding StructBegin/StructEnd markers. null entries are skipped.
 */
export function writeGenericStruct(
  writer: Writer,
  struct: StructValue,
  ctx: EncodeContext,
  depth: number
): void {
  checkDepth(depth);
  for (const tag of struct.tags()) {
    const value = struct.get(tag);
    if (value === null || value === undefined) {
      continue;
    }
    writeGenericField(writer, tag, value, ctx, depth + 1);
  }
}

/**
 * Reads struct fields into a StructValue.
 *
 * A nested struct must be closed by StructEnd; an outermost one may also
 * end with the input.
 *
 * @throws DecodeError if a tag repeats within the struct
 */
export function readGenericStruct(
  reader: Reader,
  bytesMode: BytesMode,
  depth: number,
  nested: boolean
): StructValue {
  checkDepth(depth);
  const struct = new StructValue();
  while (reader.hasMore) {
    const offset = reader.position;
    const { tag, type } = reader.readHead();
    if (type === TypeCode.StructEnd) {
      return struct;
    }
    if (struct.has(tag)) {
      throw new DecodeError(offset, `Duplicate tag ${tag} in struct`);
    }
    struct.set(tag, readGenericValue(reader, type, bytesMode, depth + 1));
  }
  if (nested) {
    throw new BufferOverflowError(reader.position);
  }
  return struct;
}

/**
 * Reads the payload of a field whose header has already been consumed.
 */
export function readGenericValue(
  reader: Reader,
  type: TypeCode,
  bytesMode: BytesMode,
  depth: number
): Value {
  checkDepth(depth);
  switch (type) {
    case TypeCode.Int1:
    case TypeCode.Int2:
    case TypeCode.Int4:
    case TypeCode.Int8:
    case TypeCode.ZeroTag:
      return reader.readInt(type);
    case TypeCode.Float:
      return reader.readFloat();
    case TypeCode.Double:
      return reader.readDouble();
    case TypeCode.String1:
    case TypeCode.String4:
      return reader.readString(type);
    case TypeCode.Map: {
      const size = reader.readSize();
      const map = new Map<Value, Value>();
      for (let i = 0; i < size; i++) {
        const key = readGenericValue(reader, reader.readHead().type, bytesMode, depth + 1);
        const item = readGenericValue(reader, reader.readHead().type, bytesMode, depth + 1);
        map.set(key, item);
      }
      return map;
    }
    case TypeCode.List: {
      const size = reader.readSize();
      const items: Value[] = [];
      for (let i = 0; i < size; i++) {
        items.push(readGenericValue(reader, reader.readHead().type, bytesMode, depth + 1));
      }
      return items;
    }
    case TypeCode.SimpleList: {
      const length = reader.readSimpleListLength();
      return interpretBytes(reader.readBytes(length), bytesMode, reader.littleEndian, depth);
    }
    case TypeCode.StructBegin:
      return readGenericStruct(reader, bytesMode, depth, true);
    case TypeCode.StructEnd:
      return null;
  }
}

/**
 * Turns SimpleList content into a value according to the bytes mode.
 *
 * In Auto mode, text wins over a nested struct, and a nested struct over
 * raw bytes. Returned byte arrays are copies, never views of the input.
 */
export function interpretBytes(
  bytes: Uint8Array,
  bytesMode: BytesMode,
  littleEndian: boolean,
  depth: number
): Value {
  switch (bytesMode) {
    case BytesMode.Raw:
      return bytes.slice();
    case BytesMode.String:
      return decodeUtf8(bytes) ?? bytes.slice();
    case BytesMode.Auto:
      return decodeSafeText(bytes) ?? decodeNestedStruct(bytes, littleEndian, depth) ?? bytes.slice();
  }
}

function decodeNestedStruct(bytes: Uint8Array, littleEndian: boolean, depth: number): StructValue | null {
  if (!probeStruct(bytes, littleEndian)) {
    return null;
  }
  try {
    return readGenericStruct(new Reader(bytes, littleEndian), BytesMode.Auto, depth, false);
  } catch (e) {
    if (e instanceof JceError) {
      return null;
    }
    throw e;
  }
}
