import { DepthExceededError, JceError } from "./errors";
import { Reader } from "./reader";
import { probeStruct } from "./scanner";
import { MAX_DEPTH, Option, TypeCode, typeName } from "./types";
import { decodeSafeText } from "./value";

/**
 * One field as it appears on the wire.
 *
 * Scalars carry their value. Lists and structs carry child nodes, and
 * maps carry [key, value] node pairs. A byte list that holds text has the
 * text as its value; one that holds a nested struct keeps its bytes and
 * lists the struct's fields as children.
 */
export interface WireNode {
  tag: number;
  type: TypeCode;
  typeName: string;
  value: NodeValue;
  /** Byte length of strings and byte lists, element count of lists and maps */
  length?: number;
  children?: WireNode[];
}

export type NodeValue =
  | null
  | number
  | bigint
  | string
  | Uint8Array
  | WireNode[]
  | Array<[WireNode, WireNode]>;

export interface DecodeNodesOptions {
  /** Option bits; only Option.LittleEndian is used */
  flags?: number;
}

/**
 * Decodes a struct body into a tree of wire nodes, for inspecting
 * payloads whose schema is unknown.
 */
export function decodeNodes(data: Uint8Array, options: DecodeNodesOptions = {}): WireNode[] {
  const reader = new Reader(data, ((options.flags ?? 0) & Option.LittleEndian) !== 0);
  return readFields(reader, 0);
}

function readFields(reader: Reader, depth: number): WireNode[] {
  if (depth > MAX_DEPTH) {
    throw new DepthExceededError(MAX_DEPTH);
  }
  const fields: WireNode[] = [];
  while (reader.hasMore) {
    const { tag, type } = reader.readHead();
    if (type === TypeCode.StructEnd) {
      break;
    }
    fields.push(readNode(reader, tag, type, depth + 1));
  }
  return fields;
}

function readNode(reader: Reader, tag: number, type: TypeCode, depth: number): WireNode {
  if (depth > MAX_DEPTH) {
    throw new DepthExceededError(MAX_DEPTH);
  }
  const node = (value: NodeValue, length?: number): WireNode =>
    length === undefined
      ? { tag, type, typeName: typeName(type), value }
      : { tag, type, typeName: typeName(type), value, length };

  switch (type) {
    case TypeCode.Int1:
    case TypeCode.Int2:
    case TypeCode.Int4:
    case TypeCode.Int8:
    case TypeCode.ZeroTag:
      return node(reader.readInt(type));
    case TypeCode.Float:
      return node(reader.readFloat());
    case TypeCode.Double:
      return node(reader.readDouble());
    case TypeCode.String1:
    case TypeCode.String4: {
      const start = reader.position;
      const value = reader.readString(type);
      const prefix = type === TypeCode.String1 ? 1 : 4;
      return node(value, reader.position - start - prefix);
    }
    case TypeCode.List: {
      const size = reader.readSize();
      const items: WireNode[] = [];
      for (let i = 0; i < size; i++) {
        const head = reader.readHead();
        items.push(readNode(reader, head.tag, head.type, depth + 1));
      }
      return node(items, size);
    }
    case TypeCode.Map: {
      const size = reader.readSize();
      const entries: Array<[WireNode, WireNode]> = [];
      for (let i = 0; i < size; i++) {
        const keyHead = reader.readHead();
        const key = readNode(reader, keyHead.tag, keyHead.type, depth + 1);
        const valueHead = reader.readHead();
        entries.push([key, readNode(reader, valueHead.tag, valueHead.type, depth + 1)]);
      }
      return node(entries, size);
    }
    case TypeCode.SimpleList: {
      const bytes = reader.readBytes(reader.readSimpleListLength());
      const text = decodeSafeText(bytes);
      if (text !== null) {
        return node(text, bytes.length);
      }
      const result = node(bytes.slice(), bytes.length);
      const children = nestedNodes(bytes, reader.littleEndian, depth);
      if (children !== null) {
        result.children = children;
      }
      return result;
    }
    case TypeCode.StructBegin:
      return node(readFields(reader, depth));
    case TypeCode.StructEnd:
      return node(null);
  }
}

function nestedNodes(bytes: Uint8Array, littleEndian: boolean, depth: number): WireNode[] | null {
  if (bytes.length === 0 || !probeStruct(bytes, littleEndian)) {
    return null;
  }
  try {
    return readFields(new Reader(bytes, littleEndian), depth);
  } catch (e) {
    if (e instanceof JceError) {
      return null;
    }
    throw e;
  }
}
