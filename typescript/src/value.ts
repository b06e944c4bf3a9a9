import { EncodeError } from "./errors";
import { isSchemaCarrier, type SchemaCarrier } from "./schema";
import { MAX_TAG } from "./types";

/**
 * Schema-less value model exchanged by the generic codec.
 *
 * Integers decode to number, or to bigint when an Int8 payload does not
 * fit in the safe-integer range. null is the absence marker produced by
 * a StructEnd read in value position.
 */
export type Value =
  | null
  | number
  | bigint
  | string
  | Uint8Array
  | Value[]
  | Map<Value, Value>
  | StructValue;

/**
 * A tag-indexed record, encoded as StructBegin ... StructEnd.
 *
 * A plain Map is encoded as a JCE map; wrapping fields in a StructValue
 * is what marks them as a record instead.
 */
export class StructValue implements Iterable<[number, Value]> {
  private readonly fields = new Map<number, Value>();

  constructor(entries?: Iterable<readonly [number, Value]> | Readonly<Record<number, Value>>) {
    if (entries === undefined) {
      return;
    }
    if (isIterable(entries)) {
      for (const [tag, value] of entries) {
        this.set(tag, value);
      }
    } else {
      for (const [key, value] of Object.entries(entries)) {
        this.set(Number(key), value);
      }
    }
  }

  get size(): number {
    return this.fields.size;
  }

  get(tag: number): Value | undefined {
    return this.fields.get(tag);
  }

  has(tag: number): boolean {
    return this.fields.has(tag);
  }

  /**
   * Sets the value of a tag.
   *
   * @throws RangeError if tag is not an integer in 0-255
   */
  set(tag: number, value: Value): this {
    if (!Number.isInteger(tag) || tag < 0 || tag > MAX_TAG) {
      throw new RangeError(`Struct tag must be an integer in 0-${MAX_TAG}, got ${tag}`);
    }
    this.fields.set(tag, value);
    return this;
  }

  delete(tag: number): boolean {
    return this.fields.delete(tag);
  }

  /**
   * Tags in ascending order, the order fields are written in.
   */
  tags(): number[] {
    return [...this.fields.keys()].sort((a, b) => a - b);
  }

  entries(): IterableIterator<[number, Value]> {
    return this.fields.entries();
  }

  [Symbol.iterator](): IterableIterator<[number, Value]> {
    return this.fields.entries();
  }
}

function isIterable<T>(value: object): value is Iterable<T> {
  return Symbol.iterator in value;
}

/**
 * Result of classifying an untyped value for generic encoding.
 */
export type Classified =
  | { kind: "int"; value: number | bigint }
  | { kind: "float"; value: number }
  | { kind: "bytes"; value: Uint8Array }
  | { kind: "text"; value: string }
  | { kind: "list"; value: readonly unknown[] }
  | { kind: "map"; value: ReadonlyMap<unknown, unknown> }
  | { kind: "struct"; value: StructValue }
  | { kind: "schema"; value: SchemaCarrier };

const INT64_LOWER = -(2 ** 63);
const INT64_UPPER = 2 ** 63;

/**
 * Classifies a value into the wire kind the generic encoder writes.
 *
 * The checks run in a fixed order: integer, floating point, bytes, text,
 * list, map or struct, schema carrier. A value matching none of them
 * cannot be encoded.
 *
 * @throws EncodeError if no kind matches
 */
export function classify(value: unknown): Classified {
  if (typeof value === "boolean") {
    return { kind: "int", value: value ? 1 : 0 };
  }
  if (typeof value === "bigint") {
    return { kind: "int", value };
  }
  if (typeof value === "number") {
    if (Number.isInteger(value) && value >= INT64_LOWER && value < INT64_UPPER) {
      return { kind: "int", value };
    }
    return { kind: "float", value };
  }
  if (value instanceof Uint8Array) {
    return { kind: "bytes", value };
  }
  if (typeof value === "string") {
    return { kind: "text", value };
  }
  if (Array.isArray(value)) {
    return { kind: "list", value };
  }
  if (value instanceof Map) {
    return { kind: "map", value };
  }
  if (value instanceof StructValue) {
    return { kind: "struct", value };
  }
  if (isSchemaCarrier(value)) {
    return { kind: "schema", value };
  }
  throw new EncodeError(`Cannot infer type of ${describe(value)}`);
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}

const safeTextDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Decodes bytes as human-readable text, or returns null.
 *
 * Control characters other than TAB, LF and CR, and DEL, disqualify the
 * input, as does invalid UTF-8.
 */
export function decodeSafeText(bytes: Uint8Array): string | null {
  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i];
    if (b < 32) {
      if (b !== 9 && b !== 10 && b !== 13) {
        return null;
      }
    } else if (b === 127) {
      return null;
    }
  }
  return decodeUtf8(bytes);
}

/**
 * Decodes strict UTF-8, or returns null when the bytes are not valid UTF-8.
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return safeTextDecoder.decode(bytes);
  } catch {
    return null;
  }
}

/**
 * Structural equality used to compare field values with their defaults.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) {
    return true;
  }
  if (typeof a === "number" && typeof b === "bigint") {
    return Number.isInteger(a) && BigInt(a) === b;
  }
  if (typeof a === "bigint" && typeof b === "number") {
    return Number.isInteger(b) && a === BigInt(b);
  }
  if (typeof a === "boolean" || typeof b === "boolean") {
    return toIntegerLike(a) === toIntegerLike(b);
  }
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (a[i] !== b[i]) return false;
    }
    return true;
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
  }
  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false;
    for (const [key, item] of a) {
      if (!b.has(key) || !valuesEqual(item, b.get(key))) return false;
    }
    return true;
  }
  if (a instanceof StructValue && b instanceof StructValue) {
    if (a.size !== b.size) return false;
    for (const [tag, item] of a) {
      if (!b.has(tag) || !valuesEqual(item, b.get(tag))) return false;
    }
    return true;
  }
  return false;
}

function toIntegerLike(value: unknown): unknown {
  return typeof value === "boolean" ? (value ? 1 : 0) : value;
}

/**
 * Copies mutable containers so that defaults are not shared between decodes.
 */
export function cloneDefault<T>(value: T): T;
export function cloneDefault(value: unknown): unknown {
  if (value instanceof Uint8Array) return value.slice();
  if (Array.isArray(value)) return value.slice();
  if (value instanceof Map) return new Map(value);
  if (value instanceof StructValue) return new StructValue(value);
  return value;
}
