import { BufferOverflowError, InvalidTypeError } from "./errors";

/**
 * Type codes used in the JCE wire format.
 *
 * The low nibble of every field header carries one of these codes; it
 * selects the physical encoding of the value that follows.
 */
export enum TypeCode {
  /** 1-byte signed integer */
  Int1 = 0,
  /** 2-byte signed integer */
  Int2 = 1,
  /** 4-byte signed integer */
  Int4 = 2,
  /** 8-byte signed integer */
  Int8 = 3,
  /** 4-byte IEEE 754 float */
  Float = 4,
  /** 8-byte IEEE 754 double */
  Double = 5,
  /** String with a 1-byte length prefix */
  String1 = 6,
  /** String with a 4-byte length prefix */
  String4 = 7,
  /** Count-prefixed key/value pairs */
  Map = 8,
  /** Count-prefixed elements */
  List = 9,
  /** Opens a nested struct */
  StructBegin = 10,
  /** Closes a nested struct */
  StructEnd = 11,
  /** Integer zero, no payload */
  ZeroTag = 12,
  /** Byte array */
  SimpleList = 13,
}

/**
 * Descriptor type code meaning "infer the wire type from the value".
 */
export const INFER_TYPE = 255;

/**
 * Type code as declared by a field descriptor.
 */
export type DeclaredType = TypeCode | typeof INFER_TYPE;

/**
 * Option bit flags accepted by the encode and decode entry points.
 */
export enum Option {
  None = 0,
  /** Use little-endian byte order for the whole call */
  LittleEndian = 1,
  /** Omit struct fields equal to their declared default */
  OmitDefault = 32,
  /** Omit struct fields the host object never explicitly set */
  ExcludeUnset = 64,
}

/**
 * How an opaque byte list is interpreted by the generic decoder.
 */
export enum BytesMode {
  /** Always return the bytes unmodified */
  Raw = 0,
  /** Decode as UTF-8 when valid, otherwise return bytes */
  String = 1,
  /** Text, nested struct or bytes, chosen by content */
  Auto = 2,
}

/**
 * Maximum nesting depth for encode, decode, skip and scan.
 */
export const MAX_DEPTH = 100;

/**
 * Highest tag that fits in the header nibble; larger tags use an extra byte.
 */
export const MAX_COMPACT_TAG = 14;

export const MAX_TAG = 255;

/**
 * Header nibble value that announces an extended tag byte.
 */
export const EXTENDED_TAG_MARKER = 0x0f;

export const TYPE_MASK = 0x0f;
export const TAG_SHIFT = 4;

/**
 * Element type byte that opens every SimpleList payload.
 */
export const SIMPLE_LIST_ELEMENT_BYTE = TypeCode.Int1;

/**
 * Largest string payload written with a 1-byte length prefix.
 */
export const MAX_STRING1_LENGTH = 255;

/**
 * Signed integer bounds used to pick the narrowest integer encoding.
 */
export const MinInt64 = -(2n ** 63n);
export const MaxInt64 = 2n ** 63n - 1n;

/**
 * Tag and type code of one field header.
 */
export interface FieldHead {
  tag: number;
  type: TypeCode;
}

/**
 * Result of decoding a field header.
 */
export interface HeadResult extends FieldHead {
  bytesRead: number;
}

/**
 * Returns true if code is one of the fourteen wire type codes.
 */
export function isTypeCode(code: number): code is TypeCode {
  return Number.isInteger(code) && code >= TypeCode.Int1 && code <= TypeCode.SimpleList;
}

/**
 * Returns true if the type code is one of the integer encodings.
 */
export function isIntegerType(type: TypeCode): boolean {
  return (
    type === TypeCode.Int1 ||
    type === TypeCode.Int2 ||
    type === TypeCode.Int4 ||
    type === TypeCode.Int8 ||
    type === TypeCode.ZeroTag
  );
}

/**
 * Returns true if the type code is one of the string encodings.
 */
export function isStringType(type: TypeCode): boolean {
  return type === TypeCode.String1 || type === TypeCode.String4;
}

/**
 * Encode a field header from tag and type code.
 *
 * Tags 0-14 share a single byte with the type; tags 15-255 write the
 * marker nibble followed by the full tag byte.
 */
export function encodeHead(tag: number, type: TypeCode): Uint8Array {
  if (tag <= MAX_COMPACT_TAG) {
    return new Uint8Array([(tag << TAG_SHIFT) | type]);
  }
  return new Uint8Array([(EXTENDED_TAG_MARKER << TAG_SHIFT) | type, tag]);
}

/**
 * Decode a field header from a buffer.
 *
 * @throws BufferOverflowError if the header or its extended tag byte is missing
 * @throws InvalidTypeError if the low nibble is not a known type code
 */
export function decodeHead(data: Uint8Array, offset: number = 0): HeadResult {
  if (offset >= data.length) {
    throw new BufferOverflowError(offset);
  }

  const b = data[offset];
  const code = b & TYPE_MASK;
  let tag = b >> TAG_SHIFT;
  let bytesRead = 1;

  if (tag === EXTENDED_TAG_MARKER) {
    if (offset + 1 >= data.length) {
      throw new BufferOverflowError(offset + 1);
    }
    tag = data[offset + 1];
    bytesRead = 2;
  }

  if (!isTypeCode(code)) {
    throw new InvalidTypeError(offset, code);
  }

  return { tag, type: code, bytesRead };
}

const TYPE_NAMES: Record<TypeCode, string> = {
  [TypeCode.Int1]: "Byte",
  [TypeCode.Int2]: "Short",
  [TypeCode.Int4]: "Int",
  [TypeCode.Int8]: "Long",
  [TypeCode.Float]: "Float",
  [TypeCode.Double]: "Double",
  [TypeCode.String1]: "Str",
  [TypeCode.String4]: "Str",
  [TypeCode.Map]: "Map",
  [TypeCode.List]: "List",
  [TypeCode.StructBegin]: "Struct",
  [TypeCode.StructEnd]: "StructEnd",
  [TypeCode.ZeroTag]: "Zero",
  [TypeCode.SimpleList]: "SimpleList",
};

/**
 * Human-readable name of a type code, as shown by the node inspector.
 */
export function typeName(type: TypeCode): string {
  return TYPE_NAMES[type];
}
