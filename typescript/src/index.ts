/**
 * jce-codec - JCE/Tars tag-length-value codec for TypeScript
 *
 * @example
 * ```typescript
 * import { TypeCode, encodeStruct, decodeStruct } from 'jce-codec';
 *
 * const User = [
 *   { name: 'id', tag: 0, type: TypeCode.Int4 },
 *   { name: 'name', tag: 1, type: TypeCode.String1, defaultValue: '' },
 * ];
 *
 * const data = encodeStruct({ id: 7, name: 'alice' }, User);
 * const user = decodeStruct(data, User);
 * ```
 */

// Core types
export {
  TypeCode,
  Option,
  BytesMode,
  INFER_TYPE,
  MAX_DEPTH,
  MAX_TAG,
  MinInt64,
  MaxInt64,
  isTypeCode,
  encodeHead,
  decodeHead,
  typeName,
} from "./types";
export type { DeclaredType, FieldHead, HeadResult } from "./types";

// Errors
export {
  JceError,
  EncodeError,
  DecodeError,
  BufferOverflowError,
  InvalidTypeError,
  DepthExceededError,
  SchemaError,
  DuplicateTagError,
  FrameError,
  FrameInvalidLengthError,
  FrameTooLargeError,
  BufferLimitExceededError,
  StreamClosedError,
} from "./errors";

// Values and schemas
export { StructValue, classify, valuesEqual } from "./value";
export type { Value, Classified } from "./value";
export { FieldFlag, CompiledSchema, compileSchema, schemaSymbol, isSchemaCarrier } from "./schema";
export type { FieldDescriptor, SchemaLike, SchemaCarrier } from "./schema";
export { SchemaRegistry, defaultSchemaRegistry, registerSchema } from "./registry";
export { recordAccessor } from "./accessor";
export type { FieldAccessor } from "./accessor";
export type { StructRecord } from "./struct";

// Codec
export { encodeStruct, encodeGeneric, decodeStruct, decodeStructInto, decodeGeneric } from "./codec";
export type { CodecContext } from "./codec";
export { decodeNodes } from "./nodes";
export type { WireNode, NodeValue, DecodeNodesOptions } from "./nodes";

// Streaming support
export { StreamDecoder, StreamEncoder } from "./stream";
export type { DecodedPacket, StreamDecoderOptions, StreamEncoderOptions } from "./stream";
export { checkFrame } from "./framing";
export {
  DEFAULT_MAX_FRAME_SIZE,
  DEFAULT_MAX_BUFFER_SIZE,
  DEFAULT_LENGTH_FIELD_WIDTH,
  createFrameConfig,
} from "./config";
export type { FrameConfig, FrameConfigOptions, LengthFieldWidth, DecodeErrorPolicy } from "./config";

// Logging
export { consoleLogger, noopLogger } from "./logger";
export type { Logger } from "./logger";

// Low-level access
export { Scanner, probeStruct } from "./scanner";

export { Writer } from "./writer";
export type { WriterOptions } from "./writer";
export { Reader } from "./reader";

/**
 * Library version.
 */
export const VERSION = "0.1.0";

