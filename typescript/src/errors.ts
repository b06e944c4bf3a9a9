/**
 * Base error class for codec errors.
 */
export class JceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JceError";
  }
}

/**
 * Error thrown when a value cannot be encoded.
 */
export class EncodeError extends JceError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 *
 * Carries the byte offset at which the problem was detected.
 */
export class DecodeError extends JceError {
  readonly offset: number;

  constructor(offset: number, message: string) {
    super(`Error at offset ${offset}: ${message}`);
    this.name = "DecodeError";
    this.offset = offset;
  }
}

/**
 * Error thrown when a read runs past the end of the input.
 */
export class BufferOverflowError extends DecodeError {
  constructor(offset: number) {
    super(offset, "Unexpected end of buffer");
    this.name = "BufferOverflowError";
  }
}

/**
 * Error thrown when a header carries an unknown type code.
 */
export class InvalidTypeError extends DecodeError {
  readonly code: number;

  constructor(offset: number, code: number) {
    super(offset, `Invalid type ${code}`);
    this.name = "InvalidTypeError";
    this.code = code;
  }
}

/**
 * Error thrown when encode or decode recursion passes the depth limit.
 */
export class DepthExceededError extends JceError {
  readonly depth: number;

  constructor(depth: number) {
    super(`Depth exceeded: nesting deeper than ${depth} levels`);
    this.name = "DepthExceededError";
    this.depth = depth;
  }
}

/**
 * Error thrown when a field descriptor list cannot be compiled.
 */
export class SchemaError extends JceError {
  constructor(message: string) {
    super(message);
    this.name = "SchemaError";
  }
}

/**
 * Error thrown when two descriptors of one schema share a tag.
 */
export class DuplicateTagError extends SchemaError {
  readonly tag: number;

  constructor(tag: number) {
    super(`Duplicate tag ${tag} in schema`);
    this.name = "DuplicateTagError";
    this.tag = tag;
  }
}

/**
 * Base class for framing errors.
 */
export class FrameError extends JceError {
  constructor(message: string) {
    super(message);
    this.name = "FrameError";
  }
}

/**
 * Error thrown when an inclusive length is shorter than the length field itself.
 */
export class FrameInvalidLengthError extends FrameError {
  readonly length: number;
  readonly headerLength: number;

  constructor(length: number, headerLength: number) {
    super(`Frame length ${length} is invalid (less than header length ${headerLength})`);
    this.name = "FrameInvalidLengthError";
    this.length = length;
    this.headerLength = headerLength;
  }
}

/**
 * Error thrown when a frame exceeds the configured maximum size.
 */
export class FrameTooLargeError extends FrameError {
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number) {
    super(`Frame length ${size} exceeds limit ${limit}`);
    this.name = "FrameTooLargeError";
    this.size = size;
    this.limit = limit;
  }
}

/**
 * Error thrown when feeding data would grow a stream buffer past its limit.
 */
export class BufferLimitExceededError extends JceError {
  readonly size: number;
  readonly limit: number;

  constructor(size: number, limit: number) {
    super(`Stream buffer size ${size} exceeds limit ${limit}`);
    this.name = "BufferLimitExceededError";
    this.size = size;
    this.limit = limit;
  }
}

/**
 * Error thrown when writing to a closed stream.
 */
export class StreamClosedError extends JceError {
  constructor() {
    super("Stream is closed");
    this.name = "StreamClosedError";
  }
}
