/**
 * Frame configuration defaults and validators.
 */

/** Default maximum packet size, length field included (10 MiB). */
export const DEFAULT_MAX_FRAME_SIZE = 10 * 1024 * 1024;

/** Default cap on bytes buffered by a stream decoder (10 MiB). */
export const DEFAULT_MAX_BUFFER_SIZE = 10 * 1024 * 1024;

/** Default width of the length prefix in bytes. */
export const DEFAULT_LENGTH_FIELD_WIDTH = 4;

/**
 * Width of a frame's length prefix.
 */
export type LengthFieldWidth = 1 | 2 | 4;

/**
 * What a stream decoder does with a complete packet that fails to decode.
 *
 * - "discard": drop the packet, then rethrow
 * - "retain": leave it buffered, then rethrow
 */
export type DecodeErrorPolicy = "discard" | "retain";

/**
 * How packets are delimited in a byte stream.
 */
export interface FrameConfig {
  readonly lengthFieldWidth: LengthFieldWidth;
  /** Whether the length value counts the length field itself */
  readonly inclusiveLength: boolean;
  readonly littleEndian: boolean;
  /** Largest accepted packet, length field included */
  readonly maxFrameSize: number;
}

export interface FrameConfigOptions {
  /** Width of the length prefix. Default: 4 */
  lengthFieldWidth?: number;
  /** Default: true */
  inclusiveLength?: boolean;
  /** Default: false (big-endian) */
  littleEndian?: boolean;
  /** Default: 10 MiB */
  maxFrameSize?: number;
}

/**
 * Validates a length field width.
 *
 * @throws {RangeError} When width is not 1, 2 or 4
 */
export function validateLengthFieldWidth(width: unknown): asserts width is LengthFieldWidth {
  if (width !== 1 && width !== 2 && width !== 4) {
    throw new RangeError(`Length field width must be 1, 2 or 4, got ${String(width)}`);
  }
}

/**
 * Validates a size limit is a positive integer.
 *
 * @throws {TypeError} When size is invalid
 */
export function validateSizeLimit(size: unknown, name: string): asserts size is number {
  if (typeof size !== "number" || !Number.isSafeInteger(size) || size < 1) {
    throw new TypeError(`${name} must be a positive integer, got ${String(size)}`);
  }
}

/**
 * Validates a decode error policy.
 *
 * @throws {TypeError} When policy is not "discard" or "retain"
 */
export function validateDecodeErrorPolicy(policy: unknown): asserts policy is DecodeErrorPolicy {
  if (policy !== "discard" && policy !== "retain") {
    throw new TypeError(`Decode error policy must be "discard" or "retain", got ${String(policy)}`);
  }
}

/**
 * Builds a frozen frame configuration, filling in defaults.
 */
export function createFrameConfig(options: FrameConfigOptions = {}): FrameConfig {
  const lengthFieldWidth = options.lengthFieldWidth ?? DEFAULT_LENGTH_FIELD_WIDTH;
  validateLengthFieldWidth(lengthFieldWidth);
  const maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE;
  validateSizeLimit(maxFrameSize, "maxFrameSize");

  return Object.freeze({
    lengthFieldWidth,
    inclusiveLength: options.inclusiveLength ?? true,
    littleEndian: options.littleEndian ?? false,
    maxFrameSize,
  });
}
