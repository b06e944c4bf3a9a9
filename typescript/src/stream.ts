/**
 * Length-prefixed packet streams.
 *
 * Wire format: [length: 1, 2 or 4 bytes][struct body]
 *
 * The length is unsigned, in the configured byte order, and counts the
 * length field itself unless inclusiveLength is false.
 */

import { type CodecContext, decodeGeneric, decodeStruct, encodeGeneric, encodeStruct } from "./codec";
import {
  DEFAULT_MAX_BUFFER_SIZE,
  type DecodeErrorPolicy,
  type FrameConfig,
  type FrameConfigOptions,
  createFrameConfig,
  validateDecodeErrorPolicy,
  validateSizeLimit,
} from "./config";
import { BufferLimitExceededError, FrameTooLargeError, StreamClosedError } from "./errors";
import { checkFrame, maxLengthFieldValue, writeLengthField } from "./framing";
import { type Logger, resolveLogger } from "./logger";
import { type SchemaLike, resolveSchema } from "./schema";
import type { StructRecord } from "./struct";
import { BytesMode } from "./types";
import type { StructValue } from "./value";

/** Default initial buffer capacity for stream buffers. */
const DEFAULT_STREAM_BUFFER_CAPACITY = 4096;

/** Growth factor for stream buffers. */
const STREAM_GROWTH_FACTOR = 2;

/**
 * A decoded packet: a record when a schema is configured, else a StructValue.
 */
export type DecodedPacket = StructRecord | StructValue;

/**
 * Options for StreamDecoder configuration.
 */
export interface StreamDecoderOptions extends FrameConfigOptions {
  /** Decode packets into records with this schema; generic decode otherwise */
  schema?: SchemaLike;
  /** Option bits passed to the decoder */
  flags?: number;
  /** Bytes mode for generic decode. Default: Auto */
  bytesMode?: BytesMode;
  context?: CodecContext;
  /** Largest number of bytes held while waiting for a packet. Default: 10 MiB */
  maxBufferSize?: number;
  /** Default: "discard" */
  decodeErrorPolicy?: DecodeErrorPolicy;
  /** Default: console; null disables logging */
  logger?: Logger | null;
  /** Initial buffer capacity. Default: 4096 */
  initialCapacity?: number;
}

/**
 * StreamDecoder accumulates bytes from a transport and yields decoded
 * packets as they become complete.
 *
 * @example
 * ```typescript
 * const decoder = new StreamDecoder({ schema: User, maxFrameSize: 1024 });
 * socket.on("data", (chunk) => {
 *   decoder.feed(chunk);
 *   for (const user of decoder) {
 *     handle(user);
 *   }
 * });
 * ```
 */
export class StreamDecoder implements Iterable<DecodedPacket> {
  readonly config: FrameConfig;
  private readonly decodePacket: (body: Uint8Array) => DecodedPacket;
  private readonly maxBufferSize: number;
  private readonly policy: DecodeErrorPolicy;
  private readonly logger: Logger;
  private buffer: Uint8Array;
  private start: number;
  private end: number;

  constructor(options: StreamDecoderOptions = {}) {
    this.config = createFrameConfig(options);
    this.maxBufferSize = options.maxBufferSize ?? DEFAULT_MAX_BUFFER_SIZE;
    validateSizeLimit(this.maxBufferSize, "maxBufferSize");
    this.policy = options.decodeErrorPolicy ?? "discard";
    validateDecodeErrorPolicy(this.policy);
    this.logger = resolveLogger(options.logger);

    const { schema, context } = options;
    const flags = options.flags ?? 0;
    const bytesMode = options.bytesMode ?? BytesMode.Auto;
    if (schema !== undefined) {
      const compiled = context?.registry ? context.registry.resolve(schema) : resolveSchema(schema);
      this.decodePacket = (body) => decodeStruct(body, compiled, flags, context);
    } else {
      this.decodePacket = (body) => decodeGeneric(body, flags, bytesMode);
    }

    this.buffer = new Uint8Array(options.initialCapacity ?? DEFAULT_STREAM_BUFFER_CAPACITY);
    this.start = 0;
    this.end = 0;
  }

  /**
   * Number of buffered bytes not yet consumed by a packet.
   */
  get pending(): number {
    return this.end - this.start;
  }

  /**
   * Appends bytes received from the transport.
   *
   * @throws BufferLimitExceededError if the buffered total would pass
   *   maxBufferSize; nothing is appended in that case
   */
  feed(data: Uint8Array): void {
    const total = this.pending + data.length;
    if (total > this.maxBufferSize) {
      throw new BufferLimitExceededError(total, this.maxBufferSize);
    }
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.end);
    this.end += data.length;
  }

  /**
   * Decodes the next complete packet.
   *
   * @returns the decoded packet, or null while the next one is incomplete
   * @throws FrameError if the length prefix is invalid; no bytes are consumed
   * @throws JceError if the packet body fails to decode; whether the
   *   packet is dropped depends on decodeErrorPolicy
   */
  next(): DecodedPacket | null {
    const available = this.buffer.subarray(this.start, this.end);
    let size: number | null;
    try {
      size = checkFrame(available, this.config);
    } catch (e) {
      this.logger.error("Invalid frame in stream:", e);
      throw e;
    }
    if (size === null) {
      return null;
    }

    const body = available.subarray(this.config.lengthFieldWidth, size);
    try {
      const packet = this.decodePacket(body);
      this.consume(size);
      return packet;
    } catch (e) {
      if (this.policy === "discard") {
        this.consume(size);
      }
      this.logger.warn(`Failed to decode packet of ${size} bytes (${this.policy}):`, e);
      throw e;
    }
  }

  /**
   * Drops all buffered bytes.
   */
  reset(): void {
    this.start = 0;
    this.end = 0;
  }

  *[Symbol.iterator](): IterableIterator<DecodedPacket> {
    for (let packet = this.next(); packet !== null; packet = this.next()) {
      yield packet;
    }
  }

  private consume(size: number): void {
    this.start += size;
    if (this.start === this.end) {
      this.start = 0;
      this.end = 0;
    }
  }

  /**
   * Makes room for needed more bytes, compacting before growing.
   */
  private ensureCapacity(needed: number): void {
    if (this.end + needed <= this.buffer.length) {
      return;
    }
    const pending = this.pending;
    if (pending + needed <= this.buffer.length) {
      this.buffer.copyWithin(0, this.start, this.end);
    } else {
      let newCapacity = Math.max(this.buffer.length, 1) * STREAM_GROWTH_FACTOR;
      while (newCapacity < pending + needed) {
        newCapacity *= STREAM_GROWTH_FACTOR;
      }
      const newBuffer = new Uint8Array(newCapacity);
      newBuffer.set(this.buffer.subarray(this.start, this.end));
      this.buffer = newBuffer;
    }
    this.start = 0;
    this.end = pending;
  }
}

/**
 * Options for StreamEncoder configuration.
 */
export interface StreamEncoderOptions extends FrameConfigOptions {
  /** Option bits passed to the encoder */
  flags?: number;
  context?: CodecContext;
  /** Initial buffer capacity. Default: 4096 */
  initialCapacity?: number;
}

/**
 * StreamEncoder writes length-prefixed packets to a buffer, in the
 * format StreamDecoder reads back.
 *
 * @example
 * ```typescript
 * const encoder = new StreamEncoder();
 * encoder.writeStruct({ id: 1, name: "a" }, User);
 * encoder.writeStruct({ id: 2, name: "b" }, User);
 * socket.write(encoder.bytes());
 * ```
 */
export class StreamEncoder {
  readonly config: FrameConfig;
  private readonly flags: number;
  private readonly context: CodecContext;
  private buffer: Uint8Array;
  private pos: number;
  private closed: boolean;

  constructor(options: StreamEncoderOptions = {}) {
    this.config = createFrameConfig(options);
    this.flags = options.flags ?? 0;
    this.context = options.context ?? {};
    this.buffer = new Uint8Array(options.initialCapacity ?? DEFAULT_STREAM_BUFFER_CAPACITY);
    this.pos = 0;
    this.closed = false;
  }

  /**
   * Returns the current position (bytes written).
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns true if the encoder is closed.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = Math.max(this.buffer.length, 1) * STREAM_GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= STREAM_GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
  }

  /**
   * Writes an already encoded struct body as one packet.
   *
   * @throws StreamClosedError if the encoder is closed
   * @throws FrameTooLargeError if the packet exceeds maxFrameSize or the
   *   length field cannot represent it
   */
  writeFrame(payload: Uint8Array): void {
    if (this.closed) {
      throw new StreamClosedError();
    }
    const { lengthFieldWidth: width, inclusiveLength, littleEndian, maxFrameSize } = this.config;
    const packetSize = payload.length + width;
    if (packetSize > maxFrameSize) {
      throw new FrameTooLargeError(packetSize, maxFrameSize);
    }
    const length = inclusiveLength ? packetSize : payload.length;
    const maxLength = maxLengthFieldValue(width);
    if (length > maxLength) {
      throw new FrameTooLargeError(length, maxLength);
    }

    this.ensureCapacity(packetSize);
    writeLengthField(this.buffer.subarray(this.pos), length, width, littleEndian);
    this.buffer.set(payload, this.pos + width);
    this.pos += packetSize;
  }

  /**
   * Encodes value with a schema and writes it as one packet.
   */
  writeStruct(value: object, schema: SchemaLike): void {
    this.writeFrame(encodeStruct(value, schema, this.flags, this.context));
  }

  /**
   * Encodes value without a schema and writes it as one packet.
   */
  writeGeneric(value: unknown): void {
    this.writeFrame(encodeGeneric(value, this.flags, this.context));
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the encoder for reuse, clearing all written data.
   */
  reset(): void {
    this.pos = 0;
    this.closed = false;
  }

  /**
   * Closes the encoder. No more packets can be written after closing.
   */
  close(): void {
    this.closed = true;
  }
}
