import type { FrameConfig, LengthFieldWidth } from "./config";
import { FrameInvalidLengthError, FrameTooLargeError } from "./errors";

/**
 * Reads the unsigned length prefix at the start of buffer.
 *
 * @returns the length, or null when fewer than width bytes are available
 */
export function readLengthField(
  buffer: Uint8Array,
  width: LengthFieldWidth,
  littleEndian: boolean
): number | null {
  if (buffer.length < width) {
    return null;
  }
  const view = new DataView(buffer.buffer, buffer.byteOffset, width);
  switch (width) {
    case 1:
      return view.getUint8(0);
    case 2:
      return view.getUint16(0, littleEndian);
    case 4:
      return view.getUint32(0, littleEndian);
  }
}

/**
 * Writes length into the first width bytes of target.
 */
export function writeLengthField(
  target: Uint8Array,
  length: number,
  width: LengthFieldWidth,
  littleEndian: boolean
): void {
  const view = new DataView(target.buffer, target.byteOffset, width);
  switch (width) {
    case 1:
      view.setUint8(0, length);
      break;
    case 2:
      view.setUint16(0, length, littleEndian);
      break;
    case 4:
      view.setUint32(0, length, littleEndian);
      break;
  }
}

/**
 * Largest value a length field of the given width can carry.
 */
export function maxLengthFieldValue(width: LengthFieldWidth): number {
  return 2 ** (width * 8) - 1;
}

/**
 * Checks whether buffer starts with a complete packet.
 *
 * @returns the packet size (length field included), or null while more
 *   bytes are needed
 * @throws FrameInvalidLengthError if an inclusive length is smaller than
 *   the length field
 * @throws FrameTooLargeError if the packet exceeds config.maxFrameSize
 */
export function checkFrame(buffer: Uint8Array, config: FrameConfig): number | null {
  const width = config.lengthFieldWidth;
  const length = readLengthField(buffer, width, config.littleEndian);
  if (length === null) {
    return null;
  }

  const packetSize = config.inclusiveLength ? length : length + width;
  if (config.inclusiveLength && packetSize < width) {
    throw new FrameInvalidLengthError(length, width);
  }
  if (packetSize > config.maxFrameSize) {
    throw new FrameTooLargeError(packetSize, config.maxFrameSize);
  }
  if (buffer.length < packetSize) {
    return null;
  }
  return packetSize;
}
