import { Writer } from "./writer";

/** Scratch buffers larger than this are dropped after use. */
const RETAIN_LIMIT = 64 * 1024;

interface ScratchSlot {
  writer: Writer;
  inUse: boolean;
}

const slots: Record<"big" | "little", ScratchSlot> = {
  big: { writer: new Writer(), inUse: false },
  little: { writer: new Writer({ littleEndian: true }), inUse: false },
};

/**
 * Runs an encoder against a reused scratch writer and returns a copy of
 * what it wrote.
 *
 * A re-entrant call, such as encoding a nested blob while the outer
 * encode holds the scratch writer, gets a fresh writer instead.
 */
export function encodeWithScratch(littleEndian: boolean, encode: (writer: Writer) => void): Uint8Array {
  const slot = littleEndian ? slots.little : slots.big;
  if (slot.inUse) {
    const writer = new Writer({ littleEndian });
    encode(writer);
    return writer.toBytes();
  }

  slot.inUse = true;
  try {
    slot.writer.reset();
    encode(slot.writer);
    const result = slot.writer.toBytes();
    if (slot.writer.position > RETAIN_LIMIT) {
      slot.writer = new Writer({ littleEndian });
    }
    return result;
  } finally {
    slot.inUse = false;
  }
}
