/**
 * Length-prefixed framing for records.
 *
 * Frame layout (little-endian):
 *   [0..3]  payload length  u32
 *   [4..5]  schema tag      u16
 *   [6..]   payload
 *
 * The length alone is enough to step over a frame without decoding it.
 */

import { ErrorCode, ProtorecError } from '../types/errors.js';
import { formatTag, MAX_SCHEMA_TAG } from '../schema/registry.js';
import type { ByteSource } from '../file/io.js';

/** Bytes in front of every payload */
export const FRAME_HEADER_LENGTH = 6;

/** Default maximum payload size (16 MB) */
export const MAX_FRAME_LENGTH = 16 * 1024 * 1024;

/** Largest length the u32 prefix can carry */
const U32_MAX = 0xffffffff;

/**
 * Frame a payload with its length and schema tag
 */
export function frameRecord(tag: number, payload: Uint8Array, maxFrameLength: number = MAX_FRAME_LENGTH): Uint8Array {
  if (!Number.isInteger(tag) || tag < 0 || tag > MAX_SCHEMA_TAG) {
    throw new ProtorecError(ErrorCode.ERR_INVALID_SCHEMA, `Schema tag ${tag} is not a u16`);
  }
  const limit = Math.min(maxFrameLength, U32_MAX);
  if (payload.length > limit) {
    throw new ProtorecError(
      ErrorCode.ERR_FRAME_TOO_LARGE,
      `Payload too large: ${payload.length} bytes (max: ${limit})`,
      { tag }
    );
  }

  const framed = new Uint8Array(FRAME_HEADER_LENGTH + payload.length);
  const view = new DataView(framed.buffer, framed.byteOffset, FRAME_HEADER_LENGTH);
  view.setUint32(0, payload.length, true);
  view.setUint16(4, tag, true);
  framed.set(payload, FRAME_HEADER_LENGTH);
  return framed;
}

/**
 * A frame read back from a source
 */
export interface Frame {
  tag: number;
  /** The payload (without frame header) */
  payload: Uint8Array;
  /** Total bytes consumed (including frame header) */
  bytesConsumed: number;
}

/**
 * Read the frame starting at `offset`.
 * Returns null at end of stream. Reads exactly the frame header and then
 * exactly the declared payload, nothing past it.
 *
 * Throws ERR_TRUNCATED_FRAME when the source ends inside the frame and
 * ERR_STREAM_CORRUPT when the declared length is over `maxFrameLength`.
 */
export function unframe(source: ByteSource, offset: number, maxFrameLength: number = MAX_FRAME_LENGTH): Frame | null {
  const remaining = source.size - offset;
  if (remaining <= 0) {
    return null;
  }

  if (remaining < FRAME_HEADER_LENGTH) {
    throw new ProtorecError(
      ErrorCode.ERR_TRUNCATED_FRAME,
      `Frame header at ${offset} needs ${FRAME_HEADER_LENGTH} bytes, ${remaining} remain`,
      { position: offset }
    );
  }

  const head = source.read(offset, FRAME_HEADER_LENGTH);
  if (head.length < FRAME_HEADER_LENGTH) {
    throw new ProtorecError(ErrorCode.ERR_TRUNCATED_FRAME, `Source ended inside frame header at ${offset}`, {
      position: offset,
    });
  }

  const view = new DataView(head.buffer, head.byteOffset, FRAME_HEADER_LENGTH);
  const length = view.getUint32(0, true);
  const tag = view.getUint16(4, true);

  if (length > maxFrameLength) {
    throw new ProtorecError(
      ErrorCode.ERR_STREAM_CORRUPT,
      `Frame at ${offset} declares ${length} bytes (max: ${maxFrameLength})`,
      { position: offset, tag }
    );
  }

  const available = remaining - FRAME_HEADER_LENGTH;
  if (length > available) {
    throw new ProtorecError(
      ErrorCode.ERR_TRUNCATED_FRAME,
      `Frame ${formatTag(tag)} at ${offset} declares ${length} bytes, ${available} remain`,
      { position: offset, tag }
    );
  }

  const payload = length === 0 ? new Uint8Array(0) : source.read(offset + FRAME_HEADER_LENGTH, length);
  if (payload.length < length) {
    throw new ProtorecError(ErrorCode.ERR_TRUNCATED_FRAME, `Source ended inside frame at ${offset}`, {
      position: offset,
      tag,
    });
  }

  return { tag, payload, bytesConsumed: FRAME_HEADER_LENGTH + length };
}
