/**
 * Payload encoding and record framing
 */

export {
  MessageCodec,
  encodeCanonical,
  decodeCanonical,
} from './codec.js';
export type { EncodedRecord } from './codec.js';

export {
  FRAME_HEADER_LENGTH,
  MAX_FRAME_LENGTH,
  frameRecord,
  unframe,
} from './framing.js';
export type { Frame } from './framing.js';

export {
  FieldReader,
  asUint,
  asU64,
  asBool,
  asText,
  asBytes,
} from './fields.js';
export type { WireValue, WireMap } from './fields.js';
