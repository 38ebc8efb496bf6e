/**
 * CBOR codec for record payloads.
 * Uses cborg for deterministic encoding: the same value always produces the
 * same bytes, which diffing and fingerprinting rely on.
 */

import * as cborg from 'cborg';
import { ErrorCode, ProtorecError } from '../types/errors.js';
import type { Variant } from '../types/values.js';
import { formatTag, type RegisteredSchema, type SchemaRegistry } from '../schema/registry.js';
import { FieldReader, type WireValue } from './fields.js';

/**
 * Encode options for deterministic CBOR.
 * cborg's default map sorter already orders keys canonically.
 */
const encodeOptions: cborg.EncodeOptions = {
  float64: true,
};

/**
 * Decode options: reject anything the encoder would never produce.
 * Maps come back as Map so that no key (`__proto__` included) is lost.
 */
const decodeOptions: cborg.DecodeOptions = {
  strict: true,
  useMaps: true,
  rejectDuplicateMapKeys: true,
  allowIndefinite: false,
  allowUndefined: false,
};

const EMPTY_PAYLOAD = new Uint8Array(0);

/**
 * Encode a wire value to canonical CBOR bytes
 */
export function encodeCanonical(data: WireValue): Uint8Array {
  return cborg.encode(data, encodeOptions);
}

/**
 * Decode one CBOR item that must span the whole buffer. Maps decode as Map.
 */
export function decodeCanonical(data: Uint8Array): unknown {
  try {
    const decoded: unknown = cborg.decode(data, decodeOptions);
    return decoded;
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ProtorecError(ErrorCode.ERR_SCHEMA_MISMATCH, `Malformed payload: ${detail}`, { cause: error });
  }
}

/**
 * A value's payload together with the tag it was encoded under
 */
export interface EncodedRecord {
  tag: number;
  payload: Uint8Array;
}

/**
 * Encoder and decoder for the values of one registry
 */
export class MessageCodec<V extends Variant> {
  constructor(readonly registry: SchemaRegistry<V>) {}

  /**
   * Tag that encode() would write for this value
   */
  tagOf(value: V): number {
    return this.registry.encoderFor(value.kind).tag;
  }

  /**
   * Encode a value to its payload bytes
   */
  encode(value: V): Uint8Array {
    return this.encodeRecord(value).payload;
  }

  encodeRecord(value: V): EncodedRecord {
    const schema = this.registry.encoderFor(value.kind);
    if (schema.layout === 'unit') {
      return { tag: schema.tag, payload: EMPTY_PAYLOAD };
    }
    try {
      return { tag: schema.tag, payload: encodeCanonical(schema.toWire(value)) };
    } catch (error) {
      if (error instanceof ProtorecError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new ProtorecError(
        ErrorCode.ERR_SCHEMA_MISMATCH,
        `Cannot encode ${schema.kind} v${schema.version}: ${detail}`,
        { tag: schema.tag, cause: error }
      );
    }
  }

  /**
   * Decode a payload written under `tag`.
   * Throws ERR_UNKNOWN_SCHEMA for unregistered tags and ERR_SCHEMA_MISMATCH for
   * payloads that do not fit the tag's layout.
   */
  decode(tag: number, payload: Uint8Array): V {
    const schema = this.registry.lookup(tag);
    try {
      return decodeWith(schema, payload);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ProtorecError(
        ErrorCode.ERR_SCHEMA_MISMATCH,
        `${schema.kind} v${schema.version} (${formatTag(tag)}): ${detail}`,
        { tag, cause: error }
      );
    }
  }
}

function decodeWith<V extends Variant>(schema: RegisteredSchema<V>, payload: Uint8Array): V {
  let fields: FieldReader;
  if (schema.layout === 'unit') {
    if (payload.length !== 0) {
      throw new ProtorecError(ErrorCode.ERR_SCHEMA_MISMATCH, `Unit payload must be empty, got ${payload.length} bytes`);
    }
    fields = FieldReader.empty();
  } else {
    if (payload.length === 0) {
      throw new ProtorecError(ErrorCode.ERR_SCHEMA_MISMATCH, 'Empty payload');
    }
    fields = FieldReader.from(decodeCanonical(payload));
  }

  const value = schema.fromWire(fields);
  fields.finish();

  if (value.kind !== schema.kind) {
    throw new ProtorecError(ErrorCode.ERR_SCHEMA_MISMATCH, `Decoded ${value.kind}, expected ${schema.kind}`);
  }
  return value;
}
