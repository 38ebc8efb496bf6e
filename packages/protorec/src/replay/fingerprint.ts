/**
 * Content fingerprint of a capture file.
 *
 * SHA-256 over each record's kind and canonical payload, in order. Files with
 * the same logical content fingerprint the same, whatever schema versions they
 * were written with.
 */

import { sha256 } from '@noble/hashes/sha256';
import { utf8ToBytes } from '@noble/hashes/utils';
import type { Variant } from '../types/values.js';
import { MessageCodec } from '../wire/codec.js';
import { RecordReader, type ReadSource } from '../file/reader.js';
import { bytesToHex } from '../utils/hex.js';
import type { ReplayOptions } from './diff.js';

export interface Fingerprint {
  /** Hex SHA-256 digest */
  readonly digest: string;
  readonly recordCount: number;
}

function lengthPrefix(length: number): Uint8Array {
  const prefix = new Uint8Array(4);
  new DataView(prefix.buffer).setUint32(0, length, true);
  return prefix;
}

/**
 * Throws the first per-record or terminal error
 */
export function fingerprintRecords<V extends Variant>(source: ReadSource, options: ReplayOptions<V>): Fingerprint {
  const codec = new MessageCodec(options.registry);
  const hash = sha256.create();
  let recordCount = 0;

  const reader = RecordReader.open(source, options);
  try {
    for (const entry of reader.records()) {
      if (!entry.ok) {
        throw entry.error;
      }
      const kind = utf8ToBytes(entry.value.kind);
      const { payload } = codec.encodeRecord(entry.value);
      hash.update(lengthPrefix(kind.length)).update(kind);
      hash.update(lengthPrefix(payload.length)).update(payload);
      recordCount++;
    }
  } finally {
    reader.close();
  }

  return { digest: bytesToHex(hash.digest()), recordCount };
}
