/**
 * Record file format (v1.0)
 *
 * Layout (all integers are little-endian):
 *
 * [Header] 16 bytes
 *   - magic: 4 bytes ("PREC")
 *   - format_version: u16 (major << 8 | minor)
 *   - flags: u16 (bit 0: finalized, record_count is set; other bits reserved)
 *   - record_count: u64 (advisory, 0 until the writer closes)
 *
 * [Frames] until end of file
 *   - length: u32
 *   - schema tag: u16
 *   - payload: `length` bytes
 *
 * Readers accept any minor version of the major they know. record_count is
 * never used to decide where the file ends.
 */

import { ErrorCode, ProtorecError } from '../types/errors.js';

export const FORMAT_MAGIC = new Uint8Array([0x50, 0x52, 0x45, 0x43]); // "PREC"
export const FORMAT_MAJOR = 1;
export const FORMAT_MINOR = 0;
export const FORMAT_VERSION = (FORMAT_MAJOR << 8) | FORMAT_MINOR;

export const HEADER_LENGTH = 16;
export const OFFSET_VERSION = 4;
export const OFFSET_FLAGS = 6;
export const OFFSET_RECORD_COUNT = 8;

export enum HeaderFlag {
  Finalized = 0x0001,
}

export interface FileHeader {
  /** Raw format_version field */
  formatVersion: number;
  major: number;
  minor: number;
  flags: number;
  /** Set once the writer closed the file and patched the record count */
  finalized: boolean;
  /** Advisory record count; only present on finalized files */
  recordCount?: bigint;
}

/**
 * Header as written when a file is opened: not finalized, count 0
 */
export function encodeHeader(formatVersion: number = FORMAT_VERSION): Uint8Array {
  const header = new Uint8Array(HEADER_LENGTH);
  header.set(FORMAT_MAGIC, 0);
  const view = new DataView(header.buffer);
  view.setUint16(OFFSET_VERSION, formatVersion, true);
  view.setUint16(OFFSET_FLAGS, 0, true);
  view.setBigUint64(OFFSET_RECORD_COUNT, 0n, true);
  return header;
}

/**
 * Bytes patched over the header from OFFSET_FLAGS on close
 */
export function encodeFinalization(recordCount: bigint): Uint8Array {
  const patch = new Uint8Array(HEADER_LENGTH - OFFSET_FLAGS);
  const view = new DataView(patch.buffer);
  view.setUint16(0, HeaderFlag.Finalized, true);
  view.setBigUint64(OFFSET_RECORD_COUNT - OFFSET_FLAGS, recordCount, true);
  return patch;
}

export function formatVersionString(formatVersion: number): string {
  return `${formatVersion >> 8}.${formatVersion & 0xff}`;
}

/**
 * Validate and parse the header at the start of a file.
 * `bytes` is whatever the source had, up to HEADER_LENGTH.
 */
export function parseHeader(bytes: Uint8Array): FileHeader {
  const prefix = Math.min(bytes.length, FORMAT_MAGIC.length);
  for (let i = 0; i < prefix; i++) {
    if (bytes[i] !== FORMAT_MAGIC[i]) {
      throw new ProtorecError(ErrorCode.ERR_BAD_MAGIC, 'Invalid file header magic', { position: 0 });
    }
  }
  if (bytes.length < HEADER_LENGTH) {
    throw new ProtorecError(
      ErrorCode.ERR_STREAM_CORRUPT,
      `File too small to contain a header: ${bytes.length} bytes (need ${HEADER_LENGTH})`,
      { position: 0 }
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, HEADER_LENGTH);
  const formatVersion = view.getUint16(OFFSET_VERSION, true);
  const major = formatVersion >> 8;
  if (major !== FORMAT_MAJOR) {
    throw new ProtorecError(
      ErrorCode.ERR_UNSUPPORTED_VERSION,
      `Unsupported format version: ${formatVersionString(formatVersion)} (reads ${FORMAT_MAJOR}.x)`,
      { position: OFFSET_VERSION }
    );
  }

  const flags = view.getUint16(OFFSET_FLAGS, true);
  const finalized = (flags & HeaderFlag.Finalized) !== 0;
  return {
    formatVersion,
    major,
    minor: formatVersion & 0xff,
    flags,
    finalized,
    recordCount: finalized ? view.getBigUint64(OFFSET_RECORD_COUNT, true) : undefined,
  };
}
