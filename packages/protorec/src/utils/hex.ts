/**
 * Hex helpers for fingerprints and tool output.
 */

import { bytesToHex } from '@noble/hashes/utils';

export { bytesToHex };

/**
 * Convert a hex string to a byte array. Whitespace between bytes is ignored.
 */
export function hexToBytes(hex: string): Uint8Array {
  const digits = hex.replace(/\s+/g, '');
  if (digits.length % 2 !== 0) {
    throw new Error('Invalid hex string: odd length');
  }
  const bytes = new Uint8Array(digits.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    const pair = digits.slice(i * 2, i * 2 + 2);
    if (!/^[0-9a-fA-F]{2}$/.test(pair)) {
      throw new Error(`Invalid hex character at position ${i * 2}`);
    }
    bytes[i] = parseInt(pair, 16);
  }
  return bytes;
}

/**
 * First `max` bytes as spaced hex, with an ellipsis when cut
 */
export function hexPreview(bytes: Uint8Array, max: number = 16): string {
  const shown = (bytesToHex(bytes.subarray(0, max)).match(/../g) ?? []).join(' ');
  return bytes.length > max ? `${shown} ...` : shown;
}
