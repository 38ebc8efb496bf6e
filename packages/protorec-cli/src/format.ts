/**
 * Display helpers shared by the commands
 */

import { ErrorCode, bytesToHex, type ProtorecError } from 'protorec';

/**
 * JSON-safe copy of a decoded value: bytes become hex strings, u64 values
 * decimal strings
 */
export function toDisplay(value: unknown): unknown {
  if (value instanceof Uint8Array) {
    return bytesToHex(value);
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toDisplay(item));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, toDisplay(item)]));
  }
  return value;
}

export function formatJson(value: unknown): string {
  return JSON.stringify(toDisplay(value));
}

/** ERR_TRUNCATED_FRAME and the like */
export function errorName(error: ProtorecError): string {
  return ErrorCode[error.code];
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
