import { vi } from 'vitest';
import { ProtorecError } from '../types/errors.js';
import type { Logger } from '../utils/log.js';

/**
 * Run `fn` and return the ProtorecError it throws
 */
export function caught(fn: () => unknown): ProtorecError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ProtorecError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ProtorecError');
}

export function mockLogger() {
  return {
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
    debug: vi.fn<(message: string) => void>(),
  } satisfies Logger;
}

export const bytes = (...values: number[]): Uint8Array => new Uint8Array(values);

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((total, part) => total + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * A decoded CBOR map, for comparing against decodeCanonical() output
 */
export function wire(fields: Record<string, unknown>): Map<string, unknown> {
  return new Map(Object.entries(fields));
}
