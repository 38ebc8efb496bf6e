/**
 * Wire maps and the validated field reader used by schema decoders.
 *
 * A map-layout payload is one CBOR map keyed by short field names. Decoders
 * never touch the decoded map directly: every field goes through a
 * FieldReader accessor, which checks its wire type, and finish() rejects keys
 * that no accessor asked for.
 */

import { ErrorCode, ProtorecError } from '../types/errors.js';

/**
 * Values a schema may put on the wire
 */
export type WireValue = number | bigint | string | boolean | Uint8Array | WireValue[] | WireMap;

export interface WireMap {
  [key: string]: WireValue;
}

const U64_MAX = (1n << 64n) - 1n;

function throwMismatch(path: string, expected: string, actual: unknown): never {
  throw new ProtorecError(
    ErrorCode.ERR_SCHEMA_MISMATCH,
    `Field ${path}: expected ${expected}, got ${describe(actual)}`
  );
}

function describe(value: unknown): string {
  if (value === undefined) return 'nothing';
  if (value === null) return 'null';
  if (value instanceof Uint8Array) return 'bytes';
  if (value instanceof Map) return 'map';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Read an unsigned integer that fits in a JS number
 */
export function asUint(value: unknown, path: string, max: number = Number.MAX_SAFE_INTEGER): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > max) {
    return throwMismatch(path, `integer 0..${max}`, value);
  }
  return value;
}

/**
 * Read an unsigned 64-bit integer. cborg yields numbers for safe values and
 * bigints above that.
 */
export function asU64(value: unknown, path: string): bigint {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === 'bigint' && value >= 0n && value <= U64_MAX) {
    return value;
  }
  return throwMismatch(path, 'u64', value);
}

export function asBool(value: unknown, path: string): boolean {
  if (typeof value !== 'boolean') {
    return throwMismatch(path, 'boolean', value);
  }
  return value;
}

export function asText(value: unknown, path: string): string {
  if (typeof value !== 'string') {
    return throwMismatch(path, 'text', value);
  }
  return value;
}

export function asBytes(value: unknown, path: string): Uint8Array {
  if (!(value instanceof Uint8Array)) {
    return throwMismatch(path, 'bytes', value);
  }
  return value;
}

/**
 * Validated access to the fields of one wire map
 */
export class FieldReader {
  private readonly fields: Map<string, unknown>;
  private readonly consumed = new Set<string>();

  private constructor(fields: Map<string, unknown>, readonly path: string) {
    this.fields = fields;
  }

  /**
   * Wrap a decoded wire value, which must be a map with text keys
   */
  static from(value: unknown, path: string = '$'): FieldReader {
    if (!(value instanceof Map)) {
      return throwMismatch(path, 'map', value);
    }
    const entries: Iterable<[unknown, unknown]> = value.entries();
    const fields = new Map<string, unknown>();
    for (const [key, entry] of entries) {
      if (typeof key !== 'string') {
        return throwMismatch(`${path} key`, 'text', key);
      }
      fields.set(key, entry);
    }
    return new FieldReader(fields, path);
  }

  /**
   * Reader over no fields, handed to unit-layout decoders
   */
  static empty(): FieldReader {
    return new FieldReader(new Map(), '$');
  }

  has(key: string): boolean {
    return this.fields.has(key);
  }

  uint(key: string, max?: number): number {
    return asUint(this.take(key), this.pathOf(key), max);
  }

  u64(key: string): bigint {
    return asU64(this.take(key), this.pathOf(key));
  }

  bool(key: string): boolean {
    return asBool(this.take(key), this.pathOf(key));
  }

  text(key: string): string {
    return asText(this.take(key), this.pathOf(key));
  }

  bytes(key: string): Uint8Array {
    return asBytes(this.take(key), this.pathOf(key));
  }

  /**
   * Read an array, decoding each item with `item`
   */
  array<T>(key: string, item: (value: unknown, path: string) => T): T[] {
    const value = this.take(key);
    const path = this.pathOf(key);
    if (!Array.isArray(value)) {
      return throwMismatch(path, 'array', value);
    }
    return value.map((entry: unknown, i) => item(entry, `${path}[${i}]`));
  }

  /**
   * Read a nested map. `read` gets its own reader, which is finished on return.
   */
  map<T>(key: string, read: (fields: FieldReader) => T): T {
    const nested = FieldReader.from(this.take(key), this.pathOf(key));
    const result = read(nested);
    nested.finish();
    return result;
  }

  /**
   * Read an optional field; absent keys give undefined
   */
  optional<T>(key: string, read: (fields: FieldReader, key: string) => T): T | undefined {
    return this.fields.has(key) ? read(this, key) : undefined;
  }

  /**
   * Reject keys that no accessor consumed
   */
  finish(): void {
    for (const key of this.fields.keys()) {
      if (!this.consumed.has(key)) {
        throw new ProtorecError(ErrorCode.ERR_SCHEMA_MISMATCH, `Field ${this.pathOf(key)}: not part of the schema`);
      }
    }
  }

  private take(key: string): unknown {
    if (!this.fields.has(key)) {
      return throwMismatch(this.pathOf(key), 'a value', undefined);
    }
    this.consumed.add(key);
    return this.fields.get(key);
  }

  private pathOf(key: string): string {
    return `${this.path}.${key}`;
  }
}
