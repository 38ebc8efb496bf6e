/**
 * Schema registry: the closed lookup table from schema tags to the encode and
 * decode functions of one (kind, version) layout.
 *
 * Registration is additive. A tag, once registered, always means the same
 * layout; a changed layout gets a new tag and a higher version, and the
 * superseded definition stays registered so older files keep decoding.
 */

import { ErrorCode, ProtorecError } from '../types/errors.js';
import type { Variant } from '../types/values.js';
import type { FieldReader, WireMap } from '../wire/fields.js';

/** Largest value a schema tag can take on disk (u16) */
export const MAX_SCHEMA_TAG = 0xffff;

/**
 * How a schema lays out its payload
 * - map: one canonical CBOR map of wire keys
 * - unit: empty payload
 */
export type SchemaLayout = 'map' | 'unit';

/**
 * Definition of one schema version for the variant T
 */
export interface SchemaDefinition<T extends Variant> {
  readonly tag: number;
  readonly kind: T['kind'];
  readonly version: number;
  readonly layout: SchemaLayout;
  readonly description?: string;
  /**
   * Convert a value to its wire map. Only needed on the current version of a
   * map-layout kind; superseded versions are decode-only.
   */
  toWire?(value: T): WireMap;
  /**
   * Rebuild a value from its fields. Superseded versions return the current
   * in-memory shape.
   */
  fromWire(fields: FieldReader): T;
}

/**
 * A definition as stored in the registry, erased to the registry's union
 */
export interface RegisteredSchema<V extends Variant> {
  readonly tag: number;
  readonly kind: string;
  readonly version: number;
  readonly layout: SchemaLayout;
  readonly description?: string;
  readonly encodable: boolean;
  toWire(value: V): WireMap;
  fromWire(fields: FieldReader): V;
}

export class SchemaRegistry<V extends Variant> {
  private readonly byTag = new Map<number, RegisteredSchema<V>>();
  private readonly byKind = new Map<string, RegisteredSchema<V>[]>();

  /**
   * Add a schema definition
   */
  register<T extends V>(definition: SchemaDefinition<T>): this {
    const { tag, kind, version, layout } = definition;

    if (!Number.isInteger(tag) || tag < 0 || tag > MAX_SCHEMA_TAG) {
      throw new ProtorecError(ErrorCode.ERR_INVALID_SCHEMA, `Schema tag ${tag} is not a u16`);
    }
    if (!Number.isInteger(version) || version < 1) {
      throw new ProtorecError(ErrorCode.ERR_INVALID_SCHEMA, `Schema ${kind} has invalid version ${version}`);
    }
    const existing = this.byTag.get(tag);
    if (existing) {
      throw new ProtorecError(
        ErrorCode.ERR_DUPLICATE_SCHEMA,
        `Schema tag ${formatTag(tag)} already registered for ${existing.kind} v${existing.version}`,
        { tag }
      );
    }
    const versions = this.byKind.get(kind) ?? [];
    if (versions.some((entry) => entry.version === version)) {
      throw new ProtorecError(ErrorCode.ERR_DUPLICATE_SCHEMA, `Schema ${kind} v${version} already registered`, {
        tag,
      });
    }

    const isKind = (value: V): value is T => value.kind === kind;
    const toWire = definition.toWire;

    const entry: RegisteredSchema<V> = {
      tag,
      kind,
      version,
      layout,
      description: definition.description,
      encodable: layout === 'unit' || toWire !== undefined,
      toWire(value: V): WireMap {
        if (!isKind(value)) {
          throw new ProtorecError(
            ErrorCode.ERR_UNKNOWN_SCHEMA,
            `Schema ${formatTag(tag)} encodes ${kind}, not ${value.kind}`,
            { tag }
          );
        }
        if (toWire === undefined) {
          throw new ProtorecError(ErrorCode.ERR_INVALID_SCHEMA, `Schema ${kind} v${version} is decode-only`, {
            tag,
          });
        }
        return toWire.call(definition, value);
      },
      fromWire(fields: FieldReader): V {
        return definition.fromWire(fields);
      },
    };

    this.byTag.set(tag, entry);
    versions.push(entry);
    versions.sort((a, b) => a.version - b.version);
    this.byKind.set(kind, versions);
    return this;
  }

  has(tag: number): boolean {
    return this.byTag.has(tag);
  }

  /**
   * Find the schema for a tag read from a file
   */
  lookup(tag: number): RegisteredSchema<V> {
    const entry = this.byTag.get(tag);
    if (!entry) {
      throw new ProtorecError(ErrorCode.ERR_UNKNOWN_SCHEMA, `Unknown schema tag ${formatTag(tag)}`, { tag });
    }
    return entry;
  }

  /**
   * The schema new values of a kind are written with: its highest version
   */
  encoderFor(kind: string): RegisteredSchema<V> {
    const versions = this.byKind.get(kind);
    const current = versions?.[versions.length - 1];
    if (!current) {
      throw new ProtorecError(ErrorCode.ERR_UNKNOWN_SCHEMA, `No schema registered for ${kind}`);
    }
    if (!current.encodable) {
      throw new ProtorecError(
        ErrorCode.ERR_INVALID_SCHEMA,
        `Latest schema for ${kind} (v${current.version}) cannot encode`,
        { tag: current.tag }
      );
    }
    return current;
  }

  /**
   * All registered schemas, ordered by tag
   */
  schemas(): RegisteredSchema<V>[] {
    return [...this.byTag.values()].sort((a, b) => a.tag - b.tag);
  }
}

/**
 * Format a schema tag the way tools print it (0x0001)
 */
export function formatTag(tag: number): string {
  return `0x${tag.toString(16).padStart(4, '0')}`;
}
