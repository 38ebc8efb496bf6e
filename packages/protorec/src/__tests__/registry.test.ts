import { describe, it, expect } from 'vitest';
import { SchemaRegistry, formatTag, type SchemaDefinition } from '../schema/registry.js';
import { createDefaultRegistry } from '../schema/defaults.js';
import { ErrorCode } from '../types/errors.js';
import type { Variant } from '../types/values.js';
import { caught } from './helpers.js';

interface Note extends Variant {
  kind: 'note';
  text: string;
}

function noteSchema(tag: number, version: number, encodable = true): SchemaDefinition<Note> {
  return {
    tag,
    kind: 'note',
    version,
    layout: 'map',
    ...(encodable ? { toWire: (value: Note) => ({ t: value.text }) } : {}),
    fromWire: (fields) => ({ kind: 'note', text: fields.text('t') }),
  };
}

describe('SchemaRegistry', () => {
  it('should look up schemas by tag', () => {
    const registry = new SchemaRegistry<Note>().register(noteSchema(0x20, 1));
    expect(registry.has(0x20)).toBe(true);
    expect(registry.has(0x21)).toBe(false);
    expect(registry.lookup(0x20).kind).toBe('note');
  });

  it('should encode with the highest registered version', () => {
    const registry = new SchemaRegistry<Note>()
      .register(noteSchema(0x22, 2))
      .register(noteSchema(0x20, 1, false));
    expect(registry.encoderFor('note').tag).toBe(0x22);
  });

  it('should refuse a kind whose newest version cannot encode', () => {
    const registry = new SchemaRegistry<Note>().register(noteSchema(0x20, 1)).register(noteSchema(0x21, 2, false));
    const error = caught(() => registry.encoderFor('note'));
    expect(error.code).toBe(ErrorCode.ERR_INVALID_SCHEMA);
    expect(error.message).toBe('Latest schema for note (v2) cannot encode');
  });

  it('should reject a tag registered twice', () => {
    const registry = new SchemaRegistry<Note>().register(noteSchema(0x20, 1));
    const error = caught(() => registry.register(noteSchema(0x20, 2)));
    expect(error.code).toBe(ErrorCode.ERR_DUPLICATE_SCHEMA);
    expect(error.message).toBe('Schema tag 0x0020 already registered for note v1');
  });

  it('should reject a kind and version registered twice', () => {
    const registry = new SchemaRegistry<Note>().register(noteSchema(0x20, 1));
    const error = caught(() => registry.register(noteSchema(0x21, 1)));
    expect(error.code).toBe(ErrorCode.ERR_DUPLICATE_SCHEMA);
    expect(error.message).toBe('Schema note v1 already registered');
  });

  it('should reject tags and versions that cannot be stored', () => {
    const registry = new SchemaRegistry<Note>();
    expect(caught(() => registry.register(noteSchema(0x10000, 1))).code).toBe(ErrorCode.ERR_INVALID_SCHEMA);
    expect(caught(() => registry.register(noteSchema(1.5, 1))).code).toBe(ErrorCode.ERR_INVALID_SCHEMA);
    expect(caught(() => registry.register(noteSchema(1, 0))).code).toBe(ErrorCode.ERR_INVALID_SCHEMA);
    expect(registry.schemas()).toEqual([]);
  });

  it('should refuse to encode a value through a schema of another kind', () => {
    const registry = new SchemaRegistry<Variant>().register<Note>(noteSchema(0x20, 1));
    const error = caught(() => registry.lookup(0x20).toWire({ kind: 'other' }));
    expect(error.code).toBe(ErrorCode.ERR_UNKNOWN_SCHEMA);
    expect(error.message).toBe('Schema 0x0020 encodes note, not other');
  });

  it('should list schemas by tag', () => {
    const tags = createDefaultRegistry()
      .schemas()
      .map((schema) => [formatTag(schema.tag), schema.kind, schema.version, schema.encodable]);
    expect(tags).toEqual([
      ['0x0001', 'capture.input', 1, false],
      ['0x0002', 'capture.input', 2, true],
      ['0x0010', 'parse.none', 1, true],
      ['0x0011', 'parse.incomplete', 1, true],
      ['0x0012', 'parse.error', 1, true],
      ['0x0100', 'pop3.message', 1, true],
    ]);
  });
});

describe('formatTag', () => {
  it('should pad to four hex digits', () => {
    expect(formatTag(1)).toBe('0x0001');
    expect(formatTag(0xbeef)).toBe('0xbeef');
  });
});
