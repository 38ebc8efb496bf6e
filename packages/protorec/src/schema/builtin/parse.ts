/**
 * Outcome of one parse call that produced no message
 */

import type { Variant } from '../../types/values.js';
import { asUint, type WireMap } from '../../wire/fields.js';
import type { SchemaDefinition } from '../registry.js';

/** Input was consumed without producing a message */
export interface ParseNone extends Variant {
  readonly kind: 'parse.none';
}

/** The parser needs more input */
export interface ParseIncomplete extends Variant {
  readonly kind: 'parse.incomplete';
  /** Bytes still needed, when the parser knows */
  readonly needed?: number;
}

/** The parser rejected its input */
export interface ParseFailure extends Variant {
  readonly kind: 'parse.error';
  readonly reason?: string;
}

export const parseNoneV1: SchemaDefinition<ParseNone> = {
  tag: 0x0010,
  kind: 'parse.none',
  version: 1,
  layout: 'unit',
  description: 'Input consumed, no message',
  fromWire() {
    return { kind: 'parse.none' };
  },
};

export const parseIncompleteV1: SchemaDefinition<ParseIncomplete> = {
  tag: 0x0011,
  kind: 'parse.incomplete',
  version: 1,
  layout: 'map',
  description: 'More input needed',
  toWire(value): WireMap {
    return value.needed !== undefined ? { n: asUint(value.needed, '$.n') } : {};
  },
  fromWire(fields) {
    const needed = fields.optional('n', (f, key) => f.uint(key));
    return needed !== undefined ? { kind: 'parse.incomplete', needed } : { kind: 'parse.incomplete' };
  },
};

export const parseFailureV1: SchemaDefinition<ParseFailure> = {
  tag: 0x0012,
  kind: 'parse.error',
  version: 1,
  layout: 'map',
  description: 'Parser rejected input',
  toWire(value): WireMap {
    return value.reason !== undefined ? { r: value.reason } : {};
  },
  fromWire(fields) {
    const reason = fields.optional('r', (f, key) => f.text(key));
    return reason !== undefined ? { kind: 'parse.error', reason } : { kind: 'parse.error' };
  },
};
