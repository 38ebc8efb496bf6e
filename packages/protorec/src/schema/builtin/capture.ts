/**
 * Parser input captured from a connection.
 */

import { ErrorCode, ProtorecError } from '../../types/errors.js';
import type { Variant } from '../../types/values.js';
import { asU64, type FieldReader } from '../../wire/fields.js';
import type { SchemaDefinition } from '../registry.js';

/**
 * Which side of the connection sent the bytes
 */
export enum Direction {
  TO_SERVER = 0,
  TO_CLIENT = 1,
  UNKNOWN = 2,
}

const DIRECTIONS: readonly Direction[] = [Direction.TO_SERVER, Direction.TO_CLIENT, Direction.UNKNOWN];

export interface CaptureInput extends Variant {
  readonly kind: 'capture.input';
  readonly direction: Direction;
  /** Bytes handed to the parser */
  readonly data: Uint8Array;
  /** Connection the bytes belong to, when the capture tracks flows */
  readonly flowId?: bigint;
}

function checkDirection(value: number, path: string): Direction {
  const direction = DIRECTIONS.find((entry) => entry === value);
  if (direction === undefined) {
    throw new ProtorecError(ErrorCode.ERR_SCHEMA_MISMATCH, `Field ${path}: unknown direction ${value}`);
  }
  return direction;
}

function readDirection(fields: FieldReader): Direction {
  return checkDirection(fields.uint('d'), `${fields.path}.d`);
}

/**
 * First layout: no flow id. Decode-only.
 */
export const captureInputV1: SchemaDefinition<CaptureInput> = {
  tag: 0x0001,
  kind: 'capture.input',
  version: 1,
  layout: 'map',
  description: 'Parser input (direction, data)',
  fromWire(fields) {
    return {
      kind: 'capture.input',
      direction: readDirection(fields),
      data: fields.bytes('b'),
    };
  },
};

export const captureInputV2: SchemaDefinition<CaptureInput> = {
  tag: 0x0002,
  kind: 'capture.input',
  version: 2,
  layout: 'map',
  description: 'Parser input (direction, data, flow id)',
  toWire(value) {
    return {
      d: checkDirection(value.direction, '$.d'),
      b: value.data,
      ...(value.flowId !== undefined ? { f: asU64(value.flowId, '$.f') } : {}),
    };
  },
  fromWire(fields) {
    const flowId = fields.optional('f', (f, key) => f.u64(key));
    return {
      kind: 'capture.input',
      direction: readDirection(fields),
      data: fields.bytes('b'),
      ...(flowId !== undefined ? { flowId } : {}),
    };
  },
};
