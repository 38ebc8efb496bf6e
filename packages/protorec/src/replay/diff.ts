/**
 * Record-by-record comparison of two capture files. Both files are read
 * lazily, side by side.
 *
 * Values are compared by kind and canonical encoding under the current
 * schema, so a record written with a superseded tag equals its re-encoded
 * counterpart.
 */

import { isTerminal, type ProtorecError } from '../types/errors.js';
import type { Variant } from '../types/values.js';
import type { SchemaRegistry } from '../schema/registry.js';
import { MessageCodec } from '../wire/codec.js';
import { RecordReader, type ReadSource, type RecordEntry } from '../file/reader.js';
import { log } from '../utils/log.js';

export interface ReplayOptions<V extends Variant> {
  registry: SchemaRegistry<V>;
  maxFrameLength?: number;
}

/**
 * - changed: both sides decoded to different values
 * - missing: record only exists on the left
 * - extra: record only exists on the right
 * - error: either side failed to decode
 */
export type DifferenceType = 'changed' | 'missing' | 'extra' | 'error';

export interface RecordDifference {
  readonly index: number;
  readonly type: DifferenceType;
  readonly detail: string;
}

export interface DiffResult {
  readonly identical: boolean;
  readonly leftCount: number;
  readonly rightCount: number;
  readonly differences: RecordDifference[];
  readonly leftTerminal?: ProtorecError;
  readonly rightTerminal?: ProtorecError;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

function describeEntry<V extends Variant>(entry: RecordEntry<V>): string {
  return entry.ok ? entry.value.kind : `error (${entry.error.message})`;
}

/**
 * One side of a comparison: pulls entries one at a time and records the
 * terminal error that ended the side, if any.
 */
class Side<V extends Variant> {
  count = 0;
  terminal?: ProtorecError;
  private readonly entries: Generator<RecordEntry<V>, void, undefined>;
  private done = false;

  constructor(reader: RecordReader<V>) {
    this.entries = reader.records();
  }

  next(): RecordEntry<V> | undefined {
    if (this.done) {
      return undefined;
    }
    try {
      const step = this.entries.next();
      if (step.done) {
        this.done = true;
        return undefined;
      }
      this.count++;
      return step.value;
    } catch (error) {
      this.done = true;
      if (isTerminal(error)) {
        this.terminal = error;
        return undefined;
      }
      throw error;
    }
  }
}

function compare<V extends Variant>(
  codec: MessageCodec<V>,
  index: number,
  l: RecordEntry<V>,
  r: RecordEntry<V>
): RecordDifference | undefined {
  if (!l.ok || !r.ok) {
    const detail = [
      ...(l.ok ? [] : [`left: ${l.error.message}`]),
      ...(r.ok ? [] : [`right: ${r.error.message}`]),
    ].join('; ');
    return { index, type: 'error', detail };
  }
  if (l.value.kind !== r.value.kind) {
    return { index, type: 'changed', detail: `${l.value.kind} -> ${r.value.kind}` };
  }
  const lp = codec.encodeRecord(l.value);
  const rp = codec.encodeRecord(r.value);
  if (lp.tag !== rp.tag || !bytesEqual(lp.payload, rp.payload)) {
    return { index, type: 'changed', detail: `${l.value.kind} content differs` };
  }
  return undefined;
}

/**
 * Walk both files in step, one record from each side at a time
 */
export function diffRecords<V extends Variant>(
  left: ReadSource,
  right: ReadSource,
  options: ReplayOptions<V>
): DiffResult {
  const codec = new MessageCodec(options.registry);
  const leftReader = RecordReader.open(left, options);
  try {
    const rightReader = RecordReader.open(right, options);
    try {
      return walk(codec, new Side(leftReader), new Side(rightReader));
    } finally {
      rightReader.close();
    }
  } finally {
    leftReader.close();
  }
}

function walk<V extends Variant>(codec: MessageCodec<V>, a: Side<V>, b: Side<V>): DiffResult {
  const differences: RecordDifference[] = [];

  for (let index = 0; ; index++) {
    const l = a.next();
    const r = b.next();
    if (l !== undefined && r !== undefined) {
      const difference = compare(codec, index, l, r);
      if (difference !== undefined) {
        differences.push(difference);
      }
    } else if (l !== undefined) {
      differences.push({ index, type: 'missing', detail: describeEntry(l) });
    } else if (r !== undefined) {
      differences.push({ index, type: 'extra', detail: describeEntry(r) });
    } else {
      break;
    }
  }

  const identical = differences.length === 0 && a.terminal === undefined && b.terminal === undefined;
  log.debug(`Compared ${a.count} and ${b.count} records: ${differences.length} differences`);

  return {
    identical,
    leftCount: a.count,
    rightCount: b.count,
    differences,
    ...(a.terminal !== undefined ? { leftTerminal: a.terminal } : {}),
    ...(b.terminal !== undefined ? { rightTerminal: b.terminal } : {}),
  };
}
