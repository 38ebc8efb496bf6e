import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { diffRecords } from '../replay/diff.js';
import { fingerprintRecords } from '../replay/fingerprint.js';
import { encodeRecords } from '../file/writer.js';
import { encodeHeader } from '../file/format.js';
import { BufferSource, type ByteSource } from '../file/io.js';
import { frameRecord } from '../wire/framing.js';
import { encodeCanonical } from '../wire/codec.js';
import { createDefaultRegistry, type MessageValue } from '../schema/defaults.js';
import { Direction } from '../schema/builtin/capture.js';
import { ErrorCode } from '../types/errors.js';
import { consoleLog, setLog } from '../utils/log.js';
import { bytes, caught, concat, mockLogger } from './helpers.js';

const registry = createDefaultRegistry();
const options = { registry };

const input: MessageValue = { kind: 'capture.input', direction: Direction.TO_SERVER, data: bytes(0x41) };
const none: MessageValue = { kind: 'parse.none' };
const incomplete: MessageValue = { kind: 'parse.incomplete', needed: 3 };

beforeEach(() => {
  setLog(mockLogger());
});

afterEach(() => {
  setLog(consoleLog);
});

describe('diffRecords', () => {
  it('should find identical captures identical', () => {
    const file = encodeRecords([input, none], options);
    expect(diffRecords(file, file.slice(), options)).toEqual({
      identical: true,
      leftCount: 2,
      rightCount: 2,
      differences: [],
    });
  });

  it('should report changed, missing and extra records', () => {
    const left = encodeRecords([input, none, incomplete], options);
    const right = encodeRecords([input, incomplete], options);
    const result = diffRecords(left, right, options);

    expect(result.identical).toBe(false);
    expect(result.differences).toEqual([
      { index: 1, type: 'changed', detail: 'parse.none -> parse.incomplete' },
      { index: 2, type: 'missing', detail: 'parse.incomplete' },
    ]);
    expect(diffRecords(right, left, options).differences[1]).toEqual({
      index: 2,
      type: 'extra',
      detail: 'parse.incomplete',
    });
  });

  it('should compare content within a kind', () => {
    const left = encodeRecords([incomplete], options);
    const right = encodeRecords([{ kind: 'parse.incomplete', needed: 4 }], options);
    expect(diffRecords(left, right, options).differences).toEqual([
      { index: 0, type: 'changed', detail: 'parse.incomplete content differs' },
    ]);
  });

  it('should treat a superseded encoding as equal to its upgrade', () => {
    const legacy = concat(encodeHeader(), frameRecord(0x0001, encodeCanonical({ d: 0, b: bytes(0x41) })));
    const current = encodeRecords([input], options);
    expect(diffRecords(legacy, current, options).identical).toBe(true);
  });

  it('should report records that fail to decode', () => {
    const broken = concat(encodeHeader(), frameRecord(0x0eee, bytes(1)));
    const current = encodeRecords([none], options);
    expect(diffRecords(broken, current, options).differences).toEqual([
      { index: 0, type: 'error', detail: 'left: Unknown schema tag 0x0eee' },
    ]);
  });

  it('should report a truncated side', () => {
    const full = encodeRecords([input, none], options);
    const cut = full.subarray(0, full.length - 2);
    const result = diffRecords(full, cut, options);

    expect(result.identical).toBe(false);
    expect(result.leftTerminal).toBeUndefined();
    expect(result.rightTerminal?.code).toBe(ErrorCode.ERR_TRUNCATED_FRAME);
    expect(result.differences).toEqual([{ index: 1, type: 'missing', detail: 'parse.none' }]);
  });

  it('should read both files record by record, in step', () => {
    const events: string[] = [];
    class TracedSource implements ByteSource {
      private readonly inner: BufferSource;
      constructor(private readonly side: string, bytes: Uint8Array) {
        this.inner = new BufferSource(bytes);
      }
      get size(): number {
        return this.inner.size;
      }
      read(offset: number, length: number): Uint8Array {
        events.push(`${this.side}@${offset}`);
        return this.inner.read(offset, length);
      }
      close(): void {
        events.push(`${this.side} closed`);
      }
    }

    // Unit records: each frame is a bare 6-byte header.
    const file = encodeRecords([none, none], options);
    const result = diffRecords(new TracedSource('L', file), new TracedSource('R', file), options);

    expect(result.identical).toBe(true);
    expect(events).toEqual(['L@0', 'R@0', 'L@16', 'R@16', 'L@22', 'R@22', 'R closed', 'L closed']);
  });
});

describe('fingerprintRecords', () => {
  it('should be stable for the same content', () => {
    const a = fingerprintRecords(encodeRecords([input, none], options), options);
    const b = fingerprintRecords(encodeRecords([input, none], options), options);
    expect(a).toEqual(b);
    expect(a.recordCount).toBe(2);
    expect(a.digest).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should depend on record order', () => {
    const a = fingerprintRecords(encodeRecords([input, none], options), options);
    const b = fingerprintRecords(encodeRecords([none, input], options), options);
    expect(a.digest).not.toBe(b.digest);
  });

  it('should match across schema versions', () => {
    const legacy = concat(encodeHeader(), frameRecord(0x0001, encodeCanonical({ d: 0, b: bytes(0x41) })));
    expect(fingerprintRecords(legacy, options)).toEqual(fingerprintRecords(encodeRecords([input], options), options));
  });

  it('should hash an empty capture to the digest of no input', () => {
    expect(fingerprintRecords(encodeRecords([], options), options)).toEqual({
      digest: 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
      recordCount: 0,
    });
  });

  it('should fail on the first record that does not decode', () => {
    const broken = concat(encodeHeader(), frameRecord(0x0eee, bytes(1)));
    expect(caught(() => fingerprintRecords(broken, options)).code).toBe(ErrorCode.ERR_UNKNOWN_SCHEMA);
  });

  it('should fail on a truncated file', () => {
    const full = encodeRecords([input], options);
    expect(caught(() => fingerprintRecords(full.subarray(0, 20), options)).code).toBe(ErrorCode.ERR_TRUNCATED_FRAME);
  });
});
