import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  Direction,
  consoleLog,
  createDefaultRegistry,
  fingerprintRecords,
  setLog,
  writeRecords,
  type MessageValue,
} from 'protorec';
import { runInspect } from '../commands/inspect.js';
import { runDump } from '../commands/dump.js';
import { runVerify } from '../commands/verify.js';
import { runDiff } from '../commands/diff.js';
import { runFingerprint } from '../commands/fingerprint.js';
import { runSchemas } from '../commands/schemas.js';
import { runAction } from '../run.js';

const registry = createDefaultRegistry();

// Payloads: 13 and 0 bytes; frames start at 16 and 35.
const values: MessageValue[] = [
  { kind: 'capture.input', direction: Direction.TO_SERVER, data: new Uint8Array([1, 2, 3]), flowId: 7n },
  { kind: 'parse.none' },
];

let dir: string;
let capture: string;
const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

function collect(run: (print: (line: string) => void) => number): { code: number; lines: string[] } {
  const lines: string[] = [];
  const code = run((line) => lines.push(line));
  return { code, lines };
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'protorec-cli-'));
  capture = join(dir, 'capture.prec');
  writeRecords(capture, values, { registry });
  vi.clearAllMocks();
  setLog(logger);
});

afterEach(() => {
  setLog(consoleLog);
  rmSync(dir, { recursive: true, force: true });
});

function truncatedCopy(length: number): string {
  const path = join(dir, 'truncated.prec');
  writeFileSync(path, readFileSync(capture).subarray(0, length));
  return path;
}

describe('inspect', () => {
  it('should list the header and frames', () => {
    expect(collect((print) => runInspect(capture, print))).toEqual({
      code: 0,
      lines: [
        `File:    ${capture}`,
        'Format:  1.0',
        'Records: 2',
        '',
        '#0  @16  0x0002  capture.input v2  13 bytes  a3 61 62 43 01 02 03 61 64 00 61 66 07',
        '#1  @35  0x0010  parse.none v1  0 bytes',
        '2 frames',
      ],
    });
  });

  it('should stop at a truncated frame', () => {
    const { code, lines } = collect((print) => runInspect(truncatedCopy(38), print));
    expect(code).toBe(1);
    expect(lines.slice(2)).toEqual([
      'Records: 2',
      '',
      '#0  @16  0x0002  capture.input v2  13 bytes  a3 61 62 43 01 02 03 61 64 00 61 66 07',
      'ERR_TRUNCATED_FRAME: Frame header at 35 needs 6 bytes, 3 remain',
    ]);
  });
});

describe('dump', () => {
  it('should print one JSON line per record', () => {
    expect(collect((print) => runDump(capture, {}, print))).toEqual({
      code: 0,
      lines: [
        '{"index":0,"tag":"0x0002","value":{"kind":"capture.input","direction":0,"data":"010203","flowId":"7"}}',
        '{"index":1,"tag":"0x0010","value":{"kind":"parse.none"}}',
      ],
    });
  });

  it('should honour the limit', () => {
    const { code, lines } = collect((print) => runDump(capture, { limit: 1 }, print));
    expect(code).toBe(0);
    expect(lines).toHaveLength(1);
  });

  it('should print the terminal error as JSON', () => {
    const { code, lines } = collect((print) => runDump(truncatedCopy(38), {}, print));
    expect(code).toBe(1);
    expect(lines[1]).toBe(
      '{"position":35,"error":"ERR_TRUNCATED_FRAME","message":"Frame header at 35 needs 6 bytes, 3 remain"}'
    );
  });
});

describe('verify', () => {
  it('should pass an intact file', () => {
    expect(collect((print) => runVerify(capture, print))).toEqual({
      code: 0,
      lines: ['2 records decoded, 0 failed'],
    });
  });

  it('should fail a truncated file', () => {
    expect(collect((print) => runVerify(truncatedCopy(38), print))).toEqual({
      code: 1,
      lines: [
        'ERR_TRUNCATED_FRAME: Frame header at 35 needs 6 bytes, 3 remain',
        '1 record decoded, 0 failed, file ends early',
      ],
    });
  });
});

describe('diff', () => {
  it('should report identical files', () => {
    const copy = join(dir, 'copy.prec');
    writeRecords(copy, values, { registry });
    expect(collect((print) => runDiff(capture, copy, print))).toEqual({
      code: 0,
      lines: ['identical (2 records)'],
    });
  });

  it('should list differences', () => {
    const shorter = join(dir, 'shorter.prec');
    writeRecords(shorter, values.slice(0, 1), { registry });
    expect(collect((print) => runDiff(capture, shorter, print))).toEqual({
      code: 1,
      lines: ['#1  missing  parse.none', '1 difference (2 vs 1 records)'],
    });
  });
});

describe('fingerprint', () => {
  it('should print the digest next to each path', () => {
    const { digest } = fingerprintRecords(capture, { registry });
    expect(collect((print) => runFingerprint([capture], print))).toEqual({
      code: 0,
      lines: [`${digest}  ${capture}`],
    });
  });
});

describe('schemas', () => {
  it('should list every built-in schema', () => {
    const { code, lines } = collect((print) => runSchemas(print));
    expect(code).toBe(0);
    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe('0x0001  capture.input     v1  map   decode-only  Parser input (direction, data)');
    expect(lines[2]).toBe('0x0010  parse.none        v1  unit  encodable    Input consumed, no message');
  });
});

describe('runAction', () => {
  it('should log failures and set a failing exit code', () => {
    const previous = process.exitCode;
    try {
      runAction(() => runVerify(join(dir, 'absent.prec'), () => undefined));
      expect(process.exitCode).toBe(1);
      expect(logger.error).toHaveBeenCalledTimes(1);
    } finally {
      process.exitCode = previous;
    }
  });
});
