/**
 * Dump command - decoded records as JSON lines
 */

import { Command, InvalidArgumentError } from 'commander';
import { RecordReader, createDefaultRegistry, formatTag, isTerminal } from 'protorec';
import { errorName, formatJson } from '../format.js';
import { runAction, type Print } from '../run.js';

export interface DumpOptions {
  limit?: number;
}

export function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidArgumentError('Limit must be a non-negative integer.');
  }
  return limit;
}

export function runDump(path: string, options: DumpOptions, print: Print): number {
  const reader = RecordReader.open(path, { registry: createDefaultRegistry() });
  let failed = false;
  let shown = 0;
  try {
    for (const entry of reader.records()) {
      if (options.limit !== undefined && shown >= options.limit) {
        break;
      }
      shown++;
      const base = { index: entry.index, tag: formatTag(entry.tag) };
      if (entry.ok) {
        print(formatJson({ ...base, value: entry.value }));
      } else {
        failed = true;
        print(formatJson({ ...base, error: errorName(entry.error), message: entry.error.message }));
      }
    }
  } catch (error) {
    if (!isTerminal(error)) {
      throw error;
    }
    failed = true;
    print(formatJson({ position: error.position, error: errorName(error), message: error.message }));
  } finally {
    reader.close();
  }
  return failed ? 1 : 0;
}

export const dumpCommand = new Command('dump')
  .description('Print decoded records as JSON lines (bytes as hex, u64 as strings)')
  .argument('<file>', 'Record file')
  .option('-n, --limit <count>', 'Stop after this many records', parseLimit)
  .action((file: string, options: DumpOptions) => {
    runAction(() => runDump(file, options, console.log));
  });
