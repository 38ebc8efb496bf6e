/**
 * Inspect command - header and raw frames, without decoding payloads
 */

import { Command } from 'commander';
import {
  RecordReader,
  createDefaultRegistry,
  formatTag,
  formatVersionString,
  hexPreview,
  isTerminal,
} from 'protorec';
import { errorName, plural } from '../format.js';
import { runAction, type Print } from '../run.js';

export function runInspect(path: string, print: Print): number {
  const registry = createDefaultRegistry();
  const reader = RecordReader.open(path, { registry });
  try {
    const { header } = reader;
    print(`File:    ${path}`);
    print(`Format:  ${formatVersionString(header.formatVersion)}`);
    print(`Records: ${header.recordCount !== undefined ? header.recordCount.toString() : 'not finalized'}`);
    print('');

    let count = 0;
    try {
      for (const frame of reader.frames()) {
        const schema = registry.has(frame.tag) ? registry.lookup(frame.tag) : undefined;
        const name = schema ? `${schema.kind} v${schema.version}` : 'unknown schema';
        const line = `#${frame.index}  @${frame.position}  ${formatTag(frame.tag)}  ${name}  ${plural(frame.length, 'byte')}  ${hexPreview(frame.payload)}`;
        print(line.trimEnd());
        count++;
      }
    } catch (error) {
      if (isTerminal(error)) {
        print(`${errorName(error)}: ${error.message}`);
        return 1;
      }
      throw error;
    }

    print(plural(count, 'frame'));
    return 0;
  } finally {
    reader.close();
  }
}

export const inspectCommand = new Command('inspect')
  .description('Show the file header and every frame without decoding it')
  .argument('<file>', 'Record file')
  .action((file: string) => {
    runAction(() => runInspect(file, console.log));
  });
