/**
 * Verify command - decode everything and report what failed
 */

import { Command } from 'commander';
import { createDefaultRegistry, formatTag, readRecords } from 'protorec';
import { errorName, plural } from '../format.js';
import { runAction, type Print } from '../run.js';

export function runVerify(path: string, print: Print): number {
  const { entries, terminal } = readRecords(path, { registry: createDefaultRegistry() });

  let decoded = 0;
  let failed = 0;
  for (const entry of entries) {
    if (entry.ok) {
      decoded++;
      continue;
    }
    failed++;
    print(`#${entry.index}  @${entry.position}  ${formatTag(entry.tag)}  ${errorName(entry.error)}: ${entry.error.message}`);
  }
  if (terminal) {
    print(`${errorName(terminal)}: ${terminal.message}`);
  }

  print(`${plural(decoded, 'record')} decoded, ${failed} failed${terminal ? ', file ends early' : ''}`);
  return failed === 0 && terminal === undefined ? 0 : 1;
}

export const verifyCommand = new Command('verify')
  .description('Decode every record; exits with 1 when any record or the file is damaged')
  .argument('<file>', 'Record file')
  .action((file: string) => {
    runAction(() => runVerify(file, console.log));
  });
