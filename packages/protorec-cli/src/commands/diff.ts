/**
 * Diff command - compare two captures record by record
 */

import { Command } from 'commander';
import { createDefaultRegistry, diffRecords } from 'protorec';
import { errorName, plural } from '../format.js';
import { runAction, type Print } from '../run.js';

export function runDiff(left: string, right: string, print: Print): number {
  const result = diffRecords(left, right, { registry: createDefaultRegistry() });

  for (const difference of result.differences) {
    print(`#${difference.index}  ${difference.type}  ${difference.detail}`);
  }
  if (result.leftTerminal) {
    print(`left: ${errorName(result.leftTerminal)}: ${result.leftTerminal.message}`);
  }
  if (result.rightTerminal) {
    print(`right: ${errorName(result.rightTerminal)}: ${result.rightTerminal.message}`);
  }

  print(
    result.identical
      ? `identical (${plural(result.leftCount, 'record')})`
      : `${plural(result.differences.length, 'difference')} (${result.leftCount} vs ${result.rightCount} records)`
  );
  return result.identical ? 0 : 1;
}

export const diffCommand = new Command('diff')
  .description('Compare two record files; exits with 1 when they differ')
  .argument('<left>', 'First record file')
  .argument('<right>', 'Second record file')
  .action((left: string, right: string) => {
    runAction(() => runDiff(left, right, console.log));
  });
