/**
 * Fingerprint command - content hash of each file
 */

import { Command } from 'commander';
import { createDefaultRegistry, fingerprintRecords } from 'protorec';
import { runAction, type Print } from '../run.js';

export function runFingerprint(paths: string[], print: Print): number {
  const registry = createDefaultRegistry();
  for (const path of paths) {
    const { digest } = fingerprintRecords(path, { registry });
    print(`${digest}  ${path}`);
  }
  return 0;
}

export const fingerprintCommand = new Command('fingerprint')
  .description('Print a SHA-256 of the decoded content of each file')
  .argument('<files...>', 'Record files')
  .action((files: string[]) => {
    runAction(() => runFingerprint(files, console.log));
  });
