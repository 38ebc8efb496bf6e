#!/usr/bin/env node
/**
 * protorec CLI
 */

import { Command } from 'commander';
import { setLog } from 'protorec';
import { createCliLogger } from './logger.js';
import { inspectCommand } from './commands/inspect.js';
import { dumpCommand } from './commands/dump.js';
import { verifyCommand } from './commands/verify.js';
import { diffCommand } from './commands/diff.js';
import { fingerprintCommand } from './commands/fingerprint.js';
import { schemasCommand } from './commands/schemas.js';

const program = new Command();

program
  .name('protorec')
  .description('Inspect, verify and compare protocol record files')
  .version('0.1.0')
  .option('-v, --verbose', 'Log per-record diagnostics', false)
  .hook('preAction', () => {
    const { verbose } = program.opts<{ verbose: boolean }>();
    setLog(createCliLogger(verbose));
  });

program.addCommand(inspectCommand);
program.addCommand(dumpCommand);
program.addCommand(verifyCommand);
program.addCommand(diffCommand);
program.addCommand(fingerprintCommand);
program.addCommand(schemasCommand);

program.parse();
