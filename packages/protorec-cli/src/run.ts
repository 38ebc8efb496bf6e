/**
 * Glue between commander actions and the command functions, which print
 * through a callback and return the exit code
 */

import { log } from 'protorec';
import { describeError } from './format.js';

export type Print = (line: string) => void;

export function runAction(action: () => number): void {
  try {
    process.exitCode = action();
  } catch (error) {
    log.error(describeError(error));
    process.exitCode = 1;
  }
}
