/**
 * Terminal logger installed into the library by the CLI
 */

import pc from 'picocolors';
import type { Logger } from 'protorec';

export function createCliLogger(verbose: boolean): Logger {
  return {
    info(message: string): void {
      console.log(message);
    },
    warn(message: string): void {
      console.error(pc.yellow(`warning: ${message}`));
    },
    error(message: string): void {
      console.error(pc.red(`error: ${message}`));
    },
    debug(message: string): void {
      if (verbose) {
        console.error(pc.dim(message));
      }
    },
  };
}
