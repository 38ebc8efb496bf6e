/**
 * Schemas command - list the built-in registry
 */

import { Command } from 'commander';
import { createDefaultRegistry, formatTag } from 'protorec';
import { runAction, type Print } from '../run.js';

export function runSchemas(print: Print): number {
  for (const schema of createDefaultRegistry().schemas()) {
    const columns = [
      formatTag(schema.tag),
      schema.kind.padEnd(16),
      `v${schema.version}`,
      schema.layout.padEnd(4),
      (schema.encodable ? 'encodable' : 'decode-only').padEnd(11),
      schema.description ?? '',
    ];
    print(columns.join('  ').trimEnd());
  }
  return 0;
}

export const schemasCommand = new Command('schemas')
  .description('List the schemas records are written and read with')
  .action(() => {
    runAction(() => runSchemas(console.log));
  });
