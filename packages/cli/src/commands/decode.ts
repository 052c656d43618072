import { Command } from 'commander';
import { ScopeSet } from '@scopeset/core';
import { runAction } from '../lib/run.js';

interface DecodeOptions {
  json?: boolean;
}

export function decodeCommand(program: Command): void {
  program
    .command('decode')
    .description('Decode a wire-format scope list into canonical scope names')
    .argument('<list>', 'Comma separated scope list')
    .option('--json', 'Output as a JSON array')
    .action((list: string, options: DecodeOptions) => {
      runAction(() => {
        const scopes = ScopeSet.fromString(list);
        if (options.json) {
          console.log(JSON.stringify(scopes));
          return;
        }
        for (const scope of scopes) {
          console.log(scope);
        }
      });
    });
}
