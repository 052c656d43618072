import { Command } from 'commander';
import chalk from 'chalk';
import { table } from 'table';
import { ScopeSet } from '@scopeset/core';
import { runAction } from '../lib/run.js';

interface DiffOptions {
  json?: boolean;
}

/**
 * Show which scopes a registration gains and loses when its scope list
 * changes from `current` to `next`.
 */
export function diffCommand(program: Command): void {
  program
    .command('diff')
    .description('Show scopes added and removed between two scope lists')
    .argument('<current>', 'Current scope list')
    .argument('<next>', 'New scope list')
    .option('--json', 'Output as JSON')
    .action((current: string, next: string, options: DiffOptions) => {
      runAction(() => {
        const currentScopes = ScopeSet.fromString(current);
        const nextScopes = ScopeSet.fromString(next);
        const added = nextScopes.difference(currentScopes);
        const removed = currentScopes.difference(nextScopes);

        if (options.json) {
          console.log(JSON.stringify({ added: added.toArray(), removed: removed.toArray() }));
          return;
        }

        if (added.isEmpty() && removed.isEmpty()) {
          console.log(chalk.gray('No scope changes'));
          return;
        }

        const rows: string[][] = [['Change', 'Scope']];
        for (const scope of added) {
          rows.push([chalk.green('+ added'), scope]);
        }
        for (const scope of removed) {
          rows.push([chalk.red('- removed'), scope]);
        }
        console.log(table(rows));
      });
    });
}
