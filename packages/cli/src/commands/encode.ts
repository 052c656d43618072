import { Command } from 'commander';
import { ScopeSet } from '@scopeset/core';
import { runAction } from '../lib/run.js';

export function encodeCommand(program: Command): void {
  program
    .command('encode')
    .description('Canonicalize scope names and print them as a wire-format scope list')
    .argument('<scopes...>', 'Raw scope names')
    .action((scopes: string[]) => {
      runAction(() => {
        console.log(new ScopeSet(scopes).toEscapedString());
      });
    });
}
