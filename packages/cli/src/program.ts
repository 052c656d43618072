import { Command } from 'commander';
import chalk from 'chalk';
import { decodeCommand } from './commands/decode.js';
import { diffCommand } from './commands/diff.js';
import { encodeCommand } from './commands/encode.js';
import { matchCommand } from './commands/match.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('scopes')
    .description('Canonicalize, encode and compare service discovery scope lists')
    .version('0.1.0', '-v, --version');

  // Register commands
  encodeCommand(program);
  decodeCommand(program);
  matchCommand(program);
  diffCommand(program);

  program.on('command:*', () => {
    console.error(
      chalk.red(
        `\nInvalid command: ${program.args.join(' ')}\nSee --help for a list of available commands.\n`
      )
    );
    process.exitCode = 1;
  });

  return program;
}
