import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigLoadError, ConfigManager, Logger, ScopeMatcher, ScopeSet } from '@scopeset/core';
import { runAction } from '../lib/run.js';

interface MatchOptions {
  config?: string;
  json?: boolean;
}

/** Exit code when the lists share no scope */
export const NO_MATCH_EXIT_CODE = 2;

/**
 * Build the matcher for the local side. With '-' the local scopes come from
 * --config; otherwise from the command line. A config file, when given,
 * always supplies the cache size and logging. Logs go to stderr so they never
 * mix with command output.
 */
function createMatcher(local: string, options: MatchOptions): ScopeMatcher {
  if (!options.config) {
    if (local === '-') {
      throw new ConfigLoadError("--config <file> is required when <local> is '-'");
    }
    return new ScopeMatcher(ScopeSet.fromString(local), {
      logger: new Logger({ level: 'silent' }),
    });
  }

  const localScopes = local === '-' ? undefined : ScopeSet.fromString(local);
  const config = new ConfigManager({ configPath: options.config }).load();
  return new ScopeMatcher(localScopes ?? config.scopes, {
    maxCacheSize: config.matcher.maxCacheSize,
    logger: new Logger({ name: 'scopes', destination: 'stderr', ...config.logging }),
  });
}

export function matchCommand(program: Command): void {
  program
    .command('match')
    .description('Check whether two scope lists share at least one scope')
    .argument('<local>', "Local scope list, or '-' to read it from --config")
    .argument('<remote>', 'Remote scope list')
    .option('-c, --config <file>', 'YAML configuration providing cache size, logging and (with -) the local scopes')
    .option('--json', 'Output as JSON')
    .action((local: string, remote: string, options: MatchOptions) => {
      runAction(() => {
        const matcher = createMatcher(local, options);
        const result = matcher.match(remote);
        if (result.error) {
          throw result.error;
        }
        const shared = result.matched;

        if (options.json) {
          console.log(
            JSON.stringify({
              intersects: result.accepted,
              count: shared.size,
              intersection: shared.toArray(),
            })
          );
        } else {
          const statusColor = result.accepted ? chalk.green : chalk.red;

          console.log(chalk.bold('Scope Match'));
          console.log(chalk.gray('─'.repeat(50)));
          console.log(`Local:  ${chalk.cyan(matcher.localScopes.toEscapedString())}`);
          console.log(`Remote: ${chalk.cyan(ScopeSet.fromString(remote).toEscapedString())}`);
          console.log(`Shared: ${chalk.cyan(shared.toEscapedString())} (${shared.size})`);
          console.log(chalk.gray('─'.repeat(50)));
          console.log(`Result: ${statusColor.bold(result.accepted ? 'MATCH' : 'NO MATCH')}`);
        }

        if (!result.accepted) {
          process.exitCode = NO_MATCH_EXIT_CODE;
        }
      });
    });
}
