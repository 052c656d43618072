import chalk from 'chalk';
import { ConfigLoadError, ConfigValidationError, isScopeError } from '@scopeset/core';

/**
 * Run a command action, reporting scope and config errors on stderr with
 * exit code 1. Anything else is a bug and propagates.
 */
export function runAction(action: () => void): void {
  try {
    action();
  } catch (error) {
    if (
      isScopeError(error) ||
      error instanceof ConfigLoadError ||
      error instanceof ConfigValidationError
    ) {
      console.error(chalk.red(`Error: ${error.message}`));
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}
