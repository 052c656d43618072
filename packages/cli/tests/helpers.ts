import { vi } from 'vitest';
import { createProgram } from '../src/program.js';

export interface CliRun {
  stdout: string[];
  stderr: string[];
  exitCode: number | undefined;
}

/**
 * Run the CLI in-process with the given arguments and capture console output.
 */
export async function runCli(...args: string[]): Promise<CliRun> {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});
  const error = vi.spyOn(console, 'error').mockImplementation(() => {});
  process.exitCode = undefined;

  try {
    await createProgram().parseAsync(args, { from: 'user' });
    const exitCode = process.exitCode;
    return {
      stdout: log.mock.calls.map((call) => String(call[0])),
      stderr: error.mock.calls.map((call) => String(call[0])),
      exitCode: typeof exitCode === 'number' ? exitCode : undefined,
    };
  } finally {
    process.exitCode = undefined;
    log.mockRestore();
    error.mockRestore();
  }
}
