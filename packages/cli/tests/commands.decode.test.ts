import { describe, it, expect } from 'vitest';
import { runCli } from './helpers.js';

describe('Decode Command', () => {
  it('should print one canonical scope per line', async () => {
    const result = await runCli('decode', 'West-Wing, default');

    expect(result.stdout).toEqual(['default', 'west-wing']);
  });

  it('should unescape delimiters inside a scope', async () => {
    const result = await runCli('decode', 'a\\,b,c', '--json');

    expect(result.stdout).toEqual(['["a,b","c"]']);
  });

  it('should print nothing for an empty list', async () => {
    const result = await runCli('decode', '');

    expect(result.stdout).toEqual([]);
    expect(result.exitCode).toBeUndefined();
  });

  it('should fail on a dangling escape', async () => {
    const result = await runCli('decode', 'lab\\');

    expect(result.stderr[0]).toContain('Malformed escape sequence at offset 3');
    expect(result.exitCode).toBe(1);
  });
});
