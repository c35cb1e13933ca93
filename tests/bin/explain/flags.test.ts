import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { parseExplainFlags } from '../../../src/bin/explain';

describe('parseExplainFlags', () => {
  let errors: string[];

  beforeEach(() => {
    errors = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('parses --json with a single command argument', () => {
    expect(parseExplainFlags(['--json', 'rm -rf build'])).toEqual({
      json: true,
      cwd: undefined,
      command: 'rm -rf build',
    });
  });

  test('keeps shell operators in a single argument', () => {
    expect(parseExplainFlags(['rm a && rm b'])?.command).toBe('rm a && rm b');
  });

  test('re-quotes several arguments', () => {
    expect(parseExplainFlags(['--cwd', '/srv/app', 'rm', 'a b'])).toEqual({
      json: false,
      cwd: '/srv/app',
      command: "rm 'a b'",
    });
  });

  test('treats everything after -- as the command', () => {
    expect(parseExplainFlags(['--', '--json'])?.command).toBe('--json');
  });

  test('treats an unknown long flag as the start of the command', () => {
    expect(parseExplainFlags(['--force-delete'])?.command).toBe('--force-delete');
  });

  test('rejects --cwd without a path', () => {
    expect(parseExplainFlags(['--cwd'])).toBeNull();
    expect(parseExplainFlags(['--cwd', '--json', 'rm x'])).toBeNull();
    expect(errors).toEqual(['Error: --cwd requires a path', 'Error: --cwd requires a path']);
  });

  test('rejects a missing command', () => {
    expect(parseExplainFlags(['--json'])).toBeNull();
    expect(errors[0]).toBe('Error: No command provided');
  });
});
