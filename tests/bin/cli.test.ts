import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { resolveCliAction, runCli } from '../../src/bin/cli';
import { FakePrompt, type Sandbox, makeSandbox, removeDir, textSource } from '../helpers';

describe('cli', () => {
  let logs: string[];
  let errors: string[];

  beforeEach(() => {
    logs = [];
    errors = [];
    vi.stubEnv('NO_COLOR', '1');
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logs.push(args.map(String).join(' '));
    });
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe('resolveCliAction', () => {
    test('prints help with no arguments', () => {
      expect(resolveCliAction([])).toEqual({ kind: 'exit', code: 0 });
      expect(logs[0]?.startsWith('deletion-guard v')).toBe(true);
    });

    test('prints the version', () => {
      expect(resolveCliAction(['--version'])).toEqual({ kind: 'exit', code: 0 });
      expect(resolveCliAction(['-V'])).toEqual({ kind: 'exit', code: 0 });
      expect(logs).toEqual(['0.1.0', '0.1.0']);
    });

    test('selects the hook mode from any of its flags', () => {
      for (const flag of ['--hook', '-H', '--claude-code']) {
        expect(resolveCliAction([flag])).toEqual({ kind: 'run', mode: 'hook' });
      }
    });

    test('selects verify-config and explain', () => {
      expect(resolveCliAction(['-vc'])).toEqual({ kind: 'run', mode: 'verify-config' });
      expect(resolveCliAction(['--verify-config'])).toEqual({ kind: 'run', mode: 'verify-config' });
      expect(resolveCliAction(['explain', 'rm x'])).toEqual({ kind: 'run', mode: 'explain' });
    });

    test('-h is help, not the hook', () => {
      expect(resolveCliAction(['-h'])).toEqual({ kind: 'exit', code: 0 });
      expect(logs[0]?.startsWith('deletion-guard v')).toBe(true);
    });

    test('shows command help for "help <command>" and "<command> --help"', () => {
      expect(resolveCliAction(['help', 'explain'])).toEqual({ kind: 'exit', code: 0 });
      expect(resolveCliAction(['--hook', '--help'])).toEqual({ kind: 'exit', code: 0 });
      expect(logs[0]?.startsWith('deletion-guard explain')).toBe(true);
      expect(logs[1]?.startsWith('deletion-guard hook')).toBe(true);
    });

    test('rejects unknown commands and options', () => {
      expect(resolveCliAction(['help', 'doctor'])).toEqual({ kind: 'exit', code: 1 });
      expect(resolveCliAction(['--bogus'])).toEqual({ kind: 'exit', code: 1 });
      expect(errors).toEqual([
        'Unknown command: doctor',
        "Run 'deletion-guard --help' for available commands.",
        'Unknown option: --bogus',
        "Run 'deletion-guard --help' for usage.",
      ]);
    });
  });

  describe('runCli', () => {
    let sb: Sandbox;

    beforeEach(() => {
      sb = makeSandbox();
      vi.stubEnv('CLAUDE_PROJECT_DIR', '');
    });

    afterEach(() => {
      removeDir(sb.base);
    });

    test('runs the hook with the given options', async () => {
      const target = join(sb.other, 'x');
      const code = await runCli(['--hook'], {
        stdin: textSource(
          JSON.stringify({ cwd: sb.ws, tool_name: 'Bash', tool_input: { command: `rm ${target}` } }),
        ),
        err: (text) => errors.push(text),
        env: {},
        homeDir: sb.home,
        userConfigDir: sb.userConfigDir,
        prompt: new FakePrompt(false),
        tmpRoots: [sb.scratch],
        platform: 'linux',
      });

      expect(code).toBe(2);
      expect(errors[0]?.endsWith(`Command: rm ${target}`)).toBe(true);
    });

    test('prints an explain trace as JSON', async () => {
      const code = await runCli(['explain', '--json', '--cwd', sb.ws, 'ls']);

      expect(code).toBe(0);
      const parsed: unknown = JSON.parse(logs.join('\n'));
      expect(parsed).toMatchObject({
        input: 'ls',
        cwd: sb.ws,
        workspace: sb.ws,
        outcome: 'allow',
        steps: [{ type: 'detect', kind: null }],
      });
    });

    test('shows explain help when no command is given', async () => {
      expect(await runCli(['explain'])).toBe(0);
      expect(logs[0]?.startsWith('deletion-guard explain')).toBe(true);
    });

    test('fails when explain flags are invalid', async () => {
      expect(await runCli(['explain', '--cwd'])).toBe(1);
      expect(errors).toEqual(['Error: --cwd requires a path']);
    });
  });
});
