import { describe, expect, test } from 'vitest';

import { findCommand } from '../../src/bin/commands';
import { printCommandHelp, printHelp, printVersion, showCommandHelp } from '../../src/bin/help';
import { captureOutput } from '../helpers';

describe('help output', () => {
  describe('printHelp (main help)', () => {
    test('contains version header', () => {
      const output = captureOutput(() => printHelp());
      expect(output.split('\n')[0]).toBe('deletion-guard v0.1.0');
    });

    test('contains description', () => {
      const output = captureOutput(() => printHelp());
      expect(output).toContain('Backs up or blocks shell deletions based on where their targets live.');
    });

    test('lists all visible commands', () => {
      const output = captureOutput(() => printHelp());
      expect(output).toContain('deletion-guard -H, --hook');
      expect(output).toContain('deletion-guard explain [options] <command>');
      expect(output).toContain('deletion-guard -vc, --verify-config');
    });

    test('documents environment variables and config files', () => {
      const output = captureOutput(() => printHelp());
      expect(output).toContain('ENVIRONMENT VARIABLES:');
      expect(output).toContain('DELETION_GUARD_BACKUP_MODE=<mode>');
      expect(output).toContain('DELETION_GUARD_AUDIT=0');
      expect(output).toContain('CONFIG FILES:');
      expect(output).toContain('~/.deletion-guard/config.json');
      expect(output).toContain('.deletion-guard.json');
    });

    test('aligns global options in two columns', () => {
      const lines = captureOutput(() => printHelp()).split('\n');
      const start = lines.indexOf('OPTIONS:');
      expect(lines.slice(start, start + 4)).toEqual([
        'OPTIONS:',
        '  -h, --help                     Show help; after a command, help for that command',
        '  deletion-guard help <command>  Same as <command> --help',
        '  -V, --version                  Show version',
      ]);
    });
  });

  describe('printCommandHelp', () => {
    test('prints header, usage, options and examples', () => {
      const command = findCommand('explain');
      expect(command).toBeDefined();
      if (!command) return;

      const lines = captureOutput(() => printCommandHelp(command)).split('\n');
      expect(lines.slice(0, 6)).toEqual([
        'deletion-guard explain',
        '',
        '  Trace how a command would be classified, without prompting or backing up',
        '',
        'USAGE:',
        '  deletion-guard explain [options] <command>',
      ]);
      expect(lines).toContain('  --cwd <path>  Use custom working directory');
      expect(lines).toContain('  deletion-guard explain "rm -rf build"');
    });
  });

  describe('showCommandHelp', () => {
    test('returns true for a known command or alias', () => {
      expect(captureOutput(() => expect(showCommandHelp('verify-config')).toBe(true))).toContain(
        'Validate user and project settings files',
      );
      captureOutput(() => expect(showCommandHelp('--hook')).toBe(true));
    });

    test('returns false for an unknown command', () => {
      const output = captureOutput(() => expect(showCommandHelp('doctor')).toBe(false));
      expect(output).toBe('');
    });
  });

  test('printVersion prints the bare version', () => {
    expect(captureOutput(() => printVersion())).toBe('0.1.0\n');
  });
});
