import { describe, expect, test } from 'vitest';

import {
  formatBlockedMessage,
  formatOutsidePrompt,
  formatOutsideReason,
  formatUnenumerablePrompt,
  formatUnresolvablePrompt,
} from '../../src/core/format';

describe('prompts', () => {
  test('unresolvable prompt quotes the command', () => {
    expect(formatUnresolvablePrompt('rm $(cat list)')).toBe(
      '\nDeletion guard: Command contains unresolvable paths:\n  rm $(cat list)\nAllow this deletion? [y/N] ',
    );
  });

  test('unenumerable prompt lists unresolved arguments', () => {
    expect(formatUnenumerablePrompt('rm $X', ['$X'])).toBe(
      '\nDeletion guard: Cannot enumerate deletion targets for:\n  rm $X\nArguments that cannot be resolved: $X\nAllow this deletion? [y/N] ',
    );
  });

  test('outside prompt lists every path', () => {
    expect(formatOutsidePrompt(['/a', '/b'])).toBe(
      '\nDeletion guard: The following paths are outside the workspace:\n  /a\n  /b\nAllow deletion? [y/N] ',
    );
  });
});

describe('formatOutsideReason', () => {
  test('names the blocked paths', () => {
    expect(formatOutsideReason(['/a', '/b']).split('\n')[1]).toBe('Blocked: /a, /b');
  });
});

describe('formatBlockedMessage', () => {
  test('appends the command after a blank line', () => {
    expect(formatBlockedMessage({ reason: 'Nope.', command: 'rm x' })).toBe(
      'Nope.\n\nCommand: rm x',
    );
  });

  test('redacts and truncates the command', () => {
    const message = formatBlockedMessage({
      reason: 'Nope.',
      command: 'abcdef',
      redact: (text) => text.toUpperCase(),
      maxCommandLength: 3,
    });
    expect(message).toBe('Nope.\n\nCommand: ABC...');
  });

  test('omits the command when absent', () => {
    expect(formatBlockedMessage({ reason: 'Nope.' })).toBe('Nope.');
  });
});
