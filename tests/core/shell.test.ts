import { describe, expect, test } from 'vitest';

import {
  getSegmentHead,
  hasUnbalancedQuotes,
  parseCommand,
  splitSegments,
  splitShellCommands,
  stripWrappers,
  tokenize,
  tokenizePermissive,
} from '../../src/core/shell';

describe('tokenize', () => {
  test('keeps variables literal', () => {
    expect(tokenize('rm $HOME/x')).toEqual([
      { type: 'word', value: 'rm' },
      { type: 'word', value: '$HOME/x' },
    ]);
  });

  test('turns glob entries into words', () => {
    expect(tokenize('rm *.txt')).toEqual([
      { type: 'word', value: 'rm' },
      { type: 'word', value: '*.txt' },
    ]);
  });

  test('stops at a comment', () => {
    expect(tokenize('rm a # rm b')).toEqual([
      { type: 'word', value: 'rm' },
      { type: 'word', value: 'a' },
    ]);
  });

  test('keeps a "#" inside a word', () => {
    expect(tokenize('curl http://x/#frag; rm -rf /srv/data')).toEqual([
      { type: 'word', value: 'curl' },
      { type: 'word', value: 'http://x/#frag' },
      { type: 'operator', value: ';' },
      { type: 'word', value: 'rm' },
      { type: 'word', value: '-rf' },
      { type: 'word', value: '/srv/data' },
    ]);
    expect(splitShellCommands('rm a#b')).toEqual([['rm', 'a#b']]);
  });

  test('starts a comment at a "#" right after an operator', () => {
    expect(tokenize('echo a;#rm b')).toEqual([
      { type: 'word', value: 'echo' },
      { type: 'word', value: 'a' },
      { type: 'operator', value: ';' },
    ]);
  });

  test('keeps a quoted "#"', () => {
    expect(splitShellCommands('rm "# notes.txt"')).toEqual([['rm', '# notes.txt']]);
  });

  test('ignores quotes inside a trailing comment', () => {
    const parsed = parseCommand("echo done;rm -rf /srv/data # don't");
    expect(parsed.permissive).toBe(false);
    expect(splitSegments(parsed.tokens)).toEqual([
      ['echo', 'done'],
      ['rm', '-rf', '/srv/data'],
    ]);
  });

  test('reports the permissive fallback', () => {
    expect(parseCommand('rm "x').permissive).toBe(true);
    expect(parseCommand('rm x').permissive).toBe(false);
  });

  test('falls back to whitespace splitting on unbalanced quotes', () => {
    expect(tokenize('rm "unterminated; ls')).toEqual([
      { type: 'word', value: 'rm' },
      { type: 'word', value: '"unterminated' },
      { type: 'operator', value: ';' },
      { type: 'word', value: 'ls' },
    ]);
  });
});

describe('tokenizePermissive', () => {
  test('splits control operators out of words', () => {
    expect(tokenizePermissive('echo done;rm -rf x')).toEqual([
      { type: 'word', value: 'echo' },
      { type: 'word', value: 'done' },
      { type: 'operator', value: ';' },
      { type: 'word', value: 'rm' },
      { type: 'word', value: '-rf' },
      { type: 'word', value: 'x' },
    ]);
    expect(tokenizePermissive('a&&b||c|d&').map((token) => token.value)).toEqual([
      'a',
      '&&',
      'b',
      '||',
      'c',
      '|',
      'd',
      '&',
    ]);
  });

  test('leaves fd duplication alone', () => {
    expect(tokenizePermissive('ls 2>&1')).toEqual([
      { type: 'word', value: 'ls' },
      { type: 'word', value: '2>&1' },
    ]);
  });
});

describe('hasUnbalancedQuotes', () => {
  test('detects an open double quote', () => {
    expect(hasUnbalancedQuotes('rm "a')).toBe(true);
  });

  test('ignores escaped quotes', () => {
    expect(hasUnbalancedQuotes('rm a\\"b')).toBe(false);
  });

  test('stops at a comment', () => {
    expect(hasUnbalancedQuotes("ls # don't")).toBe(false);
    expect(hasUnbalancedQuotes("echo it's#fine")).toBe(true);
  });

  test('treats double quotes inside single quotes as text', () => {
    expect(hasUnbalancedQuotes(`rm '"'`)).toBe(false);
  });
});

describe('splitShellCommands', () => {
  test('splits on operators', () => {
    expect(splitShellCommands('rm -rf a b; rm c && ls | wc -l')).toEqual([
      ['rm', '-rf', 'a', 'b'],
      ['rm', 'c'],
      ['ls'],
      ['wc', '-l'],
    ]);
  });

  test('drops redirect targets and fd numbers', () => {
    expect(splitShellCommands('rm a 2>/dev/null && echo ok > log.txt')).toEqual([
      ['rm', 'a'],
      ['echo', 'ok'],
    ]);
  });

  test('keeps quoted arguments whole', () => {
    expect(splitShellCommands('rm "my file.txt"')).toEqual([['rm', 'my file.txt']]);
  });

  test('splits subshell parentheses', () => {
    expect(splitShellCommands('(cd sub && rm x)')).toEqual([['cd', 'sub'], ['rm', 'x']]);
  });
});

describe('stripWrappers', () => {
  test('removes sudo and its valued options', () => {
    expect(stripWrappers(['sudo', '-u', 'root', 'rm', 'x'])).toEqual(['rm', 'x']);
  });

  test('removes env assignments and env flags', () => {
    expect(stripWrappers(['FOO=1', 'env', '-i', 'BAR=2', 'rm', 'x'])).toEqual(['rm', 'x']);
  });

  test('leaves plain commands alone', () => {
    expect(stripWrappers(['rm', '-f', 'x'])).toEqual(['rm', '-f', 'x']);
  });
});

describe('getSegmentHead', () => {
  test('lower-cases the basename', () => {
    expect(getSegmentHead(['/bin/RM', 'x'])).toBe('rm');
  });

  test('looks through wrappers', () => {
    expect(getSegmentHead(['nohup', 'nice', '-n', '5', 'find', '.'])).toBe('find');
  });

  test('returns null for an empty segment', () => {
    expect(getSegmentHead([])).toBeNull();
  });
});
