import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import {
  expandHome,
  expandVariables,
  extractTargets,
  flattenTargets,
  flattenUnresolved,
} from '../../src/core/targets';
import { makeTempDir, removeDir, writeFile } from '../helpers';

describe('extractTargets', () => {
  let ws: string;
  const options = { env: {}, homeDir: '/home/tester', platform: 'linux' as const };

  beforeEach(() => {
    ws = makeTempDir();
  });

  afterEach(() => {
    removeDir(ws);
  });

  test('returns one entry per deletion segment', () => {
    expect(extractTargets('rm -rf a b; rm c', ws, options)).toEqual([
      { verb: 'rm', targets: [join(ws, 'a'), join(ws, 'b')], unresolved: [] },
      { verb: 'rm', targets: [join(ws, 'c')], unresolved: [] },
    ]);
  });

  test('ignores segments without a deletion verb', () => {
    expect(extractTargets('echo hi > out.txt && ls', ws, options)).toEqual([]);
  });

  test('keeps absolute paths and looks through sudo', () => {
    expect(extractTargets('sudo rm /etc/hosts', ws, options)).toEqual([
      { verb: 'rm', targets: ['/etc/hosts'], unresolved: [] },
    ]);
  });

  test('expands the home directory', () => {
    expect(flattenTargets(extractTargets('rm ~/notes.txt', ws, options))).toEqual([
      '/home/tester/notes.txt',
    ]);
  });

  test('expands known variables', () => {
    const segments = extractTargets('rm -r $TARGET ${TARGET}/b', ws, {
      ...options,
      env: { TARGET: '/srv/data' },
    });
    expect(flattenTargets(segments)).toEqual(['/srv/data', '/srv/data/b']);
  });

  test('reports unknown variables and ~user as unresolved', () => {
    const segments = extractTargets('rm $UNKNOWN/x ~bob/file keep', ws, options);
    expect(flattenUnresolved(segments)).toEqual(['$UNKNOWN/x', '~bob/file']);
    expect(flattenTargets(segments)).toEqual([join(ws, 'keep')]);
  });

  test('treats relative paths after cd as unresolved', () => {
    const segments = extractTargets('cd sub && rm x /abs/y', ws, options);
    expect(segments).toEqual([{ verb: 'rm', targets: ['/abs/y'], unresolved: ['x'] }]);
  });

  test('honors -- and flags that take a value', () => {
    expect(flattenTargets(extractTargets('rm -- -weird', ws, options))).toEqual([
      join(ws, '-weird'),
    ]);
    expect(flattenTargets(extractTargets('rm -t dest x', ws, options))).toEqual([join(ws, 'x')]);
  });

  test('drops redirect targets', () => {
    expect(flattenTargets(extractTargets('rm a 2>/dev/null', ws, options))).toEqual([
      join(ws, 'a'),
    ]);
  });

  test('expands globs against the filesystem', () => {
    writeFile(join(ws, 'a.txt'));
    writeFile(join(ws, 'b.txt'));
    writeFile(join(ws, 'c.log'));
    expect(flattenTargets(extractTargets('rm *.txt', ws, options))).toEqual([
      join(ws, 'a.txt'),
      join(ws, 'b.txt'),
    ]);
  });

  test('keeps a glob with no matches as a literal path', () => {
    expect(flattenTargets(extractTargets('rm *.md', ws, options))).toEqual([join(ws, '*.md')]);
  });

  test('takes an existing path literally even when it looks like a pattern', () => {
    writeFile(join(ws, 'a (1)', 'f.txt'));
    writeFile(join(ws, 'a 1', 'f.txt'));
    expect(flattenTargets(extractTargets('rm "a (1)/f.txt"', ws, options))).toEqual([
      join(ws, 'a (1)', 'f.txt'),
    ]);
  });

  test('skips find and xargs segments', () => {
    expect(extractTargets('find . -name x -exec rm {} \\;', ws, options)).toEqual([]);
    expect(extractTargets('ls | xargs rm', ws, options)).toEqual([]);
  });

  test('treats slash arguments as flags on win32', () => {
    expect(
      flattenTargets(extractTargets('del /q notes.txt', ws, { ...options, platform: 'win32' })),
    ).toEqual([join(ws, 'notes.txt')]);
  });
});

describe('expandHome', () => {
  test('expands ~ and ~/', () => {
    expect(expandHome('~', '/home/tester')).toBe('/home/tester');
    expect(expandHome('~/a/b', '/home/tester')).toBe('/home/tester/a/b');
  });

  test('leaves other words alone', () => {
    expect(expandHome('a~b', '/home/tester')).toBe('a~b');
  });
});

describe('expandVariables', () => {
  test('leaves unknown names in place', () => {
    expect(expandVariables('$A/${B}/$C', { A: 'x', C: 'z' })).toBe('x/${B}/z');
  });
});
