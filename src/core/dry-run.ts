import { spawnSync } from 'node:child_process';
import { isAbsolute, resolve } from 'node:path';

import { FIND_DELETE_RE, GIT_CLEAN_FORCE_RE } from './detect';
import { getBasename, getSegmentHead, splitShellCommands, stripWrappers } from './shell';
import { CWD_CHANGING_COMMANDS, DRY_RUN_TIMEOUT_MS, type DiscoveryResult } from '../types';

export interface RunResult {
  /** Exit status; null when killed or never started */
  status: number | null;
  stdout: string;
  /** Spawn failure or timeout */
  error?: Error;
}

/**
 * Runs a program without a shell. Only the rewritten find/git invocation
 * reaches it, never the rest of the user's command line.
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  cwd: string,
  timeoutMs: number,
) => RunResult;

export const defaultCommandRunner: CommandRunner = (file, args, cwd, timeoutMs) => {
  const result = spawnSync(file, [...args], {
    cwd,
    timeout: timeoutMs,
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    maxBuffer: 16 * 1024 * 1024,
    windowsHide: true,
  });
  return { status: result.status, stdout: result.stdout ?? '', error: result.error };
};

/** find primaries that run programs, prompt, or write files */
const FIND_UNSAFE_PRIMARIES = new Set([
  '-exec',
  '-execdir',
  '-ok',
  '-okdir',
  '-delete',
  '-fprint',
  '-fprint0',
  '-fprintf',
  '-fls',
]);

const GIT_OPTIONS_WITH_VALUE = new Set(['-C', '-c', '--git-dir', '--work-tree', '--namespace']);
const GIT_CLEAN_OPTIONS_WITH_VALUE = new Set(['-e', '--exclude']);
const FORCE_CLUSTER_RE = /^-[a-z]*f[a-z]*$/;

interface Invocation {
  file: string;
  args: string[];
  /** Directory the program runs in */
  cwd: string;
  /** Directory relative output paths are resolved against */
  base: string;
}

type RewriteResult = { ok: true; invocation: Invocation } | { ok: false; reason: string };

/**
 * Tier 2: enumerate what a find -delete or git clean -f would remove by
 * running its non-destructive form.
 */
export function discoverTargets(
  command: string,
  cwd: string,
  runner: CommandRunner = defaultCommandRunner,
): DiscoveryResult {
  if (FIND_DELETE_RE.test(command)) {
    return discoverFindTargets(command, cwd, runner);
  }
  if (GIT_CLEAN_FORCE_RE.test(command)) {
    return discoverGitCleanTargets(command, cwd, runner);
  }
  return { kind: 'unavailable', reason: 'no dry-run form for this command' };
}

export function discoverFindTargets(
  command: string,
  cwd: string,
  runner: CommandRunner = defaultCommandRunner,
): DiscoveryResult {
  const rewrite = rewriteFind(command, cwd);
  if (!rewrite.ok) {
    return { kind: 'unavailable', reason: rewrite.reason };
  }
  return execute(rewrite.invocation, runner, (stdout, base) =>
    stdout
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean)
      .map((line) => (isAbsolute(line) ? line : resolve(base, line))),
  );
}

export function discoverGitCleanTargets(
  command: string,
  cwd: string,
  runner: CommandRunner = defaultCommandRunner,
): DiscoveryResult {
  const rewrite = rewriteGitClean(command, cwd);
  if (!rewrite.ok) {
    return { kind: 'unavailable', reason: rewrite.reason };
  }
  return execute(rewrite.invocation, runner, (stdout, base) => {
    const paths: string[] = [];
    for (const line of stdout.split('\n')) {
      const match = /^Would remove (.+)$/.exec(line.trim());
      if (match?.[1]) {
        paths.push(resolve(base, match[1]));
      }
    }
    return paths;
  });
}

function execute(
  invocation: Invocation,
  runner: CommandRunner,
  parse: (stdout: string, base: string) => string[],
): DiscoveryResult {
  let result: RunResult;
  try {
    result = runner(invocation.file, invocation.args, invocation.cwd, DRY_RUN_TIMEOUT_MS);
  } catch (error) {
    return { kind: 'unavailable', reason: error instanceof Error ? error.message : String(error) };
  }

  if (result.error) {
    return { kind: 'unavailable', reason: result.error.message };
  }

  const paths = parse(result.stdout, invocation.base);
  if (paths.length > 0) {
    return { kind: 'found', paths };
  }
  if (result.status === 0) {
    return { kind: 'none' };
  }
  return {
    kind: 'unavailable',
    reason: `${invocation.file} exited with status ${result.status ?? 'unknown'}`,
  };
}

/**
 * Locate the find segment, drop -delete and "-exec rm ... ;|+" clauses, and
 * refuse anything left that could act on the filesystem.
 */
export function rewriteFind(command: string, cwd: string): RewriteResult {
  const located = locateSegment(command, (words) => {
    const head = getSegmentHead(words);
    return head === 'find' && FIND_DELETE_RE.test(words.join(' '));
  });
  if (!located.ok) return located;

  const [file, ...rest] = stripWrappers(located.words);
  if (!file) {
    return { ok: false, reason: 'empty find command' };
  }

  const args: string[] = [];
  let changed = false;
  for (let i = 0; i < rest.length; i++) {
    const word = rest[i] ?? '';
    if (word === '-delete') {
      changed = true;
      continue;
    }
    if ((word === '-exec' || word === '-execdir') && isRmExec(rest, i + 1)) {
      while (i < rest.length && rest[i] !== ';' && rest[i] !== '+') {
        i++;
      }
      changed = true;
      continue;
    }
    if (FIND_UNSAFE_PRIMARIES.has(word)) {
      return { ok: false, reason: `find ${word} cannot be dry-run safely` };
    }
    args.push(word === '-print0' ? '-print' : word);
  }

  if (!changed) {
    return { ok: false, reason: 'no destructive find action to strip' };
  }
  return { ok: true, invocation: { file, args, cwd, base: cwd } };
}

function isRmExec(words: readonly string[], start: number): boolean {
  const head = stripWrappers(words.slice(start))[0];
  return head !== undefined && getBasename(head).toLowerCase() === 'rm';
}

/**
 * Locate the git clean segment and turn each force flag into -n
 * ("-xfd" becomes "-xnd", "--force" becomes "-n").
 */
export function rewriteGitClean(command: string, cwd: string): RewriteResult {
  const located = locateSegment(command, (words) => {
    const stripped = stripWrappers(words);
    return getSegmentHead(words) === 'git' && findGitSubcommand(stripped)?.name === 'clean';
  });
  if (!located.ok) return located;

  const [file, ...rest] = stripWrappers(located.words);
  const subcommand = findGitSubcommand([file ?? '', ...rest]);
  if (!file || !subcommand) {
    return { ok: false, reason: 'git clean not found' };
  }

  const args = rest.slice(0, subcommand.index - 1);
  args.push('clean');
  let changed = false;
  let skipNext = false;
  for (const word of rest.slice(subcommand.index)) {
    if (skipNext) {
      skipNext = false;
      args.push(word);
      continue;
    }
    if (GIT_CLEAN_OPTIONS_WITH_VALUE.has(word)) {
      skipNext = true;
      args.push(word);
      continue;
    }
    if (word === '-i' || word === '--interactive') {
      return { ok: false, reason: 'git clean --interactive cannot be dry-run' };
    }
    if (word === '--force') {
      args.push('-n');
      changed = true;
      continue;
    }
    if (FORCE_CLUSTER_RE.test(word)) {
      args.push(word.replace(/f/g, 'n'));
      changed = true;
      continue;
    }
    args.push(word);
  }

  if (!changed) {
    return { ok: false, reason: 'no force flag to rewrite' };
  }
  // git -C keeps its argument, so only the output base moves
  return {
    ok: true,
    invocation: { file, args, cwd, base: resolve(cwd, ...subcommand.directories) },
  };
}

/** Subcommand position in git's argv (index into words) and the -C directories before it */
function findGitSubcommand(
  words: readonly string[],
): { name: string; index: number; directories: string[] } | null {
  const directories: string[] = [];
  for (let i = 1; i < words.length; i++) {
    const word = words[i] ?? '';
    if (GIT_OPTIONS_WITH_VALUE.has(word)) {
      if (word === '-C') {
        directories.push(words[i + 1] ?? '');
      }
      i++;
      continue;
    }
    if (word.startsWith('-')) continue;
    return { name: word, index: i, directories };
  }
  return null;
}

type LocateResult = { ok: true; words: string[] } | { ok: false; reason: string };

function locateSegment(
  command: string,
  matches: (words: readonly string[]) => boolean,
): LocateResult {
  let cwdChanged = false;
  for (const words of splitShellCommands(command)) {
    const head = getSegmentHead(words);
    if (head && CWD_CHANGING_COMMANDS.has(head)) {
      cwdChanged = true;
      continue;
    }
    if (matches(words)) {
      if (cwdChanged) {
        return { ok: false, reason: 'working directory changes before the command' };
      }
      return { ok: true, words };
    }
  }
  return { ok: false, reason: 'command segment not found' };
}
