import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

import { isDeleteVerb } from './detect';
import { expandGlob, isGlobPattern } from './glob';
import { getBasename, getSegmentHead, splitSegments, tokenize } from './shell';
import {
  CWD_CHANGING_COMMANDS,
  DYNAMIC_ARGUMENT_HEADS,
  FLAGS_WITH_VALUE,
  type SegmentTargets,
} from '../types';

export interface ExtractOptions {
  /** Decides whether "/x" is a flag (win32) or a path */
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

interface ArgumentContext {
  cwd: string;
  cwdChanged: boolean;
  env: NodeJS.ProcessEnv;
  homeDir: string;
}

type ResolvedArgument = { kind: 'paths'; paths: string[] } | { kind: 'unresolved' };

/**
 * Collect explicit path arguments of every deletion verb in the command.
 * Each simple command is scanned independently: arguments stop at the
 * operator that ends it, so "rm a; rm b" gives two entries.
 */
export function extractTargets(
  command: string,
  cwd: string,
  options: ExtractOptions = {},
): SegmentTargets[] {
  const platform = options.platform ?? process.platform;
  const ctx: ArgumentContext = {
    cwd,
    cwdChanged: false,
    env: options.env ?? process.env,
    homeDir: options.homeDir ?? process.env.HOME ?? homedir(),
  };

  const results: SegmentTargets[] = [];

  for (const words of splitSegments(tokenize(command))) {
    const head = getSegmentHead(words);
    if (!head) continue;

    if (CWD_CHANGING_COMMANDS.has(head)) {
      ctx.cwdChanged = true;
      continue;
    }

    // find -exec rm {} / xargs rm: arguments arrive at run time
    if (DYNAMIC_ARGUMENT_HEADS.has(head)) {
      continue;
    }

    const segment = scanSegment(words, platform, ctx);
    if (segment) {
      results.push(segment);
    }
  }

  return results;
}

/** All resolved targets across segments, in order */
export function flattenTargets(segments: readonly SegmentTargets[]): string[] {
  return segments.flatMap((segment) => segment.targets);
}

export function flattenUnresolved(segments: readonly SegmentTargets[]): string[] {
  return segments.flatMap((segment) => segment.unresolved);
}

function scanSegment(
  words: readonly string[],
  platform: NodeJS.Platform,
  ctx: ArgumentContext,
): SegmentTargets | null {
  let verb: string | null = null;
  let endOfFlags = false;
  let skipNext = false;
  const targets: string[] = [];
  const unresolved: string[] = [];

  for (const word of words) {
    if (verb === null) {
      if (isDeleteVerb(word)) {
        verb = getBasename(word).toLowerCase();
      }
      continue;
    }

    if (skipNext) {
      skipNext = false;
      continue;
    }

    if (!endOfFlags) {
      if (word === '--') {
        endOfFlags = true;
        continue;
      }
      if (word.startsWith('-') || (platform === 'win32' && word.startsWith('/'))) {
        if (FLAGS_WITH_VALUE.has(word)) {
          skipNext = true;
        }
        continue;
      }
    }

    const resolved = resolveArgument(word, ctx);
    if (resolved.kind === 'unresolved') {
      unresolved.push(word);
    } else {
      targets.push(...resolved.paths);
    }
  }

  return verb === null ? null : { verb, targets, unresolved };
}

function resolveArgument(word: string, ctx: ArgumentContext): ResolvedArgument {
  // ~user expands to another account's home, which we do not look up
  if (/^~[^/\\]/.test(word)) {
    return { kind: 'unresolved' };
  }

  const expanded = expandVariables(expandHome(word, ctx.homeDir), ctx.env);
  if (expanded.includes('$')) {
    return { kind: 'unresolved' };
  }
  if (ctx.cwdChanged && !isAbsolute(expanded)) {
    return { kind: 'unresolved' };
  }

  const candidate = resolve(isAbsolute(expanded) ? expanded : join(ctx.cwd, expanded));
  // Quoting is gone by now, so "a (1)" looks like a pattern; an existing path is taken literally
  if (isGlobPattern(candidate) && !existsSync(candidate)) {
    const matches = expandGlob(candidate);
    if (matches.length > 0) {
      return { kind: 'paths', paths: matches };
    }
  }
  // Missing paths are kept so they can still be classified
  return { kind: 'paths', paths: [candidate] };
}

export function expandHome(word: string, homeDir: string): string {
  if (word === '~') {
    return homeDir;
  }
  if (word.startsWith('~/') || word.startsWith('~\\')) {
    return join(homeDir, word.slice(2));
  }
  return word;
}

/** $NAME and ${NAME}; unknown names are left in place */
export function expandVariables(word: string, env: NodeJS.ProcessEnv): string {
  return word.replace(
    /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
    (match: string, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare;
      if (!name) return match;
      return env[name] ?? match;
    },
  );
}
