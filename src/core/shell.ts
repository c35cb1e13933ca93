import { type ParseEntry, parse } from 'shell-quote';

import { COMMAND_WRAPPERS, SHELL_OPERATORS } from '../types';

export type ShellToken =
  | { type: 'word'; value: string }
  | { type: 'operator'; value: string }
  | { type: 'redirect'; value: string };

const REDIRECT_OPERATORS = new Set(['>', '>>', '<', '>&', '<&', '&>', '&>>']);

const ENV_ASSIGNMENT_RE = /^[A-Za-z_][A-Za-z0-9_]*=/;

const WRAPPER_OPTIONS_WITH_VALUE: Record<string, ReadonlySet<string>> = {
  sudo: new Set(['-u', '-g', '-C', '-h', '-p']),
  doas: new Set(['-u', '-C']),
  env: new Set(['-u', '-C', '--unset', '--chdir']),
  nice: new Set(['-n']),
};

/** Tokens of a command, and whether quoting forced the permissive fallback */
export interface ParsedCommand {
  tokens: ShellToken[];
  permissive: boolean;
}

/**
 * Tokenize a command with shell quoting rules.
 * Variable references stay literal ($NAME) so that expansion can happen later
 * against the caller's environment. Falls back to a permissive tokenizer when
 * quoting is malformed.
 */
export function parseCommand(command: string): ParsedCommand {
  const scan = scanQuoting(command);
  if (scan.unbalanced) {
    return { tokens: tokenizePermissive(scan.code), permissive: true };
  }

  let entries: ParseEntry[];
  try {
    entries = parse(scan.escaped, (key: string) => `$${key}`);
  } catch {
    return { tokens: tokenizePermissive(scan.code), permissive: true };
  }

  const tokens: ShellToken[] = [];
  for (const entry of entries) {
    if (typeof entry === 'string') {
      tokens.push({ type: 'word', value: entry });
      continue;
    }
    if ('comment' in entry) {
      break;
    }
    if (entry.op === 'glob') {
      tokens.push({ type: 'word', value: entry.pattern });
      continue;
    }
    if (REDIRECT_OPERATORS.has(entry.op)) {
      // "2>/dev/null" arrives as "2", ">", "/dev/null"; the fd number is not an argument
      const previous = tokens[tokens.length - 1];
      if (previous?.type === 'word' && /^\d+$/.test(previous.value)) {
        tokens.pop();
      }
      tokens.push({ type: 'redirect', value: entry.op });
      continue;
    }
    tokens.push({ type: 'operator', value: entry.op });
  }
  return { tokens, permissive: false };
}

export function tokenize(command: string): ShellToken[] {
  return parseCommand(command).tokens;
}

/** ";", "&&", "||", "|", "|&", ";;" and a background "&" (not the one in ">&" or "&>") */
const PERMISSIVE_OPERATOR_RE = /(;;|;|&&|\|\||\|&|\||(?<![<>])&(?!>))/;

/**
 * Whitespace tokenizer for text whose quoting cannot be parsed.
 * Quote characters stay in the words; control operators are split out of
 * them, so "done;rm" gives "done", ";", "rm".
 */
export function tokenizePermissive(command: string): ShellToken[] {
  const tokens: ShellToken[] = [];
  for (const raw of command.split(/\s+/)) {
    for (const part of raw.split(PERMISSIVE_OPERATOR_RE)) {
      if (!part) continue;
      tokens.push(
        SHELL_OPERATORS.has(part) ? { type: 'operator', value: part } : { type: 'word', value: part },
      );
    }
  }
  return tokens;
}

interface QuotingScan {
  /** Text before the first comment */
  code: string;
  /** The same text with every "#" inside a word backslash-escaped */
  escaped: string;
  /** A quote is still open at the end of the code */
  unbalanced: boolean;
}

/**
 * Walk the command once with shell quoting rules. A "#" starts a comment only
 * at the start of a word and outside quotes; inside a word ("http://x/#top",
 * "a#b") it is literal, which shell-quote alone would not respect.
 */
function scanQuoting(command: string): QuotingScan {
  let quote: '"' | "'" | null = null;
  let code = '';
  let escaped = '';

  for (let i = 0; i < command.length; i++) {
    const ch = command[i] ?? '';
    if (ch === '\\' && quote !== "'") {
      const pair = ch + (command[i + 1] ?? '');
      code += pair;
      escaped += pair;
      i++;
      continue;
    }
    if (quote) {
      if (ch === quote) quote = null;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '#') {
      if (startsWord(command, i)) break;
      escaped += '\\';
    }
    code += ch;
    escaped += ch;
  }

  return { code, escaped, unbalanced: quote !== null };
}

function startsWord(command: string, index: number): boolean {
  const previous = command[index - 1];
  return previous === undefined || /[\s;&|()<>]/.test(previous);
}

/**
 * Detect an unterminated single or double quote before any comment.
 * Backslash escapes apply outside single quotes.
 */
export function hasUnbalancedQuotes(command: string): boolean {
  return scanQuoting(command).unbalanced;
}

/** Words of every simple command, split at operators. Redirect targets are dropped. */
export function splitSegments(tokens: readonly ShellToken[]): string[][] {
  const segments: string[][] = [];
  let current: string[] = [];
  let skipRedirectTarget = false;

  for (const token of tokens) {
    if (token.type === 'operator') {
      if (current.length > 0) segments.push(current);
      current = [];
      skipRedirectTarget = false;
      continue;
    }
    if (token.type === 'redirect') {
      skipRedirectTarget = true;
      continue;
    }
    if (skipRedirectTarget) {
      skipRedirectTarget = false;
      continue;
    }
    current.push(token.value);
  }

  if (current.length > 0) segments.push(current);
  return segments;
}

export function splitShellCommands(command: string): string[][] {
  return splitSegments(tokenize(command));
}

export function getBasename(token: string): string {
  const parts = token.split(/[\\/]/);
  return parts[parts.length - 1] ?? token;
}

/**
 * Drop prefix wrappers (sudo, env, nohup, ...) and leading VAR=value
 * assignments so the real command sits at index 0.
 */
export function stripWrappers(words: readonly string[]): string[] {
  let i = 0;
  while (i < words.length) {
    const word = words[i] ?? '';
    if (ENV_ASSIGNMENT_RE.test(word)) {
      i++;
      continue;
    }
    const head = getBasename(word).toLowerCase();
    if (!COMMAND_WRAPPERS.has(head)) {
      break;
    }
    i++;
    const withValue = WRAPPER_OPTIONS_WITH_VALUE[head];
    while (i < words.length) {
      const option = words[i] ?? '';
      if (option === '--') {
        i++;
        break;
      }
      if (!option.startsWith('-')) break;
      i += withValue?.has(option) ? 2 : 1;
    }
  }
  return words.slice(i);
}

/** Basename of the segment's real command, lower-cased */
export function getSegmentHead(words: readonly string[]): string | null {
  const stripped = stripWrappers(words);
  const head = stripped[0];
  return head === undefined ? null : getBasename(head).toLowerCase();
}
