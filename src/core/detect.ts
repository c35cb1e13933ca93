import { getBasename, tokenize } from './shell';
import { DELETE_COMMANDS, type DeletionKind } from '../types';

/** find with -delete or -exec rm */
export const FIND_DELETE_RE = /\bfind\b.*(-delete|-exec\s+rm\b)/;

/** git clean with a force flag cluster; "--x" style long options are not clusters */
export const GIT_CLEAN_FORCE_RE = /\bgit\s+clean\b.*(?:(?<!-)-[a-z]*f[a-z]*\b|--force\b)/;

export const XARGS_RM_RE = /\bxargs\s+(?:sudo\s+)?(?:rm|unlink)\b/;

/**
 * Identify how a command deletes files, or null when it does not.
 * Regex checks run on the raw text; the verb check runs on shell tokens.
 */
export function detectDeletion(command: string): DeletionKind | null {
  if (FIND_DELETE_RE.test(command)) {
    return 'find';
  }
  if (GIT_CLEAN_FORCE_RE.test(command)) {
    return 'git-clean';
  }
  if (XARGS_RM_RE.test(command)) {
    return 'xargs';
  }

  for (const token of tokenize(command)) {
    if (token.type !== 'word') continue;
    if (isDeleteVerb(token.value)) {
      return 'verb';
    }
  }
  return null;
}

export function hasDeletion(command: string): boolean {
  return detectDeletion(command) !== null;
}

export function isDeleteVerb(word: string): boolean {
  return DELETE_COMMANDS.has(getBasename(word).toLowerCase());
}
