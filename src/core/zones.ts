import { existsSync, realpathSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';

import type { ClassifiedTarget, Zone, ZoneRoots } from '../types';

/**
 * Absolute path with symlinks resolved. For a path that does not exist, the
 * nearest existing ancestor is resolved and the rest is appended, so
 * /tmp/missing on macOS still lands under /private/tmp.
 */
export function resolveRealPath(p: string): string {
  const absolute = resolve(p);
  try {
    return realpathSync.native(absolute);
  } catch {
    const parent = dirname(absolute);
    if (parent === absolute) {
      return absolute;
    }
    return join(resolveRealPath(parent), basename(absolute));
  }
}

/**
 * True when path equals root or lies below it. Uses path.relative, so
 * /tmp2 is not inside /tmp.
 */
export function isInside(path: string, root: string): boolean {
  const rel = relative(root, path);
  if (rel === '') {
    return true;
  }
  return rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

export function isSamePath(a: string, b: string): boolean {
  return relative(a, b) === '';
}

/** Candidate temp directories for the platform, before resolution */
export function getTmpDirCandidates(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const candidates: string[] = [];
  if (platform === 'win32') {
    for (const name of ['TEMP', 'TMP', 'TMPDIR']) {
      const value = env[name];
      if (value) candidates.push(value);
    }
  } else {
    candidates.push('/tmp', '/var/tmp', '/private/tmp');
  }
  candidates.push(tmpdir());
  return candidates;
}

export function getTmpRoots(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string[] {
  const roots: string[] = [];
  for (const candidate of getTmpDirCandidates(platform, env)) {
    const resolved = resolveRealPath(candidate);
    if (!roots.includes(resolved)) {
      roots.push(resolved);
    }
  }
  return roots;
}

/** Resolve every root once so classification compares like with like */
export function resolveZoneRoots(
  workspace: string,
  whitelist: readonly string[],
  tmp: readonly string[] = getTmpRoots(),
): ZoneRoots {
  return {
    workspace: resolveRealPath(workspace),
    whitelist: whitelist.map(resolveRealPath),
    tmp: tmp.map(resolveRealPath),
  };
}

export function classifyPath(target: string, roots: ZoneRoots): ClassifiedTarget {
  const resolved = resolveRealPath(target);
  const exists = existsSync(resolved);
  const { zone, backupRoot } = zoneOf(resolved, roots);
  return { path: target, resolved, exists, zone, backupRoot };
}

function zoneOf(resolved: string, roots: ZoneRoots): { zone: Zone; backupRoot: string | null } {
  // Deleting the workspace root itself is never auto-approved
  if (isSamePath(resolved, roots.workspace)) {
    return { zone: 'outside', backupRoot: null };
  }
  if (isInside(resolved, roots.workspace)) {
    return { zone: 'workspace', backupRoot: roots.workspace };
  }
  for (const root of roots.whitelist) {
    if (isInside(resolved, root)) {
      return { zone: 'whitelist', backupRoot: root };
    }
  }
  for (const root of roots.tmp) {
    if (isInside(resolved, root)) {
      return { zone: 'tmp', backupRoot: null };
    }
  }
  return { zone: 'outside', backupRoot: null };
}

/**
 * Deepest roots first, configured order among equals. Only nested roots can
 * both contain a path, so first-match classification then picks the most
 * specific one.
 */
export function orderWhitelistRoots(roots: readonly string[]): string[] {
  const unique: string[] = [];
  for (const root of roots) {
    if (!unique.some((existing) => isSamePath(existing, root))) {
      unique.push(root);
    }
  }
  return unique
    .map((root, index) => ({ root, index, depth: depthOf(root) }))
    .sort((a, b) => b.depth - a.depth || a.index - b.index)
    .map(({ root }) => root);
}

function depthOf(p: string): number {
  return resolve(p).split(sep).filter(Boolean).length;
}
