import { type Dirent, readdirSync } from 'node:fs';
import { join } from 'node:path';
import picomatch from 'picomatch';

export function isGlobPattern(pattern: string): boolean {
  return picomatch.scan(toPosix(pattern)).isGlob;
}

/**
 * Expand an absolute glob pattern against the filesystem.
 * "**" crosses directories; dot entries match. Symlinked directories are not
 * descended into. Returns matches sorted, or [] when nothing matches.
 */
export function expandGlob(pattern: string): string[] {
  const { base, glob, isGlob } = picomatch.scan(toPosix(pattern));
  if (!isGlob || !glob) {
    return [];
  }

  const matcher = picomatch(glob, { dot: true });
  const maxDepth = glob.includes('**') ? Number.POSITIVE_INFINITY : glob.split('/').length;
  const root = base || '/';
  const matches: string[] = [];

  walk(root, '', 1, maxDepth, (relative) => {
    if (matcher(relative)) {
      matches.push(join(root, relative));
    }
  });

  return matches.sort();
}

function walk(
  dir: string,
  prefix: string,
  depth: number,
  maxDepth: number,
  visit: (relative: string) => void,
): void {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (error) {
    if (UNREADABLE_DIR_CODES.has(errorCode(error))) return;
    throw error;
  }

  for (const entry of entries) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    visit(relative);
    if (entry.isDirectory() && depth < maxDepth) {
      walk(join(dir, entry.name), relative, depth + 1, maxDepth, visit);
    }
  }
}

const UNREADABLE_DIR_CODES = new Set(['ENOENT', 'ENOTDIR', 'EACCES', 'EPERM']);

export function errorCode(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return '';
}

function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}
