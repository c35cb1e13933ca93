import { randomBytes } from 'node:crypto';
import {
  appendFileSync,
  copyFileSync,
  cpSync,
  existsSync,
  type Dirent,
  mkdirSync,
  readdirSync,
  readFileSync,
  statSync,
  writeFileSync,
} from 'node:fs';
import { basename, dirname, extname, join, relative, sep } from 'node:path';

import { isInside } from './zones';
import {
  BACKUP_WARN_BYTES,
  type BackupRecord,
  type GuardSettings,
  PER_FOLDER_SIZE_LIMIT,
} from '../types';

/** Persists copies of files that are about to be deleted */
export interface BackupStore {
  /**
   * Back up targets that belong to one zone root.
   * Returns one record per copied target; failed copies are reported and skipped.
   */
  store(targets: readonly string[], zoneRoot: string, command: string): BackupRecord[];
}

export interface BackupStoreOptions {
  /** Progress sink; defaults to stdout */
  log?: (line: string) => void;
  /** Warn when the centralized backup root grows past this many bytes */
  warnBytes?: number;
  /** Per-folder mode skips the whole backup above this many bytes */
  sizeLimit?: number;
  now?: () => Date;
  pid?: number;
}

/** Directory per-folder backups are written to, inside each zone root */
export const PER_FOLDER_DIR_NAME = '.deletion-guard-backups';

export const MANIFEST_FILE = 'manifest.jsonl';

/** Path components that are never backed up */
export const SKIP_NAMES: ReadonlySet<string> = new Set([
  // VCS
  '.git',
  '.svn',
  '.hg',
  // Python environments and caches
  'venv',
  '.venv',
  'env',
  '__pypackages__',
  '__pycache__',
  '.pytest_cache',
  '.mypy_cache',
  '.ruff_cache',
  // Node
  'node_modules',
  // Build outputs
  'dist',
  'build',
  'out',
  'target',
  '.output',
  '.next',
  '.nuxt',
  '.svelte-kit',
  '.astro',
  // Mobile / JVM
  'Pods',
  '.gradle',
  // Coverage
  'coverage',
  '.nyc_output',
  // Temp
  'tmp',
  'temp',
  '.tmp',
  // Our own backups
  PER_FOLDER_DIR_NAME,
]);

const SKIP_SUFFIXES = ['.egg-info', '.dist-info'];

function isSkippedName(name: string): boolean {
  return SKIP_NAMES.has(name) || SKIP_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

/**
 * True when any component of the target below its zone root is on the skip
 * list. Components above the root do not count, so a workspace that itself
 * lives under /tmp is still backed up.
 */
export function hasSkipComponent(target: string, zoneRoot: string): boolean {
  const rel = isInside(target, zoneRoot) ? relative(zoneRoot, target) : basename(target);
  return rel.split(sep).some((part) => part !== '' && isSkippedName(part));
}

/** 6 hex chars */
export function generateBackupId(): string {
  return randomBytes(3).toString('hex');
}

/** "Button_a3b7c9.tsx" for files, "src_a3b7c9" for directories */
export function makeBackupName(target: string, isDir: boolean, id: string): string {
  const name = basename(target);
  if (isDir) {
    return `${name}_${id}`;
  }
  const ext = extname(name);
  const stem = ext ? name.slice(0, -ext.length) : name;
  return `${stem}_${id}${ext}`;
}

/** Local time as YYYY-MM-DDTHH:MM:SS */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Total size of regular files below dir; skip-listed entries are left out when asked */
export function directorySize(dir: string, skipListed = false): number {
  let entries: Dirent[];
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch {
    return 0;
  }
  let total = 0;
  for (const entry of entries) {
    if (skipListed && isSkippedName(entry.name)) continue;
    const full = join(dir, entry.name);
    if (entry.isDirectory()) {
      total += directorySize(full, skipListed);
    } else if (entry.isFile()) {
      try {
        total += statSync(full).size;
      } catch {
        // vanished between readdir and stat
      }
    }
  }
  return total;
}

function copyTarget(target: string, dest: string): { isDir: boolean; size: number } {
  const isDir = statSync(target).isDirectory();
  if (isDir) {
    cpSync(target, dest, {
      recursive: true,
      dereference: true,
      errorOnExist: true,
      force: false,
      preserveTimestamps: true,
      filter: (src) => src === target || !isSkippedName(basename(src)),
    });
    return { isDir, size: directorySize(dest) };
  }
  copyFileSync(target, dest);
  return { isDir, size: statSync(dest).size };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Every backup goes to <backupRoot>/files under a randomized name, with one
 * manifest line per copy in <backupRoot>/manifest.jsonl.
 */
export class CentralizedBackupStore implements BackupStore {
  private readonly log: (line: string) => void;
  private readonly warnBytes: number;
  private readonly now: () => Date;

  constructor(
    private readonly backupRoot: string,
    options: BackupStoreOptions = {},
  ) {
    this.log = options.log ?? console.log;
    this.warnBytes = options.warnBytes ?? BACKUP_WARN_BYTES;
    this.now = options.now ?? (() => new Date());
  }

  store(targets: readonly string[], zoneRoot: string, command: string): BackupRecord[] {
    const filesDir = join(this.backupRoot, 'files');
    const manifestPath = join(this.backupRoot, MANIFEST_FILE);
    mkdirSync(filesDir, { recursive: true });

    const backedUpAt = formatTimestamp(this.now());
    const records: BackupRecord[] = [];

    for (const target of targets) {
      if (!existsSync(target)) continue;
      if (hasSkipComponent(target, zoneRoot)) {
        this.log(`  ⏭ Skip (skip list): ${target}`);
        continue;
      }

      try {
        const isDir = statSync(target).isDirectory();
        let id = generateBackupId();
        let backupName = makeBackupName(target, isDir, id);
        while (existsSync(join(filesDir, backupName))) {
          id = generateBackupId();
          backupName = makeBackupName(target, isDir, id);
        }
        const dest = join(filesDir, backupName);
        const copied = copyTarget(target, dest);

        const record: BackupRecord = {
          id,
          backup_filename: backupName,
          original_path: target,
          backed_up_at: backedUpAt,
          workspace: zoneRoot,
          is_dir: copied.isDir,
          size_bytes: copied.size,
          command,
        };
        appendFileSync(manifestPath, `${JSON.stringify(record)}\n`, 'utf-8');
        records.push(record);

        this.log(`  ✓ Backed up: ${basename(target)}  →  ${dest}`);
      } catch (error) {
        this.log(`  ✗ Backup failed (${describeError(error)}): ${target}`);
      }
    }

    this.warnIfLarge();
    return records;
  }

  private warnIfLarge(): void {
    const total = directorySize(this.backupRoot);
    if (total > this.warnBytes) {
      const mb = Math.round(total / (1024 * 1024));
      this.log('');
      this.log(`  ⚠ Backup folder is ${mb}MB (${this.backupRoot}).`);
      this.log('  Delete old entries under files/ to free space.');
    }
  }
}

/**
 * Backups live next to the data in <zoneRoot>/.deletion-guard-backups/<stamp>,
 * mirroring relative paths. The whole batch is skipped above the size limit.
 */
export class PerFolderBackupStore implements BackupStore {
  private readonly log: (line: string) => void;
  private readonly sizeLimit: number;
  private readonly now: () => Date;
  private readonly pid: number;

  constructor(options: BackupStoreOptions = {}) {
    this.log = options.log ?? console.log;
    this.sizeLimit = options.sizeLimit ?? PER_FOLDER_SIZE_LIMIT;
    this.now = options.now ?? (() => new Date());
    this.pid = options.pid ?? process.pid;
  }

  store(targets: readonly string[], zoneRoot: string, command: string): BackupRecord[] {
    const candidates = targets.filter(
      (target) => existsSync(target) && !hasSkipComponent(target, zoneRoot),
    );

    const total = candidates.reduce((sum, target) => sum + candidateSize(target), 0);
    if (total > this.sizeLimit) {
      const mb = Math.floor(total / (1024 * 1024));
      const limitMb = Math.floor(this.sizeLimit / (1024 * 1024));
      this.log(`  Skip (>${limitMb}MB): total backup size ${mb} MB, skipping backup`);
      return [];
    }

    const now = this.now();
    const stamp = formatTimestamp(now).replace('T', '_').replace(/:/g, '-');
    const batchDir = join(zoneRoot, PER_FOLDER_DIR_NAME, `${stamp}_${this.pid}_${generateBackupId()}`);
    ensureGitignore(zoneRoot);

    const records: BackupRecord[] = [];
    for (const target of targets) {
      if (!existsSync(target)) continue;
      if (hasSkipComponent(target, zoneRoot)) {
        this.log(`  ⏭ Skip (skip list): ${target}`);
        continue;
      }

      const rel = isInside(target, zoneRoot) ? relative(zoneRoot, target) : basename(target);
      const dest = join(batchDir, rel);
      try {
        mkdirSync(dirname(dest), { recursive: true });
        const copied = copyTarget(target, dest);
        const record: BackupRecord = {
          id: generateBackupId(),
          backup_filename: relative(zoneRoot, dest),
          original_path: target,
          backed_up_at: formatTimestamp(now),
          workspace: zoneRoot,
          is_dir: copied.isDir,
          size_bytes: copied.size,
          command,
        };
        appendFileSync(join(batchDir, MANIFEST_FILE), `${JSON.stringify(record)}\n`, 'utf-8');
        records.push(record);
        this.log(`  ✓ Backed up: ${rel}  →  ${record.backup_filename}`);
      } catch (error) {
        this.log(`  ✗ Backup failed for ${rel}: ${describeError(error)}`);
      }
    }
    return records;
  }
}

function candidateSize(target: string): number {
  try {
    const stat = statSync(target);
    if (stat.isFile()) return stat.size;
    if (stat.isDirectory()) return directorySize(target, true);
  } catch {
    // unreadable targets count as empty
  }
  return 0;
}

export const GITIGNORE_ENTRY = `${PER_FOLDER_DIR_NAME}/`;

/** Add the per-folder backup directory to <root>/.gitignore once */
export function ensureGitignore(root: string): void {
  const gitignore = join(root, '.gitignore');
  try {
    if (existsSync(gitignore)) {
      const content = readFileSync(gitignore, 'utf-8');
      const present = content
        .split('\n')
        .some((line) => line.trim() === GITIGNORE_ENTRY || line.trim() === PER_FOLDER_DIR_NAME);
      if (present) return;
      writeFileSync(gitignore, `${content.replace(/\n+$/, '')}\n${GITIGNORE_ENTRY}\n`, 'utf-8');
    } else {
      writeFileSync(gitignore, `${GITIGNORE_ENTRY}\n`, 'utf-8');
    }
  } catch (error) {
    console.error(`[deletion-guard] could not update ${gitignore}: ${describeError(error)}`);
  }
}

export function createBackupStore(
  settings: Pick<GuardSettings, 'backupMode' | 'backupRoot'>,
  options: BackupStoreOptions = {},
): BackupStore {
  return settings.backupMode === 'per-folder'
    ? new PerFolderBackupStore(options)
    : new CentralizedBackupStore(settings.backupRoot, options);
}
