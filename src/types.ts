/**
 * Shared types for the deletion guard.
 */

/** Trust zone of a deletion target */
export type Zone = 'workspace' | 'whitelist' | 'tmp' | 'outside';

/** Final outcome for a command */
export type Decision = 'allow' | 'allow-with-backup' | 'block';

/** How backups are laid out on disk */
export type BackupMode = 'centralized' | 'per-folder';

/** Settings file contents (~/.deletion-guard/config.json, .deletion-guard.json) */
export interface Config {
  /** Schema version (must be 1) */
  version: number;
  /** Directories outside the workspace whose contents are backed up instead of prompted */
  whitelisted_folders: string[];
  /** Backup layout; unset means "inherit" */
  backup_mode?: BackupMode;
  /** Root directory for centralized backups */
  backup_root?: string;
}

/** Result of config validation */
export interface ValidationResult {
  /** List of validation error messages */
  errors: string[];
}

/** Read-only settings handed to the engine, resolved once per invocation */
export interface GuardSettings {
  /** Resolved whitelist roots, most specific first */
  whitelistRoots: string[];
  backupMode: BackupMode;
  /** Resolved centralized backup root */
  backupRoot: string;
}

/** A deletion target after classification */
export interface ClassifiedTarget {
  /** Path as produced by extraction or discovery */
  path: string;
  /** Absolute, symlink-normalized path */
  resolved: string;
  exists: boolean;
  zone: Zone;
  /** Workspace root or matching whitelist root; null for tmp and outside */
  backupRoot: string | null;
}

/** Roots the zone resolver classifies against */
export interface ZoneRoots {
  workspace: string;
  whitelist: readonly string[];
  tmp: readonly string[];
}

/** One manifest line written by the backup store */
export interface BackupRecord {
  /** Collision-resistant 6-hex identifier, also embedded in backup_filename */
  id: string;
  backup_filename: string;
  original_path: string;
  backed_up_at: string;
  /** Zone root the target belongs to */
  workspace: string;
  is_dir: boolean;
  size_bytes: number;
  command: string;
}

/** How a command deletes files */
export type DeletionKind = 'find' | 'git-clean' | 'xargs' | 'verb';

/** Targets of one simple command that contains a deletion verb */
export interface SegmentTargets {
  /** Lower-cased basename of the verb */
  verb: string;
  /** Absolute paths, glob-expanded; missing paths included */
  targets: string[];
  /** Arguments whose real location cannot be known statically */
  unresolved: string[];
}

/** Outcome of a Tier 2 dry run */
export type DiscoveryResult =
  | { kind: 'found'; paths: string[] }
  | { kind: 'none' }
  | { kind: 'unavailable'; reason: string };

/** Pipeline stage that produced a verdict */
export type VerdictStage =
  | 'no-deletion'
  | 'unresolvable'
  | 'unenumerable'
  | 'nothing-found'
  | 'outside'
  | 'classified';

/** Result of evaluating one command */
export interface Verdict {
  decision: Decision;
  stage: VerdictStage;
  /** Explanation for a block, written to stderr */
  reason?: string;
  /** Paths that caused a block */
  blockedPaths: string[];
  /** Every classified target, in extraction order */
  targets: ClassifiedTarget[];
  /** Records produced by the backup store */
  backups: BackupRecord[];
  /** True when the user answered a prompt affirmatively */
  confirmed: boolean;
}

/** Why the engine asked for confirmation */
export type PromptKind = 'unresolvable' | 'unenumerable' | 'outside';

/** One step of the decision pipeline, as reported to a trace observer */
export type TraceStep =
  | { type: 'detect'; kind: DeletionKind | null }
  | { type: 'unresolvable'; construct: string | null }
  | { type: 'extract'; segments: SegmentTargets[] }
  | { type: 'discover'; result: DiscoveryResult }
  | { type: 'classify'; targets: ClassifiedTarget[] }
  | { type: 'prompt'; kind: PromptKind; message: string; confirmed: boolean }
  | { type: 'backup'; root: string; paths: string[] };

/** Audit log entry */
export interface AuditLogEntry {
  ts: string;
  command: string;
  decision: Decision;
  stage: VerdictStage;
  paths: string[];
  cwd: string | null;
}

/** Constants */
export const PROMPT_TIMEOUT_MS = 30_000;
export const DRY_RUN_TIMEOUT_MS = 10_000;
export const PER_FOLDER_SIZE_LIMIT = 10 * 1024 * 1024;
export const BACKUP_WARN_BYTES = 500 * 1024 * 1024;

/** Exit code that tells the caller the command was blocked */
export const EXIT_BLOCKED = 2;

export const UNIX_DELETE_COMMANDS: ReadonlySet<string> = new Set([
  'rm',
  'rmdir',
  'unlink',
  'shred',
  'trash',
  'rimraf',
]);
export const WINDOWS_DELETE_COMMANDS: ReadonlySet<string> = new Set(['del', 'erase', 'rd']);
export const POWERSHELL_DELETE_COMMANDS: ReadonlySet<string> = new Set(['remove-item', 'ri']);

/** Every verb that marks a Tier 1 deletion */
export const DELETE_COMMANDS: ReadonlySet<string> = new Set([
  ...UNIX_DELETE_COMMANDS,
  ...WINDOWS_DELETE_COMMANDS,
  ...POWERSHELL_DELETE_COMMANDS,
]);

/** Shell operators that end a simple command */
export const SHELL_OPERATORS: ReadonlySet<string> = new Set([
  ';',
  '&&',
  '||',
  '|',
  '&',
  '|&',
  ';;',
  '(',
  ')',
  '\n',
]);

/** Flags of deletion verbs that take a value argument */
export const FLAGS_WITH_VALUE: ReadonlySet<string> = new Set(['-t', '--target-directory']);

/** Commands whose deletion verb receives dynamic arguments */
export const DYNAMIC_ARGUMENT_HEADS: ReadonlySet<string> = new Set(['find', 'xargs', 'parallel']);

/** Commands that change the working directory for later segments */
export const CWD_CHANGING_COMMANDS: ReadonlySet<string> = new Set(['cd', 'pushd', 'popd']);

/** Prefix commands stripped before looking at the real head */
export const COMMAND_WRAPPERS: ReadonlySet<string> = new Set([
  'sudo',
  'doas',
  'env',
  'command',
  'nice',
  'nohup',
  'time',
  'busybox',
]);
