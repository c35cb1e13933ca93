export { DecisionEngine, type DecisionEngineOptions, type EvaluationContext } from './core/engine';
export {
  type BackupStore,
  type BackupStoreOptions,
  CentralizedBackupStore,
  createBackupStore,
  PerFolderBackupStore,
} from './core/backup';
export { loadConfig, resolveSettings, validateConfig, validateConfigFile } from './core/config';
export { type CommandRunner, discoverTargets } from './core/dry-run';
export { detectDeletion, hasDeletion } from './core/detect';
export { findUnresolvable } from './core/unresolvable';
export { extractTargets } from './core/targets';
export { classifyPath, getTmpRoots, resolveZoneRoots } from './core/zones';
export {
  type BoundedLineReader,
  type ConfirmationPrompt,
  createTerminalPrompt,
  TerminalLineReader,
  TerminalPrompt,
} from './core/prompt';
export { runClaudeCodeHook } from './bin/hooks/claude-code';
export type * from './types';
