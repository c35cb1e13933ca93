import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import * as z from 'zod';

import { expandHome } from './targets';
import { orderWhitelistRoots, resolveRealPath } from './zones';
import type { BackupMode, Config, GuardSettings, ValidationResult } from '../types';

export const USER_CONFIG_DIR_NAME = '.deletion-guard';
export const PROJECT_CONFIG_FILE = '.deletion-guard.json';

const BackupModeSchema = z.enum(['centralized', 'per-folder']);

export const ConfigSchema = z
  .strictObject({
    $schema: z.string().optional().describe('JSON Schema reference for IDE support'),
    version: z.literal(1).describe('Schema version (must be 1)'),
    whitelisted_folders: z
      .array(z.string().min(1))
      .default([])
      .describe('Folders outside the workspace whose deletions are backed up instead of prompted'),
    backup_mode: BackupModeSchema.optional().describe('centralized (default) or per-folder'),
    backup_root: z.string().min(1).optional().describe('Root directory for centralized backups'),
  })
  .describe('Deletion guard settings');

const DEFAULT_CONFIG: Config = {
  version: 1,
  whitelisted_folders: [],
};

export interface LoadConfigOptions {
  /** Override user config directory (for testing) */
  userConfigDir?: string;
}

export function loadConfig(cwd?: string, options?: LoadConfigOptions): Config {
  const safeCwd = typeof cwd === 'string' ? cwd : process.cwd();
  const userConfigDir = options?.userConfigDir ?? join(homedir(), USER_CONFIG_DIR_NAME);
  const userConfigPath = join(userConfigDir, 'config.json');
  const projectConfigPath = join(safeCwd, PROJECT_CONFIG_FILE);

  const userConfig = loadSingleConfig(userConfigPath);
  const projectConfig = loadSingleConfig(projectConfigPath);

  return mergeConfigs(userConfig, projectConfig);
}

function loadSingleConfig(path: string): Config | null {
  if (!existsSync(path)) {
    return null;
  }

  try {
    const content = readFileSync(path, 'utf-8');
    if (!content.trim()) {
      return null;
    }

    const result = ConfigSchema.safeParse(JSON.parse(content));
    if (!result.success) {
      return null;
    }

    const { version, whitelisted_folders, backup_mode, backup_root } = result.data;
    return { version, whitelisted_folders, backup_mode, backup_root };
  } catch {
    // Unreadable or malformed files fall back to defaults; --verify-config reports them
    return null;
  }
}

/**
 * Whitelists from both scopes are combined (user first); scalar settings
 * from the project file win.
 */
function mergeConfigs(userConfig: Config | null, projectConfig: Config | null): Config {
  if (!userConfig && !projectConfig) {
    return DEFAULT_CONFIG;
  }

  if (!userConfig) {
    return projectConfig ?? DEFAULT_CONFIG;
  }

  if (!projectConfig) {
    return userConfig;
  }

  return {
    version: 1,
    whitelisted_folders: [...userConfig.whitelisted_folders, ...projectConfig.whitelisted_folders],
    backup_mode: projectConfig.backup_mode ?? userConfig.backup_mode,
    backup_root: projectConfig.backup_root ?? userConfig.backup_root,
  };
}

/** @internal Exported for testing */
export function validateConfig(config: unknown): ValidationResult {
  const result = ConfigSchema.safeParse(config);
  if (result.success) {
    return { errors: [] };
  }
  return {
    errors: result.error.issues.map((issue) => {
      const path = issue.path.map(String).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    }),
  };
}

export function validateConfigFile(path: string): ValidationResult {
  const errors: string[] = [];

  if (!existsSync(path)) {
    errors.push(`File not found: ${path}`);
    return { errors };
  }

  try {
    const content = readFileSync(path, 'utf-8');
    if (!content.trim()) {
      errors.push('Config file is empty');
      return { errors };
    }

    const parsed: unknown = JSON.parse(content);
    return validateConfig(parsed);
  } catch (e) {
    errors.push(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
    return { errors };
  }
}

export interface ResolveSettingsOptions {
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Turn the merged config into the read-only settings the engine runs with.
 * DELETION_GUARD_BACKUP_MODE overrides the configured mode.
 */
export function resolveSettings(config: Config, options: ResolveSettingsOptions = {}): GuardSettings {
  const env = options.env ?? process.env;
  const home = options.homeDir ?? env.HOME ?? homedir();

  const whitelistRoots = orderWhitelistRoots(
    config.whitelisted_folders.map((folder) => resolveRealPath(expandHome(folder, home))),
  );

  const override = BackupModeSchema.safeParse(env.DELETION_GUARD_BACKUP_MODE);
  const backupMode: BackupMode = override.success
    ? override.data
    : (config.backup_mode ?? 'centralized');

  const backupRoot = resolve(
    expandHome(config.backup_root ?? join(home, USER_CONFIG_DIR_NAME, 'backups'), home),
  );

  return { whitelistRoots, backupMode, backupRoot };
}

export function getUserConfigPath(): string {
  return join(homedir(), USER_CONFIG_DIR_NAME, 'config.json');
}

export function getProjectConfigPath(cwd?: string): string {
  return resolve(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
}

export type { ValidationResult };
