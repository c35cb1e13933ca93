/**
 * Settings file discovery for the explain command.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';

import { getProjectConfigPath, getUserConfigPath, validateConfigFile } from '../../core/config';

export interface ConfigSource {
  scope: 'user' | 'project';
  path: string;
  valid: boolean;
}

export interface GetConfigSourcesOptions {
  cwd?: string;
  /** Override user config directory for testing */
  userConfigDir?: string;
}

/**
 * Settings files that exist, user scope first. Both scopes are merged at
 * run time; invalid files are listed but ignored.
 */
export function getConfigSources(options: GetConfigSourcesOptions = {}): ConfigSource[] {
  const userPath = options.userConfigDir
    ? join(options.userConfigDir, 'config.json')
    : getUserConfigPath();
  const candidates = [
    { scope: 'user' as const, path: userPath },
    { scope: 'project' as const, path: getProjectConfigPath(options.cwd) },
  ];

  return candidates
    .filter(({ path }) => existsSync(path))
    .map(({ scope, path }) => ({
      scope,
      path,
      valid: validateConfigFile(path).errors.length === 0,
    }));
}
