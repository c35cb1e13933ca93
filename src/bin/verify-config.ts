import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';

import { colors } from './utils/colors';
import {
  getProjectConfigPath,
  USER_CONFIG_DIR_NAME,
  validateConfigFile,
} from '../core/config';

export interface VerifyConfigOptions {
  cwd?: string;
  /** Override user config directory (for testing) */
  userConfigDir?: string;
}

/**
 * Validate the user and project settings files and print a report.
 * Returns the exit code: 1 when any existing file is invalid.
 */
export function verifyConfig(options: VerifyConfigOptions = {}): number {
  const userConfigDir = options.userConfigDir ?? join(homedir(), USER_CONFIG_DIR_NAME);
  const files = [
    { scope: 'User', path: join(userConfigDir, 'config.json') },
    { scope: 'Project', path: getProjectConfigPath(options.cwd) },
  ];

  let found = 0;
  let failed = 0;

  for (const { scope, path } of files) {
    if (!existsSync(path)) {
      console.log(`${scope} config: ${colors.dim(`${path} (not found)`)}`);
      continue;
    }
    found++;
    const { errors } = validateConfigFile(path);
    if (errors.length === 0) {
      console.log(`${scope} config: ${path} ${colors.green('✓ valid')}`);
      continue;
    }
    failed++;
    console.log(`${scope} config: ${path} ${colors.red('✗ invalid')}`);
    for (const error of errors) {
      console.log(`  - ${error}`);
    }
  }

  console.log('');
  if (found === 0) {
    console.log('No config files found. Defaults apply.');
    return 0;
  }
  if (failed > 0) {
    console.log(colors.red(`${failed} config file(s) invalid; defaults apply in their place.`));
    return 1;
  }
  console.log(colors.green('All config files are valid.'));
  return 0;
}
