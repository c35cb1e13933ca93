import { resolve } from 'node:path';

/** Explicitly disabled, e.g. DELETION_GUARD_AUDIT=0 */
export function envFalsy(name: string, env: NodeJS.ProcessEnv = process.env): boolean {
  const val = env[name];
  return val === '0' || val === 'false' || val === 'no';
}

/**
 * Workspace root: CLAUDE_PROJECT_DIR when set, then the hook's cwd,
 * then the process cwd.
 */
export function getWorkspaceRoot(cwd?: string, env: NodeJS.ProcessEnv = process.env): string {
  const projectDir = env.CLAUDE_PROJECT_DIR;
  if (projectDir) {
    return resolve(projectDir);
  }
  return resolve(cwd || process.cwd());
}
