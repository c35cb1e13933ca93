import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import type { BackupStore } from '../src/core/backup';
import type { CommandRunner, RunResult } from '../src/core/dry-run';
import type { ConfirmationPrompt } from '../src/core/prompt';
import type { BackupRecord } from '../src/types';

/** Fresh directory with symlinks resolved, so paths compare equal to classified ones */
export function makeTempDir(prefix = 'deletion-guard-'): string {
  return realpathSync(mkdtempSync(join(tmpdir(), prefix)));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function writeFile(path: string, content = ''): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf-8');
}

/** Workspace, whitelist, scratch (temp zone) and unrelated directories under one base */
export interface Sandbox {
  base: string;
  ws: string;
  wl: string;
  scratch: string;
  other: string;
  home: string;
  userConfigDir: string;
}

export function makeSandbox(): Sandbox {
  const base = makeTempDir();
  const sandbox: Sandbox = {
    base,
    ws: join(base, 'ws'),
    wl: join(base, 'wl'),
    scratch: join(base, 'scratch'),
    other: join(base, 'other'),
    home: join(base, 'home'),
    userConfigDir: join(base, 'home', '.deletion-guard'),
  };
  for (const dir of [sandbox.ws, sandbox.wl, sandbox.scratch, sandbox.other, sandbox.userConfigDir]) {
    mkdirSync(dir, { recursive: true });
  }
  return sandbox;
}

export class FakePrompt implements ConfirmationPrompt {
  readonly messages: string[] = [];

  constructor(private readonly answer: boolean) {}

  async confirm(message: string): Promise<boolean> {
    this.messages.push(message);
    return this.answer;
  }
}

export interface StoreCall {
  targets: string[];
  zoneRoot: string;
  command: string;
}

export class FakeBackupStore implements BackupStore {
  readonly calls: StoreCall[] = [];

  store(targets: readonly string[], zoneRoot: string, command: string): BackupRecord[] {
    this.calls.push({ targets: [...targets], zoneRoot, command });
    return targets.map((target, index) => ({
      id: `00000${index}`,
      backup_filename: `backup-${index}`,
      original_path: target,
      backed_up_at: '2024-01-05T09:03:07',
      workspace: zoneRoot,
      is_dir: false,
      size_bytes: 0,
      command,
    }));
  }
}

export interface RunnerCall {
  file: string;
  args: readonly string[];
  cwd: string;
  timeoutMs: number;
}

/** Runner that records calls and replies with a fixed result */
export function fakeRunner(result: RunResult, calls: RunnerCall[] = []): CommandRunner {
  return (file, args, cwd, timeoutMs) => {
    calls.push({ file, args, cwd, timeoutMs });
    return result;
  };
}

export async function* textSource(text: string): AsyncGenerator<string> {
  yield text;
}

/**
 * Capture console.log output during a function call.
 */
export function captureOutput(fn: () => void): string {
  const originalLog = console.log;
  let output = '';
  console.log = (...args: unknown[]) => {
    output += `${args.map(String).join(' ')}\n`;
  };
  try {
    fn();
  } finally {
    console.log = originalLog;
  }
  return output;
}
