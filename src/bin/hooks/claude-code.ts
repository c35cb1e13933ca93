import { homedir } from 'node:os';
import * as z from 'zod';

import { redactSecrets, shouldAudit, writeAuditLog } from '../../core/audit';
import { createBackupStore, type BackupStore } from '../../core/backup';
import { loadConfig, resolveSettings } from '../../core/config';
import type { CommandRunner } from '../../core/dry-run';
import { DecisionEngine } from '../../core/engine';
import { envFalsy, getWorkspaceRoot } from '../../core/env';
import { formatBlockedMessage } from '../../core/format';
import { type ConfirmationPrompt, createTerminalPrompt } from '../../core/prompt';
import { EXIT_BLOCKED, type GuardSettings } from '../../types';

export const HookInputSchema = z.object({
  session_id: z.string().optional(),
  transcript_path: z.string().optional(),
  cwd: z.string().optional(),
  hook_event_name: z.string().optional(),
  tool_name: z.string(),
  tool_input: z
    .object({
      command: z.string().optional(),
      description: z.string().optional(),
    })
    .nullable()
    .optional(),
});

/** Claude Code PreToolUse hook input */
export type HookInput = z.infer<typeof HookInputSchema>;

export interface HookIO {
  /** Hook JSON source; defaults to process.stdin */
  stdin?: AsyncIterable<string | Buffer>;
  /** Informational lines (backup progress) */
  out?: (line: string) => void;
  /** Block explanations and failures */
  err?: (text: string) => void;
}

export interface HookOptions extends HookIO {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  /** Override user config directory (for testing) */
  userConfigDir?: string;
  prompt?: ConfirmationPrompt;
  runner?: CommandRunner;
  tmpRoots?: readonly string[];
  platform?: NodeJS.Platform;
  /** Build the backup store from resolved settings; defaults to the configured mode */
  backupStore?: (settings: GuardSettings, log: (line: string) => void) => BackupStore;
}

async function readAll(stdin: AsyncIterable<string | Buffer>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8').trim();
}

/** Parse and validate hook input; null for anything that is not a usable hook payload */
export function parseHookInput(text: string): HookInput | null {
  if (!text) {
    return null;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const result = HookInputSchema.safeParse(raw);
  return result.success ? result.data : null;
}

/**
 * Run the PreToolUse hook once and return the process exit code:
 * 0 to let the command through, 2 to block it.
 * Internal errors are reported and fail open.
 */
export async function runClaudeCodeHook(options: HookOptions = {}): Promise<number> {
  const err = options.err ?? ((text: string) => console.error(text));
  try {
    return await evaluateHook(options);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    err(`[deletion-guard] unhandled error (failing open): ${message}`);
    return 0;
  }
}

async function evaluateHook(options: HookOptions): Promise<number> {
  const env = options.env ?? process.env;
  const out = options.out ?? ((line: string) => console.log(line));
  const err = options.err ?? ((text: string) => console.error(text));
  const homeDir = options.homeDir ?? env.HOME ?? homedir();

  const input = parseHookInput(await readAll(options.stdin ?? process.stdin));
  if (!input || input.tool_name !== 'Bash') {
    return 0;
  }

  const command = input.tool_input?.command;
  if (!command?.trim()) {
    return 0;
  }

  const cwd = input.cwd ?? process.cwd();
  const workspace = getWorkspaceRoot(input.cwd, env);

  const config = loadConfig(workspace, { userConfigDir: options.userConfigDir });
  const settings = resolveSettings(config, { homeDir, env });
  const backupStore = options.backupStore
    ? options.backupStore(settings, out)
    : createBackupStore(settings, { log: out });

  const engine = new DecisionEngine({
    settings,
    prompt: options.prompt ?? createTerminalPrompt(options.platform),
    backupStore,
    runner: options.runner,
    tmpRoots: options.tmpRoots,
    platform: options.platform,
    env,
    homeDir,
  });

  const verdict = await engine.evaluate(command, { cwd, workspace });

  const sessionId = input.session_id;
  if (sessionId && shouldAudit(verdict) && !envFalsy('DELETION_GUARD_AUDIT', env)) {
    writeAuditLog(sessionId, command, verdict, cwd, { homeDir });
  }

  if (verdict.decision === 'block') {
    err(
      formatBlockedMessage({
        reason: verdict.reason ?? 'Deletion guard: blocked.',
        command,
        redact: redactSecrets,
      }),
    );
    return EXIT_BLOCKED;
  }
  return 0;
}
