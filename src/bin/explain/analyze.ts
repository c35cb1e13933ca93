/**
 * Core analysis logic for the explain command.
 */

import { homedir } from 'node:os';
import { resolve } from 'node:path';

import { type ConfigSource, getConfigSources } from './config';
import { redactEnvAssignmentsInString, redactEnvAssignmentTokens } from './redact';
import { redactSecrets } from '../../core/audit';
import { loadConfig, resolveSettings } from '../../core/config';
import type { CommandRunner } from '../../core/dry-run';
import { DecisionEngine } from '../../core/engine';
import { getWorkspaceRoot } from '../../core/env';
import { splitShellCommands } from '../../core/shell';
import type { PromptKind, TraceStep } from '../../types';

export interface ExplainOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  /** Override user config directory (for testing) */
  userConfigDir?: string;
  runner?: CommandRunner;
  tmpRoots?: readonly string[];
  platform?: NodeJS.Platform;
}

/** What the hook would do before any human answers */
export type ExplainOutcome = 'allow' | 'allow-with-backup' | 'prompt';

export interface ExplainResult {
  /** Input with env assignments and secrets redacted */
  input: string;
  segments: string[][];
  cwd: string;
  workspace: string;
  steps: TraceStep[];
  outcome: ExplainOutcome;
  /** Prompt that would be shown, when the outcome is "prompt" */
  prompt?: { kind: PromptKind; message: string };
  /** Block reason if the prompt were denied */
  reason?: string;
  error?: string;
  configSources: ConfigSource[];
}

const redactCommand = (command: string): string =>
  redactSecrets(redactEnvAssignmentsInString(command));

/**
 * Run the decision pipeline without side effects: every prompt is recorded
 * and answered "no", and backups are recorded instead of written.
 */
export async function explainCommand(
  command: string,
  options: ExplainOptions = {},
): Promise<ExplainResult> {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? env.HOME ?? homedir();
  const cwd = resolve(options.cwd ?? process.cwd());
  const workspace = getWorkspaceRoot(cwd, env);
  const configSources = getConfigSources({ cwd: workspace, userConfigDir: options.userConfigDir });

  const base = {
    input: redactCommand(command),
    cwd,
    workspace,
    configSources,
  };

  if (!command.trim()) {
    return { ...base, segments: [], steps: [], outcome: 'allow', error: 'No command provided' };
  }

  const segments = splitShellCommands(command).map((seg) =>
    redactEnvAssignmentTokens(seg).map(redactSecrets),
  );

  const settings = resolveSettings(
    loadConfig(workspace, { userConfigDir: options.userConfigDir }),
    { homeDir, env },
  );

  const steps: TraceStep[] = [];
  const engine = new DecisionEngine({
    settings,
    prompt: { confirm: async () => false },
    backupStore: { store: () => [] },
    runner: options.runner,
    tmpRoots: options.tmpRoots,
    platform: options.platform,
    env,
    homeDir,
    trace: (step) =>
      steps.push(step.type === 'prompt' ? { ...step, message: redactCommand(step.message) } : step),
  });

  const verdict = await engine.evaluate(command, { cwd, workspace });
  const promptStep = steps.find(
    (step): step is Extract<TraceStep, { type: 'prompt' }> => step.type === 'prompt',
  );

  if (promptStep) {
    return {
      ...base,
      segments,
      steps,
      outcome: 'prompt',
      prompt: { kind: promptStep.kind, message: promptStep.message },
      reason: verdict.reason,
    };
  }

  return {
    ...base,
    segments,
    steps,
    outcome: verdict.decision === 'allow-with-backup' ? 'allow-with-backup' : 'allow',
  };
}
