import type { BackupStore } from './backup';
import { detectDeletion } from './detect';
import { type CommandRunner, defaultCommandRunner, discoverTargets } from './dry-run';
import {
  REASON_UNENUMERABLE,
  REASON_UNRESOLVABLE,
  formatOutsidePrompt,
  formatOutsideReason,
  formatUnenumerablePrompt,
  formatUnresolvablePrompt,
} from './format';
import type { ConfirmationPrompt } from './prompt';
import { parseCommand } from './shell';
import { extractTargets, flattenTargets, flattenUnresolved } from './targets';
import { findUnresolvable } from './unresolvable';
import { classifyPath, getTmpRoots, resolveZoneRoots } from './zones';
import type {
  BackupRecord,
  ClassifiedTarget,
  GuardSettings,
  PromptKind,
  TraceStep,
  Verdict,
  VerdictStage,
} from '../types';

export interface DecisionEngineOptions {
  settings: GuardSettings;
  prompt: ConfirmationPrompt;
  backupStore: BackupStore;
  runner?: CommandRunner;
  /** Resolved temp roots; defaults to the platform's */
  tmpRoots?: readonly string[];
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  /** Observer for each pipeline step (used by explain) */
  trace?: (step: TraceStep) => void;
}

export interface EvaluationContext {
  /** Directory the command runs in */
  cwd: string;
  /** Workspace root; defaults to cwd */
  workspace?: string;
}

/**
 * Decides what happens to one command: detection, target enumeration,
 * zone classification, confirmation, then backup dispatch.
 *
 * Policy denials come back as a "block" verdict. Unexpected errors are
 * thrown to the caller, which fails open.
 */
export class DecisionEngine {
  private readonly runner: CommandRunner;
  private readonly tmpRoots: readonly string[];

  constructor(private readonly options: DecisionEngineOptions) {
    this.runner = options.runner ?? defaultCommandRunner;
    this.tmpRoots = options.tmpRoots ?? getTmpRoots(options.platform, options.env);
  }

  async evaluate(command: string, context: EvaluationContext): Promise<Verdict> {
    const { cwd } = context;
    const workspace = context.workspace ?? cwd;

    const kind = detectDeletion(command);
    this.emit({ type: 'detect', kind });
    if (!kind) {
      return allow('no-deletion');
    }

    // Tier 3: nothing static can be trusted
    const construct = findUnresolvable(command);
    this.emit({ type: 'unresolvable', construct });
    if (construct) {
      const confirmed = await this.ask('unresolvable', formatUnresolvablePrompt(command));
      return confirmed
        ? allow('unresolvable', { confirmed })
        : block('unresolvable', REASON_UNRESOLVABLE, []);
    }

    // Malformed quoting leaves word boundaries as guesses
    if (parseCommand(command).permissive) {
      return this.confirmUnenumerable(command, []);
    }

    // Tier 1
    const segments = extractTargets(command, cwd, {
      platform: this.options.platform,
      env: this.options.env,
      homeDir: this.options.homeDir,
    });
    this.emit({ type: 'extract', segments });
    const unresolved = flattenUnresolved(segments);
    if (unresolved.length > 0) {
      return this.confirmUnenumerable(command, unresolved);
    }

    let targets = flattenTargets(segments);

    // Tier 2
    if (targets.length === 0) {
      const discovery = discoverTargets(command, cwd, this.runner);
      this.emit({ type: 'discover', result: discovery });
      if (discovery.kind === 'none') {
        return allow('nothing-found');
      }
      if (discovery.kind === 'unavailable') {
        return this.confirmUnenumerable(command, []);
      }
      targets = discovery.paths;
    }

    const roots = resolveZoneRoots(workspace, this.options.settings.whitelistRoots, this.tmpRoots);
    const classified = targets.map((target) => classifyPath(target, roots));
    this.emit({ type: 'classify', targets: classified });

    const outside = classified.filter((t) => t.zone === 'outside').map((t) => t.resolved);
    let confirmed = false;
    if (outside.length > 0) {
      confirmed = await this.ask('outside', formatOutsidePrompt(outside));
      if (!confirmed) {
        return block('outside', formatOutsideReason(outside), outside, classified);
      }
    }

    const groups = groupByBackupRoot(classified);
    const backups: BackupRecord[] = [];
    for (const [root, group] of groups) {
      this.emit({ type: 'backup', root, paths: group });
      backups.push(...this.options.backupStore.store(group, root, command));
    }

    return {
      decision: groups.size > 0 ? 'allow-with-backup' : 'allow',
      stage: confirmed ? 'outside' : 'classified',
      blockedPaths: [],
      targets: classified,
      backups,
      confirmed,
    };
  }

  private async confirmUnenumerable(command: string, unresolved: string[]): Promise<Verdict> {
    const confirmed = await this.ask('unenumerable', formatUnenumerablePrompt(command, unresolved));
    return confirmed
      ? allow('unenumerable', { confirmed })
      : block('unenumerable', REASON_UNENUMERABLE, unresolved);
  }

  private async ask(kind: PromptKind, message: string): Promise<boolean> {
    const confirmed = await this.options.prompt.confirm(message);
    this.emit({ type: 'prompt', kind, message, confirmed });
    return confirmed;
  }

  private emit(step: TraceStep): void {
    this.options.trace?.(step);
  }
}

/**
 * Workspace and whitelist targets keyed by their backup root, so every store
 * call records the right owning root. Tmp and outside targets are not backed up.
 */
export function groupByBackupRoot(targets: readonly ClassifiedTarget[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const target of targets) {
    if (target.zone !== 'workspace' && target.zone !== 'whitelist') continue;
    if (!target.backupRoot) continue;
    const group = groups.get(target.backupRoot) ?? [];
    group.push(target.resolved);
    groups.set(target.backupRoot, group);
  }
  return groups;
}

function allow(stage: VerdictStage, extra: { confirmed?: boolean } = {}): Verdict {
  return {
    decision: 'allow',
    stage,
    blockedPaths: [],
    targets: [],
    backups: [],
    confirmed: extra.confirmed ?? false,
  };
}

function block(
  stage: VerdictStage,
  reason: string,
  blockedPaths: string[],
  targets: ClassifiedTarget[] = [],
): Verdict {
  return { decision: 'block', stage, reason, blockedPaths, targets, backups: [], confirmed: false };
}
