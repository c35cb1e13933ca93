import { findCommand } from './commands';
import {
  explainCommand,
  formatTraceHuman,
  formatTraceJson,
  parseExplainFlags,
} from './explain';
import { PROGRAM_NAME, printHelp, printVersion, showCommandHelp } from './help';
import { type HookOptions, runClaudeCodeHook } from './hooks/claude-code';
import { verifyConfig } from './verify-config';

type CommandMode = 'hook' | 'explain' | 'verify-config';

export type CliAction = { kind: 'run'; mode: CommandMode } | { kind: 'exit'; code: number };

/**
 * Check if --help or -h is present in args (but not as a quoted command argument).
 */
function hasHelpFlag(args: readonly string[]): boolean {
  return args.includes('--help') || args.includes('-h');
}

/**
 * Handle "help <command>" pattern.
 */
function handleHelpCommand(args: readonly string[]): CliAction | null {
  if (args[0] !== 'help') {
    return null;
  }

  const commandName = args[1];
  if (!commandName) {
    printHelp();
    return { kind: 'exit', code: 0 };
  }

  if (showCommandHelp(commandName)) {
    return { kind: 'exit', code: 0 };
  }

  console.error(`Unknown command: ${commandName}`);
  console.error(`Run '${PROGRAM_NAME} --help' for available commands.`);
  return { kind: 'exit', code: 1 };
}

/**
 * Handle "<command> --help" pattern for subcommands.
 */
function handleCommandHelp(args: readonly string[]): CliAction | null {
  if (!hasHelpFlag(args)) {
    return null;
  }

  const commandName = args[0];
  if (!commandName || commandName === '-h' || commandName === '--help') {
    // Global help
    return null;
  }

  if (findCommand(commandName)) {
    showCommandHelp(commandName);
    return { kind: 'exit', code: 0 };
  }

  return null;
}

/** Decide what to do with the arguments after the program name */
export function resolveCliAction(args: readonly string[]): CliAction {
  const helpAction = handleHelpCommand(args) ?? handleCommandHelp(args);
  if (helpAction) {
    return helpAction;
  }

  if (args[0] === 'explain') {
    return { kind: 'run', mode: 'explain' };
  }

  if (args.length === 0 || hasHelpFlag(args)) {
    printHelp();
    return { kind: 'exit', code: 0 };
  }

  if (args.includes('--version') || args.includes('-V')) {
    printVersion();
    return { kind: 'exit', code: 0 };
  }

  if (args.includes('--verify-config') || args.includes('-vc')) {
    return { kind: 'run', mode: 'verify-config' };
  }

  if (args.includes('--hook') || args.includes('-H') || args.includes('--claude-code')) {
    return { kind: 'run', mode: 'hook' };
  }

  console.error(`Unknown option: ${args[0] ?? ''}`);
  console.error(`Run '${PROGRAM_NAME} --help' for usage.`);
  return { kind: 'exit', code: 1 };
}

async function runExplain(args: string[]): Promise<number> {
  if (hasHelpFlag(args) || args.length === 0) {
    showCommandHelp('explain');
    return 0;
  }

  const flags = parseExplainFlags(args);
  if (!flags) {
    return 1;
  }

  const result = await explainCommand(flags.command, { cwd: flags.cwd });
  const asciiOnly = !!process.env.NO_COLOR || !process.stdout.isTTY;

  console.log(flags.json ? formatTraceJson(result) : formatTraceHuman(result, { asciiOnly }));
  return 0;
}

/** Run the CLI and return its exit code */
export async function runCli(args: string[], hookOptions: HookOptions = {}): Promise<number> {
  const action = resolveCliAction(args);
  if (action.kind === 'exit') {
    return action.code;
  }

  switch (action.mode) {
    case 'hook':
      return runClaudeCodeHook(hookOptions);
    case 'verify-config':
      return verifyConfig();
    case 'explain':
      return runExplain(args.slice(1));
  }
}
