import type { Command } from './commands';
import { findCommand, getVisibleCommands } from './commands';

import { version } from '../../package.json';

export const PROGRAM_NAME = 'deletion-guard';

type Row = readonly [left: string, right: string];

/** Two aligned columns, indented under a section title */
function section(title: string, rows: readonly Row[]): string[] {
  const width = Math.max(...rows.map(([left]) => left.length)) + 2;
  const body = rows.map(([left, right]) => (right ? `  ${left.padEnd(width)}${right}` : `  ${left}`));
  return [`${title}:`, ...body, ''];
}

const ENVIRONMENT: readonly Row[] = [
  ['CLAUDE_PROJECT_DIR=<path>', 'Workspace root (defaults to the hook cwd)'],
  ['DELETION_GUARD_BACKUP_MODE=<mode>', 'centralized or per-folder'],
  ['DELETION_GUARD_AUDIT=0', 'Disable the audit log'],
  ['NO_COLOR=1', 'Disable colored output'],
];

const CONFIG_FILES: readonly Row[] = [
  ['~/.deletion-guard/config.json', 'User-scope config'],
  ['.deletion-guard.json', 'Project-scope config'],
];

/** @internal Exported for testing */
export function printCommandHelp(command: Command): void {
  const lines = [
    `${PROGRAM_NAME} ${command.name}`,
    '',
    `  ${command.description}`,
    '',
    ...section('USAGE', [[`${PROGRAM_NAME} ${command.usage}`, '']]),
  ];
  if (command.options.length > 0) {
    lines.push(
      ...section(
        'OPTIONS',
        command.options.map((opt): Row => [opt.argument ? `${opt.flags} ${opt.argument}` : opt.flags, opt.description]),
      ),
    );
  }
  if (command.examples?.length) {
    lines.push(...section('EXAMPLES', command.examples.map((example): Row => [example, ''])));
  }
  console.log(lines.join('\n').trimEnd());
}

export function printHelp(): void {
  const lines = [
    `${PROGRAM_NAME} v${version}`,
    '',
    'Backs up or blocks shell deletions based on where their targets live.',
    '',
    ...section(
      'COMMANDS',
      getVisibleCommands().map((cmd): Row => [`${PROGRAM_NAME} ${cmd.usage}`, cmd.description]),
    ),
    ...section('OPTIONS', [
      ['-h, --help', 'Show help; after a command, help for that command'],
      [`${PROGRAM_NAME} help <command>`, 'Same as <command> --help'],
      ['-V, --version', 'Show version'],
    ]),
    ...section('ENVIRONMENT VARIABLES', ENVIRONMENT),
    ...section('CONFIG FILES', CONFIG_FILES),
  ];
  console.log(lines.join('\n').trimEnd());
}

export function printVersion(): void {
  console.log(version);
}

/** Prints help for a command name or alias; false when there is no such command */
export function showCommandHelp(commandName: string): boolean {
  const command = findCommand(commandName);
  if (!command) return false;
  printCommandHelp(command);
  return true;
}
