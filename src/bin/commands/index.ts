import { explainCommand } from './explain';
import { hookCommand } from './hook';
import type { Command } from './types';
import { verifyConfigCommand } from './verify-config';

/** @internal Exported for testing */
export type { Command, CommandOption } from './types';

/**
 * All registered commands.
 * Order determines display order in main help.
 * @internal Exported for testing
 */
export const commands: readonly Command[] = [hookCommand, explainCommand, verifyConfigCommand];

/**
 * Lookup a command by name or alias.
 * Returns undefined if not found.
 */
export function findCommand(nameOrAlias: string): Command | undefined {
  const normalized = nameOrAlias.toLowerCase();
  return commands.find(
    (cmd) =>
      cmd.name.toLowerCase() === normalized ||
      cmd.aliases?.includes(nameOrAlias),
  );
}

/**
 * Get all visible commands (non-hidden) for main help display.
 */
export function getVisibleCommands(): readonly Command[] {
  return commands.filter((cmd) => !cmd.hidden);
}
