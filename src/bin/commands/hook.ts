import type { Command } from './types';

export const hookCommand: Command = {
  name: 'hook',
  aliases: ['-H', '--hook', '--claude-code'],
  description: 'Run as Claude Code PreToolUse hook (reads JSON from stdin, exits 2 to block)',
  usage: '-H, --hook',
  options: [
    {
      flags: '-h, --help',
      description: 'Show this help',
    },
  ],
  examples: ['deletion-guard --hook', 'deletion-guard --claude-code'],
};
