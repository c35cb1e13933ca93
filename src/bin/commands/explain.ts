import type { Command } from './types';

export const explainCommand: Command = {
  name: 'explain',
  description: 'Trace how a command would be classified, without prompting or backing up',
  usage: 'explain [options] <command>',
  argument: '<command>',
  options: [
    {
      flags: '--json',
      description: 'Output the trace as JSON',
    },
    {
      flags: '--cwd',
      argument: '<path>',
      description: 'Use custom working directory',
    },
    {
      flags: '-h, --help',
      description: 'Show this help',
    },
  ],
  examples: [
    'deletion-guard explain "rm -rf build"',
    'deletion-guard explain --json "rm ~/notes.txt"',
    'deletion-guard explain --cwd /srv/app "git clean -fd"',
  ],
};
