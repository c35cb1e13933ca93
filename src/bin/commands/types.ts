/** A CLI option shown in help output */
export interface CommandOption {
  flags: string;
  argument?: string;
  description: string;
}

/** A CLI command and the metadata its help text is built from */
export interface Command {
  name: string;
  aliases?: readonly string[];
  description: string;
  usage: string;
  argument?: string;
  options: readonly CommandOption[];
  examples?: readonly string[];
  hidden?: boolean;
}
