/**
 * Prompt and block messages shown to the user.
 */

const PREFIX = 'Deletion guard:';

export const REMEDIATION_EXPLICIT_PATHS =
  'Rewrite using explicit file paths (avoid $(...), backtick subshells, eval, or base64-piped commands).';

export function formatUnresolvablePrompt(command: string): string {
  return `\n${PREFIX} Command contains unresolvable paths:\n  ${command}\nAllow this deletion? [y/N] `;
}

export function formatUnenumerablePrompt(command: string, unresolved: readonly string[] = []): string {
  const detail =
    unresolved.length > 0 ? `\nArguments that cannot be resolved: ${unresolved.join(', ')}` : '';
  return `\n${PREFIX} Cannot enumerate deletion targets for:\n  ${command}${detail}\nAllow this deletion? [y/N] `;
}

export function formatOutsidePrompt(paths: readonly string[]): string {
  const list = paths.map((p) => `  ${p}`).join('\n');
  return `\n${PREFIX} The following paths are outside the workspace:\n${list}\nAllow deletion? [y/N] `;
}

export const REASON_UNRESOLVABLE = `${PREFIX} Unable to verify whether target paths are inside the workspace or /tmp. ${REMEDIATION_EXPLICIT_PATHS}`;

export const REASON_UNENUMERABLE = `${PREFIX} Unable to verify whether target paths are inside the workspace or /tmp. Rewrite using explicit file paths.`;

export function formatOutsideReason(paths: readonly string[]): string {
  return (
    `${PREFIX} Deleting files outside the workspace or /tmp is not allowed and the user has not confirmed this operation.\n` +
    `Blocked: ${paths.join(', ')}`
  );
}

export interface BlockedMessageInput {
  reason: string;
  command?: string;
  redact?: (text: string) => string;
  maxCommandLength?: number;
}

/**
 * Full stderr text for a block: the reason, then the command that was stopped.
 */
export function formatBlockedMessage(input: BlockedMessageInput): string {
  const { reason, command, redact, maxCommandLength = 200 } = input;
  const lines = [reason];

  if (command) {
    const shown = redact ? redact(command) : command;
    lines.push('');
    lines.push(`Command: ${excerpt(shown, maxCommandLength)}`);
  }

  return lines.join('\n');
}

function excerpt(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
