/**
 * Redaction utilities for the explain command.
 * Keeps environment variable values out of trace output.
 */

/** Regex to match environment variable assignments (KEY=value) */
const ENV_ASSIGNMENT_RE = /^[A-Za-z_][A-Za-z0-9_]*=/;

/**
 * Redact env assignments in a raw command string (KEY=value → KEY=<redacted>).
 * Handles both quoted and unquoted values.
 */
export function redactEnvAssignmentsInString(str: string): string {
  return str.replace(/\b([A-Za-z_][A-Za-z0-9_]*)=(?:"[^"]*"|'[^']*'|\S+)/g, '$1=<redacted>');
}

/**
 * Redact values in tokens that look like env assignments (KEY=value → KEY=<redacted>).
 */
export function redactEnvAssignmentTokens(tokens: readonly string[]): string[] {
  return tokens.map((token) => {
    if (ENV_ASSIGNMENT_RE.test(token)) {
      const eqIdx = token.indexOf('=');
      return `${token.slice(0, eqIdx)}=<redacted>`;
    }
    return token;
  });
}
