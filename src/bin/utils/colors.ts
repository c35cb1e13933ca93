/**
 * Shared ANSI color utilities with TTY detection.
 * Automatically disables colors when not writing to a TTY or when NO_COLOR is set.
 */

/**
 * Determines if color output should be used.
 * Evaluated lazily to allow tests to control via environment variables.
 * @internal Exported for testing
 */
export function shouldUseColor(): boolean {
  return Boolean(process.stdout.isTTY && !process.env.NO_COLOR);
}

/**
 * Basic color functions.
 */
const green = (s: string) => (shouldUseColor() ? `\x1b[32m${s}\x1b[0m` : s);
const yellow = (s: string) => (shouldUseColor() ? `\x1b[33m${s}\x1b[0m` : s);
const cyan = (s: string) => (shouldUseColor() ? `\x1b[36m${s}\x1b[0m` : s);
const red = (s: string) => (shouldUseColor() ? `\x1b[31m${s}\x1b[0m` : s);
const dim = (s: string) => (shouldUseColor() ? `\x1b[2m${s}\x1b[0m` : s);

/**
 * Color object for convenient grouped access.
 */
export const colors = {
  green,
  yellow,
  cyan,
  red,
  dim,
};

/**
 * ANSI reset escape sequence.
 */
const ANSI_RESET = '\x1b[0m';

/**
 * A curated list of distinct, vibrant 256-color ANSI codes.
 * Selected to be readable on dark backgrounds and visually distinct.
 */
const DISTINCT_COLORS = [
  39, // DeepSkyBlue1
  82, // Chartreuse2
  198, // DeepPink1
  226, // Yellow1
  208, // DarkOrange
  51, // Cyan1
  196, // Red1
  46, // Green1
  201, // Magenta1
  214, // Orange1
  93, // Purple
  154, // GreenYellow
  220, // Gold1
  27, // Blue3
  49, // MediumSpringGreen
  190, // YellowGreen
  200, // HotPink
  33, // DodgerBlue1
  129, // Purple1
  227, // LightGoldenrod1
  45, // Turquoise2
  160, // Red3
  63, // RoyalBlue1
  118, // Chartreuse1
  123, // DarkSlateGray1
  202, // OrangeRed1
];

/**
 * Palette color for the token at `index`, cycling through the palette.
 * Empty when color is off.
 */
export function generateDistinctColor(index: number): string {
  if (!shouldUseColor()) return '';
  const colorCode = DISTINCT_COLORS[index % DISTINCT_COLORS.length];
  return `\x1b[38;5;${colorCode}m`;
}

/** Quote a token and color it by position */
export function colorizeToken(token: string, index: number): string {
  if (!shouldUseColor()) return `"${token}"`;
  return `${generateDistinctColor(index)}"${token}"${ANSI_RESET}`;
}
