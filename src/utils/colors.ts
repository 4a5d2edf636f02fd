/**
 * Terminal Colors
 *
 * ANSI codes for the console logger. Output is plain when NO_COLOR is set
 * or stdout is not a terminal, so piped logs stay greppable.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Color Codes
// ═══════════════════════════════════════════════════════════════════════════════

export const colors = {
  reset: '\x1b[0m',

  // Modifiers
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  // Bright foreground colors
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightCyan: '\x1b[96m'
} as const;

export type ColorName = keyof typeof colors;

let enabled = !process.env['NO_COLOR'] && process.stdout.isTTY === true;

export function setColorEnabled(value: boolean): void {
  enabled = value;
}

export function isColorEnabled(): boolean {
  return enabled;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Color Functions
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Wrap text in one or more codes, followed by a reset.
 */
export function colorize(text: string, ...styles: ColorName[]): string {
  if (!enabled || styles.length === 0) return text;
  return `${styles.map((name) => colors[name]).join('')}${text}${colors.reset}`;
}

/** Color functions by role */
export const c = {
  dim: (text: string) => colorize(text, 'dim'),
  white: (text: string) => colorize(text, 'white'),
  cyan: (text: string) => colorize(text, 'cyan'),
  yellow: (text: string) => colorize(text, 'yellow'),
  magenta: (text: string) => colorize(text, 'magenta'),
  brightGreen: (text: string) => colorize(text, 'brightGreen'),
  brightRed: (text: string) => colorize(text, 'brightRed'),
  brightYellow: (text: string) => colorize(text, 'brightYellow'),
  brightCyan: (text: string) => colorize(text, 'brightCyan'),
  heading: (text: string) => colorize(text, 'bright', 'white')
} as const;
