/**
 * ANSI barvy pro reporty a log výstup.
 */

/** Explicitní přepnutí barev (null = autodetekce) */
let colorOverride: boolean | null = null;

/** Vynutí nebo zakáže barvy; `null` vrátí autodetekci */
export function setColorEnabled(enabled: boolean | null): void {
  colorOverride = enabled;
}

/** Detekce podpory barev */
export function supportsColor(): boolean {
  if (colorOverride !== null) {
    return colorOverride;
  }

  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }

  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }

  return process.stdout.isTTY === true;
}

/** ANSI kódy pro barvy */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m'
} as const;

export type ColorName = keyof typeof colors;

/** Aplikuje barvu na text */
export function colorize(text: string, color: ColorName): string {
  if (!supportsColor()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}
