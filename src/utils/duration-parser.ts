const MULTIPLIERS: Record<string, number> = {
  'ms': 1,
  's': 1000,
  'm': 60 * 1000,
  'h': 60 * 60 * 1000
};

export const DURATION_RE = /^(\d+(?:\.\d+)?)(ms|s|m|h)$/;

/**
 * Parsuje duration string na milisekundy.
 * Podporované formáty: "250ms", "1.5s", "2m", "1h" nebo číslo v ms.
 */
export function parseDuration(duration: string | number): number {
  if (typeof duration === 'number') return duration;

  const match = DURATION_RE.exec(duration);
  if (!match) throw new Error(`Invalid duration: ${duration}`);

  const [, value = '', unit = ''] = match;
  const multiplier = MULTIPLIERS[unit];

  if (multiplier === undefined) {
    throw new Error(`Unknown duration unit: ${unit}`);
  }

  return Math.round(parseFloat(value) * multiplier);
}

/**
 * Formátuje milisekundy na čitelný string ("850ms", "2.4s", "3m 5s").
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60 * 1000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / (60 * 1000));
  const seconds = Math.round((ms % (60 * 1000)) / 1000);
  return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
}
