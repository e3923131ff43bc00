/**
 * Výběr formátteru podle `--format`.
 */

import type { OutputFormat, FormattableData } from '../types.js';
import { JsonFormatter } from './json-formatter.js';
import { PrettyFormatter } from './pretty-formatter.js';

export interface OutputFormatter {
  format(data: FormattableData): string;
}

const FORMATTERS: Record<OutputFormat, (useColors: boolean) => OutputFormatter> = {
  json: () => new JsonFormatter(true),
  pretty: (useColors) => new PrettyFormatter(useColors)
};

export function createFormatter(format: OutputFormat, useColors: boolean = true): OutputFormatter {
  return FORMATTERS[format](useColors);
}

export { JsonFormatter } from './json-formatter.js';
export { PrettyFormatter } from './pretty-formatter.js';
