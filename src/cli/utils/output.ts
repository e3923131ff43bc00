/**
 * Zápis výsledků CLI na stdout/stderr.
 *
 * Reporty jdou na stdout (kromě chyb), logy mají vlastní sinky v
 * `logging/logger.ts`. `--quiet` potlačí reporty, chyby se vypíší vždy.
 */

import type { OutputFormat, FormattableData } from '../types.js';
import { createFormatter } from '../formatters/index.js';
import { setColorEnabled, supportsColor } from '../../utils/colors.js';

export interface OutputSettings {
  quiet: boolean;
  noColor: boolean;
  format: OutputFormat;
}

let settings: OutputSettings = {
  quiet: false,
  noColor: false,
  format: 'pretty'
};

/** Nastaví výstup pro zbytek procesu; JSON výstup vypíná barvy i v reportech stavů */
export function setOutputOptions(options: Partial<OutputSettings>): void {
  settings = { ...settings, ...options };
  setColorEnabled(settings.noColor || settings.format === 'json' ? false : null);
}

export function print(message: string): void {
  if (settings.quiet) return;
  console.log(message);
}

export function printError(message: string): void {
  console.error(message);
}

/** Zformátuje data zvoleným formátterem a vypíše je */
export function printData(data: FormattableData): void {
  const isError = data.type === 'error';
  if (settings.quiet && !isError) return;

  const output = createFormatter(settings.format, supportsColor()).format(data);
  if (isError) {
    printError(output);
  } else {
    print(output);
  }
}
