/**
 * CLI typy pro protocheck.
 */

import type { ListenerKind } from '../types/event.js';
import type { SkippedTest } from '../types/test.js';
import type { LogLevel } from '../logging/logger.js';
import { DEFAULT_LISTENER_DIR, type RunSummary } from '../core/orchestrator.js';
import { DEFAULT_ACTION_GRACE_MS } from '../core/state.js';
import { DEFAULT_HOST_TEMPLATE } from '../actions/registry.js';
import { DEFAULT_CODE_TIMEOUT_MS } from '../evaluation/code-sandbox.js';
import { DEFAULT_POLL_INTERVAL_MS, type WatchMode } from '../listener/watch-strategy.js';

/** Podporované výstupní formáty */
export type OutputFormat = 'json' | 'pretty';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'pretty'];

/** Exit kódy CLI */
export const ExitCode = {
  Success: 0,
  GeneralError: 1,
  InvalidArguments: 2,
  ValidationError: 3,
  FileNotFound: 4,
  Interrupted: 5,
  TestFailed: 6
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** Globální CLI options */
export interface GlobalOptions {
  format: OutputFormat;
  quiet: boolean;
  noColor: boolean;
  config: string | undefined;
}

/** CLI konfigurace (z `.protocheck.json`) */
export interface CliConfig {
  listener: {
    dir: string;
    type: ListenerKind;
    watch: WatchMode;
    pollIntervalMs: number;
  };
  rules: {
    allowCode: boolean;
    codeTimeoutMs: number;
    lenient: boolean;
  };
  output: {
    format: OutputFormat;
    colors: boolean;
    detailed: boolean;
  };
  log: {
    level: LogLevel;
    file: string | null;
  };
  hostTemplate: string;
  actionGraceMs: number;
}

/** Výchozí CLI konfigurace */
export const DEFAULT_CLI_CONFIG: CliConfig = {
  listener: {
    dir: DEFAULT_LISTENER_DIR,
    type: 'socket',
    watch: 'auto',
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS
  },
  rules: {
    allowCode: false,
    codeTimeoutMs: DEFAULT_CODE_TIMEOUT_MS,
    lenient: false
  },
  output: {
    format: 'pretty',
    colors: true,
    detailed: false
  },
  log: {
    level: 'info',
    file: null
  },
  hostTemplate: DEFAULT_HOST_TEMPLATE,
  actionGraceMs: DEFAULT_ACTION_GRACE_MS
};

/** Přehled sestavených testů pro `validate` */
export interface ValidationReport {
  tests: Array<{ name: string; source?: string; states: string[] }>;
  skipped: SkippedTest[];
}

export interface RunReport {
  summary: RunSummary;
  skipped: SkippedTest[];
}

/** Formátovatelná data pro výstup */
export type FormattableData =
  | { type: 'run'; data: RunReport }
  | { type: 'validation'; data: ValidationReport }
  | { type: 'message'; data: string }
  | { type: 'error'; data: string };
