/**
 * Hlavní CLI setup pomocí CAC.
 */

import { cac } from 'cac';
import { version } from './version.js';
import { OUTPUT_FORMATS, type CliConfig, type GlobalOptions, type OutputFormat } from './types.js';
import { loadConfig } from './utils/config.js';
import { setOutputOptions, printError, print } from './utils/output.js';
import { getExitCode, formatError, InvalidArgumentsError } from './utils/errors.js';
import { validateCommand, type ValidateOptions } from './commands/validate.js';
import { runCommand, type RunCommandOptions } from './commands/run.js';
import type { BuildOverrides } from './commands/shared.js';
import type { WatchMode } from '../listener/watch-strategy.js';

type RawOptions = Record<string, unknown>;

const WATCH_MODES: readonly WatchMode[] = ['native', 'polling', 'auto'];
const MAX_SEED = 2 ** 32 - 1;

/** CLI instance */
const cli = cac('protocheck');

/**
 * Promise z běžící async akce.
 * CAC neawaituje async action handlery, musíme to udělat sami.
 */
let _actionPromise: Promise<void> | undefined;

/** Obalí async action handler tak, aby se jeho Promise dala awaitovat v run(). */
function tracked<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => void {
  return (...args: T) => {
    _actionPromise = fn(...args).catch((err: unknown) => {
      printError(formatError(err));
      process.exit(getExitCode(err));
    });
  };
}

// ---------------------------------------------------------------------------
// Čtení options
// ---------------------------------------------------------------------------

function optString(options: RawOptions, key: string): string | undefined {
  const value = options[key];
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new InvalidArgumentsError(`--${key} expects a single value`);
}

function optFlag(options: RawOptions, key: string): boolean {
  return options[key] === true;
}

function optList(options: RawOptions, key: string): string[] {
  const value = options[key];
  const items = Array.isArray(value) ? value : value === undefined ? [] : [value];
  return items
    .flatMap((item) => String(item).split(','))
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function optSeed(options: RawOptions): number | undefined {
  const raw = optString(options, 'seed');
  if (raw === undefined) return undefined;
  const seed = Number(raw);
  if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
    throw new InvalidArgumentsError(`--seed must be an integer between 0 and ${MAX_SEED}, got: ${raw}`);
  }
  return seed;
}

function optOneOf<T extends string>(options: RawOptions, key: string, allowed: readonly T[]): T | undefined {
  const raw = optString(options, key);
  if (raw === undefined) return undefined;
  const match = allowed.find((candidate) => candidate === raw);
  if (match === undefined) {
    throw new InvalidArgumentsError(`--${key} must be one of: ${allowed.join(', ')}, got: ${raw}`);
  }
  return match;
}

/** Zpracuje globální options */
function processGlobalOptions(options: RawOptions): { global: GlobalOptions; config: CliConfig } {
  const configPath = optString(options, 'config');
  const config = loadConfig(configPath);

  const format: OutputFormat = optOneOf(options, 'format', OUTPUT_FORMATS) ?? config.output.format;
  const quiet = optFlag(options, 'quiet');
  // `--no-color` nastaví `color: false`
  const noColor = options['color'] === false || !config.output.colors;

  setOutputOptions({ format, quiet, noColor });

  return {
    global: { format, quiet, noColor, config: configPath },
    config
  };
}

/** Registruje globální options */
function registerGlobalOptions(): void {
  cli
    .option('-f, --format <format>', 'Output format: json, pretty')
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Path to config file');
}

// ---------------------------------------------------------------------------
// Příkazy
// ---------------------------------------------------------------------------

/** Registruje příkaz version */
function registerVersionCommand(): void {
  cli.command('version', 'Show version information').action(() => {
    print(`protocheck v${version}`);
  });
}

function registerBuildOptions(command: ReturnType<typeof cli.command>): void {
  command
    .option('--listener-dir <dir>', 'Directory for listener sockets and files')
    .option('--use-files', 'Use file listeners instead of Unix sockets')
    .option('--watch <mode>', 'File watch mode: native, polling, auto')
    .option('--suffix <suffix>', 'Suffix appended to test names')
    .option('--seed <seed>', 'Seed for random state order')
    .option('--allow-code', 'Allow code conditions')
    .option('--lenient', 'Treat unknown conditions as never matching');
}

function buildOverrides(options: RawOptions): BuildOverrides {
  return {
    listenerDir: optString(options, 'listenerDir'),
    useFiles: optFlag(options, 'useFiles'),
    watch: optOneOf(options, 'watch', WATCH_MODES),
    suffix: optString(options, 'suffix'),
    seed: optSeed(options),
    allowCode: optFlag(options, 'allowCode'),
    lenient: optFlag(options, 'lenient')
  };
}

/** Registruje příkaz validate */
function registerValidateCommand(): void {
  const command = cli.command('validate <source>', 'Validate test files without running them');
  registerBuildOptions(command);
  command.action(tracked(async (source: string, options: RawOptions) => {
    const { global, config } = processGlobalOptions(options);
    const validateOptions: ValidateOptions = {
      ...global,
      ...buildOverrides(options)
    };
    await validateCommand(source, validateOptions, config);
  }));
}

/** Registruje příkaz run */
function registerRunCommand(): void {
  const command = cli.command('run <source>', 'Run conformance tests from a file or directory');
  registerBuildOptions(command);
  command
    .option('--filter <names>', 'Only log output of these tests (comma-separated)')
    .option('-o, --output <file>', 'Write log to file')
    .option('--detailed', 'Show every rule in state reports')
    .option('--debug', 'Enable debug logging')
    .action(tracked(async (source: string, options: RawOptions) => {
      const { global, config } = processGlobalOptions(options);
      const detailed = optFlag(options, 'detailed');
      const runOptions: RunCommandOptions = {
        ...global,
        ...buildOverrides(options),
        ...(detailed && { detailed }),
        filter: optList(options, 'filter'),
        output: optString(options, 'output'),
        debug: optFlag(options, 'debug')
      };
      await runCommand(source, runOptions, config);
    }));
}

/** Inicializuje a spustí CLI */
export async function run(args: string[] = process.argv): Promise<void> {
  registerGlobalOptions();
  registerVersionCommand();
  registerValidateCommand();
  registerRunCommand();

  cli.help();
  cli.version(version);

  try {
    cli.parse(args);
    if (_actionPromise) {
      await _actionPromise;
    }
  } catch (err) {
    printError(formatError(err));
    process.exit(getExitCode(err));
  }
}

export { cli };
