/**
 * CLI konfigurace - načítání a správa konfiguračního souboru.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import type { CliConfig } from '../types.js';
import { DEFAULT_CLI_CONFIG, OUTPUT_FORMATS } from '../types.js';
import { FileNotFoundError, ValidationError } from './errors.js';
import { isRecord } from '../../dsl/helpers/validators.js';
import { LOG_LEVELS } from '../../logging/logger.js';

export const CONFIG_FILENAME = '.protocheck.json';

const LISTENER_TYPES = ['socket', 'file'] as const;
const WATCH_MODES = ['native', 'polling', 'auto'] as const;

/** Hledá konfigurační soubor v hierarchii adresářů */
export function findConfigFile(startDir: string, home: string = homedir()): string | null {
  let currentDir = startDir;

  while (true) {
    const configPath = join(currentDir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = resolve(currentDir, '..');
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  // Zkus home adresář
  const homeConfig = join(home, CONFIG_FILENAME);
  if (existsSync(homeConfig)) {
    return homeConfig;
  }

  return null;
}

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

class ConfigReader {
  constructor(private readonly filePath: string) {}

  section(root: Record<string, unknown>, key: string): Record<string, unknown> {
    const value = root[key];
    if (value === undefined) return {};
    if (!isRecord(value)) {
      throw this.invalid(key, 'must be an object');
    }
    return value;
  }

  boolean(obj: Record<string, unknown>, key: string, path: string, fallback: boolean): boolean {
    const value = obj[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') throw this.invalid(path, 'must be a boolean');
    return value;
  }

  number(obj: Record<string, unknown>, key: string, path: string, fallback: number): number {
    const value = obj[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      throw this.invalid(path, 'must be a positive number');
    }
    return value;
  }

  string(obj: Record<string, unknown>, key: string, path: string, fallback: string): string {
    const value = obj[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'string' || value.length === 0) throw this.invalid(path, 'must be a non-empty string');
    return value;
  }

  oneOf<T extends string>(
    obj: Record<string, unknown>,
    key: string,
    path: string,
    allowed: readonly T[],
    fallback: T,
  ): T {
    const value = obj[key];
    if (value === undefined) return fallback;
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      throw this.invalid(path, `must be one of ${allowed.join(', ')}`);
    }
    return match;
  }

  private invalid(path: string, message: string): ValidationError {
    return new ValidationError(`Invalid configuration in ${this.filePath}: ${path} ${message}`);
  }
}

/** Parsuje JSON konfiguraci a slije ji s výchozími hodnotami */
export function parseConfig(content: string, filePath: string, base: CliConfig = DEFAULT_CLI_CONFIG): CliConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`Invalid configuration in ${filePath}: ${message}`);
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(`Invalid configuration in ${filePath}: Configuration must be an object`);
  }

  const read = new ConfigReader(filePath);
  const listener = read.section(parsed, 'listener');
  const rules = read.section(parsed, 'rules');
  const output = read.section(parsed, 'output');
  const log = read.section(parsed, 'log');
  const logFile = log['file'];
  if (logFile !== undefined && logFile !== null && typeof logFile !== 'string') {
    throw new ValidationError(`Invalid configuration in ${filePath}: log.file must be a string or null`);
  }

  return {
    listener: {
      dir: read.string(listener, 'dir', 'listener.dir', base.listener.dir),
      type: read.oneOf(listener, 'type', 'listener.type', LISTENER_TYPES, base.listener.type),
      watch: read.oneOf(listener, 'watch', 'listener.watch', WATCH_MODES, base.listener.watch),
      pollIntervalMs: read.number(listener, 'pollIntervalMs', 'listener.pollIntervalMs', base.listener.pollIntervalMs)
    },
    rules: {
      allowCode: read.boolean(rules, 'allowCode', 'rules.allowCode', base.rules.allowCode),
      codeTimeoutMs: read.number(rules, 'codeTimeoutMs', 'rules.codeTimeoutMs', base.rules.codeTimeoutMs),
      lenient: read.boolean(rules, 'lenient', 'rules.lenient', base.rules.lenient)
    },
    output: {
      format: read.oneOf(output, 'format', 'output.format', OUTPUT_FORMATS, base.output.format),
      colors: read.boolean(output, 'colors', 'output.colors', base.output.colors),
      detailed: read.boolean(output, 'detailed', 'output.detailed', base.output.detailed)
    },
    log: {
      level: read.oneOf(log, 'level', 'log.level', LOG_LEVELS, base.log.level),
      file: logFile === undefined ? base.log.file : logFile
    },
    hostTemplate: read.string(parsed, 'hostTemplate', 'hostTemplate', base.hostTemplate),
    actionGraceMs: read.number(parsed, 'actionGraceMs', 'actionGraceMs', base.actionGraceMs)
  };
}

/** Cache pro načtenou konfiguraci */
let cachedConfig: CliConfig | null = null;
let cachedConfigPath: string | null = null;

/**
 * Načte CLI konfiguraci.
 *
 * Priorita:
 * 1. Explicitně zadaná cesta
 * 2. Konfigurační soubor v aktuálním adresáři nebo jeho rodičích
 * 3. Konfigurační soubor v home adresáři
 * 4. Výchozí konfigurace
 */
export function loadConfig(explicitPath?: string): CliConfig {
  const pathToLoad = explicitPath ? resolve(explicitPath) : findConfigFile(process.cwd());

  // Vrať cached konfiguraci pokud je stejná cesta
  if (cachedConfig && cachedConfigPath === pathToLoad) {
    return cachedConfig;
  }

  if (!pathToLoad) {
    cachedConfig = DEFAULT_CLI_CONFIG;
    cachedConfigPath = null;
    return cachedConfig;
  }

  if (!existsSync(pathToLoad)) {
    if (explicitPath) {
      throw new FileNotFoundError(pathToLoad);
    }
    cachedConfig = DEFAULT_CLI_CONFIG;
    cachedConfigPath = null;
    return cachedConfig;
  }

  const content = readFileSync(pathToLoad, 'utf-8');
  cachedConfig = parseConfig(content, pathToLoad);
  cachedConfigPath = pathToLoad;

  return cachedConfig;
}

/** Resetuje cache konfigurace (pro testování) */
export function resetConfigCache(): void {
  cachedConfig = null;
  cachedConfigPath = null;
}

/** Vrátí cestu k načtené konfiguraci */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}
