/**
 * Leveled logger with named children and pluggable sinks.
 *
 * Every test gets its own child (`Test.<name>`), so a name filter can narrow
 * console output to a few tests while the file sink still records everything
 * that passes the level check.
 */

import { createWriteStream, type WriteStream } from 'node:fs';
import { colorize, type ColorName } from '../utils/colors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  level: LogLevel;
  name: string;
  message: string;
  timestamp: string;
  meta?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
  /** Sink respects the name filter (console does, the log file does not) */
  filtered?: boolean;
}

export interface Logger {
  readonly name: string;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(name: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_COLOR: Record<LogLevel, ColorName> = {
  debug: 'gray',
  info: 'blue',
  warn: 'yellow',
  error: 'red'
};

function formatEntry(entry: LogEntry): string {
  const meta = entry.meta && Object.keys(entry.meta).length > 0 ? ' ' + JSON.stringify(entry.meta) : '';
  return `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.name}] ${entry.message}${meta}`;
}

/** Konzolový sink - warn/error na stderr, zbytek na stdout */
export const consoleSink: LogSink = {
  filtered: true,
  write(entry) {
    const level = colorize(entry.level.toUpperCase().padEnd(5), LEVEL_COLOR[entry.level]);
    const meta = entry.meta && Object.keys(entry.meta).length > 0 ? ' ' + JSON.stringify(entry.meta) : '';
    const line = `${colorize(entry.timestamp, 'dim')} ${level} ${colorize(entry.name, 'cyan')} ${entry.message}${meta}`;
    if (LEVEL_RANK[entry.level] >= LEVEL_RANK.warn) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
};

let sinks: LogSink[] = [consoleSink];
let minimumLevel: LogLevel = 'info';
let nameFilter: string[] | null = null;

/** Nastaví minimální úroveň logování */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

/**
 * Restricts filtered sinks to the named loggers and their children.
 * `null` removes the filter.
 */
export function setNameFilter(prefixes: string[] | null): void {
  nameFilter = prefixes && prefixes.length > 0 ? prefixes : null;
}

/** Přidá sink a vrátí funkci pro jeho odebrání */
export function addLogSink(sink: LogSink): () => void {
  sinks.push(sink);
  return () => {
    sinks = sinks.filter((s) => s !== sink);
  };
}

/** Nahradí všechny sinky (testy, `--quiet`) */
export function setLogSinks(next: LogSink[]): void {
  sinks = [...next];
}

/** File sink that appends plain (uncoloured) lines. */
export function createFileSink(path: string): LogSink & { close(): Promise<void> } {
  const stream: WriteStream = createWriteStream(path, { flags: 'a' });
  return {
    filtered: false,
    write(entry) {
      stream.write(formatEntry(entry) + '\n');
    },
    close() {
      return new Promise<void>((resolve) => {
        stream.end(() => resolve());
      });
    }
  };
}

function passesNameFilter(name: string): boolean {
  if (nameFilter === null) return true;
  return nameFilter.some((prefix) => name === prefix || name.startsWith(`${prefix}.`));
}

function emit(level: LogLevel, name: string, message: string, meta?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[minimumLevel]) {
    return;
  }

  const entry: LogEntry = {
    level,
    name,
    message,
    timestamp: new Date().toISOString(),
    ...(meta !== undefined && { meta })
  };

  const visible = passesNameFilter(name);
  for (const sink of sinks) {
    if (sink.filtered && !visible) continue;
    try {
      sink.write(entry);
    } catch (error) {
      console.error(`[logger] Sink error while writing "${message}":`, error);
    }
  }
}

/** Vytvoří logger s daným jménem */
export function createLogger(name: string): Logger {
  return {
    name,
    debug: (message, meta) => emit('debug', name, message, meta),
    info: (message, meta) => emit('info', name, message, meta),
    warn: (message, meta) => emit('warn', name, message, meta),
    error: (message, meta) => emit('error', name, message, meta),
    child: (childName) => createLogger(`${name}.${childName}`)
  };
}

/** Kořenový logger procesu */
export const rootLogger = createLogger('protocheck');

/** Logger, který nic nevypisuje */
export const silentLogger: Logger = {
  name: 'silent',
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger
};
