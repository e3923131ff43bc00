import { watch, watchFile, unwatchFile, type FSWatcher } from 'node:fs';
import { basename, dirname } from 'node:path';
import type { Logger } from '../logging/logger.js';

export type WatchMode = 'native' | 'polling' | 'auto';

export const DEFAULT_POLL_INTERVAL_MS = 100;

/** Zdroj notifikací o změně sledovaného souboru */
export interface WatchStrategy {
  readonly kind: 'native' | 'polling';
  start(path: string, onChange: () => void): void;
  stop(): void;
}

/**
 * Native watching via `fs.watch` on the parent directory, filtered to the
 * file name. Watching the directory keeps working when the file is replaced.
 */
export class NativeWatchStrategy implements WatchStrategy {
  readonly kind = 'native' as const;
  private watcher: FSWatcher | null = null;

  constructor(private readonly logger?: Logger) {}

  start(path: string, onChange: () => void): void {
    const name = basename(path);
    const watcher = watch(dirname(path), (_event, filename) => {
      if (filename === null || filename.toString() === name) {
        onChange();
      }
    });
    watcher.on('error', (error) => {
      this.logger?.warn(`File watcher error: ${error.message}`);
    });
    this.watcher = watcher;
  }

  stop(): void {
    this.watcher?.close();
    this.watcher = null;
  }
}

/**
 * Stat polling. Works on every platform and filesystem, at the cost of
 * `intervalMs` latency.
 */
export class PollingWatchStrategy implements WatchStrategy {
  readonly kind = 'polling' as const;
  private path: string | null = null;
  private listener: (() => void) | null = null;

  constructor(private readonly intervalMs: number = DEFAULT_POLL_INTERVAL_MS) {}

  start(path: string, onChange: () => void): void {
    const listener = (): void => onChange();
    watchFile(path, { interval: this.intervalMs, persistent: true }, listener);
    this.path = path;
    this.listener = listener;
  }

  stop(): void {
    if (this.path !== null && this.listener !== null) {
      unwatchFile(this.path, this.listener);
    }
    this.path = null;
    this.listener = null;
  }
}

export interface WatchStrategyOptions {
  pollIntervalMs?: number | undefined;
  platform?: NodeJS.Platform | undefined;
  logger?: Logger | undefined;
}

/**
 * `auto` volí polling na macOS a Windows, kde nativní notifikace
 * nespolehlivě hlásí append do souboru, jinde nativní sledování.
 */
export function selectWatchStrategy(mode: WatchMode, options: WatchStrategyOptions = {}): WatchStrategy {
  const platform = options.platform ?? process.platform;
  const resolved = mode === 'auto' ? (platform === 'darwin' || platform === 'win32' ? 'polling' : 'native') : mode;

  return resolved === 'polling'
    ? new PollingWatchStrategy(options.pollIntervalMs)
    : new NativeWatchStrategy(options.logger);
}
