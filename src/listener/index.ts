import type { ListenerKind, TriggerEvent } from '../types/event.js';
import type { AsyncQueue } from '../utils/async-queue.js';
import { FileListener, type FileListenerOptions } from './file-listener.js';
import type { Listener } from './listener.js';
import { SocketListener } from './socket-listener.js';

export const LISTENER_EXTENSIONS: Readonly<Record<ListenerKind, string>> = {
  socket: '.sock',
  file: '.txt',
};

/** Vytvoří listener daného druhu */
export function createListener(
  kind: ListenerKind,
  destination: string,
  queue: AsyncQueue<TriggerEvent>,
  options: FileListenerOptions = {},
): Listener {
  return kind === 'file'
    ? new FileListener(destination, queue, options)
    : new SocketListener(destination, queue, { logger: options.logger });
}

export { Listener, ListenerStartError, isNotFound } from './listener.js';
export type { ListenerOptions } from './listener.js';
export { SocketListener } from './socket-listener.js';
export { FileListener, findBackupPath } from './file-listener.js';
export type { FileListenerOptions } from './file-listener.js';
export {
  NativeWatchStrategy,
  PollingWatchStrategy,
  selectWatchStrategy,
  DEFAULT_POLL_INTERVAL_MS,
} from './watch-strategy.js';
export type { WatchMode, WatchStrategy, WatchStrategyOptions } from './watch-strategy.js';
export { parseTriggerLine, LineSplitter } from './framing.js';
