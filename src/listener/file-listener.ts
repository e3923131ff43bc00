import { open, rename, stat, writeFile, access, type FileHandle } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import type { TriggerEvent } from '../types/event.js';
import type { AsyncQueue } from '../utils/async-queue.js';
import { LineSplitter } from './framing.js';
import { Listener, isNotFound, type ListenerOptions } from './listener.js';
import { selectWatchStrategy, type WatchMode, type WatchStrategy } from './watch-strategy.js';

const FILE_MODE = 0o666;
const READ_CHUNK_SIZE = 64 * 1024;

export interface FileListenerOptions extends ListenerOptions {
  watch?: WatchMode | undefined;
  pollIntervalMs?: number | undefined;
  /** Přímo zadaná strategie (testy) */
  strategy?: WatchStrategy | undefined;
}

/**
 * Append-only file listener.
 *
 * Hosts append trigger lines to the destination file. Každá notifikace spustí
 * synchronizaci; synchronizace běží sériově, takže se čtení nepřekrývají.
 */
export class FileListener extends Listener {
  override readonly kind = 'file' as const;
  private readonly strategy: WatchStrategy;
  private handle: FileHandle | null = null;
  private inode: number | null = null;
  private offset = 0;
  private splitter = new LineSplitter();
  private syncChain: Promise<void> = Promise.resolve();
  private watching = false;

  constructor(destination: string, queue: AsyncQueue<TriggerEvent>, options: FileListenerOptions = {}) {
    super(destination, queue, options);
    this.strategy =
      options.strategy ??
      selectWatchStrategy(options.watch ?? 'auto', {
        pollIntervalMs: options.pollIntervalMs,
        logger: this.logger,
      });
  }

  get watchKind(): WatchStrategy['kind'] {
    return this.strategy.kind;
  }

  protected override async open(): Promise<void> {
    await writeFile(this.destination, '', { mode: FILE_MODE });
    this.strategy.start(this.destination, () => {
      void this.scheduleSync();
    });
    this.watching = true;
    await this.scheduleSync();
  }

  protected override async close(): Promise<void> {
    if (this.watching) {
      this.strategy.stop();
      this.watching = false;
    }

    await this.syncChain;
    await this.closeHandle();

    if (await exists(this.destination)) {
      const backup = await findBackupPath(this.destination);
      await rename(this.destination, backup);
      this.logger.debug(`Moved trigger file to ${backup}`);
    }
  }

  /** Zařadí synchronizaci za předchozí; chyby se logují */
  scheduleSync(): Promise<void> {
    this.syncChain = this.syncChain
      .then(() => this.sync())
      .catch((error: unknown) => {
        this.logger.warn(`Trigger file sync failed: ${String(error)}`);
      });
    return this.syncChain;
  }

  private async sync(): Promise<void> {
    let current: Stats;
    try {
      current = await stat(this.destination);
    } catch (error) {
      if (isNotFound(error)) {
        await this.closeHandle();
        return;
      }
      throw error;
    }

    let handle = this.handle;
    if (handle === null || this.inode !== current.ino || current.size < this.offset) {
      await this.closeHandle();
      handle = await open(this.destination, 'r');
      this.handle = handle;
      this.inode = current.ino;
      this.offset = 0;
      this.splitter = new LineSplitter();
    }

    await this.readAvailable(handle);
  }

  private async readAvailable(handle: FileHandle): Promise<void> {
    const buffer = Buffer.alloc(READ_CHUNK_SIZE);

    for (;;) {
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, this.offset);
      if (bytesRead === 0) {
        return;
      }
      this.offset += bytesRead;
      for (const line of this.splitter.push(buffer.subarray(0, bytesRead))) {
        this.enqueueLine(line);
      }
    }
  }

  private async closeHandle(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    this.inode = null;
    if (handle !== null) {
      await handle.close();
    }
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

/** První volná záložní cesta: `<dest>.bak`, `<dest>.bak.1`, ... */
export async function findBackupPath(destination: string): Promise<string> {
  let candidate = `${destination}.bak`;
  for (let i = 1; await exists(candidate); i++) {
    candidate = `${destination}.bak.${i}`;
  }
  return candidate;
}
