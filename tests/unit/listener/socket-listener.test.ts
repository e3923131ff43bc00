import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { createConnection } from 'node:net';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SocketListener } from '../../../src/listener/socket-listener.js';
import { ListenerStartError } from '../../../src/listener/listener.js';
import { AsyncQueue } from '../../../src/utils/async-queue.js';
import type { TriggerEvent } from '../../../src/types/event.js';

function send(path: string, ...chunks: string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    const socket = createConnection(path, () => {
      const last = chunks.pop() ?? '';
      for (const chunk of chunks) {
        socket.write(chunk);
      }
      socket.end(last, () => resolve());
    });
    socket.on('error', reject);
  });
}

function take(queue: AsyncQueue<TriggerEvent>): Promise<TriggerEvent> {
  return queue.take(AbortSignal.timeout(2000));
}

describe('SocketListener', () => {
  let dir: string;
  let path: string;
  let queue: AsyncQueue<TriggerEvent>;
  let listener: SocketListener;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'pc-sock-'));
    path = join(dir, 'test.sock');
    queue = new AsyncQueue<TriggerEvent>();
    listener = new SocketListener(path, queue);
  });

  afterEach(async () => {
    await listener.stop();
    await rm(dir, { recursive: true, force: true });
  });

  it('enqueues every complete line', async () => {
    await listener.start();
    await send(path, 'Status OK\nCode   200  \n');

    expect(await take(queue)).toEqual({ attribute: 'Status', value: 'OK' });
    expect(await take(queue)).toEqual({ attribute: 'Code', value: '200' });
  });

  it('joins lines split across writes', async () => {
    await listener.start();
    await send(path, 'Sta', 'tus O', 'K\n');

    expect(await take(queue)).toEqual({ attribute: 'Status', value: 'OK' });
  });

  it('drops an unterminated tail and malformed lines', async () => {
    await listener.start();
    await send(path, 'Lonely\nPartial 1');
    await send(path, 'Next 2\n');

    expect(await take(queue)).toEqual({ attribute: 'Next', value: '2' });
    expect(queue.size).toBe(0);
  });

  it('replaces a stale file at the socket path', async () => {
    await writeFile(path, 'stale');

    await listener.start();

    expect(listener.isReady).toBe(true);
    await send(path, 'Status OK\n');
    expect(await take(queue)).toEqual({ attribute: 'Status', value: 'OK' });
  });

  it('removes the socket on stop and stops only once', async () => {
    await listener.start();
    expect(existsSync(path)).toBe(true);

    await listener.stop();
    await listener.stop();

    expect(existsSync(path)).toBe(false);
  });

  it('fails to start in a missing directory', async () => {
    const broken = new SocketListener(join(dir, 'missing', 'test.sock'), queue);

    await expect(broken.start()).rejects.toBeInstanceOf(ListenerStartError);
    expect(broken.isReady).toBe(false);
    await broken.stop();
  });

  it('cannot be started twice', async () => {
    await listener.start();

    await expect(listener.start()).rejects.toThrow('listener already started');
  });
});
