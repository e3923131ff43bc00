import { createServer, type Server, type Socket } from 'node:net';
import { chmod, lstat, rm, unlink } from 'node:fs/promises';
import { LineSplitter } from './framing.js';
import { Listener, isNotFound } from './listener.js';

const SOCKET_MODE = 0o777;

/**
 * Unix domain socket listener.
 *
 * Hosts connect to the socket path and write trigger lines. Each connection
 * has its own line buffer; an unterminated tail is dropped when the peer
 * closes.
 */
export class SocketListener extends Listener {
  override readonly kind = 'socket' as const;
  private server: Server | null = null;
  private readonly connections = new Set<Socket>();

  protected override async open(): Promise<void> {
    await removeStalePath(this.destination);

    const server = createServer((socket) => this.handleConnection(socket));
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      server.once('error', onError);
      server.listen(this.destination, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (error) => {
      this.logger.error(`Socket server error: ${error.message}`);
    });

    await chmod(this.destination, SOCKET_MODE);
  }

  protected override async close(): Promise<void> {
    const server = this.server;
    this.server = null;

    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    if (server !== null && server.listening) {
      await new Promise<void>((resolve) => {
        server.close((error) => {
          if (error) {
            this.logger.debug(`Socket server close: ${error.message}`);
          }
          resolve();
        });
      });
    }

    try {
      await unlink(this.destination);
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.warn(`Could not remove socket ${this.destination}: ${String(error)}`);
      }
    }
  }

  private handleConnection(socket: Socket): void {
    this.connections.add(socket);
    const splitter = new LineSplitter();
    this.logger.debug('Host connected');

    socket.on('data', (chunk: Buffer) => {
      for (const line of splitter.push(chunk)) {
        this.enqueueLine(line);
      }
    });

    socket.on('end', () => {
      const dropped = splitter.end();
      if (dropped.trim().length > 0) {
        this.logger.debug(`Dropping unterminated trigger data: ${JSON.stringify(dropped)}`);
      }
    });

    socket.on('error', (error) => {
      this.logger.warn(`Connection error: ${error.message}`);
    });

    socket.on('close', () => {
      this.connections.delete(socket);
    });
  }
}

/** Odstraní soubor nebo adresář, který na cestě zůstal z minulého běhu */
async function removeStalePath(path: string): Promise<void> {
  try {
    const stats = await lstat(path);
    await rm(path, { recursive: stats.isDirectory(), force: true });
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
}
