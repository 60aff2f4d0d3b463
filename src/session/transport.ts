/**
 * Chat Archiver — Chat Transport
 *
 * Line-oriented view of the TLS connection to the chat endpoint. The
 * session only sees `connect()`, an async stream of lines, `send()` and
 * `close()`, so tests can substitute an in-process connection.
 */

import tls from 'node:tls';
import { createInterface } from 'node:readline';
import { createLogger } from '../utils/logger.js';
import { writeChunk } from '../utils/output.js';

const log = createLogger('Transport');

// ============================================================================
// TYPES
// ============================================================================

export interface LineConnection {
  /** Lines without terminators. Ends when the peer closes; throws on socket errors. */
  lines(): AsyncIterable<string>;
  send(line: string): Promise<void>;
  close(): void;
}

export interface Transport {
  connect(): Promise<LineConnection>;
}

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export interface TlsTransportOptions {
  host: string;
  port: number;
  /** Destroy the socket after this long without receiving data. */
  idleTimeoutMs: number;
}

// ============================================================================
// TLS
// ============================================================================

class SocketConnection implements LineConnection {
  private failure: Error | undefined;

  constructor(private readonly socket: tls.TLSSocket) {
    // Keep the first socket error until the reader reports it
    socket.on('error', (error: Error) => {
      this.failure ??= error;
    });
  }

  async *lines(): AsyncGenerator<string> {
    // A socket destroyed before reading starts never emits 'close' again
    if (!this.socket.destroyed) {
      yield* this.readLines();
    }

    if (this.failure) {
      throw new TransportError(`Connection failed: ${this.failure.message}`, { cause: this.failure });
    }
  }

  private async *readLines(): AsyncGenerator<string> {
    const reader = createInterface({ input: this.socket, crlfDelay: Infinity });
    const onClose = () => reader.close();
    this.socket.once('close', onClose);

    try {
      for await (const line of reader) {
        if (line.length > 0) yield line;
      }
    } catch (error) {
      this.failure ??= error instanceof Error ? error : new Error(String(error));
    } finally {
      this.socket.off('close', onClose);
      reader.close();
    }
  }

  async send(line: string): Promise<void> {
    try {
      await writeChunk(this.socket, line + '\r\n');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Send failed: ${message}`, { cause: error });
    }
  }

  close(): void {
    this.socket.destroy();
  }
}

export function createTlsTransport(options: TlsTransportOptions): Transport {
  const { host, port, idleTimeoutMs } = options;

  return {
    connect: () => new Promise<LineConnection>((resolve, reject) => {
      log.debug('Opening TLS connection', { host, port });

      const socket = tls.connect({ host, port, servername: host });
      socket.setEncoding('utf-8');

      const onError = (error: Error) => {
        socket.destroy();
        reject(new TransportError(`Failed to connect to ${host}:${port}: ${error.message}`, { cause: error }));
      };
      socket.once('error', onError);

      socket.once('secureConnect', () => {
        socket.off('error', onError);
        socket.setTimeout(idleTimeoutMs, () => {
          socket.destroy(new Error(`no data received for ${idleTimeoutMs}ms`));
        });
        resolve(new SocketConnection(socket));
      });
    }),
  };
}
