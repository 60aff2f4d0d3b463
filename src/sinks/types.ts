/**
 * Chat Archiver — Sink Interface
 *
 * A sink receives every archived message. The kind (wire log, JSON,
 * index backend) is picked once at startup.
 */

import type { IrcMessage } from '../irc/message.js';

export interface LogSink {
  write(message: IrcMessage): Promise<void>;
  /** Flush and release the underlying output. */
  close(): Promise<void>;
}

export interface LogStream {
  readonly stream: NodeJS.WritableStream;
  close(): Promise<void>;
}
