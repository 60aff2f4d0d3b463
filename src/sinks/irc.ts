/**
 * Chat Archiver — Wire-Format Sink
 */

import { writeMessage, type IrcMessage } from '../irc/message.js';
import { writeChunk } from '../utils/output.js';
import type { LogSink, LogStream } from './types.js';

export class IrcLogSink implements LogSink {
  constructor(private readonly output: LogStream) {}

  write(message: IrcMessage): Promise<void> {
    return writeChunk(this.output.stream, writeMessage(message) + '\n');
  }

  close(): Promise<void> {
    return this.output.close();
  }
}
