/**
 * Chat Archiver — NDJSON Sink
 *
 * One document per line, prefixed with its `_id` so lines stay
 * self-identifying outside of a bulk request.
 */

import type { IrcMessage } from '../irc/message.js';
import { projectRecord, toDocument, type ProjectOptions } from '../record/project.js';
import type { LogRecord } from '../record/types.js';
import { writeChunk } from '../utils/output.js';
import type { LogSink, LogStream } from './types.js';

export function serializeRecord(record: LogRecord): string {
  return JSON.stringify({ _id: record.id, ...toDocument(record) });
}

export class JsonLogSink implements LogSink {
  constructor(
    private readonly output: LogStream,
    private readonly projectOptions: ProjectOptions = {}
  ) {}

  write(message: IrcMessage): Promise<void> {
    const record = projectRecord(message, this.projectOptions);
    return writeChunk(this.output.stream, serializeRecord(record) + '\n');
  }

  close(): Promise<void> {
    return this.output.close();
  }
}
