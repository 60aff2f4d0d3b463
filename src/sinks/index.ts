/**
 * Chat Archiver — Sink Factory
 */

import type { OutputConfig } from '../config/types.js';
import { ElasticLogSink } from './elastic.js';
import { IrcLogSink } from './irc.js';
import { JsonLogSink } from './json.js';
import { openLogStream } from './stream.js';
import type { LogSink } from './types.js';

export function createSink(output: OutputConfig): LogSink {
  switch (output.kind) {
    case 'irc':
      return new IrcLogSink(openLogStream(output.rotation));
    case 'json':
      return new JsonLogSink(openLogStream(output.rotation));
    case 'elastic':
      return new ElasticLogSink({
        address: output.address,
        apiKey: output.apiKey,
        indices: output.indices,
      });
  }
}

export type { LogSink, LogStream } from './types.js';
