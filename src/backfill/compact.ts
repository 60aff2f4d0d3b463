/**
 * Chat Archiver — Compact
 *
 * Rewrites an archived wire log through the normalizer with id
 * compaction on. The output is what backfill's id repair reads back.
 */

import { createReadStream, createWriteStream } from 'node:fs';
import { once } from 'node:events';
import { createInterface } from 'node:readline';
import { compressMessage } from '../irc/compress.js';
import { parseMessage, writeMessage } from '../irc/message.js';
import { createLogger } from '../utils/logger.js';
import { writeChunk } from '../utils/output.js';

const log = createLogger('Compact');

export interface CompactOptions {
  input?: string;
  output?: string;
}

export interface CompactStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export interface CompactSummary {
  lines: number;
  written: number;
  skipped: number;
}

export async function runCompact(options: CompactOptions, streams: CompactStreams = {}): Promise<CompactSummary> {
  const fileOutput = !streams.output && options.output ? createWriteStream(options.output) : undefined;
  if (fileOutput) {
    // Later failures reach the caller through the write callbacks
    fileOutput.on('error', (error) => log.debug('Output stream failed', { error }));
    await once(fileOutput, 'open');
  }

  const input = streams.input ?? (options.input ? createReadStream(options.input) : process.stdin);
  const output = streams.output ?? fileOutput ?? process.stdout;

  const reader = createInterface({ input, crlfDelay: Infinity });
  const summary: CompactSummary = { lines: 0, written: 0, skipped: 0 };

  try {
    for await (const line of reader) {
      if (line.trim().length === 0) continue;
      summary.lines++;

      const message = parseMessage(line);
      if (message.command === '') {
        log.warn('Failed to parse line', { line });
        summary.skipped++;
        continue;
      }

      compressMessage(message, { compactIds: true });
      await writeChunk(output, writeMessage(message) + '\n');
      summary.written++;
    }
  } finally {
    if (fileOutput && !fileOutput.destroyed) {
      await new Promise<void>((resolve) => fileOutput.end(() => resolve()));
    }
  }

  log.info('Compact finished', { ...summary });
  return summary;
}
