/**
 * Chat Archiver — Backfill
 *
 * Replays archived wire-format logs into Elasticsearch `_bulk` files:
 * each kept line becomes a `create` header plus its document. Lines
 * that cannot be indexed deterministically (no id or no sent timestamp)
 * are skipped, and ids compacted by older archives are expanded back to
 * canonical form.
 */

import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import type { BackfillConfig } from '../config/types.js';
import { compressMessage } from '../irc/compress.js';
import { isIgnoredCommand } from '../irc/filter.js';
import { IdRepairError, REPLY_ID_TAGS, repairId } from '../irc/ids.js';
import { parseMessage } from '../irc/message.js';
import { hasTag, literalTag, unescapeTag, type Tag } from '../irc/tags.js';
import { projectRecord, toDocument, type ProjectOptions } from '../record/project.js';
import { createLogger } from '../utils/logger.js';
import { BulkChunker, type WriteFileFn } from './chunker.js';

const log = createLogger('Backfill');

export interface BackfillDeps {
  /** Defaults to the configured input file, or stdin. */
  input?: NodeJS.ReadableStream;
  writeFile?: WriteFileFn;
  project?: ProjectOptions;
}

export interface BackfillSummary {
  lines: number;
  written: number;
  skipped: number;
  files: string[];
}

function repairReplyTag(tag: Tag): Tag {
  const [key, value] = tag;
  if (!REPLY_ID_TAGS.has(key)) return tag;

  const text = unescapeTag(value);
  if (text.length === 36) return tag;
  return [key, literalTag(repairId(text))];
}

/**
 * Turn one archived line into a two-line bulk unit, or `undefined` when
 * the line is skipped. Throws IdRepairError for undecodable ids.
 */
export function toBulkUnit(
  line: string,
  config: Pick<BackfillConfig, 'index' | 'dontFilter'>,
  project: ProjectOptions = {}
): string | undefined {
  const message = parseMessage(line);

  if (message.command === '') {
    log.warn('Failed to parse line', { line });
    return undefined;
  }
  if (!config.dontFilter && isIgnoredCommand(message.command)) return undefined;

  // Without both there is no stable document to create
  if (!hasTag(message.tags, 'tmi-sent-ts') || !hasTag(message.tags, 'id')) return undefined;

  compressMessage(message);
  message.tags = message.tags.map(repairReplyTag);

  const record = projectRecord(message, project);
  const id = repairId(record.id);

  const header = JSON.stringify({ create: { _index: config.index, _id: id } });
  return `${header}\n${JSON.stringify(toDocument(record))}\n`;
}

export async function runBackfill(config: BackfillConfig, deps: BackfillDeps = {}): Promise<BackfillSummary> {
  const input = deps.input ?? (config.input ? createReadStream(config.input) : process.stdin);
  const reader = createInterface({ input, crlfDelay: Infinity });
  const chunker = new BulkChunker({
    pattern: config.output,
    chunkSize: config.chunkSize,
    writeFile: deps.writeFile,
  });

  const summary: BackfillSummary = { lines: 0, written: 0, skipped: 0, files: chunker.files };

  log.info('Backfill starting', {
    input: config.input ?? 'stdin',
    output: config.output,
    index: config.index,
    chunkSize: config.chunkSize ?? 'unbounded',
  });

  for await (const line of reader) {
    if (line.trim().length === 0) continue;
    summary.lines++;

    let unit: string | undefined;
    try {
      unit = toBulkUnit(line, config, deps.project);
    } catch (error) {
      if (!(error instanceof IdRepairError)) throw error;
      log.warn('Skipping line with unrepairable id', { value: error.value });
    }

    if (unit === undefined) {
      summary.skipped++;
      continue;
    }

    await chunker.append(unit);
    summary.written++;
  }

  await chunker.finish();

  log.info('Backfill finished', {
    lines: summary.lines,
    written: summary.written,
    skipped: summary.skipped,
    files: summary.files.length,
  });

  return summary;
}
