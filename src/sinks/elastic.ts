/**
 * Chat Archiver — Elasticsearch Sink
 *
 * Indexes each message with its own `_create` request so a replayed
 * message is rejected as a conflict instead of duplicated. Failures are
 * logged and the message is dropped; archiving carries on.
 */

import type { IrcMessage } from '../irc/message.js';
import { projectRecord, toDocument, type ProjectOptions } from '../record/project.js';
import type { LogRecord } from '../record/types.js';
import { createLogger } from '../utils/logger.js';
import type { LogSink } from './types.js';

const log = createLogger('Elastic');

const REQUEST_TIMEOUT_MS = 30_000;

export type IndexOutcome = 'created' | 'exists' | 'failed' | 'unmapped';

export interface ElasticSinkOptions {
  /** Base address, without trailing slash. */
  address: string;
  apiKey: string;
  /** Channel → index name. */
  indices: Map<string, string>;
  project?: ProjectOptions;
}

export class ElasticLogSink implements LogSink {
  private readonly address: string;
  private readonly headers: Record<string, string>;
  private readonly indices: Map<string, string>;
  private readonly projectOptions: ProjectOptions;

  constructor(options: ElasticSinkOptions) {
    this.address = options.address.replace(/\/$/, '');
    this.headers = {
      'Authorization': `ApiKey ${options.apiKey}`,
      'Content-Type': 'application/json',
    };
    this.indices = options.indices;
    this.projectOptions = options.project ?? {};
  }

  async write(message: IrcMessage): Promise<void> {
    await this.index(projectRecord(message, this.projectOptions));
  }

  async close(): Promise<void> {
    // Nothing buffered: every write is its own request
  }

  /**
   * Create the record's document. Never throws.
   */
  async index(record: LogRecord): Promise<IndexOutcome> {
    const { id, channel } = record;

    const index = channel !== undefined ? this.indices.get(channel) : undefined;
    if (index === undefined) {
      log.warn('No index mapping for message, dropping it', { id, channel, cmd: record.irc.cmd });
      return 'unmapped';
    }

    const url = `${this.address}/${index}/_create/${encodeURIComponent(id)}`;
    const body = JSON.stringify(toDocument(record));

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: this.headers,
        body,
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (error) {
      log.error('Failed to send log to index', {
        id,
        error: error instanceof Error ? error.message : String(error),
      });
      return 'failed';
    }

    if (response.ok) return 'created';

    if (response.status === 409) {
      log.info('Message already exists in index', { id });
      return 'exists';
    }

    const responseBody = await response.text().catch(() => '<failed to read response body>');
    log.error(`Failed to send log to index (status ${response.status})`, {
      id,
      response: responseBody,
      message: body,
    });
    return 'failed';
  }
}
