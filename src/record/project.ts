/**
 * Chat Archiver — Record Projection
 *
 * Converts a (normalized) IRC message into a typed LogRecord:
 * badge tags become nested maps, `id` / `tmi-sent-ts` / `display-name`
 * move into dedicated fields, every other tag is type-coerced.
 */

import { randomUUID } from 'node:crypto';
import type { IrcMessage } from '../irc/message.js';
import { unescapeTag } from '../irc/tags.js';
import { classifyCommands, type CommandClassifier } from './commands.js';
import type { BadgeMap, LogDocument, LogRecord, TagJson } from './types.js';

export interface ProjectOptions {
  classify?: CommandClassifier;
  generateId?: () => string;
  now?: () => number;
}

const BADGE_TAGS: ReadonlySet<string> = new Set(['badges', 'badge-info']);

/** Tags whose key ends with this hold opaque ids and stay strings. */
const ID_SUFFIX = '-id';

const INTEGER = /^[+-]?\d+$/;

/**
 * Parse a base-10 integer. Values outside the safe integer range are
 * rejected so large opaque numbers are never rounded.
 */
export function parseInteger(text: string): number | undefined {
  if (!INTEGER.test(text)) return undefined;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * `subscriber/12,premium/1` → `{ subscriber: 12, premium: 1 }`
 */
export function parseBadges(text: string): BadgeMap {
  const badges = new Map<string, number | string>();
  for (const entry of text.split(',')) {
    const slash = entry.indexOf('/');
    if (slash === -1) {
      badges.set(entry, '');
    } else {
      const value = entry.slice(slash + 1);
      badges.set(entry.slice(0, slash), parseInteger(value) ?? value);
    }
  }
  return Object.fromEntries(badges);
}

export function coerceTagValue(key: string, text: string): TagJson {
  if (key.endsWith(ID_SUFFIX)) return text;
  if (text === '1') return true;
  return parseInteger(text) ?? text;
}

export function projectRecord(message: IrcMessage, options: ProjectOptions = {}): LogRecord {
  const {
    classify = classifyCommands,
    generateId = randomUUID,
    now = Date.now,
  } = options;

  const tags = new Map<string, TagJson>();
  let id: string | undefined;
  let sentTs: string | undefined;
  let displayName: string | undefined;

  // Later duplicates overwrite earlier ones
  for (const [key, value] of message.tags) {
    const text = unescapeTag(value);
    if (BADGE_TAGS.has(key)) {
      tags.set(key, parseBadges(text));
    } else if (key === 'id') {
      id = text;
    } else if (key === 'tmi-sent-ts') {
      sentTs = text;
    } else if (key === 'display-name') {
      displayName = text;
    } else {
      tags.set(key, coerceTagValue(key, text));
    }
  }

  const { params, prefix, command } = message;

  const first = params[0];
  const channel = first !== undefined && first.startsWith('#') ? first.slice(1) : undefined;

  const text = params[1] ?? stringTag(tags, 'system-msg') ?? stringTag(tags, 'msg-id');

  const record: LogRecord = {
    id: id || generateId(),
    timestamp: (sentTs !== undefined ? parseInteger(sentTs) : undefined) ?? now(),
    channel,
    name: displayName ?? prefix?.nick,
    message: text,
    tags: Object.fromEntries(tags),
    irc: {
      nick: prefix?.nick,
      cmd: command,
      extras: params.slice(2),
    },
  };

  if (command === 'PRIVMSG' && text !== undefined) {
    const { parallel, pure } = classify(text);
    const count = parallel.reduce((sum, sequence) => sum + sequence.length, 0);
    if (count > 0) {
      record.commands = pure ? { count, only: true } : { count };
    }
  }

  return record;
}

function stringTag(tags: Map<string, TagJson>, key: string): string | undefined {
  const value = tags.get(key);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Flatten a record into its serialized document. Absent fields are left
 * undefined so JSON.stringify omits them.
 */
export function toDocument(record: LogRecord): LogDocument {
  return {
    '@timestamp': record.timestamp,
    channel: record.channel,
    name: record.name,
    message: record.message,
    tags: record.tags,
    'irc.nick': record.irc.nick,
    'irc.cmd': record.irc.cmd,
    'irc.extras': record.irc.extras.length > 0 ? record.irc.extras : undefined,
    'commands.only': record.commands?.only,
    'commands.count': record.commands?.count,
  };
}
