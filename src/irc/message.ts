/**
 * Chat Archiver — IRC Message Codec
 *
 * Parses one wire line into a structured message and writes it back.
 * Tag values keep their escaped wire form so `writeMessage(parseMessage(x))`
 * reproduces the tags byte for byte.
 *
 * The parser never throws: a line without a command token yields an empty
 * `command`, and callers decide whether to skip it.
 */

import { rawTag, type Tag } from './tags.js';

// ============================================================================
// TYPES
// ============================================================================

export interface Prefix {
  nick: string;
  user?: string;
  host?: string;
}

export interface IrcMessage {
  tags: Tag[];
  prefix?: Prefix;
  command: string;
  params: string[];
}

// ============================================================================
// PARSE
// ============================================================================

/**
 * Split `input` at its first space. Without a space the whole input is
 * the token and the remainder is empty.
 */
function splitFirstSpace(input: string): [token: string, rest: string] {
  const index = input.indexOf(' ');
  if (index === -1) return [input, ''];
  return [input.slice(0, index), input.slice(index + 1)];
}

/**
 * Parse `nick[!user][@host]`, right to left: host is cut off first at the
 * last `@`, then user at the last `!` of what remains.
 */
export function parsePrefix(raw: string): Prefix {
  let rest = raw;
  const prefix: Prefix = { nick: '' };

  const at = rest.lastIndexOf('@');
  if (at !== -1) {
    prefix.host = rest.slice(at + 1);
    rest = rest.slice(0, at);
  }

  const bang = rest.lastIndexOf('!');
  if (bang !== -1) {
    prefix.user = rest.slice(bang + 1);
    rest = rest.slice(0, bang);
  }

  prefix.nick = rest;
  return prefix;
}

function parseTags(blob: string): Tag[] {
  return blob.split(';').map((entry): Tag => {
    const eq = entry.indexOf('=');
    if (eq === -1) return [entry, rawTag('')];
    return [entry.slice(0, eq), rawTag(entry.slice(eq + 1))];
  });
}

export function parseMessage(line: string): IrcMessage {
  let [part, rest] = splitFirstSpace(line);

  let tags: Tag[] = [];
  if (part.startsWith('@')) {
    tags = parseTags(part.slice(1));
    [part, rest] = splitFirstSpace(rest);
  }

  let prefix: Prefix | undefined;
  if (part.startsWith(':')) {
    prefix = parsePrefix(part.slice(1));
    [part, rest] = splitFirstSpace(rest);
  }

  const command = part;
  const params: string[] = [];

  while (rest.length > 0) {
    if (rest.startsWith(':')) {
      params.push(rest.slice(1));
      break;
    }
    let param: string;
    [param, rest] = splitFirstSpace(rest);
    params.push(param);
  }

  const message: IrcMessage = { tags, command, params };
  if (prefix) message.prefix = prefix;
  return message;
}

// ============================================================================
// WRITE
// ============================================================================

export function formatPrefix(prefix: Prefix): string {
  let out = prefix.nick;
  if (prefix.user !== undefined) out += `!${prefix.user}`;
  if (prefix.host !== undefined) out += `@${prefix.host}`;
  return out;
}

/**
 * Serialize a message to its wire form (without a line terminator).
 *
 * The last parameter is written with a `:` unless it starts with `#`:
 * the only trailing parameter that needs no colon in practice is a channel
 * name (`JOIN #chan`), so that case is written bare.
 */
export function writeMessage(message: IrcMessage): string {
  let out = '';

  if (message.tags.length > 0) {
    out += '@' + message.tags.map(([key, value]) => `${key}=${value.text}`).join(';') + ' ';
  }

  if (message.prefix) {
    out += `:${formatPrefix(message.prefix)} `;
  }

  out += message.command;

  const { params } = message;
  for (let i = 0; i < params.length; i++) {
    const param = params[i];
    const isLast = i === params.length - 1;
    out += isLast && !param.startsWith('#') ? ` :${param}` : ` ${param}`;
  }

  return out;
}
