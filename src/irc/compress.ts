/**
 * Chat Archiver — Message Normalizer
 *
 * Strips metadata that is redundant or carries no information before a
 * message is logged. Mutates the message in place. Applied to every
 * command, not only PRIVMSG.
 */

import type { IrcMessage } from './message.js';
import { literalTag, unescapeTag, type Tag } from './tags.js';
import { COMPACTABLE_ID_TAGS, encodeCompactId, isCanonicalId } from './ids.js';

/** Host suffix of users on the chat service itself. */
export const SERVICE_HOST_SUFFIX = '.tmi.twitch.tv';

/** Tags dropped outright. */
export const DROPPED_TAGS: ReadonlySet<string> = new Set([
  'client-nonce',
  'emotes',
  'room-id',
]);

export interface CompressOptions {
  /** Re-encode canonical UUID id tags into their 22-char compact form. */
  compactIds?: boolean;
}

export function compressMessage(message: IrcMessage, options: CompressOptions = {}): IrcMessage {
  const { prefix } = message;

  // user and host only repeat the nick for the service's own users
  if (prefix?.host?.endsWith(SERVICE_HOST_SUFFIX)) {
    delete prefix.host;
    delete prefix.user;
  }

  const nick = prefix?.nick;

  message.tags = message.tags.filter(([key, value]) => {
    if (DROPPED_TAGS.has(key)) return false;

    const text = unescapeTag(value);
    if (key === 'display-name' && text === nick) return false;

    // absent and zero are the same default for boolean/count tags
    return text !== '' && text !== '0';
  });

  if (options.compactIds) {
    message.tags = message.tags.map((tag) => compactIdTag(tag));
  }

  return message;
}

function compactIdTag(tag: Tag): Tag {
  const [key, value] = tag;
  if (!COMPACTABLE_ID_TAGS.has(key)) return tag;

  const text = unescapeTag(value);
  if (!isCanonicalId(text)) return tag;

  return [key, literalTag(encodeCompactId(text))];
}
