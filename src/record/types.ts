/**
 * Chat Archiver — Record Types
 */

export type BadgeMap = Record<string, number | string>;

export type TagJson = string | number | boolean | BadgeMap;

/**
 * Structured projection of one chat message.
 */
export interface LogRecord {
  /** Message id; a fresh UUID when the message carried none. */
  id: string;
  /** Sent time in epoch milliseconds; receipt time when not tagged. */
  timestamp: number;
  channel?: string;
  /** Display name, falling back to the prefix nick. */
  name?: string;
  message?: string;
  tags: Record<string, TagJson>;
  irc: {
    nick?: string;
    cmd: string;
    extras: string[];
  };
  commands?: {
    count: number;
    only?: true;
  };
}

/**
 * The serialized shape shared by the JSON output, the index backend and
 * bulk files. The id is not part of it: it travels in the request path or
 * the bulk header.
 */
export interface LogDocument {
  '@timestamp': number;
  channel?: string;
  name?: string;
  message?: string;
  tags: Record<string, TagJson>;
  'irc.nick'?: string;
  'irc.cmd': string;
  'irc.extras'?: string[];
  'commands.only'?: true;
  'commands.count'?: number;
}
