/**
 * Chat Archiver — Defaults
 */

export const CLI_VERSION = '0.1.0';

export const VERSION_STRING =
  `chat-archiver/${CLI_VERSION} ${process.platform}-${process.arch} node-${process.version}`;

// ── Chat endpoint ───────────────────────────────────────────────────────────

export const CHAT_HOST = 'irc.chat.twitch.tv';
export const CHAT_TLS_PORT = 6697;

/** Login accepted by the chat service for read-only anonymous sessions. */
export const ANONYMOUS_NICK = 'justinfan12345';

export const CAPABILITIES = ['twitch.tv/tags', 'twitch.tv/commands'];

export const PASSWORD_ENV_VAR = 'CHAT_ARCHIVER_PASS';

// ── Outputs ─────────────────────────────────────────────────────────────────

/** Rotate output files once they grow past 16 MiB. */
export const DEFAULT_ROTATION_LIMIT = 1 << 24;

export const DEFAULT_BACKFILL_PATTERN = 'backfill-%.ndjson';
export const DEFAULT_BACKFILL_INDEX = 'twitch-logs';

/** Placeholder substituted by the chunk index in backfill file names. */
export const CHUNK_PLACEHOLDER = '%';

/** Placeholder substituted by the channel in a single index pattern. */
export const INDEX_CHANNEL_PLACEHOLDER = '*';
