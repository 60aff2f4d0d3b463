/**
 * Chat Archiver — Message Id Encoding
 *
 * Message ids are UUIDs in their canonical 36-character form. Older logs
 * stored them compacted: the 16 raw bytes as unpadded base64 (22 chars).
 * Both alphabets (standard and URL-safe) are accepted on read; new
 * compaction writes the URL-safe one.
 */

const CANONICAL_ID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const COMPACT_ID = /^[A-Za-z0-9+/_-]{22}(==)?$/;

/** Reply-thread tags that older logs may carry in compact form. */
export const REPLY_ID_TAGS: ReadonlySet<string> = new Set([
  'reply-parent-msg-id',
  'reply-thread-parent-msg-id',
]);

export const COMPACTABLE_ID_TAGS: ReadonlySet<string> = new Set(['id', ...REPLY_ID_TAGS]);

export class IdRepairError extends Error {
  constructor(public readonly value: string) {
    super(`Not a canonical or compact message id: "${value}"`);
    this.name = 'IdRepairError';
  }
}

export function isCanonicalId(value: string): boolean {
  return value.length === 36 && CANONICAL_ID.test(value);
}

/**
 * Compact a canonical id into 22 base64url characters.
 */
export function encodeCompactId(id: string): string {
  if (!isCanonicalId(id)) throw new IdRepairError(id);
  return Buffer.from(id.replace(/-/g, ''), 'hex').toString('base64url');
}

/**
 * Expand a compact id back to lowercase canonical form.
 */
export function decodeCompactId(compact: string): string {
  if (!COMPACT_ID.test(compact)) throw new IdRepairError(compact);

  const bytes = Buffer.from(compact, 'base64');
  if (bytes.length !== 16) throw new IdRepairError(compact);

  const hex = bytes.toString('hex');
  return [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20),
  ].join('-');
}

/**
 * Return `value` unchanged when it is 36 characters long, otherwise
 * decode it from the compact encoding.
 */
export function repairId(value: string): string {
  if (value.length === 36) return value;
  return decodeCompactId(value);
}
