/**
 * Chat Archiver — IRCv3 Tag Values
 *
 * A tag value is either still in its escaped wire form (`raw`) or already
 * final text (`literal`, e.g. after the normalizer re-encodes an id).
 * Serialization writes `text` verbatim in both cases; only semantic
 * consumers call `unescapeTag`.
 */

export type TagValue =
  | { readonly kind: 'raw'; readonly text: string }
  | { readonly kind: 'literal'; readonly text: string };

export type Tag = [key: string, value: TagValue];

export function rawTag(text: string): TagValue {
  return { kind: 'raw', text };
}

export function literalTag(text: string): TagValue {
  return { kind: 'literal', text };
}

const ESCAPE_CODES: Record<string, string> = {
  ':': ';',
  s: ' ',
  r: '\r',
  n: '\n',
};

/**
 * Decode a tag value for semantic use.
 *
 * `\:` `\s` `\r` `\n` map to `;` space CR LF, any other escaped character
 * maps to itself. An empty segment (a `\` directly followed by another `\`,
 * or a trailing `\`) emits a backslash, and the segment after it is taken
 * verbatim without decoding its first character.
 */
export function unescapeTag(value: TagValue): string {
  if (value.kind === 'literal') return value.text;

  const raw = value.text;
  if (!raw.includes('\\')) return raw;

  const [first, ...segments] = raw.split('\\');
  let out = first;
  let skip = false;

  for (const segment of segments) {
    if (skip) {
      out += segment;
      skip = false;
      continue;
    }
    if (segment.length === 0) {
      out += '\\';
      skip = true;
      continue;
    }
    // Iterate by code point so a surrogate pair is never split
    const control = String.fromCodePoint(segment.codePointAt(0) ?? 0);
    out += ESCAPE_CODES[control] ?? control;
    out += segment.slice(control.length);
  }

  return out;
}

/**
 * Encode arbitrary text into the escaped wire form.
 */
export function escapeTag(text: string): TagValue {
  let out = '';
  for (const ch of text) {
    switch (ch) {
      case '\\': out += '\\\\'; break;
      case ';': out += '\\:'; break;
      case ' ': out += '\\s'; break;
      case '\r': out += '\\r'; break;
      case '\n': out += '\\n'; break;
      default: out += ch;
    }
  }
  return rawTag(out);
}

/**
 * Last-wins lookup of a tag's unescaped value.
 */
export function getTag(tags: readonly Tag[], key: string): string | undefined {
  for (let i = tags.length - 1; i >= 0; i--) {
    const [k, v] = tags[i];
    if (k === key) return unescapeTag(v);
  }
  return undefined;
}

export function hasTag(tags: readonly Tag[], key: string): boolean {
  return tags.some(([k]) => k === key);
}
