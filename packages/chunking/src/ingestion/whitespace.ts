/**
 * FILE PURPOSE: The whitespace set used by every trim and boundary test
 *
 * WHY: JS `\s` and String#trim count U+FEFF as whitespace but not the
 *      separators U+001C–U+001F or NEL (U+0085). Offsets, and so chunk IDs,
 *      depend on which characters count, so the set is spelled out here.
 */

/** Regex character-class body (no brackets): Unicode White_Space plus U+001C–U+001F. */
export const WHITESPACE_CLASS =
  '\\t\\n\\v\\f\\r\\x1c-\\x1f \\x85\\xa0\\u1680\\u2000-\\u200a\\u2028\\u2029\\u202f\\u205f\\u3000';

const EDGE_WHITESPACE_RE = new RegExp(`^[${WHITESPACE_CLASS}]+|[${WHITESPACE_CLASS}]+$`, 'g');

/** String#trim over WHITESPACE_CLASS. A U+FEFF inside or at the end of the text is kept. */
export function trimWhitespace(text: string): string {
  return text.replace(EDGE_WHITESPACE_RE, '');
}
