/**
 * FILE PURPOSE: Paragraph segmenter
 * WHY: Blank lines are the strongest topic boundary a transcript export keeps.
 */

import type { Span } from '../types.js';
import { WHITESPACE_CLASS } from '../whitespace.js';

/** A newline, optional whitespace (trailing spaces on a blank line), then more newlines. */
const BLANK_LINE_RE = new RegExp(`\\n[${WHITESPACE_CLASS}]*\\n+`, 'g');

/** Spans of the non-blank blocks of `text`, separators excluded. */
export function paragraphBlockSpans(text: string): Span[] {
  if (!text) return [];

  const spans: Span[] = [];
  let start = 0;
  for (const match of text.matchAll(BLANK_LINE_RE)) {
    const end = match.index ?? start;
    if (end > start) spans.push({ start, end });
    start = end + match[0].length;
  }
  if (start < text.length) spans.push({ start, end: text.length });
  return spans;
}
