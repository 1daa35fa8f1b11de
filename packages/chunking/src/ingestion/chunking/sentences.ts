/**
 * FILE PURPOSE: Sentence-boundary splitter for oversized paragraph blocks
 *
 * WHY: A paragraph longer than the chunk budget must still be cut, and a cut
 *      at a sentence end keeps each chunk readable on its own.
 * HOW: Boundary recognizers report sentence-end offsets; the splitter packs
 *      whole sentences greedily and falls back to fixed-width windows.
 *      Recognizers are pluggable so other scripts can be added without
 *      touching the packing loop.
 */

import type { Span } from '../types.js';
import { fixedWidthSpans } from './fixed.js';
import { WHITESPACE_CLASS } from '../whitespace.js';

// ─── Boundary recognizers ───────────────────────────────────────────────────

/** Given text, produce the offsets just past each sentence end, ascending. */
export interface SentenceBoundaryRecognizer {
  name: string;
  findEnds(text: string): number[];
}

const FOLLOWED_BY_SPACE_OR_END = `(?=[${WHITESPACE_CLASS}]|$)`;

function regexRecognizer(name: string, pattern: RegExp): SentenceBoundaryRecognizer {
  return {
    name,
    findEnds(text) {
      const ends: number[] = [];
      for (const match of text.matchAll(pattern)) {
        ends.push((match.index ?? 0) + match[0].length);
      }
      return ends;
    },
  };
}

/** `.`, `!` or `?` followed by whitespace or end of text. */
export const latinTerminalRecognizer = regexRecognizer('latin', new RegExp(`[.!?]${FOLLOWED_BY_SPACE_OR_END}`, 'g'));

/** Korean declarative endings 다. / 요. / 함. followed by whitespace or end of text. */
export const koreanTerminalRecognizer = regexRecognizer(
  'korean',
  new RegExp(`(?:다|요|함)\\.${FOLLOWED_BY_SPACE_OR_END}`, 'g'),
);

export const DEFAULT_RECOGNIZERS: readonly SentenceBoundaryRecognizer[] = [
  latinTerminalRecognizer,
  koreanTerminalRecognizer,
];

/** Union of every recognizer's offsets, sorted and de-duplicated. */
export function findSentenceEnds(
  text: string,
  recognizers: readonly SentenceBoundaryRecognizer[] = DEFAULT_RECOGNIZERS,
): number[] {
  const ends = new Set<number>();
  for (const recognizer of recognizers) {
    for (const end of recognizer.findEnds(text)) ends.add(end);
  }
  return [...ends].sort((a, b) => a - b);
}

// ─── Block splitting ────────────────────────────────────────────────────────

/**
 * Split one block into spans of at most `maxChars`, preferring sentence ends.
 * Offsets in the result are absolute (`blockStart` + local offset).
 *
 * When the first sentence of a window alone exceeds the budget the window is
 * hard-cut at exactly `maxChars`, mid-sentence.
 */
export function splitBlock(
  blockStart: number,
  blockText: string,
  maxChars: number,
  recognizers: readonly SentenceBoundaryRecognizer[] = DEFAULT_RECOGNIZERS,
): Span[] {
  const length = blockText.length;
  if (length <= maxChars) return [{ start: blockStart, end: blockStart + length }];

  const ends = findSentenceEnds(blockText, recognizers);
  if (ends.length === 0) return fixedWidthSpans(blockStart, 0, length, maxChars);

  const spans: Span[] = [];
  let windowStart = 0;
  // Last sentence end that still fits in the current window; equals windowStart when none does.
  let lastEnd = 0;

  for (const end of ends) {
    if (end - windowStart <= maxChars) {
      lastEnd = end;
      continue;
    }

    if (lastEnd === windowStart) {
      const hardEnd = Math.min(windowStart + maxChars, length);
      spans.push({ start: blockStart + windowStart, end: blockStart + hardEnd });
      windowStart = hardEnd;
    } else {
      spans.push({ start: blockStart + windowStart, end: blockStart + lastEnd });
      windowStart = lastEnd;
    }
    lastEnd = windowStart;

    if (end - windowStart <= maxChars) lastEnd = end;
  }

  if (lastEnd > windowStart) {
    spans.push({ start: blockStart + windowStart, end: blockStart + lastEnd });
    windowStart = lastEnd;
  }
  if (windowStart < length) {
    spans.push(...fixedWidthSpans(blockStart, windowStart, length, maxChars));
  }
  return spans;
}
