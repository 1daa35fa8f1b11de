/**
 * FILE PURPOSE: Greedy packing of paragraph blocks into budget-sized spans
 *
 * HOW: A fold over the paragraph blocks. The accumulator holds the emitted
 *      spans plus the currently open span (or null). Each block either
 *      extends the open span, flushes it and opens a new one, or — when
 *      the block alone is oversized — flushes it and appends the sentence
 *      splitter's output with nothing left open.
 */

import type { Span } from '../types.js';
import { paragraphBlockSpans } from './paragraphs.js';
import { splitBlock, DEFAULT_RECOGNIZERS } from './sentences.js';
import type { SentenceBoundaryRecognizer } from './sentences.js';

interface PackState {
  emitted: Span[];
  open: Span | null;
}

function flush(state: PackState): Span[] {
  return state.open ? [...state.emitted, state.open] : state.emitted;
}

/**
 * Pack `text` into the fewest spans of at most `maxChars`, merging whole
 * paragraphs in order. `maxChars` must be a positive integer — callers
 * validate it first (see assertChunkingOptions).
 */
export function buildBaseSpans(
  text: string,
  maxChars: number,
  recognizers: readonly SentenceBoundaryRecognizer[] = DEFAULT_RECOGNIZERS,
): Span[] {
  const step = (state: PackState, block: Span): PackState => {
    const { open } = state;
    if (open && block.end - open.start <= maxChars) {
      return { emitted: state.emitted, open: { start: open.start, end: block.end } };
    }

    const emitted = flush(state);
    if (block.end - block.start <= maxChars) {
      return { emitted, open: block };
    }
    const pieces = splitBlock(block.start, text.slice(block.start, block.end), maxChars, recognizers);
    return { emitted: [...emitted, ...pieces], open: null };
  };

  return flush(paragraphBlockSpans(text).reduce(step, { emitted: [], open: null }));
}
