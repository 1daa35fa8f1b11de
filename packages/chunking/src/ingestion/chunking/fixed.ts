/**
 * FILE PURPOSE: Fixed-width span slicing
 * WHY: Last-resort split when a block has no usable sentence boundary.
 */

import type { Span } from '../types.js';

/**
 * Slice `[from, to)` of a block into windows of `width` chars, offset by
 * `blockStart`. The last window may be shorter.
 */
export function fixedWidthSpans(blockStart: number, from: number, to: number, width: number): Span[] {
  const spans: Span[] = [];
  for (let start = from; start < to; start += width) {
    spans.push({ start: blockStart + start, end: blockStart + Math.min(start + width, to) });
  }
  return spans;
}
