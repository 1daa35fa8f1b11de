/**
 * FILE PURPOSE: Overlap applier
 * WHY: Repeating the tail of the previous chunk gives retrieval cross-boundary context.
 */

import type { Span } from '../types.js';

/**
 * Pull every span after the first back to `previousEnd - overlapChars`
 * (floored at 0). A start only ever moves earlier; ends never move.
 * Overlap reaches one span back only.
 */
export function applyOverlap(spans: Span[], overlapChars: number): Span[] {
  if (spans.length === 0 || overlapChars <= 0) return spans;

  return spans.map((span, i) => {
    const previous = i > 0 ? spans[i - 1] : undefined;
    if (!previous) return span;
    const overlapStart = Math.max(0, previous.end - overlapChars);
    return { start: Math.min(overlapStart, span.start), end: span.end };
  });
}
