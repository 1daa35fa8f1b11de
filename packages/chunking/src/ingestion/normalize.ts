/**
 * FILE PURPOSE: Canonicalize raw transcript text before segmentation
 * WHY: Exports mix real CRLF, serialized "\n" escapes, tabs and BOMs.
 *      Every offset downstream refers to the output of normalize().
 */

import { trimWhitespace } from './whitespace.js';

const LEADING_BOM_RE = /^\uFEFF+/;
const BLANK_RUN_RE = /\n{3,}/g;

export function normalize(rawText: string | null | undefined): string {
  if (!rawText) return '';
  const unified = rawText
    .replace(LEADING_BOM_RE, '')
    .replaceAll('\\r\\n', '\n')
    .replaceAll('\\n', '\n')
    .replaceAll('\\r', '\n')
    .replaceAll('\r\n', '\n')
    .replaceAll('\r', '\n')
    .replaceAll('\t', ' ')
    .replace(BLANK_RUN_RE, '\n\n');
  return trimWhitespace(unified);
}
