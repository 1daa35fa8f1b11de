/**
 * FILE PURPOSE: Chunking entry points
 * WHY: normalize → paragraph blocks → base spans → overlap → chunk records,
 *      per meeting, with options validated before any record is touched.
 */

import type { ChunkRecord, MeetingRecord } from '../types.js';
import { assertChunkingOptions } from '../../config.js';
import { normalize } from '../normalize.js';
import { buildBaseSpans } from './base-spans.js';
import { applyOverlap } from './overlap.js';
import { materializeChunks } from './materialize.js';

export { fixedWidthSpans } from './fixed.js';
export { paragraphBlockSpans } from './paragraphs.js';
export {
  splitBlock,
  findSentenceEnds,
  latinTerminalRecognizer,
  koreanTerminalRecognizer,
  DEFAULT_RECOGNIZERS,
} from './sentences.js';
export type { SentenceBoundaryRecognizer } from './sentences.js';
export { buildBaseSpans } from './base-spans.js';
export { applyOverlap } from './overlap.js';
export { materializeChunks, stableChunkId, summarizeMeeting } from './materialize.js';

/** Chunk text that has already been through normalize(). */
export function chunkFromNormalized(
  record: MeetingRecord,
  normalized: string,
  maxChars: number,
  overlapChars: number,
): ChunkRecord[] {
  if (!normalized) return [];
  const spans = applyOverlap(buildBaseSpans(normalized, maxChars), overlapChars);
  return materializeChunks(record, normalized, spans);
}

export function chunk(record: MeetingRecord, maxChars: number, overlapChars: number): ChunkRecord[] {
  assertChunkingOptions({ maxChars, overlapChars });
  return chunkFromNormalized(record, normalize(record.transcript), maxChars, overlapChars);
}

/**
 * Lazy concatenation of chunk() over `records`, in input order. Every
 * iteration starts over from the beginning of `records`.
 */
export function chunkStream(
  records: Iterable<MeetingRecord>,
  maxChars: number,
  overlapChars: number,
): Iterable<ChunkRecord> {
  assertChunkingOptions({ maxChars, overlapChars });
  return {
    *[Symbol.iterator]() {
      for (const record of records) {
        yield* chunkFromNormalized(record, normalize(record.transcript), maxChars, overlapChars);
      }
    },
  };
}

/** chunkStream() for record sources that read files asynchronously. */
export function chunkStreamAsync(
  records: AsyncIterable<MeetingRecord>,
  maxChars: number,
  overlapChars: number,
): AsyncIterable<ChunkRecord> {
  assertChunkingOptions({ maxChars, overlapChars });
  return {
    async *[Symbol.asyncIterator]() {
      for await (const record of records) {
        yield* chunkFromNormalized(record, normalize(record.transcript), maxChars, overlapChars);
      }
    },
  };
}
