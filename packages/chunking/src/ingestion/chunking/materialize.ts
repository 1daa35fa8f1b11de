/**
 * FILE PURPOSE: Chunk materializer + stable chunk IDs
 *
 * WHY: Downstream indexes upsert by chunk ID, so the ID must depend only on
 *      the meeting key, the chunk position and the chunk text — re-running
 *      the same export yields the same IDs.
 */

import { createHash } from 'node:crypto';
import type { ChunkRecord, MeetingMeta, MeetingRecord, Span } from '../types.js';

/** SHA-1 hex of `{meetingKey}|{chunkIndex}|{text}` (UTF-8), untruncated. */
export function stableChunkId(meetingKey: string, chunkIndex: number, text: string): string {
  return createHash('sha1').update(`${meetingKey}|${chunkIndex}|${text}`, 'utf8').digest('hex');
}

export function materializeChunks(record: MeetingRecord, normalized: string, spans: Span[]): ChunkRecord[] {
  if (!normalized) return [];
  return spans.map(({ start, end }, chunkIndex) => {
    const text = normalized.slice(start, end);
    return {
      meetingKey: record.key,
      date: record.date,
      meetingName: record.name,
      chunkIndex,
      chunkId: stableChunkId(record.key, chunkIndex, text),
      charStart: start,
      charEnd: end,
      text,
    };
  });
}

export function summarizeMeeting(record: MeetingRecord, normalized: string, chunks: ChunkRecord[]): MeetingMeta {
  return {
    meetingKey: record.key,
    date: record.date,
    meetingName: record.name,
    transcriptCharLength: normalized.length,
    chunkCount: chunks.length,
    sourceFile: record.sourceFile ?? null,
  };
}
