/**
 * FILE PURPOSE: CHUNK_FILE processor — chunks every meeting in one CSV export
 */

import { readFile } from 'node:fs/promises';
import type { ChunkFileJobData, JobContext } from '../jobs.js';
import type { ChunkRecord, MeetingMeta } from '../../types.js';
import { assertChunkingOptions } from '../../../config.js';
import { parseMeetingCsv } from '../../adapters/csv.js';
import { normalize } from '../../normalize.js';
import { chunkFromNormalized, summarizeMeeting } from '../../chunking/index.js';

export interface ChunkFileResult {
  sourceId: string;
  meetings: MeetingMeta[];
  chunks: ChunkRecord[];
}

export async function processChunkFile(job: JobContext<ChunkFileJobData>): Promise<ChunkFileResult> {
  const { sourceId, payload } = job.data;
  const { path, maxChars, overlapChars } = payload;
  assertChunkingOptions({ maxChars, overlapChars });

  // Read errors propagate so BullMQ retries the job.
  const content = await readFile(path, 'utf-8');
  const meetings: MeetingMeta[] = [];
  const chunks: ChunkRecord[] = [];

  for (const record of parseMeetingCsv(content, path)) {
    const normalized = normalize(record.transcript);
    const recordChunks = chunkFromNormalized(record, normalized, maxChars, overlapChars);
    meetings.push(summarizeMeeting(record, normalized, recordChunks));
    chunks.push(...recordChunks);
  }

  await job.log(`Chunked ${meetings.length} meetings from ${path} into ${chunks.length} chunks`);
  return { sourceId, meetings, chunks };
}
