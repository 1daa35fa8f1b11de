/**
 * FILE PURPOSE: CHUNK_MEETING processor — chunks one meeting record
 * WHY: Pure and deterministic, so a retried job returns identical chunk IDs.
 */

import type { ChunkMeetingJobData, JobContext } from '../jobs.js';
import type { ChunkRecord } from '../../types.js';
import { chunk } from '../../chunking/index.js';

export interface ChunkMeetingResult {
  sourceId: string;
  chunks: ChunkRecord[];
}

export async function processChunkMeeting(job: JobContext<ChunkMeetingJobData>): Promise<ChunkMeetingResult> {
  const { sourceId, payload } = job.data;
  const chunks = chunk(payload.record, payload.maxChars, payload.overlapChars);
  await job.log(`Chunked meeting ${payload.record.key} into ${chunks.length} chunks`);
  return { sourceId, chunks };
}
