/**
 * FILE PURPOSE: BullMQ worker for the chunking queue
 * WHY: Runs chunk jobs with bounded concurrency. Processors are idempotent
 *      (safe to retry) and return their results for the caller to persist.
 */

import { Worker } from 'bullmq';
import type { ChunkingJobData, JobContext } from './jobs.js';
import { JobType, QUEUE_NAME } from './queue.js';
import { parseRedisConnection } from './connection.js';
import { processChunkMeeting } from './processors/chunk-meeting.js';
import type { ChunkMeetingResult } from './processors/chunk-meeting.js';
import { processChunkFile } from './processors/chunk-file.js';
import type { ChunkFileResult } from './processors/chunk-file.js';

export type ChunkingJobResult = ChunkMeetingResult | ChunkFileResult;

export async function processChunkingJob(job: JobContext): Promise<ChunkingJobResult> {
  const { data } = job;
  const jobType: string = data.type;
  const log = (message: string) => job.log(message);

  switch (data.type) {
    case JobType.CHUNK_MEETING:
      return processChunkMeeting({ data, log });
    case JobType.CHUNK_FILE:
      return processChunkFile({ data, log });
    default:
      throw new Error(`Unknown job type: ${jobType}`);
  }
}

export function createChunkingWorker(
  redisUrl?: string,
  concurrency = 5,
): Worker<ChunkingJobData, ChunkingJobResult> {
  return new Worker<ChunkingJobData, ChunkingJobResult>(
    QUEUE_NAME,
    processChunkingJob,
    {
      connection: parseRedisConnection(redisUrl),
      concurrency,
    },
  );
}
