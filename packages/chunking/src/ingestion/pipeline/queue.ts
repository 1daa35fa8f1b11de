/**
 * FILE PURPOSE: BullMQ queue factory for transcript chunking
 * WHY: Meetings chunk independently, so a Redis-backed queue fans them out
 *      across as many workers as the caller runs.
 */

import { Queue } from 'bullmq';
import type { ChunkingJobData } from './jobs.js';
import { parseRedisConnection } from './connection.js';

export const JobType = {
  CHUNK_MEETING: 'chunk-meeting',
  CHUNK_FILE: 'chunk-file',
} as const;

export type JobTypeValue = (typeof JobType)[keyof typeof JobType];

export const QUEUE_NAME = 'transcript-chunking';

export function createChunkingQueue(redisUrl?: string): Queue<ChunkingJobData> {
  return new Queue<ChunkingJobData>(QUEUE_NAME, {
    connection: parseRedisConnection(redisUrl),
    defaultJobOptions: {
      attempts: 3,
      backoff: { type: 'exponential', delay: 1000 },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  });
}
