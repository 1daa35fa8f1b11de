/**
 * FILE PURPOSE: Job type definitions for the chunking queue
 * WHY: Discriminated on `type` so the worker narrows each payload without casts.
 */

import type { JobType } from './queue.js';
import type { ChunkingOptions, MeetingRecord } from '../types.js';

/** Payload for CHUNK_MEETING — one already-parsed meeting. */
export interface ChunkMeetingPayload extends ChunkingOptions {
  record: MeetingRecord;
}

/** Payload for CHUNK_FILE — every meeting in one CSV export. */
export interface ChunkFilePayload extends ChunkingOptions {
  path: string;
}

export interface ChunkMeetingJobData {
  type: typeof JobType.CHUNK_MEETING;
  sourceId: string;
  payload: ChunkMeetingPayload;
}

export interface ChunkFileJobData {
  type: typeof JobType.CHUNK_FILE;
  sourceId: string;
  payload: ChunkFilePayload;
}

export type ChunkingJobData = ChunkMeetingJobData | ChunkFileJobData;

/** The part of a BullMQ Job that processors touch. */
export interface JobContext<T extends ChunkingJobData = ChunkingJobData> {
  data: T;
  log(message: string): Promise<unknown>;
}
