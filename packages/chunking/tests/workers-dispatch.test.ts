import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { processChunkingJob } from '../src/ingestion/pipeline/workers.js';
import { JobType } from '../src/ingestion/pipeline/queue.js';
import type { ChunkingJobData, JobContext } from '../src/ingestion/pipeline/jobs.js';
import { ChunkingConfigError } from '../src/config.js';

function createJob(data: ChunkingJobData): JobContext {
  return { data, log: vi.fn().mockResolvedValue(0) };
}

const record = {
  key: 'abc',
  date: '2026-02-02',
  name: 'Meeting',
  transcript: 'Para1 line.\n\nPara2 line.\n\nPara3 line.',
  sequenceIndex: 0,
};

describe('processChunkingJob', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chunking-jobs-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('chunks a single meeting and logs the count', async () => {
    const job = createJob({
      type: JobType.CHUNK_MEETING,
      sourceId: 'src-1',
      payload: { record, maxChars: 20, overlapChars: 0 },
    });

    const result = await processChunkingJob(job);

    expect(result.sourceId).toBe('src-1');
    expect(result.chunks.map((c) => c.text)).toEqual(['Para1 line.', 'Para2 line.', 'Para3 line.']);
    expect(job.log).toHaveBeenCalledWith('Chunked meeting abc into 3 chunks');
  });

  it('returns identical chunk IDs when a job is retried', async () => {
    const data: ChunkingJobData = {
      type: JobType.CHUNK_MEETING,
      sourceId: 'src-1',
      payload: { record, maxChars: 20, overlapChars: 5 },
    };
    const first = await processChunkingJob(createJob(data));
    const second = await processChunkingJob(createJob(data));
    expect(second.chunks.map((c) => c.chunkId)).toEqual(first.chunks.map((c) => c.chunkId));
  });

  it('chunks every meeting in a CSV file and summarizes each', async () => {
    const path = join(dir, 'export.csv');
    writeFileSync(path, 'meeting_key,name,content\nm1,Kickoff 2026-01-07,"First.\n\nSecond."\nm2,Retro,Only one.\n');
    const job = createJob({
      type: JobType.CHUNK_FILE,
      sourceId: 'file-1',
      payload: { path, maxChars: 7, overlapChars: 0 },
    });

    const result = await processChunkingJob(job);
    if (!('meetings' in result)) throw new Error('expected a file result');

    expect(result.meetings).toEqual([
      {
        meetingKey: 'm1',
        date: '2026-01-07',
        meetingName: 'Kickoff 2026-01-07',
        transcriptCharLength: 15,
        chunkCount: 2,
        sourceFile: path,
      },
      {
        meetingKey: 'm2',
        date: '',
        meetingName: 'Retro',
        transcriptCharLength: 9,
        chunkCount: 2,
        sourceFile: path,
      },
    ]);
    expect(result.chunks.map((c) => [c.meetingKey, c.text])).toEqual([
      ['m1', 'First.'],
      ['m1', 'Second.'],
      // "Only one." is a single 9-char sentence, so it is hard-cut at 7
      ['m2', 'Only on'],
      ['m2', 'e.'],
    ]);
    expect(job.log).toHaveBeenCalledWith(`Chunked 2 meetings from ${path} into 4 chunks`);
  });

  it('rejects invalid options before reading the file', async () => {
    const job = createJob({
      type: JobType.CHUNK_FILE,
      sourceId: 'file-1',
      payload: { path: join(dir, 'never-read.csv'), maxChars: 0, overlapChars: 0 },
    });
    await expect(processChunkingJob(job)).rejects.toBeInstanceOf(ChunkingConfigError);
  });

  it('propagates a missing file so the queue can retry', async () => {
    const job = createJob({
      type: JobType.CHUNK_FILE,
      sourceId: 'file-1',
      payload: { path: join(dir, 'missing.csv'), maxChars: 100, overlapChars: 0 },
    });
    await expect(processChunkingJob(job)).rejects.toThrow(/ENOENT/);
  });

  it('throws on an unknown job type', async () => {
    const job = {
      data: { type: 'reindex', sourceId: 'x', payload: {} },
      log: vi.fn(),
    } as unknown as JobContext;
    await expect(processChunkingJob(job)).rejects.toThrow('Unknown job type: reindex');
  });
});
