export type { MeetingRecord, Span, ChunkRecord, MeetingMeta, ChunkingOptions } from './types.js';
export { normalize } from './normalize.js';
export { trimWhitespace, WHITESPACE_CLASS } from './whitespace.js';
export {
  chunk,
  chunkFromNormalized,
  chunkStream,
  chunkStreamAsync,
  paragraphBlockSpans,
  splitBlock,
  findSentenceEnds,
  fixedWidthSpans,
  latinTerminalRecognizer,
  koreanTerminalRecognizer,
  DEFAULT_RECOGNIZERS,
  buildBaseSpans,
  applyOverlap,
  materializeChunks,
  stableChunkId,
  summarizeMeeting,
} from './chunking/index.js';
export type { SentenceBoundaryRecognizer } from './chunking/index.js';
export {
  discoverCsvFiles,
  hasTranscriptColumns,
  selectTranscript,
  computeMeetingKey,
  parseMeetingCsv,
  readMeetingRecords,
} from './adapters/csv.js';
export { normalizeDateString, extractDate, DATE_FIELDS } from './adapters/dates.js';
export { toChunkLine, toMeetingLine, openJsonlWriter } from './export/jsonl.js';
export type { JsonlWriter } from './export/jsonl.js';
export { createChunkingQueue, JobType, QUEUE_NAME } from './pipeline/queue.js';
export type { JobTypeValue } from './pipeline/queue.js';
export type {
  ChunkingJobData,
  ChunkMeetingJobData,
  ChunkFileJobData,
  ChunkMeetingPayload,
  ChunkFilePayload,
  JobContext,
} from './pipeline/jobs.js';
export { createChunkingWorker, processChunkingJob } from './pipeline/workers.js';
export type { ChunkingJobResult } from './pipeline/workers.js';
export { parseRedisConnection } from './pipeline/connection.js';
export type { RedisConnectionOptions } from './pipeline/connection.js';
export { processChunkMeeting, processChunkFile } from './pipeline/processors/index.js';
export type { ChunkMeetingResult, ChunkFileResult } from './pipeline/processors/index.js';
