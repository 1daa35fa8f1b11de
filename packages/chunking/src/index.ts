/**
 * FILE PURPOSE: Barrel export for the transcript chunking package
 *
 * WHY: Single import point for the engine, the CSV source and the queue.
 *      Import: `import { chunk, normalize, parseMeetingCsv } from '@transcript-chunker/chunking'`
 */

// ─── Configuration ──────────────────────────────────────────────────────────
export {
  loadChunkingConfig,
  assertChunkingOptions,
  ChunkingConfigError,
  DEFAULT_MAX_CHARS,
  DEFAULT_OVERLAP_CHARS,
} from './config.js';

// ─── Engine, source, sink, pipeline ─────────────────────────────────────────
export * from './ingestion/index.js';
