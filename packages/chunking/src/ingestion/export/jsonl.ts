/**
 * FILE PURPOSE: JSON Lines serialization for chunk and meeting records
 * WHY: Indexing jobs downstream read snake_case JSONL; the engine itself defines no file format.
 */

import { createWriteStream } from 'node:fs';
import { once } from 'node:events';
import { finished } from 'node:stream/promises';
import type { ChunkRecord, MeetingMeta } from '../types.js';

export function toChunkLine(chunk: ChunkRecord): string {
  return JSON.stringify({
    meeting_key: chunk.meetingKey,
    date_ymd: chunk.date,
    meeting_name: chunk.meetingName,
    chunk_index: chunk.chunkIndex,
    chunk_id: chunk.chunkId,
    char_start: chunk.charStart,
    char_end: chunk.charEnd,
    text: chunk.text,
  });
}

export function toMeetingLine(meta: MeetingMeta): string {
  return JSON.stringify({
    meeting_key: meta.meetingKey,
    date_ymd: meta.date,
    meeting_name: meta.meetingName,
    transcript_char_len: meta.transcriptCharLength,
    chunk_count: meta.chunkCount,
    source_file: meta.sourceFile,
  });
}

// ─── File writer ────────────────────────────────────────────────────────────

export interface JsonlWriter {
  readonly path: string;
  /** Appends `line` plus a newline, waiting for the stream to drain when it is full. */
  write(line: string): Promise<void>;
  /** Flushes and closes; rejects with the stream's error if one occurred. */
  close(): Promise<void>;
}

/**
 * Opens `path` for writing (truncating it). Resolves once the file is open, so
 * EACCES/EISDIR/ENOENT reject here; later stream errors reject the next
 * write() or close().
 */
export async function openJsonlWriter(path: string): Promise<JsonlWriter> {
  const stream = createWriteStream(path, 'utf8');
  let failure: Error | null = null;
  stream.on('error', (err) => {
    failure = err;
  });
  await once(stream, 'open');

  return {
    path,
    async write(line) {
      if (failure) throw failure;
      if (!stream.write(`${line}\n`)) {
        await once(stream, 'drain');
      }
    },
    async close() {
      if (!stream.destroyed) stream.end();
      await finished(stream);
    },
  };
}
