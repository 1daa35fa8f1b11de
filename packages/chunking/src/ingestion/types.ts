/**
 * FILE PURPOSE: Core types for transcript chunking
 *
 * WHY: The record source, the engine and the sinks all speak these shapes.
 *      Records are read-only — the engine never mutates caller data.
 */

/** One meeting as produced by a record source (e.g. a CSV export row). */
export interface MeetingRecord {
  readonly key: string;
  /** YYYY-MM-DD, or empty when no date could be recovered. */
  readonly date: string;
  readonly name: string;
  readonly transcript: string;
  /** Position of the source row among the data rows of its file. */
  readonly sequenceIndex: number;
  readonly sourceFile?: string;
}

/** Half-open character range `[start, end)` into normalized text. */
export interface Span {
  readonly start: number;
  readonly end: number;
}

export interface ChunkRecord {
  meetingKey: string;
  date: string;
  meetingName: string;
  chunkIndex: number;
  /** Full 40-char hex SHA-1 of `{meetingKey}|{chunkIndex}|{text}`. */
  chunkId: string;
  charStart: number;
  charEnd: number;
  text: string;
}

/** Per-meeting summary written alongside the chunk stream. */
export interface MeetingMeta {
  meetingKey: string;
  date: string;
  meetingName: string;
  transcriptCharLength: number;
  chunkCount: number;
  sourceFile: string | null;
}

export interface ChunkingOptions {
  maxChars: number;
  overlapChars: number;
}
