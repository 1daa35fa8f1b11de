/**
 * FILE PURPOSE: CSV meeting-export source
 *
 * WHY: Meeting transcripts arrive as CSV exports with inconsistent columns.
 *      This adapter turns rows into MeetingRecords and nothing more —
 *      chunking never sees CSV.
 * HOW: Papa Parse with header rows. Files without a transcript column are
 *      skipped, as are rows with an empty transcript.
 */

import { createHash } from 'node:crypto';
import { existsSync, readdirSync, realpathSync, statSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import Papa from 'papaparse';
import type { MeetingRecord } from '../types.js';
import { extractDate } from './dates.js';
import { trimWhitespace } from '../whitespace.js';

type CsvRow = Record<string, string | undefined>;

const TRANSCRIPT_COLUMNS = ['content', 'content_clean'];

function listCsv(dir: string): string[] {
  return readdirSync(dir)
    .filter((name) => name.toLowerCase().endsWith('.csv'))
    .sort()
    .map((name) => join(dir, name));
}

/** Real path when it resolves; a dangling link or vanished entry keeps its own path and fails at read time. */
function resolveReal(path: string): string {
  try {
    return realpathSync(path);
  } catch {
    return resolve(path);
  }
}

/**
 * A directory yields its *.csv files (sorted), a file yields itself. Without
 * a path, `cwd` and `cwd/data` are scanned. Duplicates are dropped by real path.
 */
export function discoverCsvFiles(inputPath?: string, cwd: string = process.cwd()): string[] {
  const candidates: string[] = [];
  if (inputPath) {
    if (existsSync(inputPath)) {
      const stat = statSync(inputPath);
      if (stat.isDirectory()) candidates.push(...listCsv(inputPath));
      else if (stat.isFile()) candidates.push(inputPath);
    }
  } else {
    for (const base of [cwd, join(cwd, 'data')]) {
      if (existsSync(base) && statSync(base).isDirectory()) candidates.push(...listCsv(base));
    }
  }

  const seen = new Set<string>();
  return candidates.filter((path) => {
    const real = resolveReal(path);
    if (seen.has(real)) return false;
    seen.add(real);
    return true;
  });
}

export function hasTranscriptColumns(fields: readonly string[] | undefined): boolean {
  if (!fields) return false;
  return fields.some((field) => TRANSCRIPT_COLUMNS.includes(trimWhitespace(field)));
}

/** Prefer the cleaned transcript; fall back to the raw one. */
export function selectTranscript(row: CsvRow): string {
  return row.content_clean || row.content || '';
}

/** The row's own meeting_key, else a short hash of name, date and row position. */
export function computeMeetingKey(row: CsvRow, meetingName: string, date: string, rowIndex: number): string {
  if (row.meeting_key) return row.meeting_key;
  return createHash('sha1').update(`${meetingName}|${date}|${rowIndex}`, 'utf8').digest('hex').slice(0, 12);
}

export function parseMeetingCsv(content: string, sourceFile?: string): MeetingRecord[] {
  const parsed = Papa.parse<CsvRow>(content, {
    header: true,
    skipEmptyLines: true,
    transformHeader: (header) => trimWhitespace(header),
  });
  const label = sourceFile ?? '<inline>';

  if (!hasTranscriptColumns(parsed.meta.fields)) {
    process.stderr.write(`WARN: ${label} has no content/content_clean column — skipped\n`);
    return [];
  }
  if (parsed.errors.length > 0) {
    process.stderr.write(`WARN: ${label}: ${parsed.errors.length} malformed CSV row(s)\n`);
  }

  const records: MeetingRecord[] = [];
  parsed.data.forEach((row, rowIndex) => {
    const transcript = selectTranscript(row);
    if (!transcript) return;
    const name = trimWhitespace(row.name ?? '');
    const date = extractDate(row, name);
    records.push({
      key: computeMeetingKey(row, name, date, rowIndex),
      date,
      name,
      transcript,
      sequenceIndex: rowIndex,
      sourceFile,
    });
  });
  return records;
}

/** Records from each readable path, in path order. Unreadable files are skipped. */
export async function* readMeetingRecords(paths: Iterable<string>): AsyncGenerator<MeetingRecord> {
  for (const path of paths) {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (err) {
      process.stderr.write(`WARN: Could not read ${path}: ${err instanceof Error ? err.message : String(err)}\n`);
      continue;
    }
    yield* parseMeetingCsv(content, path);
  }
}
