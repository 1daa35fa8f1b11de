import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { openJsonlWriter, toChunkLine, toMeetingLine } from '../src/ingestion/export/jsonl.js';

describe('toChunkLine', () => {
  it('writes snake_case fields in a fixed order', () => {
    const line = toChunkLine({
      meetingKey: 'abc',
      date: '2026-02-02',
      meetingName: 'Meeting',
      chunkIndex: 1,
      chunkId: '2ee4d59fee41634ef144b1ea8076d28391598b44',
      charStart: 13,
      charEnd: 24,
      text: 'Para2 line.',
    });
    expect(line).toBe(
      '{"meeting_key":"abc","date_ymd":"2026-02-02","meeting_name":"Meeting","chunk_index":1,' +
        '"chunk_id":"2ee4d59fee41634ef144b1ea8076d28391598b44","char_start":13,"char_end":24,"text":"Para2 line."}',
    );
  });

  it('escapes newlines so each record stays on one line', () => {
    const line = toChunkLine({
      meetingKey: 'k',
      date: '',
      meetingName: '',
      chunkIndex: 0,
      chunkId: 'id',
      charStart: 0,
      charEnd: 4,
      text: 'a\n\nb',
    });
    expect(line).not.toContain('\n');
    expect(line.endsWith('"text":"a\\n\\nb"}')).toBe(true);
  });
});

describe('toMeetingLine', () => {
  it('writes a null source file explicitly', () => {
    expect(
      toMeetingLine({
        meetingKey: 'abc',
        date: '',
        meetingName: 'Standup',
        transcriptCharLength: 42,
        chunkCount: 2,
        sourceFile: null,
      }),
    ).toBe(
      '{"meeting_key":"abc","date_ymd":"","meeting_name":"Standup","transcript_char_len":42,"chunk_count":2,"source_file":null}',
    );
  });
});

describe('openJsonlWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chunking-jsonl-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes one newline-terminated line per call', async () => {
    const path = join(dir, 'chunks.jsonl');
    const writer = await openJsonlWriter(path);
    await writer.write('{"a":1}');
    await writer.write('{"b":2}');
    await writer.close();

    expect(readFileSync(path, 'utf8')).toBe('{"a":1}\n{"b":2}\n');
  });

  it('truncates an existing file', async () => {
    const path = join(dir, 'meetings.jsonl');
    const first = await openJsonlWriter(path);
    await first.write('old line');
    await first.close();

    const second = await openJsonlWriter(path);
    await second.write('new');
    await second.close();

    expect(readFileSync(path, 'utf8')).toBe('new\n');
  });

  it('rejects instead of emitting an unhandled error when the target is a directory', async () => {
    const path = join(dir, 'chunks.jsonl');
    mkdirSync(path);
    await expect(openJsonlWriter(path)).rejects.toThrow(/EISDIR/);
  });

  it('rejects when the parent directory does not exist', async () => {
    await expect(openJsonlWriter(join(dir, 'missing', 'chunks.jsonl'))).rejects.toThrow(/ENOENT/);
  });
});
