#!/usr/bin/env npx tsx
/**
 * FILE PURPOSE: Chunk meeting transcript CSV exports into JSONL
 *
 * HOW: Discovers CSV files (argument, CHUNK_INPUT, or ./ and ./data),
 *      chunks every meeting with the configured budget and writes
 *      chunks.jsonl + meetings.jsonl into CHUNK_OUTPUT_DIR.
 *
 * USAGE:
 *   npx tsx scripts/chunk-transcripts.ts exports/
 *   CHUNK_MAX_CHARS=1200 CHUNK_OVERLAP_CHARS=100 npx tsx scripts/chunk-transcripts.ts meetings.csv
 */

import { mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import {
  chunkFromNormalized,
  discoverCsvFiles,
  loadChunkingConfig,
  normalize,
  openJsonlWriter,
  readMeetingRecords,
  summarizeMeeting,
  toChunkLine,
  toMeetingLine,
} from '../packages/chunking/src/index.js';

async function main() {
  const { maxChars, overlapChars } = loadChunkingConfig();
  const input = process.argv[2] || process.env.CHUNK_INPUT || undefined;
  const outDir = resolve(process.env.CHUNK_OUTPUT_DIR || 'chunks-out');

  const files = discoverCsvFiles(input);
  if (files.length === 0) {
    process.stderr.write(`WARN: No CSV files found${input ? ` at ${input}` : ''}\n`);
    return;
  }

  mkdirSync(outDir, { recursive: true });

  let meetings = 0;
  let chunks = 0;

  // Open/write errors reject into main(); both writers are closed either way.
  const chunkOut = await openJsonlWriter(join(outDir, 'chunks.jsonl'));
  try {
    const meetingOut = await openJsonlWriter(join(outDir, 'meetings.jsonl'));
    try {
      for await (const record of readMeetingRecords(files)) {
        const normalized = normalize(record.transcript);
        const records = chunkFromNormalized(record, normalized, maxChars, overlapChars);

        for (const chunk of records) {
          await chunkOut.write(toChunkLine(chunk));
        }
        await meetingOut.write(toMeetingLine(summarizeMeeting(record, normalized, records)));

        meetings++;
        chunks += records.length;
      }
    } finally {
      await meetingOut.close();
    }
  } finally {
    await chunkOut.close();
  }

  process.stdout.write(
    `Done. Files: ${files.length}, Meetings: ${meetings}, Chunks: ${chunks} (max ${maxChars}, overlap ${overlapChars}) → ${outDir}\n`,
  );
}

main().catch((err) => {
  process.stderr.write(`Fatal: ${err}\n`);
  process.exit(1);
});
