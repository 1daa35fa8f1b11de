/**
 * FILE PURPOSE: Barrel export for chunking pipeline processors
 */

export { processChunkMeeting } from './chunk-meeting.js';
export type { ChunkMeetingResult } from './chunk-meeting.js';

export { processChunkFile } from './chunk-file.js';
export type { ChunkFileResult } from './chunk-file.js';
