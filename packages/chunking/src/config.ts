/**
 * FILE PURPOSE: Chunking configuration — env loading + fail-fast validation
 *
 * WHY: A non-positive budget makes the packer loop meaningless. Bad settings
 *      must stop a run before the first record, never surface per chunk.
 */

import type { ChunkingOptions } from './ingestion/types.js';

export const DEFAULT_MAX_CHARS = 2000;
export const DEFAULT_OVERLAP_CHARS = 200;

export class ChunkingConfigError extends Error {
  constructor(message: string) {
    super(`Invalid chunking config: ${message}`);
    this.name = 'ChunkingConfigError';
  }
}

export function assertChunkingOptions(options: ChunkingOptions): void {
  const { maxChars, overlapChars } = options;
  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new ChunkingConfigError(`maxChars must be a positive integer (got ${maxChars})`);
  }
  if (!Number.isInteger(overlapChars) || overlapChars < 0) {
    throw new ChunkingConfigError(`overlapChars must be a non-negative integer (got ${overlapChars})`);
  }
}

function envInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ChunkingConfigError(`${name} must be an integer (got "${raw}")`);
  }
  return parsed;
}

/** Read CHUNK_MAX_CHARS / CHUNK_OVERLAP_CHARS, falling back to 2000 / 200. */
export function loadChunkingConfig(env: NodeJS.ProcessEnv = process.env): ChunkingOptions {
  const options: ChunkingOptions = {
    maxChars: envInteger(env, 'CHUNK_MAX_CHARS', DEFAULT_MAX_CHARS),
    overlapChars: envInteger(env, 'CHUNK_OVERLAP_CHARS', DEFAULT_OVERLAP_CHARS),
  };
  assertChunkingOptions(options);
  return options;
}
