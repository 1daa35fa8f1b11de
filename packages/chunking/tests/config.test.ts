import { describe, it, expect } from 'vitest';
import { assertChunkingOptions, ChunkingConfigError, loadChunkingConfig } from '../src/config.js';

describe('loadChunkingConfig', () => {
  it('falls back to 2000 / 200 when nothing is set', () => {
    expect(loadChunkingConfig({})).toEqual({ maxChars: 2000, overlapChars: 200 });
  });

  it('reads CHUNK_MAX_CHARS and CHUNK_OVERLAP_CHARS', () => {
    expect(loadChunkingConfig({ CHUNK_MAX_CHARS: ' 500 ', CHUNK_OVERLAP_CHARS: '0' })).toEqual({
      maxChars: 500,
      overlapChars: 0,
    });
  });

  it('names the variable that is not an integer', () => {
    expect(() => loadChunkingConfig({ CHUNK_MAX_CHARS: 'abc' })).toThrow(
      'Invalid chunking config: CHUNK_MAX_CHARS must be an integer (got "abc")',
    );
    expect(() => loadChunkingConfig({ CHUNK_OVERLAP_CHARS: '12.5' })).toThrow(ChunkingConfigError);
  });

  it('rejects a zero budget', () => {
    expect(() => loadChunkingConfig({ CHUNK_MAX_CHARS: '0' })).toThrow(
      'Invalid chunking config: maxChars must be a positive integer (got 0)',
    );
  });

  it('rejects a negative overlap', () => {
    expect(() => loadChunkingConfig({ CHUNK_OVERLAP_CHARS: '-5' })).toThrow(
      'Invalid chunking config: overlapChars must be a non-negative integer (got -5)',
    );
  });
});

describe('assertChunkingOptions', () => {
  it('accepts the smallest valid options', () => {
    expect(() => assertChunkingOptions({ maxChars: 1, overlapChars: 0 })).not.toThrow();
  });

  it('throws a named error', () => {
    try {
      assertChunkingOptions({ maxChars: Number.NaN, overlapChars: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ChunkingConfigError);
      expect(err).toHaveProperty('name', 'ChunkingConfigError');
    }
  });
});
