import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../core/errors.js';
import { parseChunk, parseChunkMetadata } from '../chunk_schema.js';

describe('parseChunkMetadata', () => {
  it('coerces numeric page strings and keeps extra keys', () => {
    expect(parseChunkMetadata({ page: '4', filename: 'a.pdf', section: 'Intro' })).toEqual({
      page: 4,
      filename: 'a.pdf',
      section: 'Intro',
    });
  });

  it('treats missing metadata as empty', () => {
    expect(parseChunkMetadata(undefined)).toEqual({});
  });

  it('rejects non-positive pages', () => {
    expect(() => parseChunkMetadata({ page: 0 })).toThrow(ValidationError);
  });

  it('rejects a non-string path', () => {
    expect(() => parseChunkMetadata({ file_path: 42 })).toThrow(/file_path/);
  });
});

describe('parseChunk', () => {
  it('accepts a stored chunk', () => {
    expect(parseChunk({ id: 'n1', text: 'body', score: 0.5, metadata: { start_page: 2 } })).toEqual({
      id: 'n1',
      text: 'body',
      score: 0.5,
      metadata: { start_page: 2 },
    });
  });

  it('defaults absent metadata', () => {
    expect(parseChunk({ id: 'n2', text: '' }).metadata).toEqual({});
  });

  it('requires an id', () => {
    expect(() => parseChunk({ id: '', text: 'x' })).toThrow('Validation failed for chunk');
  });
});
