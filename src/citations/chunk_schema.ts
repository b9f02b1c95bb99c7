/**
 * @fileoverview Chunk validation at the storage boundary
 *
 * Rows read back from a collection are untrusted JSON. They are checked here
 * once, so the citation code can rely on typed optional fields instead of
 * probing metadata at every call site.
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import type { Chunk, ChunkMetadata } from './types.js';

const PageNumberSchema = z.coerce.number().int().positive();

export const ChunkMetadataSchema = z.object({
  page: PageNumberSchema.optional(),
  start_page: PageNumberSchema.optional(),
  end_page: PageNumberSchema.optional(),
  filename: z.string().optional(),
  file_path: z.string().optional(),
}).passthrough();

export const ChunkSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  score: z.number().finite().optional(),
  metadata: ChunkMetadataSchema.default({}),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
    .join('; ');
}

/**
 * Validate chunk metadata. Page keys arriving as numeric strings are coerced.
 *
 * @throws ValidationError when a page key is not a positive integer or a
 *   name/path key is not a string
 */
export function parseChunkMetadata(value: unknown): ChunkMetadata {
  const parsed = ChunkMetadataSchema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new ValidationError('metadata', 'chunk metadata', describeIssues(parsed.error));
  }
  return parsed.data;
}

export function parseChunk(value: unknown): Chunk {
  const parsed = ChunkSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError('chunk', 'chunk record', describeIssues(parsed.error));
  }
  return parsed.data;
}
