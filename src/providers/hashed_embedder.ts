/**
 * @fileoverview Offline hashed-term embedder
 *
 * Feature hashing: every lower-cased word is hashed with SHA-256 into one of
 * `dimensions` buckets with a +1/-1 sign, then the vector is scaled to unit
 * length. Texts sharing words end up close under cosine similarity. Runs
 * without a model download or network access.
 */

import { createHash } from 'node:crypto';
import { ConfigurationError } from '../core/errors.js';
import type { EmbeddingFunction } from '../retrieval/types.js';

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

function bucketOf(token: string, dimensions: number): { index: number; sign: number } {
  const digest = createHash('sha256').update(token, 'utf-8').digest();
  return {
    index: digest.readUInt32BE(0) % dimensions,
    sign: (digest[4] ?? 0) & 1 ? -1 : 1,
  };
}

/** Embed one text. A text without words embeds to the zero vector. */
export function embedText(text: string, dimensions: number): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of tokenize(text)) {
    const { index, sign } = bucketOf(token, dimensions);
    vector[index] = (vector[index] ?? 0) + sign;
  }

  const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
  return norm === 0 ? vector : vector.map((value) => value / norm);
}

export function createHashedEmbedder(dimensions = 384): EmbeddingFunction {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new ConfigurationError('embeddingDimensions', `expected a positive integer, got ${dimensions}`);
  }
  return async (texts) => texts.map((text) => embedText(text, dimensions));
}
