/**
 * @fileoverview Embedding encoding and similarity
 *
 * Embeddings are stored as little-endian Float32 BLOBs.
 */

export function encodeEmbedding(vector: readonly number[]): Buffer {
  const buffer = Buffer.allocUnsafe(vector.length * 4);
  const view = new Float32Array(buffer.buffer, buffer.byteOffset, vector.length);
  view.set(vector);
  return buffer;
}

export function decodeEmbedding(blob: Buffer): Float32Array {
  // Copy out: the BLOB's buffer may not be 4-byte aligned
  const copy = new Uint8Array(blob);
  return new Float32Array(copy.buffer, 0, Math.floor(copy.byteLength / 4));
}

/**
 * Cosine similarity in [-1, 1]; 0 when either vector is all zeros or the
 * lengths differ.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
