/**
 * @fileoverview Tests for auto-merging of retrieved chunks
 */

import { describe, it, expect } from 'vitest';
import type { Chunk } from '../../citations/types.js';
import { autoMerge, type ChunkHierarchy } from '../auto_merge.js';

// ============================================================================
// FIXTURES
// ============================================================================

/**
 * doc
 * ├── sec1: a, b
 * └── sec2: c, d
 */
const PARENTS: Record<string, string> = {
  sec1: 'doc',
  sec2: 'doc',
  a: 'sec1',
  b: 'sec1',
  c: 'sec2',
  d: 'sec2',
};

function node(id: string, score?: number): Chunk {
  return { id, text: `text of ${id}`, score, metadata: { page: 1 } };
}

const hierarchy: ChunkHierarchy = {
  parentOf: (id) => PARENTS[id],
  childCount: (parentId) => Object.values(PARENTS).filter((p) => p === parentId).length,
  chunk: (id) => (id === 'doc' || id in PARENTS ? node(id) : undefined),
};

function summary(chunks: Chunk[]): Array<[string, number]> {
  return chunks.map((chunk) => [chunk.id, Number((chunk.score ?? 0).toFixed(4))]);
}

// ============================================================================
// TESTS
// ============================================================================

describe('autoMerge', () => {
  it('replaces siblings with their parent when more than the ratio is retrieved', () => {
    const merged = autoMerge([node('a', 0.9), node('b', 0.7), node('c', 0.5)], hierarchy, 0.5);

    expect(summary(merged)).toEqual([
      ['sec1', 0.8],
      ['c', 0.5],
    ]);
    expect(merged[0]?.text).toBe('text of sec1');
  });

  it('does not merge at exactly the ratio', () => {
    const merged = autoMerge([node('a', 0.9), node('c', 0.5)], hierarchy, 0.5);

    expect(summary(merged)).toEqual([
      ['a', 0.9],
      ['c', 0.5],
    ]);
  });

  it('keeps merging up the tree', () => {
    const merged = autoMerge([node('a', 0.9), node('b', 0.7), node('c', 0.5)], hierarchy, 0.4);

    expect(summary(merged)).toEqual([['doc', 0.65]]);
  });

  it('keeps a parent that was retrieved directly only once', () => {
    const merged = autoMerge([node('sec1', 0.95), node('a', 0.9), node('b', 0.7)], hierarchy, 0.5);

    expect(summary(merged)).toEqual([['sec1', 0.95]]);
  });

  it('leaves chunks alone when the parent cannot be loaded', () => {
    const orphanHierarchy: ChunkHierarchy = { ...hierarchy, chunk: () => undefined };

    const merged = autoMerge([node('b', 0.7), node('a', 0.9)], orphanHierarchy, 0.5);

    expect(summary(merged)).toEqual([
      ['a', 0.9],
      ['b', 0.7],
    ]);
  });

  it('returns an empty list for no chunks', () => {
    expect(autoMerge([], hierarchy, 0.5)).toEqual([]);
  });
});
