/**
 * @fileoverview Auto-merging of retrieved chunks
 *
 * Hierarchical collections store every chunk at several sizes: each leaf has a
 * parent holding it and its siblings. When a query retrieves more than
 * `ratio` of a parent's children, those children are replaced by the parent.
 * The check repeats up the tree until nothing merges.
 */

import type { Chunk } from '../citations/types.js';

/** Read access to the stored chunk tree. */
export interface ChunkHierarchy {
  parentOf(chunkId: string): string | undefined;
  childCount(parentId: string): number;
  chunk(chunkId: string): Chunk | undefined;
}

function meanScore(chunks: readonly Chunk[]): number {
  const total = chunks.reduce((sum, chunk) => sum + (chunk.score ?? 0), 0);
  return total / chunks.length;
}

function byScoreDescending(a: Chunk, b: Chunk): number {
  return (b.score ?? 0) - (a.score ?? 0);
}

/**
 * Merge retrieved chunks into their parents.
 *
 * A merged parent scores the mean of the children it replaces. The output is
 * sorted by score, highest first, with no chunk id repeated.
 */
export function autoMerge(retrieved: readonly Chunk[], hierarchy: ChunkHierarchy, ratio: number): Chunk[] {
  let current = [...retrieved];

  for (;;) {
    const siblings = new Map<string, Chunk[]>();
    for (const chunk of current) {
      const parentId = hierarchy.parentOf(chunk.id);
      if (parentId === undefined) continue;
      const group = siblings.get(parentId) ?? [];
      group.push(chunk);
      siblings.set(parentId, group);
    }

    const replaced = new Set<string>();
    const parents: Chunk[] = [];
    for (const [parentId, children] of siblings) {
      const total = hierarchy.childCount(parentId);
      if (total === 0 || children.length / total <= ratio) continue;
      const parent = hierarchy.chunk(parentId);
      if (parent === undefined) continue;
      for (const child of children) replaced.add(child.id);
      parents.push({ ...parent, score: meanScore(children) });
    }

    if (parents.length === 0) break;

    const seen = new Set<string>();
    current = [...current.filter((chunk) => !replaced.has(chunk.id)), ...parents].filter((chunk) => {
      if (seen.has(chunk.id)) return false;
      seen.add(chunk.id);
      return true;
    });
  }

  return current.sort(byScoreDescending);
}
