/**
 * @fileoverview Collection store types
 */

import type { ChunkMetadata } from '../citations/types.js';

/**
 * One node of a collection's chunk tree, as written at ingestion.
 * Leaves carry an embedding; parents exist only for auto-merging.
 */
export interface ChunkNode {
  id: string;
  /** null for a root node */
  parentId: string | null;
  /** 0 for the coarsest chunk size */
  level: number;
  text: string;
  metadata: ChunkMetadata;
  embedding?: readonly number[];
}

export interface CollectionInfo {
  name: string;
  sourceFile: string | null;
  createdAt: Date;
  /** Every stored node, leaves and parents */
  nodeCount: number;
  /** Embedded nodes, the ones a query can retrieve */
  leafCount: number;
  /** Whether the chunk hierarchy is stored, enabling auto-merging */
  hasDocstore: boolean;
}

export interface CreateCollectionOptions {
  sourceFile?: string;
  /** Drop any existing nodes of a collection with the same name */
  replace?: boolean;
}
