/**
 * @fileoverview Document ingestion
 *
 * Chunks a page document, embeds its leaves in batches and writes the tree to
 * a collection, replacing whatever the collection held before.
 */

import * as path from 'node:path';
import { StorageError, ValidationError } from '../core/errors.js';
import type { EmbeddingFunction } from '../retrieval/types.js';
import type { SqliteCollectionStore } from '../storage/sqlite_collection_store.js';
import type { ChunkNode } from '../storage/types.js';
import { logInfo } from '../telemetry/logger.js';
import { chunkArray } from '../utils/async.js';
import { toCollectionName } from './collection_name.js';
import { chunkDocument, leavesOf } from './hierarchical_chunker.js';
import type { IngestReport, PageDocument } from './types.js';

export interface IngestOptions {
  embed: EmbeddingFunction;
  chunkSizes: readonly number[];
  /** Defaults to the name derived from the file name */
  collectionName?: string;
  /** Texts per embedding call (default: 64) */
  embedBatchSize?: number;
}

async function embedLeaves(
  leaves: readonly ChunkNode[],
  embed: EmbeddingFunction,
  batchSize: number
): Promise<Map<string, number[]>> {
  const vectors = new Map<string, number[]>();
  for (const batch of chunkArray(leaves, batchSize)) {
    const embedded = await embed(batch.map((leaf) => leaf.text));
    if (embedded.length !== batch.length) {
      throw new StorageError(
        'write',
        false,
        `embedding function returned ${embedded.length} vectors for ${batch.length} texts`
      );
    }
    batch.forEach((leaf, index) => {
      const vector = embedded[index];
      if (vector !== undefined) vectors.set(leaf.id, vector);
    });
  }
  return vectors;
}

/**
 * @throws ValidationError when the document has no text
 * @throws StorageError when embedding or writing fails
 */
export async function ingestDocument(
  store: SqliteCollectionStore,
  document: PageDocument,
  options: IngestOptions
): Promise<IngestReport> {
  const filePath = path.resolve(document.filePath);
  const filename = document.filename ?? path.basename(filePath);
  const collectionName = options.collectionName ?? toCollectionName(filename);

  const nodes = chunkDocument({ filename, filePath, pages: document.pages }, options.chunkSizes);
  if (nodes.length === 0) {
    throw new ValidationError('pages', 'at least one page with text', `${document.pages.length} empty pages`);
  }

  const leaves = leavesOf(nodes);
  const vectors = await embedLeaves(leaves, options.embed, options.embedBatchSize ?? 64);
  const embeddedNodes = nodes.map((node) => {
    const embedding = vectors.get(node.id);
    return embedding === undefined ? node : { ...node, embedding };
  });

  store.replaceCollection(collectionName, embeddedNodes, { sourceFile: filePath });

  logInfo(`Ingested ${filename} into ${collectionName}`, {
    pages: document.pages.length,
    nodes: nodes.length,
    leaves: leaves.length,
  });

  return {
    collectionName,
    filePath,
    pageCount: document.pages.length,
    nodeCount: nodes.length,
    leafCount: leaves.length,
  };
}
