/**
 * @fileoverview Storage Module Exports
 */

export type { ChunkNode, CollectionInfo, CreateCollectionOptions } from './types.js';

export { SqliteCollectionStore, type SqliteCollectionStoreOptions } from './sqlite_collection_store.js';

export { autoMerge, type ChunkHierarchy } from './auto_merge.js';

export { cosineSimilarity, decodeEmbedding, encodeEmbedding } from './vectors.js';
