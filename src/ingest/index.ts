/**
 * @fileoverview Ingest Module Exports
 */

export { toCollectionName } from './collection_name.js';
export { chunkDocument, leavesOf, splitSpan, type ChunkSource } from './hierarchical_chunker.js';
export { ingestDocument, type IngestOptions } from './ingest.js';
export {
  PageDocumentSchema,
  parsePageDocument,
  type IngestReport,
  type PageDocument,
  type PageText,
} from './types.js';
