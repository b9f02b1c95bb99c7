/**
 * @fileoverview Citation Module Exports
 *
 * Page-range resolution and multi-format rendering of source citations.
 */

export type {
  Chunk,
  ChunkMetadata,
  PageRange,
  CitationRange,
  CitationSet,
  CitationShape,
  MetadataSummary,
  StructuredCitation,
  StructuredPageRange,
} from './types.js';

export {
  UNKNOWN_FILENAME,
  extractPage,
  extractPages,
  mergeConsecutive,
  formatRange,
  buildLink,
  tryBuildLink,
  extractFilePath,
  extractFilename,
  hasRequiredMetadata,
  summarizeMetadata,
  resolveCitations,
} from './page_metadata.js';

export {
  LINK_TIP,
  NO_PAGE_INFORMATION,
  formatCitations,
  renderHypertext,
  renderPlain,
  renderStructured,
  renderStyled,
  summarizeSources,
  type StyledFormatOptions,
} from './formatter.js';

export { ChunkSchema, ChunkMetadataSchema, parseChunk, parseChunkMetadata } from './chunk_schema.js';
