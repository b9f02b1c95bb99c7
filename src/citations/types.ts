/**
 * @fileoverview Citation types
 *
 * A Chunk is the unit a collection returns for a query. Its metadata keys keep
 * the snake_case names written at ingestion, since they are stored as-is.
 */

/**
 * Metadata attached to a retrieved chunk. Every field is optional: the
 * citation layer degrades to "no page information" rather than failing.
 */
export interface ChunkMetadata {
  /** 1-based page the chunk starts on */
  page?: number;
  /** Fallback page key written by hierarchical chunking */
  start_page?: number;
  end_page?: number;
  filename?: string;
  /** Absolute path of the source PDF */
  file_path?: string;
  [key: string]: unknown;
}

export interface Chunk {
  id: string;
  text: string;
  /** Similarity score assigned by the index, when it reports one */
  score?: number;
  metadata: ChunkMetadata;
}

/** Inclusive page interval; start <= end. */
export interface PageRange {
  start: number;
  end: number;
}

export interface CitationRange extends PageRange {
  /** "Page 5" or "Pages 5-7" */
  pageText: string;
  /** file:// URI opening the first page of the range, when one can be built */
  link?: string;
}

/**
 * Page citations for one batch of chunks, derived once and shared by every
 * output shape.
 */
export interface CitationSet {
  readonly filename: string;
  readonly filePath?: string;
  /** Unique referenced pages, ascending */
  readonly pages: readonly number[];
  readonly ranges: readonly CitationRange[];
}

export interface MetadataSummary {
  totalChunks: number;
  validMetadataCount: number;
  uniquePageCount: number;
  pageRange: PageRange | null;
  filename: string;
  filePath: string | null;
}

export type CitationShape = 'plain' | 'styled' | 'structured' | 'hypertext';

export interface StructuredPageRange {
  startPage: number;
  endPage: number;
  pageText: string;
  link?: string;
  filePath?: string;
}

export interface StructuredCitation {
  filename: string;
  totalPagesReferenced: number;
  pageRanges: StructuredPageRange[];
  hasLinks: boolean;
}
