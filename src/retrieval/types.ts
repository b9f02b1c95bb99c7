/**
 * @fileoverview Retrieval types
 *
 * Contracts between the retrievers and the index/storage provider that owns
 * the vectors, plus the result envelope every query produces.
 */

import type { Chunk } from '../citations/types.js';

// ============================================================================
// PROVIDER CONTRACTS
// ============================================================================

/** Embeds a batch of texts; one vector per input, in order. */
export type EmbeddingFunction = (texts: string[]) => Promise<number[][]>;

/** Produces answer text from the chunks retrieved for a query. */
export type AnswerSynthesizer = (queryText: string, chunks: readonly Chunk[]) => Promise<string>;

/**
 * `hierarchical` lets the index replace groups of small chunks with their
 * parent; `flat` returns the top-K chunks as retrieved.
 */
export type RetrievalMode = 'hierarchical' | 'flat';

export interface IndexQueryOptions {
  topK: number;
  mode: RetrievalMode;
}

export interface IndexResponse {
  answer: string;
  chunks: Chunk[];
}

/** A loaded, queryable collection. Implementations throw on backend failure. */
export interface IndexHandle {
  query(queryText: string, options: IndexQueryOptions): Promise<IndexResponse>;
}

export interface LoadedIndex {
  handle: IndexHandle;
  /** Whether the collection stores its chunk hierarchy (merge-capable) */
  hasDocstore: boolean;
}

export interface StorageProvider {
  loadIndex(collectionName: string, embed: EmbeddingFunction): Promise<LoadedIndex>;
  listCollections(): Promise<string[]>;
}

// ============================================================================
// QUERY RESULTS
// ============================================================================

interface QueryResultBase {
  collectionName: string;
  /** Wall-clock time of the query, including synthesis */
  latencyMs: number;
}

export interface SucceededQueryResult extends QueryResultBase {
  succeeded: true;
  answer: string;
  chunks: Chunk[];
  error?: undefined;
}

/** A failed query never carries an answer or chunks. */
export interface FailedQueryResult extends QueryResultBase {
  succeeded: false;
  answer: '';
  chunks: Chunk[];
  error: string;
}

export type QueryResult = SucceededQueryResult | FailedQueryResult;

/** Per-collection results, in the order the collections were queried. */
export type FederatedResult = Map<string, QueryResult>;

export function succeededResult(
  collectionName: string,
  answer: string,
  chunks: Chunk[],
  latencyMs: number
): SucceededQueryResult {
  return { collectionName, succeeded: true, answer, chunks, latencyMs };
}

export function failedResult(collectionName: string, error: string, latencyMs: number): FailedQueryResult {
  return { collectionName, succeeded: false, answer: '', chunks: [], error, latencyMs };
}
