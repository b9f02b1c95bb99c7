/**
 * @fileoverview Collection Retriever
 *
 * Runs queries against one collection's loaded index. Backend failures,
 * timeouts and invalid input all come back as failed QueryResults; `query`
 * never rejects.
 */

import { DEFAULT_SETTINGS } from '../config/settings.js';
import { QueryError, describeError } from '../core/errors.js';
import { safeAsync } from '../core/result.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { withTimeout } from '../utils/async.js';
import type {
  EmbeddingFunction,
  IndexHandle,
  IndexResponse,
  QueryResult,
  RetrievalMode,
  StorageProvider,
} from './types.js';
import { failedResult, succeededResult } from './types.js';

export interface CollectionRetrieverOptions {
  storage: StorageProvider;
  embed: EmbeddingFunction;
  /** Chunks retrieved when a query passes no topK */
  similarityTopK?: number;
  /** Prefer hierarchical retrieval when the collection supports it (default: true) */
  enableAutoMerging?: boolean;
  /** Per-query timeout; 0 or undefined waits indefinitely */
  timeoutMs?: number;
}

function isValidTopK(topK: number): boolean {
  return Number.isInteger(topK) && topK > 0;
}

export class CollectionRetriever {
  private constructor(
    readonly collectionName: string,
    readonly mode: RetrievalMode,
    private readonly handle: IndexHandle,
    private readonly defaultTopK: number,
    private readonly timeoutMs: number,
  ) {}

  /**
   * Load a collection's index and pick its retrieval mode.
   *
   * @throws whatever the storage provider raises when the collection cannot be
   *   loaded; a retriever only exists for a usable collection
   */
  static async open(collectionName: string, options: CollectionRetrieverOptions): Promise<CollectionRetriever> {
    const defaultTopK = options.similarityTopK ?? DEFAULT_SETTINGS.similarityTopK;
    if (!isValidTopK(defaultTopK)) {
      throw new QueryError('validate', false, `similarityTopK must be a positive integer, got ${defaultTopK}`, collectionName);
    }

    const { handle, hasDocstore } = await options.storage.loadIndex(collectionName, options.embed);
    const mode: RetrievalMode = hasDocstore && (options.enableAutoMerging ?? true) ? 'hierarchical' : 'flat';
    logInfo(`Collection retriever ready (${mode}) for ${collectionName}`);

    return new CollectionRetriever(collectionName, mode, handle, defaultTopK, options.timeoutMs ?? 0);
  }

  async query(queryText: string, topK?: number): Promise<QueryResult> {
    const startTime = Date.now();
    const k = topK ?? this.defaultTopK;

    const outcome = await safeAsync((): Promise<IndexResponse> => {
      if (queryText.trim().length === 0) {
        throw new QueryError('validate', false, 'query text is empty', this.collectionName);
      }
      if (!isValidTopK(k)) {
        throw new QueryError('validate', false, `topK must be a positive integer, got ${k}`, this.collectionName);
      }
      logDebug(`Querying ${this.collectionName}: ${queryText.slice(0, 100)}`);
      return withTimeout(this.handle.query(queryText, { topK: k, mode: this.mode }), this.timeoutMs, {
        context: `querying collection ${this.collectionName}`,
      });
    });
    const latencyMs = Date.now() - startTime;

    if (!outcome.ok) {
      const message = describeError(outcome.error);
      logWarning(`Query failed for ${this.collectionName}`, { error: message });
      return failedResult(this.collectionName, message, latencyMs);
    }

    const { answer, chunks } = outcome.value;
    logDebug(`Retrieved ${chunks.length} chunks from ${this.collectionName}`);
    return succeededResult(this.collectionName, answer, chunks, latencyMs);
  }
}
