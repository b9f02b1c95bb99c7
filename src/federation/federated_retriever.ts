/**
 * @fileoverview Federated Retriever
 *
 * Queries several collections with one question:
 * - Collections open independently; the ones that fail are reported as warnings
 * - Queries run in bounded parallel batches with a per-collection timeout
 * - Results stay keyed by collection, in collection order
 * - `queryBest` picks one answer with a replaceable ranking policy
 */

import { ConfigurationError, describeError } from '../core/errors.js';
import { safeAsync } from '../core/result.js';
import { CollectionRetriever } from '../retrieval/collection_retriever.js';
import type {
  EmbeddingFunction,
  FederatedResult,
  QueryResult,
  StorageProvider,
  SucceededQueryResult,
} from '../retrieval/types.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import { mapInBatches } from '../utils/async.js';
import { longestAnswerPolicy } from './ranking.js';
import type { FederationConfig, FederationWarning, RankingPolicy } from './types.js';
import { DEFAULT_FEDERATION_CONFIG } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface FederatedRetrieverOptions {
  storage: StorageProvider;
  embed: EmbeddingFunction;
  /** Collections to federate; defaults to every collection the storage lists */
  collectionNames?: readonly string[];
  config?: Partial<FederationConfig>;
  rankingPolicy?: RankingPolicy;
  similarityTopK?: number;
  enableAutoMerging?: boolean;
}

// ============================================================================
// SELECTION
// ============================================================================

/**
 * Pick one result from a federated query.
 *
 * With no succeeded result, the first failed one (in collection order) is
 * returned so the caller still sees an error. Otherwise the highest-scoring
 * succeeded result wins and ties go to the earlier collection.
 * Returns undefined only for an empty result map.
 */
export function selectBest(
  results: FederatedResult,
  policy: RankingPolicy = longestAnswerPolicy
): QueryResult | undefined {
  let best: SucceededQueryResult | undefined;
  let bestScore = Number.NEGATIVE_INFINITY;
  let firstFailed: QueryResult | undefined;

  for (const result of results.values()) {
    if (!result.succeeded) {
      firstFailed ??= result;
      continue;
    }
    const score = policy.score(result);
    if (best === undefined || score > bestScore) {
      best = result;
      bestScore = score;
    }
  }

  return best ?? firstFailed;
}

function uniqueNames(names: readonly string[]): string[] {
  return [...new Set(names)];
}

// ============================================================================
// FEDERATED RETRIEVER
// ============================================================================

export class FederatedRetriever {
  private constructor(
    private readonly retrievers: readonly CollectionRetriever[],
    readonly warnings: readonly FederationWarning[],
    private readonly config: FederationConfig,
    private readonly rankingPolicy: RankingPolicy,
  ) {}

  /**
   * Open every requested collection.
   *
   * @throws ConfigurationError when no collection is requested or none of
   *   them could be opened
   */
  static async create(options: FederatedRetrieverOptions): Promise<FederatedRetriever> {
    const config: FederationConfig = { ...DEFAULT_FEDERATION_CONFIG, ...options.config };
    const requested = options.collectionNames ?? (await options.storage.listCollections());
    const names = uniqueNames(requested);

    if (names.length === 0) {
      throw new ConfigurationError('collectionNames', 'a federation needs at least one collection');
    }

    const opened = await Promise.all(
      names.map((name) =>
        safeAsync(() =>
          CollectionRetriever.open(name, {
            storage: options.storage,
            embed: options.embed,
            similarityTopK: options.similarityTopK,
            enableAutoMerging: options.enableAutoMerging,
            timeoutMs: config.collectionTimeoutMs,
          })
        )
      )
    );

    const retrievers: CollectionRetriever[] = [];
    const warnings: FederationWarning[] = [];
    opened.forEach((outcome, index) => {
      const collectionName = names[index];
      if (outcome.ok) {
        retrievers.push(outcome.value);
        return;
      }
      const message = describeError(outcome.error);
      warnings.push({ collectionName, message });
      logWarning(`Skipping collection ${collectionName}`, { error: message });
    });

    if (retrievers.length === 0) {
      throw new ConfigurationError(
        'collectionNames',
        `none of the collections could be opened (${names.join(', ')})`
      );
    }

    logInfo(`Federated retriever ready with ${retrievers.length} of ${names.length} collections`);
    return new FederatedRetriever(retrievers, warnings, config, options.rankingPolicy ?? longestAnswerPolicy);
  }

  get size(): number {
    return this.retrievers.length;
  }

  get collectionNames(): string[] {
    return this.retrievers.map((retriever) => retriever.collectionName);
  }

  /**
   * Query every collection. Failures stay inside their own entry.
   */
  async queryAll(queryText: string, topK?: number): Promise<FederatedResult> {
    const results = await mapInBatches(this.retrievers, this.config.maxParallelCollections, (retriever) =>
      retriever.query(queryText, topK)
    );

    const federated: FederatedResult = new Map();
    for (const result of results) {
      federated.set(result.collectionName, result);
    }
    return federated;
  }

  /**
   * Query every collection and keep the best-ranked answer.
   */
  async queryBest(queryText: string, topK?: number): Promise<QueryResult> {
    const results = await this.queryAll(queryText, topK);
    const best = selectBest(results, this.rankingPolicy);
    if (best === undefined) {
      // create() guarantees at least one retriever, so queryAll never returns an empty map
      throw new ConfigurationError('collectionNames', 'federation has no collections');
    }
    return best;
  }
}
