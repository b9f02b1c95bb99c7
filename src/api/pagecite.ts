/**
 * @fileoverview Pagecite client
 *
 * The library surface: citation resolution and formatting over chunks, and
 * single-collection, federated and best-answer queries over a storage
 * provider. Retrievers are opened lazily and reused across queries.
 */

import { formatCitations, type StyledFormatOptions } from '../citations/formatter.js';
import { resolveCitations } from '../citations/page_metadata.js';
import type { Chunk, CitationSet, CitationShape, StructuredCitation } from '../citations/types.js';
import { DEFAULT_SETTINGS, type Settings } from '../config/settings.js';
import { FederatedRetriever } from '../federation/federated_retriever.js';
import { longestAnswerPolicy } from '../federation/ranking.js';
import type { FederationWarning, RankingPolicy } from '../federation/types.js';
import { createExtractiveSynthesizer } from '../providers/extractive_synthesizer.js';
import { createHashedEmbedder } from '../providers/hashed_embedder.js';
import { CollectionRetriever } from '../retrieval/collection_retriever.js';
import type {
  AnswerSynthesizer,
  EmbeddingFunction,
  FederatedResult,
  QueryResult,
  StorageProvider,
} from '../retrieval/types.js';
import { SqliteCollectionStore } from '../storage/sqlite_collection_store.js';
import { setLogLevel } from '../telemetry/logger.js';

// ============================================================================
// CONFIG
// ============================================================================

export interface PageciteConfig {
  storage: StorageProvider;
  embed: EmbeddingFunction;
  settings?: Settings;
  rankingPolicy?: RankingPolicy;
}

// ============================================================================
// CLIENT
// ============================================================================

export class Pagecite {
  readonly settings: Settings;
  private readonly storage: StorageProvider;
  private readonly embed: EmbeddingFunction;
  private readonly rankingPolicy: RankingPolicy;
  private readonly retrievers = new Map<string, Promise<CollectionRetriever>>();
  private readonly federations = new Map<string, Promise<FederatedRetriever>>();

  constructor(config: PageciteConfig) {
    this.storage = config.storage;
    this.embed = config.embed;
    this.settings = config.settings ?? DEFAULT_SETTINGS;
    this.rankingPolicy = config.rankingPolicy ?? longestAnswerPolicy;
  }

  resolveCitations(chunks: readonly Chunk[]): CitationSet {
    return resolveCitations(chunks);
  }

  format(chunks: readonly Chunk[], shape: 'structured'): StructuredCitation;
  format(chunks: readonly Chunk[], shape: Exclude<CitationShape, 'structured'>, options?: StyledFormatOptions): string;
  format(chunks: readonly Chunk[], shape: CitationShape, options?: StyledFormatOptions): string | StructuredCitation;
  format(chunks: readonly Chunk[], shape: CitationShape, options?: StyledFormatOptions): string | StructuredCitation {
    return formatCitations(chunks, shape, options);
  }

  async listCollections(): Promise<string[]> {
    return this.storage.listCollections();
  }

  /**
   * Query one collection.
   *
   * @throws whatever the storage provider raises when the collection cannot
   *   be opened; query failures come back as failed results
   */
  async query(collectionName: string, queryText: string, topK?: number): Promise<QueryResult> {
    const retriever = await this.retrieverFor(collectionName);
    return retriever.query(queryText, topK);
  }

  /**
   * Query several collections, or every collection when `collectionNames`
   * is undefined.
   *
   * @throws ConfigurationError when no collection can be opened
   */
  async queryFederated(
    collectionNames: readonly string[] | undefined,
    queryText: string,
    topK?: number
  ): Promise<FederatedResult> {
    const federation = await this.federationFor(collectionNames);
    return federation.queryAll(queryText, topK);
  }

  /**
   * Query several collections and keep the best-ranked answer.
   *
   * @throws ConfigurationError when no collection can be opened
   */
  async queryBest(collectionNames: readonly string[] | undefined, queryText: string, topK?: number): Promise<QueryResult> {
    const federation = await this.federationFor(collectionNames);
    return federation.queryBest(queryText, topK);
  }

  /** Collections skipped when the federation over `collectionNames` was opened. */
  async federationWarnings(collectionNames: readonly string[] | undefined): Promise<readonly FederationWarning[]> {
    const federation = await this.federationFor(collectionNames);
    return federation.warnings;
  }

  private retrieverFor(collectionName: string): Promise<CollectionRetriever> {
    return this.cached(this.retrievers, collectionName, () =>
      CollectionRetriever.open(collectionName, {
        storage: this.storage,
        embed: this.embed,
        similarityTopK: this.settings.similarityTopK,
        enableAutoMerging: this.settings.enableAutoMerging,
        timeoutMs: this.settings.federation.collectionTimeoutMs,
      })
    );
  }

  private federationFor(collectionNames: readonly string[] | undefined): Promise<FederatedRetriever> {
    const key = collectionNames === undefined ? '*' : JSON.stringify(collectionNames);
    return this.cached(this.federations, key, () =>
      FederatedRetriever.create({
        storage: this.storage,
        embed: this.embed,
        collectionNames,
        config: this.settings.federation,
        rankingPolicy: this.rankingPolicy,
        similarityTopK: this.settings.similarityTopK,
        enableAutoMerging: this.settings.enableAutoMerging,
      })
    );
  }

  /** Share one pending open per key; a failed open is forgotten so it can be retried. */
  private cached<T>(cache: Map<string, Promise<T>>, key: string, open: () => Promise<T>): Promise<T> {
    const existing = cache.get(key);
    if (existing) return existing;

    const pending = open().catch((error: unknown) => {
      cache.delete(key);
      throw error;
    });
    cache.set(key, pending);
    return pending;
  }
}

export function createPagecite(config: PageciteConfig): Pagecite {
  return new Pagecite(config);
}

// ============================================================================
// DEFAULT WIRING
// ============================================================================

export interface LocalPagecite {
  pagecite: Pagecite;
  store: SqliteCollectionStore;
  embed: EmbeddingFunction;
}

/**
 * A client over the SQLite store named in the settings, with the offline
 * embedder and extractive synthesizer. The caller closes `store`.
 */
export function openLocalPagecite(settings: Settings, synthesize?: AnswerSynthesizer): LocalPagecite {
  setLogLevel(settings.logLevel);
  const store = SqliteCollectionStore.open(settings.storePath, {
    autoMergeRatio: settings.autoMergeRatio,
    synthesize: synthesize ?? createExtractiveSynthesizer(),
  });
  const embed = createHashedEmbedder(settings.embeddingDimensions);
  return { pagecite: createPagecite({ storage: store, embed, settings }), store, embed };
}
