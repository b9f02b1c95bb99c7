/**
 * @fileoverview In-process storage provider for tests
 *
 * Serves canned answers per collection and records every query it receives.
 */

import type { Chunk } from '../citations/types.js';
import { StorageError } from '../core/errors.js';
import type {
  EmbeddingFunction,
  IndexQueryOptions,
  LoadedIndex,
  StorageProvider,
} from '../retrieval/types.js';

export interface FakeCollection {
  answer?: string;
  chunks?: Chunk[];
  hasDocstore?: boolean;
  /** Reject loadIndex with this message */
  loadError?: string;
  /** Reject every query with this message */
  queryError?: string;
  /** Delay before answering */
  delayMs?: number;
}

export interface RecordedQuery {
  collectionName: string;
  queryText: string;
  options: IndexQueryOptions;
}

export class InMemoryStorage implements StorageProvider {
  readonly queries: RecordedQuery[] = [];
  readonly loaded: string[] = [];

  constructor(private readonly collections: Record<string, FakeCollection>) {}

  async listCollections(): Promise<string[]> {
    return Object.keys(this.collections);
  }

  async loadIndex(collectionName: string, _embed: EmbeddingFunction): Promise<LoadedIndex> {
    const collection = this.collections[collectionName];
    if (!collection) {
      throw new StorageError('open', false, `collection "${collectionName}" does not exist`);
    }
    if (collection.loadError !== undefined) {
      throw new Error(collection.loadError);
    }
    this.loaded.push(collectionName);

    return {
      hasDocstore: collection.hasDocstore ?? false,
      handle: {
        query: async (queryText, options) => {
          this.queries.push({ collectionName, queryText, options });
          if (collection.delayMs !== undefined) {
            await new Promise((resolve) => setTimeout(resolve, collection.delayMs));
          }
          if (collection.queryError !== undefined) {
            throw new Error(collection.queryError);
          }
          return {
            answer: collection.answer ?? '',
            chunks: (collection.chunks ?? []).slice(0, options.topK),
          };
        },
      },
    };
  }
}

export const noopEmbed: EmbeddingFunction = async (texts) => texts.map(() => [0]);
