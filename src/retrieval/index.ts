/**
 * @fileoverview Retrieval Module Exports
 */

export type {
  AnswerSynthesizer,
  EmbeddingFunction,
  FailedQueryResult,
  FederatedResult,
  IndexHandle,
  IndexQueryOptions,
  IndexResponse,
  LoadedIndex,
  QueryResult,
  RetrievalMode,
  StorageProvider,
  SucceededQueryResult,
} from './types.js';

export { failedResult, succeededResult } from './types.js';

export { CollectionRetriever, type CollectionRetrieverOptions } from './collection_retriever.js';
