/**
 * @fileoverview Federation Module Exports
 */

export type { FederationConfig, FederationWarning, RankingPolicy } from './types.js';

export { DEFAULT_FEDERATION_CONFIG } from './types.js';

export { longestAnswerPolicy, topChunkScorePolicy } from './ranking.js';

export { FederatedRetriever, selectBest, type FederatedRetrieverOptions } from './federated_retriever.js';
