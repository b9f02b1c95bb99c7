/**
 * @fileoverview Federation Types
 *
 * A federation is a fixed set of collections queried together. Each
 * collection keeps its own provenance: results are reported per collection
 * and never mixed.
 */

import type { SucceededQueryResult } from '../retrieval/types.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface FederationConfig {
  /** Collections queried concurrently */
  maxParallelCollections: number;
  /** Per-collection query timeout; 0 disables it */
  collectionTimeoutMs: number;
}

export const DEFAULT_FEDERATION_CONFIG: FederationConfig = {
  maxParallelCollections: 4,
  collectionTimeoutMs: 30000,
};

// ============================================================================
// CONSTRUCTION WARNINGS
// ============================================================================

/**
 * A collection that could not be opened when the federation was built.
 * The federation continues without it.
 */
export interface FederationWarning {
  collectionName: string;
  message: string;
}

// ============================================================================
// RANKING
// ============================================================================

/**
 * Scores a succeeded result for `queryBest`. Higher wins; ties go to the
 * collection queried first.
 */
export interface RankingPolicy {
  readonly name: string;
  score(result: SucceededQueryResult): number;
}
