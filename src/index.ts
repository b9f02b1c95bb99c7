/**
 * @fileoverview pagecite - page-accurate citations for retrieved answers
 *
 * Resolves the page metadata of retrieved chunks into clickable citation
 * ranges, and queries one or many document collections with per-collection
 * isolation of failures.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { loadSettings, openLocalPagecite } from 'pagecite';
 *
 * const { pagecite, store } = openLocalPagecite(loadSettings());
 * const result = await pagecite.query('annual_report', 'What was Q3 revenue?');
 * console.log(result.answer);
 * console.log(pagecite.format(result.chunks, 'plain'));
 * store.close();
 * ```
 *
 * ## Bring your own backend
 *
 * ```typescript
 * import { createPagecite } from 'pagecite';
 *
 * const pagecite = createPagecite({ storage: myVectorStore, embed: myEmbeddings });
 * const best = await pagecite.queryBest(undefined, 'Which valves need replacing?');
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// PUBLIC API SURFACE
// ============================================================================

export * from './api/index.js';
export * from './citations/index.js';
export * from './retrieval/index.js';
export * from './federation/index.js';

// ============================================================================
// COLLECTIONS
// ============================================================================

export * from './storage/index.js';
export * from './ingest/index.js';
export * from './providers/index.js';

// ============================================================================
// AMBIENT
// ============================================================================

export * from './config/index.js';
export * from './core/index.js';
export * from './utils/index.js';
export { getLogLevel, setLogLevel, type LogLevel } from './telemetry/logger.js';
export { PAGECITE_VERSION } from './version.js';
