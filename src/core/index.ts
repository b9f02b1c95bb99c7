/**
 * @fileoverview Core pagecite infrastructure
 *
 * Result types and the typed error hierarchy shared by every layer.
 */

// Result types and helpers
export {
  type Result,
  type OkResult,
  type ErrResult,
  Ok,
  Err,
  safeAsync,
  safeSync,
} from './result.js';

// Error types
export {
  type ErrorJSON,
  type QueryPhase,
  type StorageOperation,
  PageciteError,
  ConfigurationError,
  QueryError,
  StorageError,
  InvalidLinkError,
  ValidationError,
  isPageciteError,
  describeError,
} from './errors.js';
