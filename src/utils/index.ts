/**
 * @fileoverview Utility Module Exports
 *
 * @packageDocumentation
 */

export {
  TimeoutError,
  chunkArray,
  mapInBatches,
  withTimeout,
  type WithTimeoutOptions,
} from './async.js';
