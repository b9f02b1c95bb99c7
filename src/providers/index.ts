/**
 * @fileoverview Provider Module Exports
 *
 * Offline embedding and answer synthesis. Any function matching
 * EmbeddingFunction or AnswerSynthesizer can replace them.
 */

export { createHashedEmbedder, embedText, tokenize } from './hashed_embedder.js';

export {
  createExtractiveSynthesizer,
  extractiveSynthesizer,
  type ExtractiveSynthesizerOptions,
} from './extractive_synthesizer.js';
