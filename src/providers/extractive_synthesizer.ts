/**
 * @fileoverview Extractive answer synthesis
 *
 * Builds the answer from the retrieved text itself: the best few chunks,
 * whitespace-collapsed and joined, capped at a character budget.
 */

import type { AnswerSynthesizer } from '../retrieval/types.js';

export interface ExtractiveSynthesizerOptions {
  /** Chunks quoted in the answer (default: 3) */
  maxChunks?: number;
  /** Answer length cap in characters (default: 1200) */
  maxChars?: number;
}

const ELLIPSIS = '...';

export function createExtractiveSynthesizer(options: ExtractiveSynthesizerOptions = {}): AnswerSynthesizer {
  const maxChunks = options.maxChunks ?? 3;
  const maxChars = options.maxChars ?? 1200;

  return async (_queryText, chunks) => {
    const passages = chunks
      .slice(0, maxChunks)
      .map((chunk) => chunk.text.replace(/\s+/g, ' ').trim())
      .filter((passage) => passage.length > 0);

    const answer = passages.join('\n\n');
    if (answer.length <= maxChars) return answer;
    return answer.slice(0, Math.max(0, maxChars - ELLIPSIS.length)).trimEnd() + ELLIPSIS;
  };
}

export const extractiveSynthesizer: AnswerSynthesizer = createExtractiveSynthesizer();
