import * as path from 'node:path';

/**
 * Collection name for a source file: the file stem, with every character that
 * is not a letter, digit or underscore replaced by `_`, lower-cased.
 *
 * @example
 * ```typescript
 * toCollectionName('/manuals/Pump Guide (v2).pdf'); // => 'pump_guide__v2_'
 * ```
 */
export function toCollectionName(filePath: string): string {
  const stem = path.parse(filePath.replace(/\\/g, '/')).name;
  return stem.replace(/[^\p{L}\p{N}_]/gu, '_').toLowerCase();
}
