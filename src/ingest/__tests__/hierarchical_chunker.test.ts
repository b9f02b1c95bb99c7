import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../core/errors.js';
import { toCollectionName } from '../collection_name.js';
import { chunkDocument, leavesOf, splitSpan } from '../hierarchical_chunker.js';

const SOURCE = {
  filename: 'field-guide.pdf',
  filePath: '/docs/field-guide.pdf',
  pages: [
    { page: 2, text: 'delta epsilon' },
    { page: 1, text: 'alpha beta gamma' },
  ],
};

describe('toCollectionName', () => {
  it('uses the lower-cased stem with special characters replaced', () => {
    expect(toCollectionName('/manuals/Pump Guide (v2).pdf')).toBe('pump_guide__v2_');
  });

  it('keeps underscores and digits', () => {
    expect(toCollectionName('Annual_Report_2024.pdf')).toBe('annual_report_2024');
  });

  it('handles Windows paths', () => {
    expect(toCollectionName('C:\\Reports\\Q3-Summary.pdf')).toBe('q3_summary');
  });
});

describe('splitSpan', () => {
  it('splits at the last whitespace inside the limit', () => {
    const text = 'alpha beta gamma';

    const pieces = splitSpan(text, { start: 0, end: text.length }, 8);

    expect(pieces.map((p) => text.slice(p.start, p.end))).toEqual(['alpha', 'beta', 'gamma']);
  });

  it('hard-splits a word longer than the limit', () => {
    const text = 'abcdefghij';

    const pieces = splitSpan(text, { start: 0, end: text.length }, 4);

    expect(pieces.map((p) => text.slice(p.start, p.end))).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('returns nothing for whitespace', () => {
    expect(splitSpan('   \n ', { start: 0, end: 5 }, 3)).toEqual([]);
  });
});

describe('chunkDocument', () => {
  it('builds a two-level tree with page tracking', () => {
    const nodes = chunkDocument(SOURCE, [20, 8]);

    expect(nodes.map((n) => [n.level, n.text, n.metadata.page, n.metadata.end_page])).toEqual([
      [0, 'alpha beta gamma', 1, 1],
      [1, 'alpha', 1, 1],
      [1, 'beta', 1, 1],
      [1, 'gamma', 1, 1],
      [0, 'delta epsilon', 2, 2],
      [1, 'delta', 2, 2],
      [1, 'epsilon', 2, 2],
    ]);
  });

  it('links children to their parent', () => {
    const nodes = chunkDocument(SOURCE, [20, 8]);
    const [first, alpha] = nodes;

    expect(first?.parentId).toBeNull();
    expect(alpha?.parentId).toBe(first?.id);
    expect(leavesOf(nodes).map((n) => n.text)).toEqual(['alpha', 'beta', 'gamma', 'delta', 'epsilon']);
  });

  it('records the start and end page of a chunk spanning a page break', () => {
    const [node] = chunkDocument(SOURCE, [100]);

    expect(node).toMatchObject({
      parentId: null,
      text: 'alpha beta gamma\n\ndelta epsilon',
      metadata: {
        page: 1,
        start_page: 1,
        end_page: 2,
        filename: 'field-guide.pdf',
        file_path: '/docs/field-guide.pdf',
      },
    });
  });

  it('derives the same ids on every run', () => {
    const first = chunkDocument(SOURCE, [20, 8]).map((n) => n.id);
    const second = chunkDocument(SOURCE, [20, 8]).map((n) => n.id);

    expect(first).toEqual(second);
    expect(new Set(first).size).toBe(first.length);
  });

  it('rejects invalid chunk sizes', () => {
    expect(() => chunkDocument(SOURCE, [])).toThrow(ConfigurationError);
    expect(() => chunkDocument(SOURCE, [512, 0])).toThrow(ConfigurationError);
  });
});
