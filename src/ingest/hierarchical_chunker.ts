/**
 * @fileoverview Hierarchical chunking with page tracking
 *
 * Pages are joined into one text (separated by a blank line) so chunks can
 * span page breaks. The text is split at the first chunk size, each piece is
 * split again at the next size, and so on; the last level are the leaves that
 * get embedded. Splits prefer the last whitespace inside the size limit.
 *
 * Every node records the page it starts on (`page`, `start_page`), the page
 * it ends on (`end_page`), and the source file.
 */

import { createHash } from 'node:crypto';
import { ConfigurationError } from '../core/errors.js';
import type { ChunkNode } from '../storage/types.js';
import type { PageText } from './types.js';

const PAGE_SEPARATOR = '\n\n';
const WHITESPACE = /\s/;

export interface ChunkSource {
  filename: string;
  filePath: string;
  pages: readonly PageText[];
}

interface Span {
  start: number;
  end: number;
}

interface PageOffset {
  page: number;
  offset: number;
}

// ============================================================================
// TEXT LAYOUT
// ============================================================================

function stitchPages(pages: readonly PageText[]): { text: string; offsets: PageOffset[] } {
  const ordered = [...pages].sort((a, b) => a.page - b.page);
  const offsets: PageOffset[] = [];
  let text = '';
  ordered.forEach((page, index) => {
    if (index > 0) text += PAGE_SEPARATOR;
    offsets.push({ page: page.page, offset: text.length });
    text += page.text;
  });
  return { text, offsets };
}

function pageAt(offsets: readonly PageOffset[], position: number): number {
  let page = offsets[0]?.page ?? 1;
  for (const entry of offsets) {
    if (entry.offset > position) break;
    page = entry.page;
  }
  return page;
}

function isWhitespace(text: string, index: number): boolean {
  return WHITESPACE.test(text.charAt(index));
}

/**
 * Split `span` of `text` into trimmed pieces of at most `size` characters.
 * A piece ends at the last whitespace within the limit, or at the limit when
 * a single word is longer than `size`.
 */
export function splitSpan(text: string, span: Span, size: number): Span[] {
  const pieces: Span[] = [];
  let position = span.start;

  while (position < span.end) {
    while (position < span.end && isWhitespace(text, position)) position += 1;
    if (position >= span.end) break;

    const limit = Math.min(position + size, span.end);
    let cut = limit;
    if (limit < span.end) {
      for (let index = limit; index > position; index -= 1) {
        if (isWhitespace(text, index)) {
          cut = index;
          break;
        }
      }
    }

    let end = cut;
    while (end > position && isWhitespace(text, end - 1)) end -= 1;
    pieces.push({ start: position, end });
    position = cut;
  }

  return pieces;
}

function nodeId(filePath: string, level: number, span: Span): string {
  return createHash('sha256')
    .update(`${filePath}\0${level}\0${span.start}\0${span.end}`, 'utf-8')
    .digest('hex')
    .slice(0, 32);
}

// ============================================================================
// CHUNKING
// ============================================================================

/**
 * Chunk a document into a tree of nodes, parents before their children.
 * With a single chunk size every node is a root leaf.
 *
 * @throws ConfigurationError for an empty or non-positive size list
 */
export function chunkDocument(source: ChunkSource, chunkSizes: readonly number[]): ChunkNode[] {
  if (chunkSizes.length === 0 || chunkSizes.some((size) => !Number.isInteger(size) || size <= 0)) {
    throw new ConfigurationError('chunkSizes', `expected positive integers, got [${chunkSizes.join(', ')}]`);
  }

  const { text, offsets } = stitchPages(source.pages);
  const nodes: ChunkNode[] = [];
  const leafLevel = chunkSizes.length - 1;

  const visit = (span: Span, level: number, parentId: string | null): void => {
    for (const piece of splitSpan(text, span, chunkSizes[level] ?? 1)) {
      const id = nodeId(source.filePath, level, piece);
      const startPage = pageAt(offsets, piece.start);
      nodes.push({
        id,
        parentId,
        level,
        text: text.slice(piece.start, piece.end),
        metadata: {
          page: startPage,
          start_page: startPage,
          end_page: pageAt(offsets, piece.end - 1),
          filename: source.filename,
          file_path: source.filePath,
        },
      });
      if (level < leafLevel) visit(piece, level + 1, id);
    }
  };

  visit({ start: 0, end: text.length }, 0, null);
  return nodes;
}

export function leavesOf(nodes: readonly ChunkNode[]): ChunkNode[] {
  const parents = new Set(nodes.map((node) => node.parentId));
  return nodes.filter((node) => !parents.has(node.id));
}
