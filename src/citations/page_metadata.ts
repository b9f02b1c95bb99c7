/**
 * @fileoverview Page metadata resolution
 *
 * Turns the page, filename and path metadata of retrieved chunks into merged,
 * linkable page ranges. Stateless: every function reads its chunks and nothing
 * else.
 */

import * as path from 'node:path';
import { InvalidLinkError, describeError } from '../core/errors.js';
import { safeSync } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';
import type {
  Chunk,
  CitationRange,
  CitationSet,
  MetadataSummary,
  PageRange,
} from './types.js';

export const UNKNOWN_FILENAME = 'unknown.pdf';

const REQUIRED_METADATA_KEYS = ['page', 'filename', 'file_path'] as const;

// C:/... once backslashes are folded
const DRIVE_ROOT = /^[A-Za-z]:\//;
// C:docs/... is relative to a drive's own working directory
const DRIVE_RELATIVE = /^[A-Za-z]:(?!\/)/;
// //server/share/... once backslashes are folded
const UNC_PATH = /^\/\/([^/]+)(\/.*)?$/;

// ============================================================================
// PAGES
// ============================================================================

function toPageNumber(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) return undefined;
  const page = Math.trunc(value);
  return page > 0 ? page : undefined;
}

/**
 * Page a chunk starts on. `page` wins when set and non-zero; otherwise
 * `start_page` is used.
 */
export function extractPage(chunk: Chunk): number | undefined {
  const { page, start_page: startPage } = chunk.metadata;
  const chosen = page ? page : startPage;
  return toPageNumber(chosen);
}

/**
 * Unique pages referenced by the chunks, ascending.
 */
export function extractPages(chunks: readonly Chunk[]): number[] {
  const pages = new Set<number>();
  for (const chunk of chunks) {
    const page = extractPage(chunk);
    if (page !== undefined) pages.add(page);
  }

  const result = Array.from(pages).sort((a, b) => a - b);
  logDebug(`Extracted ${result.length} unique pages from ${chunks.length} chunks`);
  return result;
}

/**
 * Collapse ascending unique pages into inclusive ranges.
 *
 * @example
 * mergeConsecutive([1, 2, 3, 7, 8]); // [{ start: 1, end: 3 }, { start: 7, end: 8 }]
 */
export function mergeConsecutive(pages: readonly number[]): PageRange[] {
  if (pages.length === 0) return [];

  const ranges: PageRange[] = [];
  let start = pages[0];
  let end = pages[0];

  for (const page of pages.slice(1)) {
    if (page === end + 1) {
      end = page;
      continue;
    }
    ranges.push({ start, end });
    start = page;
    end = page;
  }
  ranges.push({ start, end });

  return ranges;
}

export function formatRange(start: number, end: number): string {
  return start === end ? `Page ${start}` : `Pages ${start}-${end}`;
}

// ============================================================================
// LINKS
// ============================================================================

function encodeUriPath(filePath: string, page: number, uriPath: string): string {
  try {
    // encodeURI keeps ':' and '/', so drive letters survive untouched
    return encodeURI(uriPath).replace(/[?#]/g, (c) => encodeURIComponent(c));
  } catch (error) {
    throw new InvalidLinkError(filePath, page, describeError(error));
  }
}

/**
 * Build a file:// URI that opens a PDF at the given page.
 *
 * Windows paths keep their drive (`file:///C:/docs/a.pdf#page=3`), UNC paths
 * keep their host (`file://server/share/a.pdf#page=3`) and POSIX paths keep
 * their root (`file:///docs/a.pdf#page=3`). Relative paths are resolved
 * against the working directory.
 *
 * @throws InvalidLinkError for an empty path, a NUL byte, a drive-relative
 *   path, a device path or a page that is not a positive integer
 */
export function buildLink(filePath: string, page: number): string {
  if (!Number.isInteger(page) || page < 1) {
    throw new InvalidLinkError(filePath, page, 'page must be a positive integer');
  }
  if (filePath.trim().length === 0) {
    throw new InvalidLinkError(filePath, page, 'path is empty');
  }
  if (filePath.includes('\0')) {
    throw new InvalidLinkError(filePath, page, 'path contains a NUL byte');
  }

  const slashed = filePath.replace(/\\/g, '/');
  if (DRIVE_RELATIVE.test(slashed)) {
    throw new InvalidLinkError(filePath, page, 'drive-relative paths have no absolute form');
  }

  const unc = UNC_PATH.exec(slashed);
  if (unc) {
    const [, host = '', share = '/'] = unc;
    if (host === '?' || host === '.') {
      throw new InvalidLinkError(filePath, page, 'device paths have no file URI');
    }
    return `file:${encodeUriPath(filePath, page, `//${host}${path.posix.normalize(share)}`)}#page=${page}`;
  }

  const absolute = slashed.startsWith('/') || DRIVE_ROOT.test(slashed)
    ? slashed
    : path.resolve(filePath).replace(/\\/g, '/');
  const normalized = path.posix.normalize(absolute);
  const uriPath = DRIVE_ROOT.test(normalized) ? `/${normalized}` : normalized;

  return `file://${encodeUriPath(filePath, page, uriPath)}#page=${page}`;
}

/**
 * {@link buildLink}, with an unbuildable link reported as undefined.
 */
export function tryBuildLink(filePath: string, page: number): string | undefined {
  const result = safeSync(() => buildLink(filePath, page));
  if (result.ok) return result.value;
  logDebug('Skipping citation link', { filePath, page, reason: result.error.message });
  return undefined;
}

// ============================================================================
// FILE IDENTITY
// ============================================================================

function firstNonEmpty(chunks: readonly Chunk[], key: 'filename' | 'file_path'): string | undefined {
  for (const chunk of chunks) {
    const value = chunk.metadata[key];
    if (typeof value === 'string' && value.length > 0) return value;
  }
  return undefined;
}

/**
 * Source path of the chunks. All chunks are expected to come from one
 * document; the first path found is used when they do not.
 */
export function extractFilePath(chunks: readonly Chunk[]): string | undefined {
  return firstNonEmpty(chunks, 'file_path');
}

export function extractFilename(chunks: readonly Chunk[]): string {
  return firstNonEmpty(chunks, 'filename') ?? UNKNOWN_FILENAME;
}

/**
 * True when the chunk carries every key citations rely on. Checks presence,
 * not whether the values are usable.
 */
export function hasRequiredMetadata(chunk: Chunk): boolean {
  return REQUIRED_METADATA_KEYS.every((key) => key in chunk.metadata);
}

export function summarizeMetadata(chunks: readonly Chunk[]): MetadataSummary {
  const pages = extractPages(chunks);
  const filePath = extractFilePath(chunks);

  return {
    totalChunks: chunks.length,
    validMetadataCount: chunks.filter(hasRequiredMetadata).length,
    uniquePageCount: pages.length,
    pageRange: pages.length > 0 ? { start: pages[0], end: pages[pages.length - 1] } : null,
    filename: extractFilename(chunks),
    filePath: filePath ?? null,
  };
}

// ============================================================================
// CITATION SET
// ============================================================================

/**
 * Resolve chunks into their citation set. Every output shape renders from
 * this one pass, so all shapes agree on the ranges.
 */
export function resolveCitations(chunks: readonly Chunk[]): CitationSet {
  const pages = extractPages(chunks);
  const filename = extractFilename(chunks);
  const filePath = extractFilePath(chunks);

  const ranges: CitationRange[] = mergeConsecutive(pages).map(({ start, end }) => {
    const link = filePath !== undefined ? tryBuildLink(filePath, start) : undefined;
    return Object.freeze({
      start,
      end,
      pageText: formatRange(start, end),
      ...(link !== undefined ? { link } : {}),
    });
  });
  logDebug(`Merged ${pages.length} pages into ${ranges.length} ranges`);

  return Object.freeze({
    filename,
    ...(filePath !== undefined ? { filePath } : {}),
    pages: Object.freeze(pages),
    ranges: Object.freeze(ranges),
  });
}
