/**
 * @fileoverview Citation formatting
 *
 * Renders a {@link CitationSet} as plain text, ANSI-styled terminal text, a
 * structured record or an HTML fragment. Page logic lives in page_metadata;
 * this module only chooses how each range is written.
 */

import { resolveCitations, summarizeMetadata } from './page_metadata.js';
import type {
  Chunk,
  CitationSet,
  CitationShape,
  MetadataSummary,
  StructuredCitation,
  StructuredPageRange,
} from './types.js';

export const NO_PAGE_INFORMATION = '📄 No page information available';
export const LINK_TIP = '💡 Tip: Ctrl+Click the blue links to open PDF at exact page';

const RULE = '='.repeat(80);

const ANSI = {
  cyan: '\u001b[36m',
  green: '\u001b[32m',
  yellow: '\u001b[33m',
  blue: '\u001b[34m',
  reset: '\u001b[0m',
} as const;

type AnsiColor = Exclude<keyof typeof ANSI, 'reset'>;

function paint(color: AnsiColor, text: string): string {
  return `${ANSI[color]}${text}${ANSI.reset}`;
}

export interface StyledFormatOptions {
  /** Append the Ctrl+Click usage tip (default: true) */
  showTip?: boolean;
}

// ============================================================================
// RENDERERS
// ============================================================================

export function renderPlain(citations: CitationSet): string {
  if (citations.ranges.length === 0) {
    return `\n${NO_PAGE_INFORMATION}`;
  }

  let output = `\n${RULE}\n`;
  output += `📄 SOURCES: ${citations.filename}\n`;
  output += `${RULE}\n\n`;

  for (const range of citations.ranges) {
    if (range.link !== undefined) {
      output += `  🔗 ${range.pageText}\n     ${range.link}\n\n`;
    } else {
      output += `  📄 ${range.pageText}\n\n`;
    }
  }

  output += `${RULE}\n`;
  return output;
}

export function renderStyled(citations: CitationSet, options: StyledFormatOptions = {}): string {
  if (citations.ranges.length === 0) {
    return `\n${paint('yellow', NO_PAGE_INFORMATION)}`;
  }

  let output = `\n${paint('cyan', RULE)}\n`;
  output += `${paint('green', `📄 SOURCES: ${citations.filename}`)}\n`;
  output += `${paint('cyan', RULE)}\n\n`;

  for (const range of citations.ranges) {
    if (range.link !== undefined) {
      output += `${paint('yellow', `  🔗 ${range.pageText}`)}\n`;
      output += `     ${paint('blue', range.link)}\n\n`;
    } else {
      output += `${paint('yellow', `  📄 ${range.pageText}`)}\n\n`;
    }
  }

  output += `${paint('cyan', RULE)}\n`;
  if (options.showTip ?? true) {
    output += `${paint('yellow', LINK_TIP)}\n`;
  }
  return output;
}

export function renderStructured(citations: CitationSet): StructuredCitation {
  const pageRanges = citations.ranges.map((range): StructuredPageRange => {
    const entry: StructuredPageRange = {
      startPage: range.start,
      endPage: range.end,
      pageText: range.pageText,
    };
    if (range.link !== undefined && citations.filePath !== undefined) {
      entry.link = range.link;
      entry.filePath = citations.filePath;
    }
    return entry;
  });

  return {
    filename: citations.filename,
    totalPagesReferenced: citations.pages.length,
    pageRanges,
    hasLinks: citations.filePath !== undefined,
  };
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderHypertext(citations: CitationSet): string {
  if (citations.ranges.length === 0) {
    return `<p>${NO_PAGE_INFORMATION}</p>`;
  }

  let html = '<div class="sources">\n';
  html += `  <h3>📄 Sources: ${escapeHtml(citations.filename)}</h3>\n`;
  html += '  <ul>\n';

  for (const range of citations.ranges) {
    const label = escapeHtml(range.pageText);
    if (range.link !== undefined) {
      html += `    <li><a href="${escapeHtml(range.link)}" target="_blank">${label}</a></li>\n`;
    } else {
      html += `    <li>${label}</li>\n`;
    }
  }

  html += '  </ul>\n';
  html += '</div>\n';
  return html;
}

// ============================================================================
// ENTRY POINTS
// ============================================================================

/**
 * Resolve and render chunks in one call.
 */
export function formatCitations(chunks: readonly Chunk[], shape: 'structured'): StructuredCitation;
export function formatCitations(
  chunks: readonly Chunk[],
  shape: Exclude<CitationShape, 'structured'>,
  options?: StyledFormatOptions
): string;
export function formatCitations(
  chunks: readonly Chunk[],
  shape: CitationShape,
  options?: StyledFormatOptions
): string | StructuredCitation;
export function formatCitations(
  chunks: readonly Chunk[],
  shape: CitationShape,
  options: StyledFormatOptions = {}
): string | StructuredCitation {
  const citations = resolveCitations(chunks);
  switch (shape) {
    case 'plain':
      return renderPlain(citations);
    case 'styled':
      return renderStyled(citations, options);
    case 'structured':
      return renderStructured(citations);
    case 'hypertext':
      return renderHypertext(citations);
  }
}

export function summarizeSources(chunks: readonly Chunk[]): MetadataSummary {
  return summarizeMetadata(chunks);
}
