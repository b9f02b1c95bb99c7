import { parseArgs } from 'node:util';
import type { Pagecite } from '../../api/pagecite.js';
import type { FederationWarning } from '../../federation/types.js';
import type { QueryResult } from '../../retrieval/types.js';
import { createError } from '../errors.js';
import { withLocalPagecite, type CommandContext } from '../session.js';

export interface QueryCommandOptions {
  context: CommandContext;
  args: string[];
}

const OUTPUT_FORMATS = ['styled', 'plain', 'json', 'html'] as const;
type OutputFormat = (typeof OUTPUT_FORMATS)[number];

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

interface QueryOutcome {
  results: QueryResult[];
  warnings: readonly FederationWarning[];
  /** Collections queried together; a failed result is then not fatal */
  federated: boolean;
}

function parseTopK(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw createError('INVALID_ARGUMENT', `--top-k must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseCollectionNames(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  const names = raw.split(',').map((name) => name.trim()).filter((name) => name.length > 0);
  if (names.length === 0) {
    throw createError('INVALID_ARGUMENT', '--collection needs at least one collection name');
  }
  return names;
}

// ============================================================================
// RENDERING
// ============================================================================

function renderCitations(pagecite: Pagecite, result: QueryResult, format: OutputFormat, showTip: boolean): string {
  switch (format) {
    case 'styled':
      return pagecite.format(result.chunks, 'styled', { showTip });
    case 'plain':
      return pagecite.format(result.chunks, 'plain');
    case 'html':
      return pagecite.format(result.chunks, 'hypertext');
    case 'json':
      return JSON.stringify(pagecite.format(result.chunks, 'structured'), null, 2);
  }
}

function toJson(pagecite: Pagecite, result: QueryResult): Record<string, unknown> {
  return {
    collectionName: result.collectionName,
    succeeded: result.succeeded,
    answer: result.answer,
    latencyMs: result.latencyMs,
    ...(result.succeeded ? {} : { error: result.error }),
    citations: pagecite.format(result.chunks, 'structured'),
  };
}

function printResult(
  pagecite: Pagecite,
  result: QueryResult,
  format: OutputFormat,
  showTip: boolean,
  heading: boolean,
): void {
  if (heading) {
    console.log(`## ${result.collectionName}`);
  }
  if (!result.succeeded) {
    console.log(`[FAIL] ${result.error}`);
    return;
  }
  console.log(result.answer);
  console.log(renderCitations(pagecite, result, format, showTip));
}

// ============================================================================
// COMMAND
// ============================================================================

async function runQuery(
  pagecite: Pagecite,
  queryText: string,
  collectionNames: string[] | undefined,
  best: boolean,
  topK: number | undefined,
): Promise<QueryOutcome> {
  const [onlyCollection] = collectionNames ?? [];
  if (collectionNames?.length === 1 && onlyCollection !== undefined && !best) {
    return { results: [await pagecite.query(onlyCollection, queryText, topK)], warnings: [], federated: false };
  }

  const warnings = await pagecite.federationWarnings(collectionNames);
  if (best) {
    return { results: [await pagecite.queryBest(collectionNames, queryText, topK)], warnings, federated: false };
  }
  const results = await pagecite.queryFederated(collectionNames, queryText, topK);
  return { results: [...results.values()], warnings, federated: true };
}

export async function queryCommand(options: QueryCommandOptions): Promise<void> {
  const { values, positionals } = parseArgs({
    args: options.args,
    options: {
      config: { type: 'string' },
      collection: { type: 'string', short: 'c' },
      best: { type: 'boolean', default: false },
      'top-k': { type: 'string', short: 'k' },
      format: { type: 'string', default: 'styled' },
      'no-tip': { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  const queryText = positionals.join(' ').trim();
  if (!queryText) {
    throw createError('INVALID_ARGUMENT', 'Query text is required. Usage: pagecite query "<text>"');
  }
  const format = values.format;
  if (!isOutputFormat(format)) {
    throw createError('INVALID_ARGUMENT', `--format must be one of ${OUTPUT_FORMATS.join(', ')}, got "${format}"`);
  }
  const topK = parseTopK(values['top-k']);
  const collectionNames = parseCollectionNames(values.collection);

  await withLocalPagecite(options.context, values.config, async ({ pagecite }) => {
    const outcome = await runQuery(pagecite, queryText, collectionNames, values.best, topK);

    if (values.json) {
      console.log(JSON.stringify({
        query: queryText,
        results: outcome.results.map((result) => toJson(pagecite, result)),
        warnings: outcome.warnings,
      }, null, 2));
    } else {
      for (const warning of outcome.warnings) {
        console.error(`[WARN] Skipped ${warning.collectionName}: ${warning.message}`);
      }
      for (const result of outcome.results) {
        // A lone failed result is reported once, as the command's error.
        if (!result.succeeded && !outcome.federated) continue;
        printResult(pagecite, result, format, !values['no-tip'], outcome.federated);
      }
    }

    const failed = outcome.results.filter((result) => !result.succeeded);
    if (failed.length > 0 && failed.length === outcome.results.length) {
      const [first] = failed;
      throw createError(
        'QUERY_FAILED',
        outcome.federated
          ? `All ${failed.length} collections failed to answer`
          : `${first?.collectionName ?? 'query'}: ${first?.error ?? 'no result'}`,
        { collections: failed.map((result) => result.collectionName) },
      );
    }
  });
}
