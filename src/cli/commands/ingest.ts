import * as fs from 'node:fs';
import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { describeError } from '../../core/errors.js';
import { ingestDocument } from '../../ingest/ingest.js';
import { parsePageDocument, type IngestReport, type PageDocument } from '../../ingest/types.js';
import { createError } from '../errors.js';
import { withLocalPagecite, type CommandContext } from '../session.js';

export interface IngestCommandOptions {
  context: CommandContext;
  args: string[];
}

function readPageDocument(filePath: string): PageDocument {
  const raw = fs.readFileSync(filePath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw createError('VALIDATION_FAILED', `${filePath} is not valid JSON: ${describeError(error)}`, { filePath });
  }
  return parsePageDocument(parsed);
}

export async function ingestCommand(options: IngestCommandOptions): Promise<void> {
  const { context } = options;
  const { values, positionals } = parseArgs({
    args: options.args,
    options: {
      config: { type: 'string' },
      collection: { type: 'string' },
      json: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  if (positionals.length === 0) {
    throw createError('INVALID_ARGUMENT', 'At least one pages file is required. Usage: pagecite ingest <pages.json...>');
  }
  if (values.collection !== undefined && positionals.length > 1) {
    throw createError('INVALID_ARGUMENT', '--collection names a single collection; ingest one file at a time with it');
  }

  // Parse every input before touching the store so a bad file writes nothing.
  const documents = positionals.map((file) => readPageDocument(path.resolve(context.cwd, file)));

  const reports = await withLocalPagecite(context, values.config, async ({ store, embed, pagecite }) => {
    const written: IngestReport[] = [];
    for (const document of documents) {
      written.push(
        await ingestDocument(store, document, {
          embed,
          chunkSizes: pagecite.settings.chunkSizes,
          collectionName: values.collection,
        }),
      );
    }
    return written;
  });

  if (values.json) {
    console.log(JSON.stringify({ ingested: reports }, null, 2));
    return;
  }

  for (const report of reports) {
    console.log(
      `[OK] Ingested ${path.basename(report.filePath)} into ${report.collectionName} ` +
        `(${report.pageCount} pages, ${report.nodeCount} chunks, ${report.leafCount} searchable)`,
    );
  }
}
