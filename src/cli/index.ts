#!/usr/bin/env node
/**
 * @fileoverview pagecite CLI
 *
 * Commands:
 *   pagecite query "<text>"      - Query collections and cite the source pages
 *   pagecite collections         - List the stored collections
 *   pagecite ingest <pages.json> - Add a document's extracted pages as a collection
 *
 * @packageDocumentation
 */

import { runCli } from './run.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exitCode = 1;
});
