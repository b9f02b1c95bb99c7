/**
 * @fileoverview Detailed help text for pagecite CLI commands
 */

const HELP_TEXT = {
  main: `
pagecite - Page-accurate citations for answers retrieved from PDF collections

USAGE:
    pagecite <command> [options]

COMMANDS:
    query "<text>"        Query one or more collections and cite the source pages
    collections           List the stored collections
    ingest <pages.json>   Add a document's extracted pages as a collection
    help [command]        Show help for a command

GLOBAL OPTIONS:
    -h, --help            Show help information
    -v, --version         Show version information
    --config <file>       Settings file (default: ./pagecite.config.yaml)
    --json                Print results and errors as JSON

ERROR HANDLING:
    With --json, errors are printed to stderr as:
    {
      "error": {
        "code": "STORAGE_ERROR",      // Machine-readable error code
        "message": "...",             // Human-readable description
        "retryable": false,
        "suggestion": "...",
        "details": { ... }
      }
    }

    Exit codes: 2 invalid arguments, 3 unreadable input, 4 configuration,
    5 storage, 6 query failures, 1 anything else.

EXAMPLES:
    pagecite ingest ./extracted/annual_report.json
    pagecite collections
    pagecite query "What was the revenue in Q3?" --collection annual_report
    pagecite query "Which valves need replacing?" --best --format plain

For more information on a specific command, run:
    pagecite help <command>
`,

  query: `
pagecite query - Query collections and cite the source pages

USAGE:
    pagecite query "<text>" [options]

OPTIONS:
    -c, --collection <names>  Comma-separated collections (default: all)
    --best                    Keep only the best answer across collections
    -k, --top-k <n>           Chunks retrieved per collection (default: settings)
    --format <shape>          Citation format: styled | plain | json | html (default: styled)
    --no-tip                  Omit the Ctrl+Click tip from styled citations
    --json                    Print the results as JSON

DESCRIPTION:
    A single collection is queried directly and an unknown name is an error.
    Several collections are queried in parallel; collections that cannot be
    opened are reported as warnings and the rest are still answered.
    With --best only the longest successful answer is kept.

EXAMPLES:
    pagecite query "How often is the impeller replaced?" -c pump_manual
    pagecite query "pressure limits" -c pump_manual,valve_handbook --best
    pagecite query "pressure limits" --format html
`,

  collections: `
pagecite collections - List the stored collections

USAGE:
    pagecite collections [options]

OPTIONS:
    --json              Print the collections as JSON

DESCRIPTION:
    Prints each collection with its chunk counts. A check mark shows that the
    chunk hierarchy is stored and answers can merge up to parent chunks.

EXAMPLES:
    pagecite collections
    pagecite collections --json
`,

  ingest: `
pagecite ingest - Add a document's extracted pages as a collection

USAGE:
    pagecite ingest <pages.json...> [options]

OPTIONS:
    --collection <name> Collection name (default: derived from the file name)
    --json              Print the ingestion reports as JSON

DESCRIPTION:
    Each input file holds the text of one PDF, page by page:
    {
      "filePath": "/docs/annual_report.pdf",
      "pages": [{ "page": 1, "text": "..." }, ...]
    }
    The pages are chunked at the configured sizes, embedded and stored.
    Re-ingesting a document replaces its collection.

EXAMPLES:
    pagecite ingest ./extracted/annual_report.json
    pagecite ingest ./extracted/*.json
    pagecite ingest ./extracted/report.json --collection finance
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

export function isHelpTopic(command: string): command is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, command);
}

export function showHelp(command?: string): void {
  if (command && isHelpTopic(command)) {
    console.log(HELP_TEXT[command]);
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}

export function getCommandHelp(command: string): string {
  return isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}
