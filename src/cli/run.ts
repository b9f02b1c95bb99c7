/**
 * @fileoverview Command dispatch for the pagecite CLI
 *
 * Kept apart from the executable so tests can drive the CLI in process and
 * read the exit code instead of `process.exitCode`.
 */

import { PAGECITE_VERSION } from '../version.js';
import { collectionsCommand } from './commands/collections.js';
import { ingestCommand } from './commands/ingest.js';
import { queryCommand } from './commands/query.js';
import {
  classifyError,
  createError,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';
import { showHelp } from './help.js';
import type { CommandContext } from './session.js';

type Command = 'query' | 'collections' | 'ingest' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  query: {
    description: 'Query collections and cite the source pages',
    usage: 'pagecite query "<text>" [--collection a,b] [--best] [--top-k N] [--format styled|plain|json|html]',
  },
  collections: {
    description: 'List the stored collections',
    usage: 'pagecite collections [--json]',
  },
  ingest: {
    description: "Add a document's extracted pages as a collection",
    usage: 'pagecite ingest <pages.json...> [--collection <name>]',
  },
  help: {
    description: 'Show help information',
    usage: 'pagecite help [command]',
  },
};

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

/**
 * Print a failure for a human or, with --json, as a structured envelope.
 */
function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  if (useJson) {
    console.error(formatErrorJson(envelope));
  } else {
    console.error(formatErrorWithHints(envelope));
  }
}

export async function runCli(args: string[], context: Partial<CommandContext> = {}): Promise<number> {
  const commandContext: CommandContext = {
    cwd: context.cwd ?? process.cwd(),
    env: context.env ?? process.env,
  };
  const [first, ...rest] = args;
  const jsonMode = args.includes('--json');

  if (first === '-v' || first === '--version') {
    console.log(`pagecite ${PAGECITE_VERSION}`);
    return 0;
  }
  if (first === undefined || first === '-h' || first === '--help' || first === 'help') {
    showHelp(first === 'help' ? rest[0] : undefined);
    return 0;
  }
  if (!isCommand(first)) {
    const envelope = classifyError(
      createError('INVALID_ARGUMENT', `Unknown command: ${first}`, {
        available: Object.entries(COMMANDS).map(([name, { description }]) => `${name}: ${description}`),
      }),
    );
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }
  if (rest.includes('-h') || rest.includes('--help')) {
    showHelp(first);
    return 0;
  }

  try {
    switch (first) {
      case 'query':
        await queryCommand({ context: commandContext, args: rest });
        break;
      case 'collections':
        await collectionsCommand({ context: commandContext, args: rest });
        break;
      case 'ingest':
        await ingestCommand({ context: commandContext, args: rest });
        break;
    }
    return 0;
  } catch (error) {
    const envelope = classifyError(asArgumentError(error));
    if (envelope.code === 'INVALID_ARGUMENT') {
      envelope.details = { ...envelope.details, usage: COMMANDS[first].usage };
    }
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }
}

/**
 * `parseArgs` rejects unknown options and missing values with plain errors
 * carrying an ERR_PARSE_ARGS_* code; report those as argument errors.
 */
function asArgumentError(error: unknown): unknown {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string' && error.code.startsWith('ERR_PARSE_ARGS')) {
    return createError('INVALID_ARGUMENT', error.message);
  }
  return error;
}
