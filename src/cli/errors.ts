/**
 * @fileoverview CLI error handling with helpful suggestions
 *
 * Every failure that reaches the command line is classified into an
 * {@link ErrorEnvelope}: a stable code, a suggestion and an exit code.
 * With `--json` the envelope is printed as is, for scripts and agents.
 */

import {
  ConfigurationError,
  QueryError,
  StorageError,
  ValidationError,
  describeError,
  isPageciteError,
} from '../core/errors.js';
import { TimeoutError } from '../utils/async.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'FILE_NOT_FOUND'
  | 'CONFIGURATION_ERROR'
  | 'STORAGE_ERROR'
  | 'QUERY_FAILED'
  | 'VALIDATION_FAILED'
  | 'TIMEOUT'
  | 'INTERNAL_ERROR';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `pagecite help <command>` for usage information.',
  FILE_NOT_FOUND: 'Check the path; `pagecite ingest` expects a JSON file of extracted pages.',
  CONFIGURATION_ERROR: 'Check pagecite.config.yaml and the PAGECITE_* environment variables.',
  STORAGE_ERROR: 'Run `pagecite collections` to see which collections exist.',
  QUERY_FAILED: 'Rephrase the query or search other collections with --collection.',
  VALIDATION_FAILED: 'Each page needs a positive integer "page" and a "text" string.',
  TIMEOUT: 'Raise COLLECTION_TIMEOUT_MS or query fewer collections at once.',
  INTERNAL_ERROR: 'Re-run with PAGECITE_LOG_LEVEL=debug for details.',
};

const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  FILE_NOT_FOUND: 3,
  VALIDATION_FAILED: 3,
  CONFIGURATION_ERROR: 4,
  STORAGE_ERROR: 5,
  QUERY_FAILED: 6,
  TIMEOUT: 6,
  INTERNAL_ERROR: 1,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

// ============================================================================
// ENVELOPES
// ============================================================================

export interface ErrorEnvelope {
  code: CliErrorCode;
  message: string;
  retryable: boolean;
  suggestion: string;
  details?: Record<string, unknown>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function codeFor(error: unknown): CliErrorCode {
  if (error instanceof ConfigurationError) return 'CONFIGURATION_ERROR';
  if (error instanceof StorageError) return 'STORAGE_ERROR';
  if (error instanceof ValidationError) return 'VALIDATION_FAILED';
  if (error instanceof QueryError) return 'QUERY_FAILED';
  if (error instanceof TimeoutError) return 'TIMEOUT';
  if (isMissingFile(error)) return 'FILE_NOT_FOUND';
  return 'INTERNAL_ERROR';
}

export function classifyError(error: unknown): ErrorEnvelope {
  if (error instanceof CliError) {
    const envelope: ErrorEnvelope = {
      code: error.code,
      message: error.message,
      retryable: false,
      suggestion: error.suggestion ?? ERROR_SUGGESTIONS[error.code],
    };
    if (error.details) envelope.details = error.details;
    return envelope;
  }

  const code = codeFor(error);
  const envelope: ErrorEnvelope = {
    code,
    message: describeError(error),
    retryable: isPageciteError(error) ? error.retryable : code === 'TIMEOUT',
    suggestion: ERROR_SUGGESTIONS[code],
  };
  const details = isPageciteError(error) ? error.toJSON().details : undefined;
  if (details) envelope.details = details;
  return envelope;
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return EXIT_CODES[envelope.code];
}

// ============================================================================
// RENDERING
// ============================================================================

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  return `Error [${envelope.code}]: ${envelope.message}\n\nSuggestion: ${envelope.suggestion}`;
}

export function formatError(error: unknown): string {
  return formatErrorWithHints(classifyError(error));
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}
