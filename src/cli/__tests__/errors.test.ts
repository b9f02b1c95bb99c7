/**
 * @fileoverview Tests for structured CLI errors
 *
 * Validates that the error system provides:
 * 1. Machine-readable error codes for library errors
 * 2. Accurate retryability hints
 * 3. Exit codes per error family
 * 4. Human and JSON renderings
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError, StorageError, ValidationError } from '../../core/errors.js';
import { TimeoutError } from '../../utils/async.js';
import {
  CliError,
  ERROR_SUGGESTIONS,
  classifyError,
  createError,
  formatError,
  formatErrorJson,
  getExitCode,
} from '../errors.js';

describe('createError', () => {
  it('attaches the suggestion for its code', () => {
    const error = createError('INVALID_ARGUMENT', 'Query text is required');

    expect(error).toBeInstanceOf(CliError);
    expect(error.code).toBe('INVALID_ARGUMENT');
    expect(error.suggestion).toBe(ERROR_SUGGESTIONS.INVALID_ARGUMENT);
  });
});

describe('classifyError', () => {
  it('keeps the code and details of a CLI error', () => {
    const envelope = classifyError(createError('QUERY_FAILED', 'manual: no result', { collections: ['manual'] }));

    expect(envelope).toEqual({
      code: 'QUERY_FAILED',
      message: 'manual: no result',
      retryable: false,
      suggestion: ERROR_SUGGESTIONS.QUERY_FAILED,
      details: { collections: ['manual'] },
    });
  });

  it('maps configuration errors', () => {
    const envelope = classifyError(new ConfigurationError('collectionNames', 'a federation needs at least one collection'));

    expect(envelope.code).toBe('CONFIGURATION_ERROR');
    expect(envelope.message).toBe(
      'Configuration error for collectionNames: a federation needs at least one collection'
    );
    expect(envelope.details).toEqual({ configKey: 'collectionNames' });
  });

  it('carries the retryability of storage errors', () => {
    expect(classifyError(new StorageError('read', true, 'database is locked')).retryable).toBe(true);
    expect(classifyError(new StorageError('open', false, 'collection "x" does not exist')).retryable).toBe(false);
  });

  it('maps validation errors, timeouts and missing files', () => {
    expect(classifyError(new ValidationError('document', 'page document', 'pages: Required')).code).toBe(
      'VALIDATION_FAILED'
    );
    expect(classifyError(new TimeoutError(50, 'querying collection slow'))).toMatchObject({
      code: 'TIMEOUT',
      retryable: true,
    });
    const missing = Object.assign(new Error("ENOENT: no such file or directory, open 'a.json'"), { code: 'ENOENT' });
    expect(classifyError(missing).code).toBe('FILE_NOT_FOUND');
  });

  it('treats anything else as an internal error', () => {
    expect(classifyError('boom')).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'boom',
      retryable: false,
      suggestion: ERROR_SUGGESTIONS.INTERNAL_ERROR,
    });
  });
});

describe('getExitCode', () => {
  it('distinguishes argument errors from runtime failures', () => {
    expect(getExitCode(classifyError(createError('INVALID_ARGUMENT', 'x')))).toBe(2);
    expect(getExitCode(classifyError(new StorageError('open', false, 'x')))).toBe(5);
    expect(getExitCode(classifyError(new Error('x')))).toBe(1);
  });
});

describe('formatting', () => {
  it('renders a code, message and suggestion for humans', () => {
    expect(formatError(createError('STORAGE_ERROR', 'collection "ghost" does not exist'))).toBe(
      'Error [STORAGE_ERROR]: collection "ghost" does not exist\n\n' +
        'Suggestion: Run `pagecite collections` to see which collections exist.'
    );
  });

  it('wraps the envelope for JSON consumers', () => {
    const envelope = classifyError(createError('INVALID_ARGUMENT', 'bad flag'));

    expect(JSON.parse(formatErrorJson(envelope))).toEqual({ error: envelope });
  });
});
