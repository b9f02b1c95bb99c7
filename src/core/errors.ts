/**
 * @fileoverview pagecite error hierarchy
 *
 * Typed, structured errors for the retrieval and citation layers. Most of them
 * never escape a public call: per-chunk and per-collection failures are folded
 * into results, and only whole-operation impossibilities are raised.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class PageciteError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends PageciteError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly configKey: string,
    message: string,
  ) {
    super(`Configuration error for ${configKey}: ${message}`);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configKey: this.configKey,
      },
    };
  }
}

// ============================================================================
// QUERY ERRORS
// ============================================================================

export type QueryPhase = 'validate' | 'retrieve' | 'merge' | 'synthesize';

export class QueryError extends PageciteError {
  readonly code = 'QUERY_ERROR';

  constructor(
    readonly phase: QueryPhase,
    readonly retryable: boolean,
    message: string,
    readonly collectionName?: string,
  ) {
    super(`Query failed at ${phase}: ${message}`);
    this.name = 'QueryError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        phase: this.phase,
        collectionName: this.collectionName,
      },
    };
  }
}

// ============================================================================
// STORAGE ERRORS
// ============================================================================

export type StorageOperation = 'open' | 'read' | 'write' | 'query';

export class StorageError extends PageciteError {
  readonly code = 'STORAGE_ERROR';

  constructor(
    readonly operation: StorageOperation,
    readonly retryable: boolean,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Storage ${operation} failed: ${message}`);
    this.name = 'StorageError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

// ============================================================================
// LINK ERRORS
// ============================================================================

export class InvalidLinkError extends PageciteError {
  readonly code = 'INVALID_LINK';
  readonly retryable = false;

  constructor(
    readonly filePath: string,
    readonly page: number,
    message: string,
  ) {
    super(`Cannot link page ${page} of "${filePath}": ${message}`);
    this.name = 'InvalidLinkError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        filePath: this.filePath,
        page: this.page,
      },
    };
  }
}

// ============================================================================
// VALIDATION ERRORS
// ============================================================================

export class ValidationError extends PageciteError {
  readonly code = 'VALIDATION_ERROR';
  readonly retryable = false;

  constructor(
    readonly field: string,
    readonly expected: string,
    readonly received: string,
  ) {
    super(`Validation failed for ${field}: expected ${expected}, got ${received}`);
    this.name = 'ValidationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        field: this.field,
        expected: this.expected,
        received: this.received,
      },
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function isPageciteError(error: unknown): error is PageciteError {
  return error instanceof PageciteError;
}

/**
 * Message of anything thrown, for error fields carried as data.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
