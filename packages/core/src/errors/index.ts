/**
 * Custom Error Classes
 *
 * Every input problem is fatal for the run. Missing data (absent readings,
 * zero-coverage methods, zero-overlap pairs) is not an error and never
 * reaches this module.
 */

/**
 * Base error class for all tempo-consensus errors
 */
export class TempoConsensusError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'TempoConsensusError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends TempoConsensusError {
  constructor(
    field: string,
    message: string,
    context: Record<string, unknown> = {},
    code: string = 'VALIDATION_ERROR'
  ) {
    super(
      `Validation failed for ${field}: ${message}`,
      code,
      { field, ...context }
    );
    this.name = 'ValidationError';
  }
}

/**
 * The same (file, method) pair was ingested twice
 */
export class DuplicateEstimateError extends ValidationError {
  constructor(fileId: string, method: string) {
    super(
      'estimate',
      `duplicate estimate for file "${fileId}" and method "${method}"`,
      { fileId, method },
      'DUPLICATE_ESTIMATE'
    );
    this.name = 'DuplicateEstimateError';
  }
}

/**
 * BPM that is zero, negative, NaN or infinite
 */
export class InvalidBpmError extends ValidationError {
  constructor(fileId: string, method: string, bpm: number) {
    super(
      'bpm',
      `expected a positive finite BPM for file "${fileId}" and method "${method}", got ${bpm}`,
      { fileId, method, bpm },
      'INVALID_BPM'
    );
    this.name = 'InvalidBpmError';
  }
}

/**
 * Ingestion attempted after the store was frozen
 */
export class FrozenStoreError extends ValidationError {
  constructor(fileId: string, method: string) {
    super(
      'store',
      `cannot ingest file "${fileId}" / method "${method}" after freeze`,
      { fileId, method },
      'STORE_FROZEN'
    );
    this.name = 'FrozenStoreError';
  }
}

export class EmptyCorpusError extends ValidationError {
  constructor() {
    super('corpus', 'no estimates were ingested', {}, 'EMPTY_CORPUS');
    this.name = 'EmptyCorpusError';
  }
}

export class UnknownMethodError extends ValidationError {
  constructor(method: string) {
    super('method', `unknown method "${method}"`, { method }, 'UNKNOWN_METHOD');
    this.name = 'UnknownMethodError';
  }
}

export class UnknownFileError extends ValidationError {
  constructor(fileId: string) {
    super('fileId', `unknown file "${fileId}"`, { fileId }, 'UNKNOWN_FILE');
    this.name = 'UnknownFileError';
  }
}

/**
 * Results document that does not match any accepted shape
 */
export class InputFormatError extends ValidationError {
  constructor(source: string, issues: string[]) {
    super(
      'input',
      `${source} is not a valid results document: ${issues.join('; ')}`,
      { source, issues },
      'INPUT_FORMAT'
    );
    this.name = 'InputFormatError';
  }
}

/**
 * Check if an error is a TempoConsensusError
 */
export function isTempoConsensusError(error: unknown): error is TempoConsensusError {
  return error instanceof TempoConsensusError;
}
