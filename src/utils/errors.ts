/**
 * Error types and codes for structdiff.
 * Every error the library throws extends StructDiffError.
 */

/**
 * Base error class for all structdiff errors.
 */
export class StructDiffError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'StructDiffError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration rejected by the schema.
 */
export class ConfigError extends StructDiffError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * A caller broke a precondition of the core (bad dimension, bad context size,
 * conflicting mapping). These are programming errors and are never recovered.
 */
export class ContractError extends StructDiffError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ContractError';
  }
}

/**
 * A comparison was abandoned through its AbortSignal.
 * Nothing computed before the abort is returned.
 */
export class DiffAbortedError extends StructDiffError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.ABORTED, message, details);
    this.name = 'DiffAbortedError';
  }
}

export const ErrorCodes = {
  // Configuration
  INVALID_CONFIG: 'CFG001',

  // Contract violations (C001-C005)
  INVALID_DIMENSION: 'C001',
  DIMENSION_MISMATCH: 'C002',
  INVALID_CONTEXT_SIZE: 'C003',
  MAPPING_CONFLICT: 'C004',
  GRAM_COUNT_MISMATCH: 'C005',

  // Lifecycle
  ABORTED: 'A001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
