/**
 * Error types and codes for patternscope.
 * All errors raised by the library extend PatternScopeError.
 */

/**
 * Base error class for all patternscope errors.
 */
export class PatternScopeError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PatternScopeError';
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
 * Configuration errors (missing files, bad JSON, schema violations).
 * Always fatal: raised while constructing a detector.
 */
export class ConfigError extends PatternScopeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (unreadable input files, parse errors outside configuration).
 */
export class SystemError extends PatternScopeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration errors
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID_JSON: 'CONFIG_INVALID_JSON',
  CONFIG_INVALID_SCHEMA: 'CONFIG_INVALID_SCHEMA',
  CONFIG_INVALID_REGEX: 'CONFIG_INVALID_REGEX',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
