/**
 * Error types and codes for genmethod.
 * All errors raised by the engine extend GenMethodError.
 */

/**
 * Base error class for all genmethod errors.
 */
export class GenMethodError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GenMethodError';
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
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends GenMethodError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Class model errors (unknown types, invalid member declarations).
 */
export class ModelError extends GenMethodError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ModelError';
  }
}

/**
 * Template errors. Carries the line/column reported by the template
 * engine in `details` when one is available.
 */
export class TemplateError extends GenMethodError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'TemplateError';
  }

  get line(): number | undefined {
    const line = this.details?.line;
    return typeof line === 'number' ? line : undefined;
  }

  get column(): number | undefined {
    const column = this.details?.column;
    return typeof column === 'number' ? column : undefined;
  }
}

/**
 * The host rejected a structural edit.
 */
export class InsertionError extends GenMethodError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'InsertionError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends GenMethodError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Template errors (T001-T004)
  TEMPLATE_PARSE: 'T001',
  TEMPLATE_RUNTIME: 'T002',
  TEMPLATE_NO_BODY: 'T003',
  TEMPLATE_NOT_FOUND: 'T004',

  // Insertion errors (H001-H003)
  INVALID_ANCHOR: 'H001',
  DETACHED_NODE: 'H002',
  EDIT_REJECTED: 'H003',

  // Model errors (M001-M003)
  INVALID_MODEL: 'M001',
  UNKNOWN_CLASS: 'M002',
  INVALID_CURSOR: 'M003',

  // System errors (S001-S002)
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',

  CONFIG_LOAD_ERROR: 'C001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
