/**
 * @arch shiftmap.common.errors
 *
 * Error types and codes for shiftmap.
 * Thrown errors extend ShiftmapError; expected analysis outcomes are
 * reported through ImpactReport entries instead.
 */

/**
 * Base error class for all shiftmap errors.
 */
export class ShiftmapError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ShiftmapError';
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
export class ConfigError extends ShiftmapError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Graph build errors that abort the whole build.
 * Per-project and per-file failures never raise one of these.
 */
export class GraphBuildError extends ShiftmapError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GraphBuildError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends ShiftmapError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // System errors
  PARSE_ERROR: 'S001',
  INVALID_SNAPSHOT: 'S002',
  FILE_READ_ERROR: 'S003',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_CONFIG: 'C002',

  // Build errors
  INPUT_LOAD_FAILED: 'B001',
  INPUT_NOT_FOUND: 'B002',
  FACTS_NOT_FOUND: 'B003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
