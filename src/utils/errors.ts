/**
 * Error types and codes for hexprobe.
 * Every error raised by the library extends HexprobeError.
 */

/**
 * Base error class carrying a stable error code and optional details.
 */
export class HexprobeError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'HexprobeError';
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
 * Broken graph contract: duplicate ids, dangling endpoints, proof mismatches.
 * These are programming errors in whoever populates the graph.
 * Error codes: G001-G004
 */
export class GraphInvariantError extends HexprobeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'GraphInvariantError';
  }
}

/**
 * Configuration-related errors (loading, parsing, profile validation).
 * Error codes: C001-C002
 */
export class ConfigError extends HexprobeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (unreadable files, malformed documents).
 * Error codes: S001-S003
 */
export class SystemError extends HexprobeError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Graph invariants
  DUPLICATE_NODE: 'G001',
  DANGLING_EDGE: 'G002',
  PROOF_MISMATCH: 'G003',
  INVALID_NODE_ID: 'G004',

  // Configuration
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_PROFILE: 'C002',

  // System
  PARSE_ERROR: 'S001',
  INVALID_SOURCE_MODEL: 'S002',
  INVALID_TYPE_REF: 'S003',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
