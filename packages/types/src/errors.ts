/**
 * Documented error code system for Cloakroom.
 *
 * Every error carries a unique code (CLOAK_Exxx) and belongs to exactly
 * one category. Categories follow the failure taxonomy of the engine:
 * preconditions, authorization, protocol, arithmetic and input.
 *
 * @packageDocumentation
 */

// ─── Error codes ────────────────────────────────────────────────────────────────

/** All Cloakroom error codes. Each maps to a specific, documented failure mode. */
export enum CloakroomErrorCode {
  // Preconditions (1xx)
  /** The team directory returned no members for the team. */
  EMPTY_TEAM = 'CLOAK_E100',
  /** The employee has never submitted a preference. */
  NO_PREFERENCE = 'CLOAK_E101',
  /** The team schedule has not been optimized yet. */
  TEAM_NOT_OPTIMIZED = 'CLOAK_E102',
  /** The personal schedule has not been assigned yet. */
  NOT_ASSIGNED = 'CLOAK_E103',
  /** A reveal request is already pending for this employee. */
  REVEAL_PENDING = 'CLOAK_E104',
  /** The schedule has already been revealed. */
  ALREADY_REVEALED = 'CLOAK_E105',

  // Authorization (2xx)
  /** The caller is not the administrator. */
  NOT_ADMIN = 'CLOAK_E200',
  /** The caller is not a recognized employee. */
  UNRECOGNIZED_EMPLOYEE = 'CLOAK_E201',

  // Decryption protocol (3xx)
  /** No pending request matches the request id. */
  UNKNOWN_REQUEST = 'CLOAK_E300',
  /** The co-processor proof did not verify. */
  INVALID_PROOF = 'CLOAK_E301',
  /** The revealed payload does not decode to the expected values. */
  MALFORMED_PAYLOAD = 'CLOAK_E302',
  /** The decryption oracle issued a request id that is already pending. */
  DUPLICATE_REQUEST = 'CLOAK_E303',

  // Arithmetic (4xx)
  /** A division had a zero divisor. */
  DIVISION_BY_ZERO = 'CLOAK_E400',
  /** A handle was not issued by the backend it was given to. */
  FOREIGN_HANDLE = 'CLOAK_E401',

  // Input, crypto and configuration (9xx)
  /** An argument was empty, malformed or out of range. */
  INVALID_INPUT = 'CLOAK_E900',
  /** A hex-encoded string was malformed. */
  CRYPTO_INVALID_HEX = 'CLOAK_E901',
  /** A cryptographic key was invalid or malformed. */
  CRYPTO_INVALID_KEY = 'CLOAK_E902',
  /** A signing operation failed. */
  CRYPTO_SIGNATURE_FAILED = 'CLOAK_E903',
  /** The configuration file is missing required fields or is malformed. */
  CONFIG_INVALID = 'CLOAK_E910',
}

/** The failure category an error belongs to. */
export type ErrorCategory = 'precondition' | 'authorization' | 'protocol' | 'arithmetic' | 'input';

// ─── Error classes ──────────────────────────────────────────────────────────────

/** Options for constructing a CloakroomError. */
export interface CloakroomErrorOptions {
  /** Additional structured context for diagnostics and logging. */
  context?: Record<string, unknown>;
  /** A human-readable hint suggesting how to resolve the error. */
  hint?: string;
  /** The underlying cause of this error, for error chaining. */
  cause?: Error;
}

/**
 * Base error class for all Cloakroom errors.
 *
 * Carries a unique error code, the failure category, optional context
 * for structured logging and an optional hint.
 *
 * @example
 * ```typescript
 * throw new PreconditionError(
 *   CloakroomErrorCode.TEAM_NOT_OPTIMIZED,
 *   'Team "platform" has not been optimized',
 *   { hint: 'Run optimizeTeam() before assigning personal schedules.' }
 * );
 * ```
 */
export class CloakroomError extends Error {
  readonly code: CloakroomErrorCode;
  readonly category: ErrorCategory;
  readonly context?: Record<string, unknown>;
  readonly hint?: string;

  constructor(
    code: CloakroomErrorCode,
    category: ErrorCategory,
    message: string,
    options?: CloakroomErrorOptions,
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'CloakroomError';
    this.code = code;
    this.category = category;
    this.context = options?.context;
    this.hint = options?.hint;
  }

  /**
   * Return a structured JSON representation suitable for logging.
   */
  toJSON(): {
    code: string;
    category: ErrorCategory;
    message: string;
    hint?: string;
    context?: Record<string, unknown>;
  } {
    const result: {
      code: string;
      category: ErrorCategory;
      message: string;
      hint?: string;
      context?: Record<string, unknown>;
    } = {
      code: this.code,
      category: this.category,
      message: this.message,
    };
    if (this.hint !== undefined) {
      result.hint = this.hint;
    }
    if (this.context !== undefined) {
      result.context = this.context;
    }
    return result;
  }
}

/** A locally checked precondition did not hold. */
export class PreconditionError extends CloakroomError {
  constructor(code: CloakroomErrorCode, message: string, options?: CloakroomErrorOptions) {
    super(code, 'precondition', message, options);
    this.name = 'PreconditionError';
  }
}

/** The caller is not allowed to perform the operation. No state changed. */
export class AuthorizationError extends CloakroomError {
  constructor(code: CloakroomErrorCode, message: string, options?: CloakroomErrorOptions) {
    super(code, 'authorization', message, options);
    this.name = 'AuthorizationError';
  }
}

/** The decryption protocol was violated. No record was mutated. */
export class ProtocolError extends CloakroomError {
  constructor(code: CloakroomErrorCode, message: string, options?: CloakroomErrorOptions) {
    super(code, 'protocol', message, options);
    this.name = 'ProtocolError';
  }
}

/** Homomorphic arithmetic hit a degenerate operand, e.g. a zero divisor. */
export class ArithmeticError extends CloakroomError {
  constructor(code: CloakroomErrorCode, message: string, options?: CloakroomErrorOptions) {
    super(code, 'arithmetic', message, options);
    this.name = 'ArithmeticError';
  }
}

/** An argument, key, encoding or configuration value was malformed. */
export class InputError extends CloakroomError {
  constructor(code: CloakroomErrorCode, message: string, options?: CloakroomErrorOptions) {
    super(code, 'input', message, options);
    this.name = 'InputError';
  }
}

// ─── Utility functions ──────────────────────────────────────────────────────────

/**
 * Check whether a value is a CloakroomError, optionally with a specific code.
 */
export function isCloakroomError(value: unknown, code?: CloakroomErrorCode): value is CloakroomError {
  if (!(value instanceof CloakroomError)) {
    return false;
  }
  return code === undefined || value.code === code;
}

/**
 * Format an error for display.
 *
 * @example
 * ```typescript
 * formatError(new AuthorizationError(CloakroomErrorCode.NOT_ADMIN, 'optimizeTeam requires the administrator'));
 * // [CLOAK_E200] (authorization) optimizeTeam requires the administrator
 * ```
 */
export function formatError(error: CloakroomError): string {
  const lines: string[] = [];
  lines.push(`[${error.code}] (${error.category}) ${error.message}`);
  if (error.hint) {
    lines.push(`Hint: ${error.hint}`);
  }
  return lines.join('\n');
}
