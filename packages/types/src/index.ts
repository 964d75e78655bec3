/**
 * @cloakroom/types — shared definitions for the Cloakroom engine.
 *
 * Error taxonomy, structured logging, typed events, the authorization
 * context and boundary validation helpers.
 *
 * @packageDocumentation
 */

import { CloakroomErrorCode, InputError } from './errors';
import { isNonEmptyString, isUint32 } from './guards';

// ─── Identities ─────────────────────────────────────────────────────────────────

/** Opaque identity of an employee, as verified by the calling context. */
export type EmployeeId = string;

/** Identity of a team. */
export type TeamId = string;

/**
 * Explicit authorization context passed to every mutating operation.
 *
 * `caller` has already been authenticated by the surrounding transport;
 * Cloakroom only decides what that identity may do.
 */
export interface AuthContext {
  readonly caller: EmployeeId;
}

// ─── Validation utilities ───────────────────────────────────────────────────────

/**
 * Assert that a string is non-empty and not only whitespace.
 *
 * @throws {InputError} When the value is blank.
 *
 * @example
 * ```typescript
 * validateNonEmpty(team, 'team');
 * ```
 */
export function validateNonEmpty(value: string, name: string): void {
  if (!isNonEmptyString(value)) {
    throw new InputError(
      CloakroomErrorCode.INVALID_INPUT,
      `${name} must be a non-empty string`,
      { context: { field: name } },
    );
  }
}

/**
 * Assert that a number is an unsigned 32-bit integer.
 *
 * @throws {InputError} When the value is fractional, negative or too large.
 */
export function validateUint32(value: number, name: string): void {
  if (!isUint32(value)) {
    throw new InputError(
      CloakroomErrorCode.INVALID_INPUT,
      `${name} must be an integer between 0 and 4294967295 (got ${value})`,
      { context: { field: name } },
    );
  }
}

// ─── Re-exports ─────────────────────────────────────────────────────────────────

export {
  CloakroomErrorCode,
  CloakroomError,
  PreconditionError,
  AuthorizationError,
  ProtocolError,
  ArithmeticError,
  InputError,
  isCloakroomError,
  formatError,
} from './errors';
export type { ErrorCategory, CloakroomErrorOptions } from './errors';

export {
  UINT32_MAX,
  isNonEmptyString,
  isValidHex,
  isValidPublicKey,
  isUint32,
  isPlainObject,
  sanitizeJsonInput,
  assertNever,
} from './guards';

export {
  Logger,
  LogLevel,
  createLogger,
  defaultLogger,
  parseLogLevel,
  DEFAULT_SENSITIVE_FIELDS,
} from './logger';
export type { LogEntry, LogOutput, LoggerOptions, LogLevelName } from './logger';

export { TypedEventEmitter, createEventBus } from './events';
export type {
  CloakroomEventMap,
  CloakroomEventName,
  CloakroomEvents,
  EventListener,
} from './events';
