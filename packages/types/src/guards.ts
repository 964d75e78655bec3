/**
 * Runtime type guards and input sanitization for Cloakroom boundaries
 * (configuration files, HTTP callback bodies, public API arguments).
 */

import { CloakroomErrorCode, InputError } from './errors';

/** Largest value representable by an unsigned 32-bit integer. */
export const UINT32_MAX = 0xffffffff;

// ─── Type Guards ────────────────────────────────────────────────────────────────

/** `true` if `value` is a string with at least one non-whitespace character. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/** `true` if `value` is an even-length string of hexadecimal digits. */
export function isValidHex(value: unknown): value is string {
  return (
    typeof value === 'string' &&
    value.length > 0 &&
    value.length % 2 === 0 &&
    /^[0-9a-fA-F]+$/.test(value)
  );
}

/** `true` if `value` is a 64-character hex string, i.e. an Ed25519 public key. */
export function isValidPublicKey(value: unknown): value is string {
  return typeof value === 'string' && /^[0-9a-fA-F]{64}$/.test(value);
}

/** `true` if `value` is an integer in [0, 2^32 - 1]. */
export function isUint32(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= UINT32_MAX;
}

/**
 * `true` if `value` is a plain object (created by `{}` or `Object.create(null)`),
 * not an array, `null` or a class instance.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// ─── JSON input ─────────────────────────────────────────────────────────────────

const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

function assertNoDangerousKeys(obj: unknown): void {
  if (typeof obj !== 'object' || obj === null) return;

  if (Array.isArray(obj)) {
    for (const item of obj) {
      assertNoDangerousKeys(item);
    }
    return;
  }

  for (const [key, nested] of Object.entries(obj)) {
    if (DANGEROUS_KEYS.has(key)) {
      throw new InputError(
        CloakroomErrorCode.INVALID_INPUT,
        `Potentially dangerous key "${key}" detected in JSON input`,
      );
    }
    assertNoDangerousKeys(nested);
  }
}

/**
 * Parse a JSON string, rejecting prototype-pollution keys.
 *
 * @throws {InputError} When the text is not valid JSON or holds a dangerous key.
 */
export function sanitizeJsonInput(value: string): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (err) {
    throw new InputError(
      CloakroomErrorCode.INVALID_INPUT,
      `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  assertNoDangerousKeys(parsed);
  return parsed;
}

// ─── Exhaustiveness Check ───────────────────────────────────────────────────────

/**
 * Place in the `default` branch of a `switch` to get a compile-time error
 * when a case is not handled.
 */
export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
