import * as ed from '@noble/ed25519';
import { sha256 as nobleSha256 } from '@noble/hashes/sha256';
import { randomBytes } from '@noble/hashes/utils';
import { CloakroomErrorCode, InputError } from '@cloakroom/types';

export type { KeyPair, PrivateKey, PublicKey, Signature, HashHex } from './types';

import type { KeyPair, PrivateKey, PublicKey, Signature, HashHex } from './types';

const KEY_LENGTH = 32;

function describeBytes(value: unknown): string {
  return value instanceof Uint8Array ? `${value.length} bytes` : typeof value;
}

/**
 * Generate a new Ed25519 key pair from the platform CSPRNG.
 *
 * @example
 * ```typescript
 * const coprocessorKeys = await generateKeyPair();
 * console.log(coprocessorKeys.publicKeyHex); // 64-char hex string
 * ```
 */
export async function generateKeyPair(): Promise<KeyPair> {
  return keyPairFromPrivateKey(randomBytes(KEY_LENGTH));
}

/**
 * Reconstruct a KeyPair from an existing 32-byte private key.
 * The input is copied so the caller's array is not retained.
 */
export async function keyPairFromPrivateKey(privateKey: Uint8Array): Promise<KeyPair> {
  if (!(privateKey instanceof Uint8Array) || privateKey.length !== KEY_LENGTH) {
    throw new InputError(
      CloakroomErrorCode.CRYPTO_INVALID_KEY,
      `Private key must be a 32-byte Uint8Array, got ${describeBytes(privateKey)}`,
      { hint: 'Provide a 32-byte Uint8Array as the Ed25519 private key.' },
    );
  }
  const copy = new Uint8Array(privateKey);
  const publicKey = await ed.getPublicKeyAsync(copy);
  return {
    privateKey: copy,
    publicKey,
    publicKeyHex: toHex(publicKey),
  };
}

/**
 * Sign arbitrary bytes with an Ed25519 private key.
 *
 * @returns A 64-byte Ed25519 signature.
 */
export async function sign(message: Uint8Array, privateKey: PrivateKey): Promise<Signature> {
  if (!(privateKey instanceof Uint8Array) || privateKey.length !== KEY_LENGTH) {
    throw new InputError(
      CloakroomErrorCode.CRYPTO_INVALID_KEY,
      `sign() expects privateKey to be a 32-byte Uint8Array, got ${describeBytes(privateKey)}`,
    );
  }
  try {
    return await ed.signAsync(message, privateKey);
  } catch (err) {
    throw new InputError(
      CloakroomErrorCode.CRYPTO_SIGNATURE_FAILED,
      `Ed25519 signing operation failed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err instanceof Error ? err : undefined },
    );
  }
}

/** Sign a UTF-8 string. Convenience wrapper around {@link sign}. */
export async function signString(message: string, privateKey: PrivateKey): Promise<Signature> {
  return sign(new TextEncoder().encode(message), privateKey);
}

/**
 * Verify an Ed25519 signature.
 *
 * Safe to call with untrusted input: a malformed key or truncated
 * signature yields `false`, never an exception.
 */
export async function verify(
  message: Uint8Array,
  signature: Signature,
  publicKey: PublicKey,
): Promise<boolean> {
  try {
    return await ed.verifyAsync(signature, message, publicKey);
  } catch {
    return false;
  }
}

/** SHA-256 of arbitrary bytes as a lowercase hex string. */
export function sha256(data: Uint8Array): HashHex {
  return toHex(nobleSha256(data));
}

/** SHA-256 of a UTF-8 string as a lowercase hex string. */
export function sha256String(data: string): HashHex {
  return sha256(new TextEncoder().encode(data));
}

/**
 * SHA-256 of a value in canonical JSON form. Structurally equal objects
 * hash identically regardless of key insertion order.
 *
 * @example
 * ```typescript
 * sha256Object({ b: 2, a: 1 }) === sha256Object({ a: 1, b: 2 }); // true
 * ```
 */
export function sha256Object(obj: unknown): HashHex {
  return sha256String(canonicalizeJson(obj));
}

/**
 * Deterministic JSON serialization with recursively sorted keys.
 *
 * @example
 * ```typescript
 * canonicalizeJson({ z: 1, a: 2 }); // '{"a":2,"z":1}'
 * ```
 */
export function canonicalizeJson(obj: unknown): string {
  return JSON.stringify(sortKeys(obj));
}

function sortKeys(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, v] of entries) {
      if (v !== undefined) {
        sorted[key] = sortKeys(v);
      }
    }
    return sorted;
  }
  return value;
}

/**
 * Encode bytes as a lowercase hex string.
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([255, 0])); // 'ff00'
 * ```
 */
export function toHex(data: Uint8Array): string {
  let hex = '';
  for (const byte of data) {
    hex += byte.toString(16).padStart(2, '0');
  }
  return hex;
}

/**
 * Decode a hex string to bytes.
 *
 * @throws {InputError} When the string has odd length or non-hex characters.
 */
export function fromHex(hex: string): Uint8Array {
  if (typeof hex !== 'string') {
    throw new InputError(
      CloakroomErrorCode.CRYPTO_INVALID_HEX,
      `fromHex() expects a string, got ${typeof hex}`,
    );
  }
  if (hex.length % 2 !== 0) {
    throw new InputError(
      CloakroomErrorCode.CRYPTO_INVALID_HEX,
      `Invalid hex string: odd length (${hex.length})`,
      { hint: 'Each byte is represented by two hex characters.' },
    );
  }
  if (hex.length > 0 && !/^[0-9a-fA-F]+$/.test(hex)) {
    throw new InputError(
      CloakroomErrorCode.CRYPTO_INVALID_HEX,
      'Invalid hex string: contains non-hexadecimal characters',
    );
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = parseInt(hex.substring(i, i + 2), 16);
  }
  return bytes;
}

/**
 * Random identifier as a hex string.
 *
 * @param bytes - Number of random bytes (default 16, i.e. 32 hex chars).
 */
export function generateId(bytes: number = 16): string {
  return toHex(randomBytes(bytes));
}

/** Current time as an ISO 8601 UTC string. */
export function timestamp(): string {
  return new Date().toISOString();
}
