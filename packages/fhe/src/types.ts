/**
 * Capability types for encrypted unsigned 32-bit integers.
 *
 * A handle is an opaque reference. It exposes no bytes and no value; the
 * only way to compute with it is through an {@link FheBackend}, and the
 * only way to read it is an authenticated decryption performed by the
 * key holder.
 */

/** Opaque handle to an encrypted uint32. */
export interface Ciphertext {
  readonly __brand: 'Ciphertext';
  /** Handle identifier, unique within the issuing backend. */
  readonly id: string;
  /** Identifier of the backend that issued the handle. */
  readonly backendId: string;
}

/** Opaque handle to an encrypted boolean, produced by comparisons. */
export interface EncryptedBool {
  readonly __brand: 'EncryptedBool';
  readonly id: string;
  readonly backendId: string;
}

/** Any handle a backend can serialize. */
export type EncryptedValue = Ciphertext | EncryptedBool;

/** Right-hand operand: a handle, or a public uint32 that is trivially encrypted. */
export type Operand = Ciphertext | number;

/**
 * Homomorphic operations over encrypted uint32 values.
 *
 * Every operation returns a new handle and never mutates an operand.
 * Operations are deterministic: the same operands yield the same handle.
 * `add`, `sub` and `mul` wrap modulo 2^32; `div` truncates and fails on
 * a zero divisor.
 */
export interface FheBackend {
  /** Identifier stamped on every handle this backend issues. */
  readonly id: string;

  /** Encrypt a value under fresh randomness (a new handle on every call). */
  encrypt(value: number): Ciphertext;

  /** Trivially encrypt a public constant. Deterministic in `value`. */
  constant(value: number): Ciphertext;

  add(a: Ciphertext, b: Operand): Ciphertext;
  sub(a: Ciphertext, b: Operand): Ciphertext;
  mul(a: Ciphertext, b: Operand): Ciphertext;
  /** @throws {ArithmeticError} DIVISION_BY_ZERO when the divisor is zero. */
  div(a: Ciphertext, b: Operand): Ciphertext;
  /** Bitwise AND; used on day-of-week bitmasks. */
  and(a: Ciphertext, b: Operand): Ciphertext;
  /** Magnitude of the operand read as a two's-complement int32. */
  abs(a: Ciphertext): Ciphertext;
  /** Unsigned `a > b`. */
  gt(a: Ciphertext, b: Operand): EncryptedBool;
  /** `whenTrue` if `condition` holds, otherwise `whenFalse`, as a new handle. */
  select(condition: EncryptedBool, whenTrue: Ciphertext, whenFalse: Ciphertext): Ciphertext;

  /** Opaque wire form of a handle, suitable for a decryption request. */
  serialize(handle: EncryptedValue): Uint8Array;
}

/**
 * Holder of the decryption key. Only the co-processor side holds one;
 * engine components never receive this interface.
 */
export interface DecryptionKeyHolder {
  /** Decrypt a serialized handle to its uint32 value (booleans yield 0 or 1). */
  decryptSerialized(bytes: Uint8Array): number;
}
