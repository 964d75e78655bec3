import { describe, it, expect, beforeEach } from 'vitest';
import { ArithmeticError, CloakroomErrorCode, InputError, UINT32_MAX } from '@cloakroom/types';
import { SimulatedFheBackend, sumAll } from './index';
import type { EncryptedValue } from './index';

let fhe: SimulatedFheBackend;

/** Decrypt through the key-holder path, as the co-processor would. */
function peek(handle: EncryptedValue): number {
  return fhe.decryptSerialized(fhe.serialize(handle));
}

beforeEach(() => {
  fhe = new SimulatedFheBackend();
});

// ---------------------------------------------------------------------------
// Handles
// ---------------------------------------------------------------------------
describe('handles', () => {
  it('encrypt issues a fresh frozen handle each call', () => {
    const a = fhe.encrypt(4);
    const b = fhe.encrypt(4);
    expect(a.id).not.toBe(b.id);
    expect(a.__brand).toBe('Ciphertext');
    expect(a.backendId).toBe(fhe.id);
    expect(Object.isFrozen(a)).toBe(true);
    expect(peek(a)).toBe(4);
  });

  it('constant is deterministic in its value', () => {
    expect(fhe.constant(7).id).toBe(fhe.constant(7).id);
    expect(fhe.constant(7).id).not.toBe(fhe.constant(8).id);
  });

  it('arithmetic is deterministic in its operands', () => {
    const a = fhe.encrypt(3);
    const b = fhe.encrypt(5);
    expect(fhe.add(a, b).id).toBe(fhe.add(a, b).id);
    expect(fhe.add(a, b).id).not.toBe(fhe.add(b, a).id);
    expect(fhe.add(a, 5).id).not.toBe(fhe.add(a, b).id);
  });

  it('operations never return an operand handle', () => {
    const a = fhe.encrypt(9);
    const sum = fhe.add(a, 0);
    expect(sum.id).not.toBe(a.id);
    expect(peek(a)).toBe(9);
    expect(peek(sum)).toBe(9);
  });

  it('encrypt rejects values outside uint32', () => {
    expect(() => fhe.encrypt(-1)).toThrow(InputError);
    expect(() => fhe.encrypt(UINT32_MAX + 1)).toThrow(InputError);
    expect(() => fhe.encrypt(2.5)).toThrow(InputError);
  });

  it('rejects a backend id that is not 32 hex characters', () => {
    expect(() => new SimulatedFheBackend('nope')).toThrow(InputError);
  });
});

// ---------------------------------------------------------------------------
// Arithmetic
// ---------------------------------------------------------------------------
describe('arithmetic', () => {
  it('add, sub, mul, div, and', () => {
    const a = fhe.encrypt(12);
    const b = fhe.encrypt(5);
    expect(peek(fhe.add(a, b))).toBe(17);
    expect(peek(fhe.sub(a, b))).toBe(7);
    expect(peek(fhe.mul(a, b))).toBe(60);
    expect(peek(fhe.div(a, b))).toBe(2);
    expect(peek(fhe.and(a, b))).toBe(4);
  });

  it('accepts plaintext scalars as the right-hand operand', () => {
    const a = fhe.encrypt(9);
    expect(peek(fhe.div(a, 2))).toBe(4);
    expect(peek(fhe.mul(a, 10))).toBe(90);
  });

  it('add and mul wrap modulo 2^32', () => {
    expect(peek(fhe.add(fhe.encrypt(UINT32_MAX), 1))).toBe(0);
    expect(peek(fhe.mul(fhe.encrypt(0x80000000), 2))).toBe(0);
    expect(peek(fhe.mul(fhe.encrypt(0x10001), 0x10001))).toBe(0x20001);
  });

  it('sub wraps below zero', () => {
    expect(peek(fhe.sub(fhe.encrypt(2), fhe.encrypt(5)))).toBe(4294967293);
  });

  it('division by a plaintext or encrypted zero throws ArithmeticError', () => {
    const a = fhe.encrypt(10);
    expect(() => fhe.div(a, 0)).toThrow(ArithmeticError);
    try {
      fhe.div(a, fhe.encrypt(0));
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ArithmeticError);
      expect((e as ArithmeticError).code).toBe(CloakroomErrorCode.DIVISION_BY_ZERO);
    }
  });

  it('abs reads the operand as a signed 32-bit value', () => {
    expect(peek(fhe.abs(fhe.encrypt(6)))).toBe(6);
    expect(peek(fhe.abs(fhe.sub(fhe.encrypt(2), 5)))).toBe(3);
    expect(peek(fhe.abs(fhe.encrypt(0x80000000)))).toBe(0x80000000);
  });

  it('gt compares unsigned and select picks a branch', () => {
    const big = fhe.encrypt(71);
    const small = fhe.encrypt(70);
    const yes = fhe.gt(big, 70);
    const no = fhe.gt(small, 70);
    expect(yes.__brand).toBe('EncryptedBool');
    expect(peek(yes)).toBe(1);
    expect(peek(no)).toBe(0);
    expect(peek(fhe.gt(fhe.encrypt(UINT32_MAX), 1))).toBe(1);

    const a = fhe.encrypt(11);
    const b = fhe.encrypt(22);
    const picked = fhe.select(yes, a, b);
    expect(peek(picked)).toBe(11);
    expect(picked.id).not.toBe(a.id);
    expect(peek(fhe.select(no, a, b))).toBe(22);
  });

  it('sumAll folds a list from the encrypted zero', () => {
    expect(peek(sumAll(fhe, [fhe.encrypt(1), fhe.encrypt(2), fhe.encrypt(3)]))).toBe(6);
    expect(peek(sumAll(fhe, []))).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Foreign handles and serialization
// ---------------------------------------------------------------------------
describe('foreign handles', () => {
  it('rejects handles from another backend', () => {
    const other = new SimulatedFheBackend();
    const theirs = other.encrypt(1);
    expect(() => fhe.add(theirs, 1)).toThrow(ArithmeticError);
    expect(() => fhe.decryptSerialized(other.serialize(theirs))).toThrow(ArithmeticError);
  });

  it('rejects a forged handle with an unknown id', () => {
    const forged = { __brand: 'Ciphertext' as const, id: 'ab'.repeat(16), backendId: fhe.id };
    expect(() => fhe.add(forged, 1)).toThrow('Handle was not issued by this backend');
  });
});

describe('serialize', () => {
  it('produces 34 opaque bytes tagged with the handle kind', () => {
    const bytes = fhe.serialize(fhe.encrypt(5));
    expect(bytes.length).toBe(34);
    expect(bytes[0]).toBe(1);
    expect(bytes[1]).toBe(1);
    expect(fhe.serialize(fhe.gt(fhe.encrypt(1), 0))[1]).toBe(2);
  });

  it('decryptSerialized rejects malformed input', () => {
    expect(() => fhe.decryptSerialized(new Uint8Array(3))).toThrow(InputError);
    const bytes = fhe.serialize(fhe.encrypt(5));
    bytes[1] = 9;
    expect(() => fhe.decryptSerialized(bytes)).toThrow('Unknown handle kind 9');
  });
});
