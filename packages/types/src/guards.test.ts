import { describe, it, expect } from 'vitest';
import {
  isNonEmptyString,
  isValidHex,
  isValidPublicKey,
  isUint32,
  isPlainObject,
  sanitizeJsonInput,
  assertNever,
  UINT32_MAX,
} from './guards';
import { InputError } from './errors';

describe('type guards', () => {
  it('isNonEmptyString', () => {
    expect(isNonEmptyString('alice')).toBe(true);
    expect(isNonEmptyString('  ')).toBe(false);
    expect(isNonEmptyString(42)).toBe(false);
  });

  it('isValidHex', () => {
    expect(isValidHex('00ff')).toBe(true);
    expect(isValidHex('0')).toBe(false);
    expect(isValidHex('zz')).toBe(false);
    expect(isValidHex('')).toBe(false);
  });

  it('isValidPublicKey requires 64 hex characters', () => {
    expect(isValidPublicKey('a'.repeat(64))).toBe(true);
    expect(isValidPublicKey('a'.repeat(62))).toBe(false);
  });

  it('isUint32 accepts exactly [0, 2^32 - 1]', () => {
    expect(isUint32(0)).toBe(true);
    expect(isUint32(UINT32_MAX)).toBe(true);
    expect(isUint32(UINT32_MAX + 1)).toBe(false);
    expect(isUint32(-1)).toBe(false);
    expect(isUint32(1.5)).toBe(false);
  });

  it('isPlainObject', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(Object.create(null))).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
    expect(isPlainObject(null)).toBe(false);
  });
});

describe('sanitizeJsonInput', () => {
  it('parses ordinary JSON', () => {
    expect(sanitizeJsonInput('{"requestId":"r1"}')).toEqual({ requestId: 'r1' });
  });

  it('rejects malformed JSON with an InputError', () => {
    expect(() => sanitizeJsonInput('{')).toThrow(InputError);
  });

  it('rejects prototype-pollution keys at any depth', () => {
    expect(() => sanitizeJsonInput('{"a":{"__proto__":{"x":1}}}')).toThrow(/dangerous key "__proto__"/);
    expect(() => sanitizeJsonInput('[{"constructor":1}]')).toThrow(InputError);
  });
});

describe('assertNever', () => {
  it('throws with the unexpected value', () => {
    expect(() => assertNever('x' as never)).toThrow('Unexpected value: x');
  });
});
