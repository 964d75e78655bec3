/**
 * In-process plaintext simulation of the FHE co-processor.
 *
 * Values live in a private table keyed by handle id and never leave this
 * module except through {@link SimulatedFheBackend.decryptSerialized},
 * which plays the role of the co-processor's secret key. Arithmetic
 * follows the uint32 semantics of {@link FheBackend}.
 *
 * Handles are never released: every `encrypt` and every derived result
 * adds an entry to the value table for the lifetime of the backend. Use
 * one per test or demo run, not as a long-lived service backend.
 *
 * @packageDocumentation
 */

import { fromHex, generateId, sha256Object, toHex } from '@cloakroom/crypto';
import {
  ArithmeticError,
  CloakroomErrorCode,
  InputError,
  validateUint32,
} from '@cloakroom/types';

import type {
  Ciphertext,
  DecryptionKeyHolder,
  EncryptedBool,
  EncryptedValue,
  FheBackend,
  Operand,
} from './types';

const FORMAT_VERSION = 1;
const KIND_UINT32 = 1;
const KIND_BOOL = 2;
const ID_BYTES = 16;
/** version + kind + backend id + handle id */
const SERIALIZED_LENGTH = 2 + ID_BYTES * 2;

type HandleKind = typeof KIND_UINT32 | typeof KIND_BOOL;

/** Operand as it enters the derivation of a result handle id. */
type OperandRef = { handle: string } | { scalar: number };

export class SimulatedFheBackend implements FheBackend, DecryptionKeyHolder {
  readonly id: string;
  private readonly values = new Map<string, number>();

  constructor(id: string = generateId(ID_BYTES)) {
    if (!/^[0-9a-f]{32}$/.test(id)) {
      throw new InputError(
        CloakroomErrorCode.INVALID_INPUT,
        'backend id must be 32 lowercase hex characters',
      );
    }
    this.id = id;
  }

  /** Number of handles issued so far. */
  get handleCount(): number {
    return this.values.size;
  }

  encrypt(value: number): Ciphertext {
    validateUint32(value, 'value');
    const id = generateId(ID_BYTES);
    this.values.set(id, value);
    return this.handle('Ciphertext', id);
  }

  constant(value: number): Ciphertext {
    validateUint32(value, 'value');
    return this.derive('constant', [{ scalar: value }], value);
  }

  add(a: Ciphertext, b: Operand): Ciphertext {
    return this.binary('add', a, b, (x, y) => (x + y) >>> 0);
  }

  sub(a: Ciphertext, b: Operand): Ciphertext {
    return this.binary('sub', a, b, (x, y) => (x - y) >>> 0);
  }

  mul(a: Ciphertext, b: Operand): Ciphertext {
    return this.binary('mul', a, b, (x, y) => Math.imul(x, y) >>> 0);
  }

  div(a: Ciphertext, b: Operand): Ciphertext {
    return this.binary('div', a, b, (x, y) => {
      if (y === 0) {
        throw new ArithmeticError(
          CloakroomErrorCode.DIVISION_BY_ZERO,
          'Homomorphic division by zero',
          { hint: 'A zero divisor indicates malformed upstream data; check the operands feeding this division.' },
        );
      }
      return Math.floor(x / y);
    });
  }

  and(a: Ciphertext, b: Operand): Ciphertext {
    return this.binary('and', a, b, (x, y) => (x & y) >>> 0);
  }

  abs(a: Ciphertext): Ciphertext {
    const x = this.read(a);
    return this.derive('abs', [{ handle: a.id }], Math.abs(x | 0) >>> 0);
  }

  gt(a: Ciphertext, b: Operand): EncryptedBool {
    const x = this.read(a);
    const y = this.operandValue(b);
    const id = this.deriveId('gt', [{ handle: a.id }, this.operandRef(b)]);
    this.values.set(id, x > y ? 1 : 0);
    return this.handle('EncryptedBool', id);
  }

  select(condition: EncryptedBool, whenTrue: Ciphertext, whenFalse: Ciphertext): Ciphertext {
    const flag = this.read(condition);
    const chosen = flag !== 0 ? this.read(whenTrue) : this.read(whenFalse);
    return this.derive(
      'select',
      [{ handle: condition.id }, { handle: whenTrue.id }, { handle: whenFalse.id }],
      chosen,
    );
  }

  serialize(handle: EncryptedValue): Uint8Array {
    this.read(handle);
    const bytes = new Uint8Array(SERIALIZED_LENGTH);
    bytes[0] = FORMAT_VERSION;
    bytes[1] = handle.__brand === 'Ciphertext' ? KIND_UINT32 : KIND_BOOL;
    bytes.set(fromHex(this.id), 2);
    bytes.set(fromHex(handle.id), 2 + ID_BYTES);
    return bytes;
  }

  decryptSerialized(bytes: Uint8Array): number {
    if (bytes.length !== SERIALIZED_LENGTH || bytes[0] !== FORMAT_VERSION) {
      throw new InputError(
        CloakroomErrorCode.INVALID_INPUT,
        `Serialized handle must be ${SERIALIZED_LENGTH} bytes of format version ${FORMAT_VERSION}`,
      );
    }
    const kind = bytes[1];
    if (kind !== KIND_UINT32 && kind !== KIND_BOOL) {
      throw new InputError(CloakroomErrorCode.INVALID_INPUT, `Unknown handle kind ${String(kind)}`);
    }
    const backendId = toHex(bytes.subarray(2, 2 + ID_BYTES));
    const handleId = toHex(bytes.subarray(2 + ID_BYTES));
    if (backendId !== this.id) {
      throw this.foreign(handleId);
    }
    const value = this.values.get(handleId);
    if (value === undefined) {
      throw this.foreign(handleId);
    }
    return value;
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private binary(
    op: string,
    a: Ciphertext,
    b: Operand,
    apply: (x: number, y: number) => number,
  ): Ciphertext {
    const x = this.read(a);
    const y = this.operandValue(b);
    return this.derive(op, [{ handle: a.id }, this.operandRef(b)], apply(x, y));
  }

  private derive(op: string, operands: OperandRef[], value: number): Ciphertext {
    const id = this.deriveId(op, operands);
    this.values.set(id, value);
    return this.handle('Ciphertext', id);
  }

  private deriveId(op: string, operands: OperandRef[]): string {
    return sha256Object({ backend: this.id, op, operands }).slice(0, ID_BYTES * 2);
  }

  private operandRef(b: Operand): OperandRef {
    return typeof b === 'number' ? { scalar: b } : { handle: b.id };
  }

  private operandValue(b: Operand): number {
    if (typeof b === 'number') {
      validateUint32(b, 'operand');
      return b;
    }
    return this.read(b);
  }

  private read(handle: EncryptedValue): number {
    if (handle.backendId !== this.id) {
      throw this.foreign(handle.id);
    }
    const value = this.values.get(handle.id);
    if (value === undefined) {
      throw this.foreign(handle.id);
    }
    return value;
  }

  private handle(brand: 'Ciphertext', id: string): Ciphertext;
  private handle(brand: 'EncryptedBool', id: string): EncryptedBool;
  private handle(brand: 'Ciphertext' | 'EncryptedBool', id: string): EncryptedValue {
    if (brand === 'Ciphertext') {
      return Object.freeze({ __brand: brand, id, backendId: this.id });
    }
    return Object.freeze({ __brand: brand, id, backendId: this.id });
  }

  private foreign(handleId: string): ArithmeticError {
    return new ArithmeticError(
      CloakroomErrorCode.FOREIGN_HANDLE,
      'Handle was not issued by this backend',
      { context: { handleId } },
    );
  }
}
