import { CloakroomErrorCode, ProtocolError, validateUint32 } from '@cloakroom/types';

const WORD_BYTES = 4;

/** Pack uint32 values as consecutive big-endian words. */
export function encodeUint32s(values: readonly number[]): Uint8Array {
  const bytes = new Uint8Array(values.length * WORD_BYTES);
  const view = new DataView(bytes.buffer);
  values.forEach((value, index) => {
    validateUint32(value, `values[${index}]`);
    view.setUint32(index * WORD_BYTES, value, false);
  });
  return bytes;
}

/**
 * Unpack exactly `count` big-endian uint32 words.
 *
 * @throws {ProtocolError} MALFORMED_PAYLOAD when the length is not `count * 4`.
 */
export function decodeUint32s(bytes: Uint8Array, count: number): number[] {
  if (bytes.length !== count * WORD_BYTES) {
    throw new ProtocolError(
      CloakroomErrorCode.MALFORMED_PAYLOAD,
      `Expected ${count * WORD_BYTES} plaintext bytes (${count} uint32 values), got ${bytes.length}`,
    );
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(view.getUint32(i * WORD_BYTES, false));
  }
  return values;
}
