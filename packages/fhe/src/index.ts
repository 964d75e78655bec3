/**
 * @cloakroom/fhe — the ciphertext-handle capability consumed by the engine,
 * plus an in-process simulated backend for tests and local runs.
 *
 * @packageDocumentation
 */

export type {
  Ciphertext,
  EncryptedBool,
  EncryptedValue,
  Operand,
  FheBackend,
  DecryptionKeyHolder,
} from './types';

export { SimulatedFheBackend } from './simulated-backend';

import type { Ciphertext, FheBackend } from './types';

/**
 * Homomorphic sum of a list of handles, starting from the encrypted zero
 * constant. Returns `constant(0)` for an empty list.
 */
export function sumAll(backend: FheBackend, handles: readonly Ciphertext[]): Ciphertext {
  let total = backend.constant(0);
  for (const handle of handles) {
    total = backend.add(total, handle);
  }
  return total;
}
