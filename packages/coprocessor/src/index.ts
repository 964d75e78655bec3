/**
 * @cloakroom/coprocessor — the decryption capability consumed by the
 * engine: request/callback types, the uint32 payload codec and the
 * Ed25519 decryption-proof format, plus an in-process simulator.
 *
 * @packageDocumentation
 */

export type {
  RequestId,
  DecryptionOracle,
  DecryptionResult,
  DecryptionCallback,
  ProofVerifier,
} from './types';

export { encodeUint32s, decodeUint32s } from './codec';

export {
  DECRYPTION_PROOF_DOMAIN,
  decryptionProofMessage,
  signDecryptionResult,
  Ed25519ProofVerifier,
} from './proof';

export { SimulatedCoprocessor } from './simulated-coprocessor';
export type { SimulatedCoprocessorOptions } from './simulated-coprocessor';
