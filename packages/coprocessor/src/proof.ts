/**
 * Decryption proof format.
 *
 * The co-processor signs the canonical hash of
 * `{ domain, requestId, plaintext }` with its Ed25519 key. Binding the
 * request id into the signed message means a proof for one request can
 * never authenticate the same plaintext delivered for another.
 */

import { fromHex, sha256Object, signString, toHex, verify } from '@cloakroom/crypto';
import type { PrivateKey, PublicKey } from '@cloakroom/crypto';
import { CloakroomErrorCode, InputError, isValidPublicKey } from '@cloakroom/types';

import type { ProofVerifier, RequestId } from './types';

/** Domain separator for decryption attestations. */
export const DECRYPTION_PROOF_DOMAIN = 'cloakroom.decryption.v1';

/** The exact string the co-processor signs for a result. */
export function decryptionProofMessage(requestId: RequestId, plaintext: Uint8Array): string {
  return sha256Object({
    domain: DECRYPTION_PROOF_DOMAIN,
    requestId,
    plaintext: toHex(plaintext),
  });
}

/** Produce the proof for a decryption result. Co-processor side only. */
export async function signDecryptionResult(
  requestId: RequestId,
  plaintext: Uint8Array,
  privateKey: PrivateKey,
): Promise<Uint8Array> {
  return signString(decryptionProofMessage(requestId, plaintext), privateKey);
}

/** Verifies proofs against the co-processor's Ed25519 public key. */
export class Ed25519ProofVerifier implements ProofVerifier {
  private readonly publicKey: PublicKey;

  /**
   * @param publicKey - Raw 32-byte key, or its 64-character hex form.
   */
  constructor(publicKey: PublicKey | string) {
    if (typeof publicKey === 'string') {
      if (!isValidPublicKey(publicKey)) {
        throw new InputError(
          CloakroomErrorCode.CRYPTO_INVALID_KEY,
          'Co-processor public key must be 64 hex characters',
        );
      }
      this.publicKey = fromHex(publicKey);
    } else {
      if (publicKey.length !== 32) {
        throw new InputError(
          CloakroomErrorCode.CRYPTO_INVALID_KEY,
          `Co-processor public key must be 32 bytes, got ${publicKey.length}`,
        );
      }
      this.publicKey = new Uint8Array(publicKey);
    }
  }

  async verify(requestId: RequestId, plaintext: Uint8Array, proof: Uint8Array): Promise<boolean> {
    const message = new TextEncoder().encode(decryptionProofMessage(requestId, plaintext));
    return verify(message, proof, this.publicKey);
  }
}
