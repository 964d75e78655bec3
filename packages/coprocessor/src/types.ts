/** Identifier the co-processor assigns to a decryption request. */
export type RequestId = string;

/**
 * The decryption capability exposed by the external co-processor.
 *
 * `requestDecryption` returns immediately with a request id. The
 * plaintext arrives later, out of band, as a {@link DecryptionResult}
 * delivered to whichever callback the deployment wires up.
 */
export interface DecryptionOracle {
  requestDecryption(ciphertexts: Uint8Array[]): Promise<RequestId>;
}

/** What the co-processor delivers when a request completes. */
export interface DecryptionResult {
  requestId: RequestId;
  /** Concatenated big-endian uint32 values, in request order. */
  plaintext: Uint8Array;
  /** Attestation over `(requestId, plaintext)`. Opaque to the engine. */
  proof: Uint8Array;
}

/** Receives completed decryptions. */
export type DecryptionCallback = (result: DecryptionResult) => Promise<void>;

/**
 * Verifies that a plaintext was produced by the trusted co-processor for
 * a specific request. Must not throw on malformed input.
 */
export interface ProofVerifier {
  verify(requestId: RequestId, plaintext: Uint8Array, proof: Uint8Array): Promise<boolean>;
}
