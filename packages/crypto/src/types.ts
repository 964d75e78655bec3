/** Raw 32-byte Ed25519 private key */
export type PrivateKey = Uint8Array;

/** Raw 32-byte Ed25519 public key */
export type PublicKey = Uint8Array;

/** 64-byte Ed25519 signature */
export type Signature = Uint8Array;

/** Hex-encoded SHA-256 hash */
export type HashHex = string;

/** A key pair for signing and verification */
export interface KeyPair {
  privateKey: PrivateKey;
  publicKey: PublicKey;
  /** Hex-encoded public key for configuration files and logs */
  publicKeyHex: string;
}
