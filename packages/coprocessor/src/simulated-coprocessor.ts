/**
 * In-process stand-in for the external decryption co-processor.
 *
 * Requests queue until a test (or demo driver) calls {@link fulfill},
 * which decrypts with the key holder, signs the result and hands it to
 * the connected callback. This reproduces the unbounded latency between
 * request and callback that the engine must tolerate.
 *
 * @packageDocumentation
 */

import { generateId, generateKeyPair } from '@cloakroom/crypto';
import type { KeyPair } from '@cloakroom/crypto';
import type { DecryptionKeyHolder } from '@cloakroom/fhe';
import { defaultLogger, InputError, CloakroomErrorCode } from '@cloakroom/types';
import type { Logger } from '@cloakroom/types';

import { encodeUint32s } from './codec';
import { signDecryptionResult } from './proof';
import type { DecryptionCallback, DecryptionOracle, DecryptionResult, RequestId } from './types';

export interface SimulatedCoprocessorOptions {
  keyHolder: DecryptionKeyHolder;
  keyPair: KeyPair;
  logger?: Logger;
}

export class SimulatedCoprocessor implements DecryptionOracle {
  private readonly keyHolder: DecryptionKeyHolder;
  private readonly keyPair: KeyPair;
  private readonly logger: Logger;
  private readonly queued = new Map<RequestId, Uint8Array[]>();
  private callback: DecryptionCallback | undefined;

  constructor(options: SimulatedCoprocessorOptions) {
    this.keyHolder = options.keyHolder;
    this.keyPair = options.keyPair;
    this.logger = options.logger ?? defaultLogger.child('coprocessor');
  }

  /** Create a co-processor with a freshly generated signing key. */
  static async create(keyHolder: DecryptionKeyHolder, logger?: Logger): Promise<SimulatedCoprocessor> {
    return new SimulatedCoprocessor({ keyHolder, keyPair: await generateKeyPair(), logger });
  }

  /** Hex public key that verifiers must trust. */
  get publicKeyHex(): string {
    return this.keyPair.publicKeyHex;
  }

  /** Route completed decryptions to `callback`. */
  connect(callback: DecryptionCallback): void {
    this.callback = callback;
  }

  async requestDecryption(ciphertexts: Uint8Array[]): Promise<RequestId> {
    if (ciphertexts.length === 0) {
      throw new InputError(CloakroomErrorCode.INVALID_INPUT, 'A decryption request needs at least one ciphertext');
    }
    const requestId = generateId();
    this.queued.set(requestId, ciphertexts.map((c) => new Uint8Array(c)));
    this.logger.debug('decryption requested', { requestId, count: ciphertexts.length });
    return requestId;
  }

  /** Ids of requests not yet fulfilled, in arrival order. */
  pendingIds(): RequestId[] {
    return [...this.queued.keys()];
  }

  /**
   * Decrypt and sign a queued request without delivering it.
   * The request stays queued.
   */
  async produce(requestId: RequestId): Promise<DecryptionResult> {
    const ciphertexts = this.queued.get(requestId);
    if (!ciphertexts) {
      throw new InputError(CloakroomErrorCode.INVALID_INPUT, `No queued decryption request ${requestId}`);
    }
    const plaintext = encodeUint32s(ciphertexts.map((c) => this.keyHolder.decryptSerialized(c)));
    const proof = await signDecryptionResult(requestId, plaintext, this.keyPair.privateKey);
    return { requestId, plaintext, proof };
  }

  /**
   * Complete a queued request: produce the signed result, dequeue it and
   * deliver it to the connected callback. Errors raised by the callback
   * propagate to the caller.
   */
  async fulfill(requestId: RequestId): Promise<DecryptionResult> {
    const callback = this.callback;
    if (!callback) {
      throw new InputError(CloakroomErrorCode.INVALID_INPUT, 'No decryption callback connected');
    }
    const result = await this.produce(requestId);
    this.queued.delete(requestId);
    this.logger.debug('delivering decryption result', { requestId });
    await callback(result);
    return result;
  }

  /** Fulfil every queued request in arrival order. */
  async fulfillAll(): Promise<DecryptionResult[]> {
    const results: DecryptionResult[] = [];
    for (const requestId of this.pendingIds()) {
      results.push(await this.fulfill(requestId));
    }
    return results;
  }
}
