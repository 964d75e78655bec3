/**
 * Request/callback state machine that turns an employee's encrypted
 * personal schedule into plaintext exactly once.
 *
 * ```
 * unassigned ──assign──▶ assigned ──requestReveal──▶ request-pending ──resolveReveal──▶ revealed
 *                              ▲                            │
 *                              └────────cancelReveal────────┘
 * ```
 *
 * A pending marker is taken before the oracle is awaited so a second
 * request for the same employee is rejected even while the first is in
 * flight. `resolveReveal` verifies the proof before it decodes anything,
 * then re-reads the correlation table and the revealed flag because
 * another resolution may have committed while verification was awaited.
 *
 * @packageDocumentation
 */

import type { AccessPolicy } from '@cloakroom/access';
import { decodeUint32s } from '@cloakroom/coprocessor';
import type {
  DecryptionOracle,
  DecryptionResult,
  ProofVerifier,
  RequestId,
} from '@cloakroom/coprocessor';
import { timestamp } from '@cloakroom/crypto';
import type { FheBackend } from '@cloakroom/fhe';
import type { RevealedSchedule, ScheduleBook } from '@cloakroom/ledger';
import {
  CloakroomErrorCode,
  defaultLogger,
  PreconditionError,
  ProtocolError,
} from '@cloakroom/types';
import type { AuthContext, CloakroomEvents, EmployeeId, Logger } from '@cloakroom/types';

import type { PendingReveal, RevealStatus } from './types';

/** Number of uint32 values in a personal-schedule reveal: office and collaboration days. */
const REVEALED_VALUE_COUNT = 2;

export interface DecryptionCoordinatorOptions {
  backend: FheBackend;
  oracle: DecryptionOracle;
  verifier: ProofVerifier;
  access: AccessPolicy;
  schedules: ScheduleBook;
  events: CloakroomEvents;
  logger?: Logger;
}

export class DecryptionCoordinator {
  private readonly backend: FheBackend;
  private readonly oracle: DecryptionOracle;
  private readonly verifier: ProofVerifier;
  private readonly access: AccessPolicy;
  private readonly schedules: ScheduleBook;
  private readonly events: CloakroomEvents;
  private readonly logger: Logger;

  private readonly correlations = new Map<RequestId, PendingReveal>();
  /** Employees with a request in flight or awaiting its callback. */
  private readonly pendingEmployees = new Set<EmployeeId>();

  constructor(options: DecryptionCoordinatorOptions) {
    this.backend = options.backend;
    this.oracle = options.oracle;
    this.verifier = options.verifier;
    this.access = options.access;
    this.schedules = options.schedules;
    this.events = options.events;
    this.logger = options.logger ?? defaultLogger.child('reveal');
  }

  /**
   * Ask the co-processor to decrypt the caller's personal schedule.
   * Returns as soon as the request is issued; the plaintext arrives
   * later through {@link resolveReveal}.
   *
   * @throws {PreconditionError} NOT_ASSIGNED, ALREADY_REVEALED or REVEAL_PENDING.
   * @throws {ProtocolError} DUPLICATE_REQUEST if the oracle reuses a pending id.
   */
  async requestReveal(ctx: AuthContext): Promise<RequestId> {
    this.access.requireEmployee(ctx, 'requestReveal');
    const employee = ctx.caller;
    const personal = this.schedules.personal(employee);
    if (!personal?.assigned) {
      throw new PreconditionError(
        CloakroomErrorCode.NOT_ASSIGNED,
        `Employee "${employee}" has no assigned schedule to reveal`,
        { context: { employee } },
      );
    }
    if (this.schedules.revealed(employee)?.revealed) {
      throw new PreconditionError(
        CloakroomErrorCode.ALREADY_REVEALED,
        `Schedule of "${employee}" has already been revealed`,
        { context: { employee } },
      );
    }
    if (this.pendingEmployees.has(employee)) {
      throw new PreconditionError(
        CloakroomErrorCode.REVEAL_PENDING,
        `A reveal for "${employee}" is already pending`,
        { hint: 'Wait for the co-processor callback, or ask the administrator to cancel it.', context: { employee } },
      );
    }

    const ciphertexts = [
      this.backend.serialize(personal.officeDays),
      this.backend.serialize(personal.collabDays),
    ];

    this.pendingEmployees.add(employee);
    let requestId: RequestId;
    try {
      requestId = await this.oracle.requestDecryption(ciphertexts);
    } catch (err) {
      this.pendingEmployees.delete(employee);
      this.logger.error('decryption request failed', {
        employee,
        error: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }

    if (this.correlations.has(requestId)) {
      this.pendingEmployees.delete(employee);
      throw new ProtocolError(
        CloakroomErrorCode.DUPLICATE_REQUEST,
        `Co-processor returned request id ${requestId}, which is already pending`,
        { context: { requestId, employee } },
      );
    }

    const requestedAt = timestamp();
    this.correlations.set(requestId, Object.freeze({ requestId, employee, requestedAt }));
    this.logger.info('reveal requested', { employee, requestId });
    this.events.emit('reveal:requested', { employee, requestId, timestamp: requestedAt });
    return requestId;
  }

  /**
   * Commit a decryption callback. Authenticated only by its proof; no
   * caller identity is involved.
   *
   * @throws {ProtocolError} UNKNOWN_REQUEST, INVALID_PROOF, ALREADY_REVEALED
   *   or MALFORMED_PAYLOAD. No state changes on any failure.
   */
  async resolveReveal(result: DecryptionResult): Promise<RevealedSchedule>;
  async resolveReveal(requestId: RequestId, plaintext: Uint8Array, proof: Uint8Array): Promise<RevealedSchedule>;
  async resolveReveal(
    resultOrId: DecryptionResult | RequestId,
    plaintextArg?: Uint8Array,
    proofArg?: Uint8Array,
  ): Promise<RevealedSchedule> {
    const delivered =
      typeof resultOrId === 'string'
        ? { requestId: resultOrId, plaintext: plaintextArg ?? new Uint8Array(0), proof: proofArg ?? new Uint8Array(0) }
        : resultOrId;
    const requestId = delivered.requestId;
    // Verify and decode private copies; the caller keeps its buffers across the await.
    const plaintext = new Uint8Array(delivered.plaintext);
    const proof = new Uint8Array(delivered.proof);

    if (!this.correlations.has(requestId)) {
      throw this.unknownRequest(requestId);
    }

    const valid = await this.verifier.verify(requestId, plaintext, proof);
    if (!valid) {
      this.logger.warn('rejected decryption result with invalid proof', { requestId });
      throw new ProtocolError(
        CloakroomErrorCode.INVALID_PROOF,
        `Decryption proof for request ${requestId} does not verify`,
        { context: { requestId } },
      );
    }

    // Another resolution or a cancellation may have landed while verifying.
    const pending = this.correlations.get(requestId);
    if (!pending) {
      throw this.unknownRequest(requestId);
    }
    if (this.schedules.revealed(pending.employee)?.revealed) {
      throw new ProtocolError(
        CloakroomErrorCode.ALREADY_REVEALED,
        `Schedule of "${pending.employee}" has already been revealed`,
        { context: { requestId, employee: pending.employee } },
      );
    }

    const [officeDays = 0, collabDays = 0] = decodeUint32s(plaintext, REVEALED_VALUE_COUNT);
    const revealed = this.schedules.markRevealed(pending.employee, officeDays, collabDays);
    this.release(pending);

    this.logger.info('schedule revealed', { employee: pending.employee, requestId });
    this.events.emit('schedule:revealed', { employee: pending.employee, timestamp: timestamp() });
    return revealed;
  }

  /**
   * Withdraw a pending request. A callback arriving later for it fails
   * with UNKNOWN_REQUEST, and the employee may request again.
   */
  cancelReveal(ctx: AuthContext, requestId: RequestId): PendingReveal {
    this.access.requireAdmin(ctx, 'cancelReveal');
    const pending = this.correlations.get(requestId);
    if (!pending) {
      throw this.unknownRequest(requestId);
    }
    this.release(pending);
    this.logger.info('reveal cancelled', { employee: pending.employee, requestId });
    this.events.emit('reveal:cancelled', { employee: pending.employee, requestId, timestamp: timestamp() });
    return pending;
  }

  /** The caller's own revealed schedule, if one has been recorded. */
  revealedSchedule(ctx: AuthContext): RevealedSchedule | undefined {
    this.access.requireEmployee(ctx, 'revealedSchedule');
    return this.schedules.revealed(ctx.caller);
  }

  status(employee: EmployeeId): RevealStatus {
    if (this.schedules.revealed(employee)?.revealed) {
      return 'revealed';
    }
    if (this.pendingEmployees.has(employee)) {
      return 'request-pending';
    }
    return this.schedules.personal(employee)?.assigned ? 'assigned' : 'unassigned';
  }

  /** Requests awaiting a callback, oldest first. */
  pendingRequests(): PendingReveal[] {
    return [...this.correlations.values()];
  }

  private release(pending: PendingReveal): void {
    this.correlations.delete(pending.requestId);
    this.pendingEmployees.delete(pending.employee);
  }

  private unknownRequest(requestId: RequestId): ProtocolError {
    return new ProtocolError(
      CloakroomErrorCode.UNKNOWN_REQUEST,
      `No pending decryption request ${requestId}`,
      { context: { requestId } },
    );
  }
}
