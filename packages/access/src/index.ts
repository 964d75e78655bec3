/**
 * @cloakroom/access — authorization gates over an explicit {@link AuthContext}.
 *
 * Identity authentication happens upstream; this package only decides
 * whether an already-authenticated caller may run an operation. One
 * privileged identity administers schedules; everyone else must be a
 * recognized employee.
 *
 * @packageDocumentation
 */

import {
  AuthorizationError,
  CloakroomErrorCode,
  defaultLogger,
  validateNonEmpty,
} from '@cloakroom/types';
import type { AuthContext, EmployeeId, Logger } from '@cloakroom/types';

// ─── Identity verification ──────────────────────────────────────────────────

/** External collaborator that knows which identities are employees. */
export interface IdentityVerifier {
  isRecognized(employee: EmployeeId): boolean;
}

/**
 * Recognizes identities from a fixed list. Without a list, every
 * non-blank identity is recognized.
 */
export class AllowListVerifier implements IdentityVerifier {
  private readonly allowed: ReadonlySet<EmployeeId> | undefined;

  constructor(employees?: Iterable<EmployeeId>) {
    this.allowed = employees === undefined ? undefined : new Set(employees);
  }

  isRecognized(employee: EmployeeId): boolean {
    if (employee.trim().length === 0) {
      return false;
    }
    return this.allowed === undefined || this.allowed.has(employee);
  }
}

// ─── Access policy ──────────────────────────────────────────────────────────

export interface AccessPolicyOptions {
  /** The single privileged identity. */
  adminId: EmployeeId;
  /** Defaults to an {@link AllowListVerifier} without a list. */
  verifier?: IdentityVerifier;
  logger?: Logger;
}

/**
 * Gatekeeper consulted at the top of every public operation.
 *
 * @example
 * ```typescript
 * const access = new AccessPolicy({ adminId: 'hr-admin' });
 * access.requireAdmin(ctx, 'optimizeTeam');
 * ```
 */
export class AccessPolicy {
  readonly adminId: EmployeeId;
  private readonly verifier: IdentityVerifier;
  private readonly logger: Logger;

  constructor(options: AccessPolicyOptions) {
    validateNonEmpty(options.adminId, 'adminId');
    this.adminId = options.adminId;
    this.verifier = options.verifier ?? new AllowListVerifier();
    this.logger = options.logger ?? defaultLogger.child('access');
  }

  isAdmin(ctx: AuthContext): boolean {
    return ctx.caller === this.adminId;
  }

  /** The administrator is always recognized. */
  isRecognized(employee: EmployeeId): boolean {
    return employee === this.adminId || this.verifier.isRecognized(employee);
  }

  /** @throws {AuthorizationError} NOT_ADMIN */
  requireAdmin(ctx: AuthContext, operation: string): void {
    if (!this.isAdmin(ctx)) {
      this.logger.warn('admin operation denied', { operation, caller: ctx.caller });
      throw new AuthorizationError(
        CloakroomErrorCode.NOT_ADMIN,
        `${operation} requires the administrator`,
        { context: { operation, caller: ctx.caller } },
      );
    }
  }

  /** @throws {AuthorizationError} UNRECOGNIZED_EMPLOYEE */
  requireEmployee(ctx: AuthContext, operation: string): void {
    if (!this.isRecognized(ctx.caller)) {
      this.logger.warn('employee operation denied', { operation, caller: ctx.caller });
      throw new AuthorizationError(
        CloakroomErrorCode.UNRECOGNIZED_EMPLOYEE,
        `${operation} requires a recognized employee`,
        { context: { operation, caller: ctx.caller } },
      );
    }
  }
}
