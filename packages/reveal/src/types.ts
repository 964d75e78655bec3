import type { RequestId } from '@cloakroom/coprocessor';
import type { EmployeeId } from '@cloakroom/types';

/** Lifecycle of an employee's personal schedule with respect to reveal. */
export type RevealStatus = 'unassigned' | 'assigned' | 'request-pending' | 'revealed';

/** A decryption request waiting for its callback. */
export interface PendingReveal {
  readonly requestId: RequestId;
  readonly employee: EmployeeId;
  /** ISO 8601 time the request was issued. */
  readonly requestedAt: string;
}
