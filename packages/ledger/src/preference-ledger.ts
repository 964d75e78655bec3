/**
 * Append-only store of encrypted preference submissions.
 *
 * Full history is kept per employee; the current preference is the
 * most recently appended record, found through an owner index rather
 * than a scan.
 */

import type { AccessPolicy } from '@cloakroom/access';
import { timestamp } from '@cloakroom/crypto';
import { defaultLogger } from '@cloakroom/types';
import type { AuthContext, CloakroomEvents, EmployeeId, Logger } from '@cloakroom/types';

import type { ScheduleBook } from './schedule-book';
import type { PreferenceInput, PreferenceRecord, RecordId } from './types';

export interface PreferenceLedgerOptions {
  access: AccessPolicy;
  schedules: ScheduleBook;
  events: CloakroomEvents;
  logger?: Logger;
}

export class PreferenceLedger {
  private readonly records: PreferenceRecord[] = [];
  private readonly latestByEmployee = new Map<EmployeeId, RecordId>();
  private readonly historyByEmployee = new Map<EmployeeId, RecordId[]>();
  private readonly access: AccessPolicy;
  private readonly schedules: ScheduleBook;
  private readonly events: CloakroomEvents;
  private readonly logger: Logger;

  constructor(options: PreferenceLedgerOptions) {
    this.access = options.access;
    this.schedules = options.schedules;
    this.events = options.events;
    this.logger = options.logger ?? defaultLogger.child('ledger');
  }

  /**
   * Append a preference for the calling employee.
   *
   * The ciphertext content cannot be validated here. The first
   * submission also creates the employee's zero-valued personal and
   * revealed schedules.
   *
   * @returns The new record's id.
   */
  submit(ctx: AuthContext, preference: PreferenceInput): RecordId {
    this.access.requireEmployee(ctx, 'submit');
    const employee = ctx.caller;
    const id = this.records.length + 1;
    const record: PreferenceRecord = Object.freeze({
      id,
      employee,
      daysInOffice: preference.daysInOffice,
      teamDays: preference.teamDays,
      focusDays: preference.focusDays,
      flexibility: preference.flexibility,
      submittedAt: timestamp(),
    });

    this.records.push(record);
    this.latestByEmployee.set(employee, id);
    const history = this.historyByEmployee.get(employee) ?? [];
    history.push(id);
    this.historyByEmployee.set(employee, history);
    this.schedules.ensureEmployee(employee);

    this.logger.info('preference submitted', { recordId: id, employee });
    this.events.emit('preference:submitted', { recordId: id, employee, timestamp: record.submittedAt });
    return id;
  }

  /** Id of the employee's most recent submission, if any. */
  latest(employee: EmployeeId): RecordId | undefined {
    return this.latestByEmployee.get(employee);
  }

  /** The employee's most recent record, if any. */
  latestRecord(employee: EmployeeId): PreferenceRecord | undefined {
    const id = this.latestByEmployee.get(employee);
    return id === undefined ? undefined : this.get(id);
  }

  get(recordId: RecordId): PreferenceRecord | undefined {
    return this.records[recordId - 1];
  }

  /** Every record the employee submitted, oldest first. */
  history(employee: EmployeeId): PreferenceRecord[] {
    const ids = this.historyByEmployee.get(employee) ?? [];
    const records: PreferenceRecord[] = [];
    for (const id of ids) {
      const record = this.get(id);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  countFor(employee: EmployeeId): number {
    return this.historyByEmployee.get(employee)?.length ?? 0;
  }

  /** Total number of records. */
  get size(): number {
    return this.records.length;
  }

  /** Employees with at least one submission, in order of first submission. */
  employees(): EmployeeId[] {
    return [...this.historyByEmployee.keys()];
  }
}
