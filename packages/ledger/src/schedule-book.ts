/**
 * Holds the live team, personal and revealed schedules.
 *
 * Every write replaces a whole frozen record, so a failed computation
 * upstream never leaves a schedule half-overwritten.
 */

import type { Ciphertext, FheBackend } from '@cloakroom/fhe';
import {
  CloakroomErrorCode,
  PreconditionError,
  ProtocolError,
  validateNonEmpty,
} from '@cloakroom/types';
import type { EmployeeId, TeamId } from '@cloakroom/types';

import type {
  PersonalSchedule,
  PersonalScheduleValues,
  RevealedSchedule,
  TeamSchedule,
  TeamScheduleValues,
} from './types';

export class ScheduleBook {
  private readonly teamSchedules = new Map<TeamId, TeamSchedule>();
  private readonly personalSchedules = new Map<EmployeeId, PersonalSchedule>();
  private readonly revealedSchedules = new Map<EmployeeId, RevealedSchedule>();
  private readonly zero: Ciphertext;

  constructor(backend: FheBackend) {
    this.zero = backend.constant(0);
  }

  // ── Team schedules ────────────────────────────────────────────────────

  /** The team's schedule, or the zero-valued, unoptimized default. */
  team(team: TeamId): TeamSchedule {
    return (
      this.teamSchedules.get(team) ??
      Object.freeze({
        officeDays: this.zero,
        collabDays: this.zero,
        overlapScore: this.zero,
        optimized: false,
      })
    );
  }

  /** Overwrite the team's schedule and mark it optimized. */
  setTeam(team: TeamId, values: TeamScheduleValues): TeamSchedule {
    validateNonEmpty(team, 'team');
    const schedule: TeamSchedule = Object.freeze({
      officeDays: values.officeDays,
      collabDays: values.collabDays,
      overlapScore: values.overlapScore,
      optimized: true,
    });
    this.teamSchedules.set(team, schedule);
    return schedule;
  }

  /** Teams with a stored schedule. */
  teams(): TeamId[] {
    return [...this.teamSchedules.keys()];
  }

  // ── Personal and revealed schedules ───────────────────────────────────

  /**
   * Create zero-valued personal and revealed schedules for an employee
   * seen for the first time. Returns `false` if they already existed.
   */
  ensureEmployee(employee: EmployeeId): boolean {
    if (this.personalSchedules.has(employee)) {
      return false;
    }
    this.personalSchedules.set(
      employee,
      Object.freeze({ officeDays: this.zero, collabDays: this.zero, assigned: false }),
    );
    this.revealedSchedules.set(
      employee,
      Object.freeze({ officeDays: 0, collabDays: 0, revealed: false }),
    );
    return true;
  }

  personal(employee: EmployeeId): PersonalSchedule | undefined {
    return this.personalSchedules.get(employee);
  }

  /** Overwrite the employee's personal schedule and mark it assigned. */
  setPersonal(employee: EmployeeId, values: PersonalScheduleValues): PersonalSchedule {
    if (!this.personalSchedules.has(employee)) {
      throw new PreconditionError(
        CloakroomErrorCode.NO_PREFERENCE,
        `Employee "${employee}" has no schedule record`,
        { hint: 'Schedules are created by the first preference submission.' },
      );
    }
    const schedule: PersonalSchedule = Object.freeze({
      officeDays: values.officeDays,
      collabDays: values.collabDays,
      assigned: true,
    });
    this.personalSchedules.set(employee, schedule);
    return schedule;
  }

  revealed(employee: EmployeeId): RevealedSchedule | undefined {
    return this.revealedSchedules.get(employee);
  }

  /**
   * Commit the plaintext schedule. The revealed flag moves from false to
   * true once and never back.
   */
  markRevealed(employee: EmployeeId, officeDays: number, collabDays: number): RevealedSchedule {
    const current = this.revealedSchedules.get(employee);
    if (current === undefined) {
      throw new PreconditionError(
        CloakroomErrorCode.NOT_ASSIGNED,
        `Employee "${employee}" has no schedule record`,
      );
    }
    if (current.revealed) {
      throw new ProtocolError(
        CloakroomErrorCode.ALREADY_REVEALED,
        `Schedule of "${employee}" has already been revealed`,
      );
    }
    const schedule: RevealedSchedule = Object.freeze({ officeDays, collabDays, revealed: true });
    this.revealedSchedules.set(employee, schedule);
    return schedule;
  }
}
