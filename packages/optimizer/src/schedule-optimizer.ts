/**
 * Encrypted schedule computation.
 *
 * Everything here runs on ciphertext handles through the {@link FheBackend};
 * no intermediate value is ever decrypted. Each operation computes all
 * of its new handles before writing anything, so a failure part-way
 * (for example a division by an encrypted zero) leaves stored state as
 * it was.
 *
 * @packageDocumentation
 */

import type { AccessPolicy } from '@cloakroom/access';
import { timestamp } from '@cloakroom/crypto';
import type { Ciphertext, FheBackend } from '@cloakroom/fhe';
import type {
  PersonalSchedule,
  PreferenceLedger,
  PreferenceRecord,
  ScheduleBook,
  TeamDirectory,
  TeamSchedule,
} from '@cloakroom/ledger';
import {
  assertNever,
  CloakroomErrorCode,
  defaultLogger,
  InputError,
  PreconditionError,
  validateNonEmpty,
} from '@cloakroom/types';
import type { AuthContext, CloakroomEvents, EmployeeId, Logger, TeamId } from '@cloakroom/types';

import { DEFAULT_OVERLAP_PAIRING } from './types';
import type { OverlapPairing } from './types';

export interface ScheduleOptimizerOptions {
  backend: FheBackend;
  access: AccessPolicy;
  ledger: PreferenceLedger;
  directory: TeamDirectory;
  schedules: ScheduleBook;
  events: CloakroomEvents;
  /** Defaults to `adjacent-index`. */
  overlapPairing?: OverlapPairing;
  logger?: Logger;
}

export class ScheduleOptimizer {
  readonly overlapPairing: OverlapPairing;
  private readonly backend: FheBackend;
  private readonly access: AccessPolicy;
  private readonly ledger: PreferenceLedger;
  private readonly directory: TeamDirectory;
  private readonly schedules: ScheduleBook;
  private readonly events: CloakroomEvents;
  private readonly logger: Logger;

  constructor(options: ScheduleOptimizerOptions) {
    this.backend = options.backend;
    this.access = options.access;
    this.ledger = options.ledger;
    this.directory = options.directory;
    this.schedules = options.schedules;
    this.events = options.events;
    this.overlapPairing = options.overlapPairing ?? DEFAULT_OVERLAP_PAIRING;
    this.logger = options.logger ?? defaultLogger.child('optimizer');
  }

  /**
   * Recompute the team schedule from the members' latest preferences.
   *
   * Office and collaboration days are the sums over members with a
   * preference divided by the raw member count (members without a
   * preference and duplicate entries included). The overlap score
   * accumulates the bitwise AND of paired members' team-day masks.
   *
   * @throws {PreconditionError} EMPTY_TEAM when the team has no members.
   */
  optimizeTeam(ctx: AuthContext, team: TeamId): TeamSchedule {
    this.access.requireAdmin(ctx, 'optimizeTeam');
    validateNonEmpty(team, 'team');
    const members = this.directory.members(team);
    if (members.length === 0) {
      throw new PreconditionError(
        CloakroomErrorCode.EMPTY_TEAM,
        `Team "${team}" has no members`,
        { hint: 'Add members with addMember() before optimizing.', context: { team } },
      );
    }

    const fhe = this.backend;
    let totalOffice = fhe.constant(0);
    let totalCollab = fhe.constant(0);
    let overlap = fhe.constant(0);
    let contributing = 0;
    let previousWithPreference: PreferenceRecord | undefined;

    for (const [i, member] of members.entries()) {
      const pref = this.ledger.latestRecord(member);
      if (!pref) {
        continue;
      }
      contributing++;
      totalOffice = fhe.add(totalOffice, pref.daysInOffice);
      totalCollab = fhe.add(totalCollab, pref.teamDays);
      const partner = this.overlapPartner(members, i, previousWithPreference);
      if (partner) {
        overlap = fhe.add(overlap, fhe.and(pref.teamDays, partner.teamDays));
      }
      previousWithPreference = pref;
    }

    const schedule = this.schedules.setTeam(team, {
      officeDays: fhe.div(totalOffice, members.length),
      collabDays: fhe.div(totalCollab, members.length),
      overlapScore: overlap,
    });

    this.logger.info('team optimized', { team, members: members.length, contributing });
    this.events.emit('team:optimized', { team, timestamp: timestamp() });
    return schedule;
  }

  /**
   * Blend the employee's latest preference with the team schedule:
   * each field is `(preference + team) / 2`, truncated.
   *
   * @throws {PreconditionError} TEAM_NOT_OPTIMIZED, then NO_PREFERENCE.
   */
  assignPersonal(ctx: AuthContext, employee: EmployeeId, team: TeamId): PersonalSchedule {
    this.access.requireAdmin(ctx, 'assignPersonal');
    validateNonEmpty(employee, 'employee');
    const teamSchedule = this.requireOptimized(team);
    const pref = this.ledger.latestRecord(employee);
    if (!pref) {
      throw new PreconditionError(
        CloakroomErrorCode.NO_PREFERENCE,
        `Employee "${employee}" has not submitted a preference`,
        { context: { employee } },
      );
    }

    const fhe = this.backend;
    const schedule = this.schedules.setPersonal(employee, {
      officeDays: fhe.div(fhe.add(pref.daysInOffice, teamSchedule.officeDays), 2),
      collabDays: fhe.div(fhe.add(pref.teamDays, teamSchedule.collabDays), 2),
    });

    this.logger.info('personal schedule assigned', { employee, team });
    this.events.emit('schedule:assigned', { employee, team, timestamp: timestamp() });
    return schedule;
  }

  // ── Administrative adjustments ────────────────────────────────────────

  /** Add encrypted event days to the team's office and collaboration days. */
  adjustForTeamEvents(ctx: AuthContext, team: TeamId, eventDays: Ciphertext): TeamSchedule {
    this.access.requireAdmin(ctx, 'adjustForTeamEvents');
    const current = this.requireOptimized(team);
    const fhe = this.backend;
    const schedule = this.schedules.setTeam(team, {
      officeDays: fhe.add(current.officeDays, eventDays),
      collabDays: fhe.add(current.collabDays, eventDays),
      overlapScore: current.overlapScore,
    });
    this.adjusted(team, 'team-events');
    return schedule;
  }

  /**
   * Remove constrained days from the employee's office days, dropping to
   * zero when the constraint exceeds them.
   */
  adjustForPersonalConstraints(
    ctx: AuthContext,
    employee: EmployeeId,
    constraintDays: Ciphertext,
  ): PersonalSchedule {
    this.access.requireAdmin(ctx, 'adjustForPersonalConstraints');
    const current = this.schedules.personal(employee);
    if (!current?.assigned) {
      throw new PreconditionError(
        CloakroomErrorCode.NOT_ASSIGNED,
        `Employee "${employee}" has no assigned schedule`,
        { context: { employee } },
      );
    }
    const fhe = this.backend;
    const officeDays = fhe.select(
      fhe.gt(constraintDays, current.officeDays),
      fhe.constant(0),
      fhe.sub(current.officeDays, constraintDays),
    );
    const schedule = this.schedules.setPersonal(employee, {
      officeDays,
      collabDays: current.collabDays,
    });
    this.adjusted(employee, 'personal-constraints');
    return schedule;
  }

  /** Credit two distinct teams' overlap scores with their shared collaboration days. */
  optimizeCrossTeamCollab(ctx: AuthContext, teamA: TeamId, teamB: TeamId): [TeamSchedule, TeamSchedule] {
    this.access.requireAdmin(ctx, 'optimizeCrossTeamCollab');
    if (teamA === teamB) {
      throw new InputError(
        CloakroomErrorCode.INVALID_INPUT,
        `optimizeCrossTeamCollab needs two distinct teams, got "${teamA}" twice`,
        { context: { team: teamA } },
      );
    }
    const a = this.requireOptimized(teamA);
    const b = this.requireOptimized(teamB);
    const fhe = this.backend;
    const shared = fhe.and(a.collabDays, b.collabDays);
    const nextA = {
      officeDays: a.officeDays,
      collabDays: a.collabDays,
      overlapScore: fhe.add(a.overlapScore, shared),
    };
    const nextB = {
      officeDays: b.officeDays,
      collabDays: b.collabDays,
      overlapScore: fhe.add(b.overlapScore, shared),
    };

    const result: [TeamSchedule, TeamSchedule] = [
      this.schedules.setTeam(teamA, nextA),
      this.schedules.setTeam(teamB, nextB),
    ];
    this.adjusted(teamA, 'cross-team');
    this.adjusted(teamB, 'cross-team');
    return result;
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private overlapPartner(
    members: EmployeeId[],
    index: number,
    previousWithPreference: PreferenceRecord | undefined,
  ): PreferenceRecord | undefined {
    switch (this.overlapPairing) {
      case 'adjacent-index': {
        const prior = index > 0 ? members[index - 1] : undefined;
        return prior === undefined ? undefined : this.ledger.latestRecord(prior);
      }
      case 'filtered-order':
        return previousWithPreference;
      default:
        return assertNever(this.overlapPairing);
    }
  }

  private requireOptimized(team: TeamId): TeamSchedule {
    validateNonEmpty(team, 'team');
    const schedule = this.schedules.team(team);
    if (!schedule.optimized) {
      throw new PreconditionError(
        CloakroomErrorCode.TEAM_NOT_OPTIMIZED,
        `Team "${team}" has not been optimized`,
        { hint: 'Run optimizeTeam() first.', context: { team } },
      );
    }
    return schedule;
  }

  private adjusted(target: string, kind: 'team-events' | 'personal-constraints' | 'cross-team'): void {
    this.logger.info('schedule adjusted', { target, kind });
    this.events.emit('schedule:adjusted', { target, kind, timestamp: timestamp() });
  }
}
