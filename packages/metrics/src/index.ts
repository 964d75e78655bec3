/**
 * @cloakroom/metrics — derived scores computed purely on ciphertext.
 *
 * Every metric reads ledger and schedule state, returns a new encrypted
 * handle and changes nothing. Subtractions wrap modulo 2^32 like every
 * other backend operation, so a "negative" result comes back as a large
 * unsigned value.
 *
 * @packageDocumentation
 */

import type { AccessPolicy } from '@cloakroom/access';
import { sumAll } from '@cloakroom/fhe';
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
  CloakroomErrorCode,
  defaultLogger,
  PreconditionError,
} from '@cloakroom/types';
import type { AuthContext, EmployeeId, Logger, TeamId } from '@cloakroom/types';

/** Flexibility score above which one extra office day is recommended. */
export const RECOMMENDATION_FLEXIBILITY_THRESHOLD = 70;

export type EmployeeMetric =
  | 'satisfaction'
  | 'focusTime'
  | 'workLifeBalance'
  | 'recommendation'
  | 'adherence';

export type TeamMetric =
  | 'teamCollaboration'
  | 'flexibilityUtilization'
  | 'efficiency'
  | 'conflict'
  | 'remoteWorkImpact';

export interface MetricCalculatorOptions {
  backend: FheBackend;
  access: AccessPolicy;
  ledger: PreferenceLedger;
  directory: TeamDirectory;
  schedules: ScheduleBook;
  logger?: Logger;
}

export class MetricCalculator {
  private readonly fhe: FheBackend;
  private readonly access: AccessPolicy;
  private readonly ledger: PreferenceLedger;
  private readonly directory: TeamDirectory;
  private readonly schedules: ScheduleBook;
  private readonly logger: Logger;

  constructor(options: MetricCalculatorOptions) {
    this.fhe = options.backend;
    this.access = options.access;
    this.ledger = options.ledger;
    this.directory = options.directory;
    this.schedules = options.schedules;
    this.logger = options.logger ?? defaultLogger.child('metrics');
  }

  // ── Employee metrics ──────────────────────────────────────────────────

  /**
   * How closely the assigned schedule matches the latest preference:
   * `100 - |assigned - preferred| / 10` for office and collaboration
   * days, averaged.
   */
  satisfaction(ctx: AuthContext, employee: EmployeeId): Ciphertext {
    this.gate(ctx, 'satisfaction', employee);
    return this.satisfactionOf(this.requireAssigned(employee), this.requirePreference(employee));
  }

  /** Office days not spent on collaboration. */
  focusTime(ctx: AuthContext, employee: EmployeeId): Ciphertext {
    this.gate(ctx, 'focusTime', employee);
    const personal = this.requireAssigned(employee);
    return this.fhe.sub(personal.officeDays, personal.collabDays);
  }

  workLifeBalance(ctx: AuthContext, employee: EmployeeId): Ciphertext {
    this.gate(ctx, 'workLifeBalance', employee);
    const personal = this.requireAssigned(employee);
    return this.fhe.sub(this.fhe.constant(100), this.fhe.mul(personal.officeDays, 10));
  }

  /** Office days plus one when the employee's flexibility exceeds the threshold. */
  recommendation(ctx: AuthContext, employee: EmployeeId): Ciphertext {
    this.gate(ctx, 'recommendation', employee);
    const personal = this.requireAssigned(employee);
    const pref = this.requirePreference(employee);
    return this.fhe.select(
      this.fhe.gt(pref.flexibility, RECOMMENDATION_FLEXIBILITY_THRESHOLD),
      this.fhe.add(personal.officeDays, 1),
      personal.officeDays,
    );
  }

  /** Mean of flexibility and satisfaction. */
  adherence(ctx: AuthContext, employee: EmployeeId): Ciphertext {
    this.gate(ctx, 'adherence', employee);
    const personal = this.requireAssigned(employee);
    const pref = this.requirePreference(employee);
    return this.fhe.div(this.fhe.add(pref.flexibility, this.satisfactionOf(personal, pref)), 2);
  }

  // ── Team metrics ──────────────────────────────────────────────────────

  teamCollaboration(ctx: AuthContext, team: TeamId): Ciphertext {
    this.gate(ctx, 'teamCollaboration', team);
    return this.requireOptimized(team).overlapScore;
  }

  /**
   * Mean flexibility over members with a preference. Needs no
   * optimization; an encrypted zero when no member has submitted.
   */
  flexibilityUtilization(ctx: AuthContext, team: TeamId): Ciphertext {
    this.gate(ctx, 'flexibilityUtilization', team);
    const flexibility: Ciphertext[] = [];
    for (const member of this.directory.members(team)) {
      const pref = this.ledger.latestRecord(member);
      if (pref) {
        flexibility.push(pref.flexibility);
      }
    }
    if (flexibility.length === 0) {
      return this.fhe.constant(0);
    }
    return this.fhe.div(sumAll(this.fhe, flexibility), flexibility.length);
  }

  /** `(collaboration days * overlap score) / 100` */
  efficiency(ctx: AuthContext, team: TeamId): Ciphertext {
    this.gate(ctx, 'efficiency', team);
    const schedule = this.requireOptimized(team);
    return this.fhe.div(this.fhe.mul(schedule.collabDays, schedule.overlapScore), 100);
  }

  /** Collaboration days minus office days. */
  conflict(ctx: AuthContext, team: TeamId): Ciphertext {
    this.gate(ctx, 'conflict', team);
    const schedule = this.requireOptimized(team);
    return this.fhe.sub(schedule.collabDays, schedule.officeDays);
  }

  /** `(5 - office days) * 20` */
  remoteWorkImpact(ctx: AuthContext, team: TeamId): Ciphertext {
    this.gate(ctx, 'remoteWorkImpact', team);
    const schedule = this.requireOptimized(team);
    return this.fhe.mul(this.fhe.sub(this.fhe.constant(5), schedule.officeDays), 20);
  }

  // ── Internals ─────────────────────────────────────────────────────────

  private gate(ctx: AuthContext, metric: EmployeeMetric | TeamMetric, target: string): void {
    this.access.requireEmployee(ctx, metric);
    this.logger.debug('computing metric', { metric, target, caller: ctx.caller });
  }

  private satisfactionOf(personal: PersonalSchedule, pref: PreferenceRecord): Ciphertext {
    const fhe = this.fhe;
    const officeGap = fhe.div(fhe.abs(fhe.sub(personal.officeDays, pref.daysInOffice)), 10);
    const collabGap = fhe.div(fhe.abs(fhe.sub(personal.collabDays, pref.teamDays)), 10);
    const officeScore = fhe.sub(fhe.constant(100), officeGap);
    const collabScore = fhe.sub(fhe.constant(100), collabGap);
    return fhe.div(fhe.add(officeScore, collabScore), 2);
  }

  private requireAssigned(employee: EmployeeId): PersonalSchedule {
    const personal = this.schedules.personal(employee);
    if (!personal?.assigned) {
      throw new PreconditionError(
        CloakroomErrorCode.NOT_ASSIGNED,
        `Employee "${employee}" has no assigned schedule`,
        { hint: 'Run assignPersonal() first.', context: { employee } },
      );
    }
    return personal;
  }

  private requirePreference(employee: EmployeeId): PreferenceRecord {
    const pref = this.ledger.latestRecord(employee);
    if (!pref) {
      throw new PreconditionError(
        CloakroomErrorCode.NO_PREFERENCE,
        `Employee "${employee}" has not submitted a preference`,
        { context: { employee } },
      );
    }
    return pref;
  }

  private requireOptimized(team: TeamId): TeamSchedule {
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
}
