/**
 * CloakroomEngine — the single entry point that wires the ledger,
 * optimizer, metrics and reveal coordinator around one FHE backend and
 * one decryption co-processor.
 *
 * @packageDocumentation
 */

import { AccessPolicy, AllowListVerifier } from '@cloakroom/access';
import type { IdentityVerifier } from '@cloakroom/access';
import { Ed25519ProofVerifier } from '@cloakroom/coprocessor';
import type {
  DecryptionCallback,
  DecryptionOracle,
  DecryptionResult,
  ProofVerifier,
  RequestId,
} from '@cloakroom/coprocessor';
import type { Ciphertext, FheBackend } from '@cloakroom/fhe';
import { PreferenceLedger, ScheduleBook, TeamDirectory } from '@cloakroom/ledger';
import type {
  PersonalSchedule,
  PreferenceInput,
  RecordId,
  RevealedSchedule,
  TeamSchedule,
} from '@cloakroom/ledger';
import { MetricCalculator } from '@cloakroom/metrics';
import { ScheduleOptimizer } from '@cloakroom/optimizer';
import type { OverlapPairing } from '@cloakroom/optimizer';
import { DecryptionCoordinator } from '@cloakroom/reveal';
import type { PendingReveal, RevealStatus } from '@cloakroom/reveal';
import { createEventBus, createLogger, parseLogLevel } from '@cloakroom/types';
import type {
  AuthContext,
  CloakroomEventMap,
  CloakroomEvents,
  EmployeeId,
  EventListener,
  Logger,
  TeamId,
} from '@cloakroom/types';

import type { CloakroomConfig } from './config';

export interface CloakroomEngineOptions {
  /** The single privileged identity. */
  adminId: EmployeeId;
  backend: FheBackend;
  oracle: DecryptionOracle;
  proofVerifier: ProofVerifier;
  /** Who counts as an employee. Defaults to recognizing every identity. */
  identityVerifier?: IdentityVerifier;
  overlapPairing?: OverlapPairing;
  logger?: Logger;
}

/** Collaborators a configuration file cannot describe. */
export interface EngineDependencies {
  backend: FheBackend;
  oracle: DecryptionOracle;
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const engine = CloakroomEngine.create({ adminId: 'hr', backend, oracle, proofVerifier });
 * coprocessor.connect(engine.decryptionCallback());
 *
 * engine.submit({ caller: 'alice' }, preference);
 * engine.addMember({ caller: 'hr' }, 'platform', 'alice');
 * engine.optimizeTeam({ caller: 'hr' }, 'platform');
 * engine.assignPersonal({ caller: 'hr' }, 'alice', 'platform');
 * await engine.requestReveal({ caller: 'alice' });
 * ```
 */
export class CloakroomEngine {
  readonly events: CloakroomEvents;
  readonly access: AccessPolicy;
  readonly schedules: ScheduleBook;
  readonly ledger: PreferenceLedger;
  readonly directory: TeamDirectory;
  readonly optimizer: ScheduleOptimizer;
  readonly metrics: MetricCalculator;
  readonly reveals: DecryptionCoordinator;
  readonly logger: Logger;

  constructor(options: CloakroomEngineOptions) {
    const logger = options.logger ?? createLogger({ component: 'cloakroom' });
    const { backend } = options;
    this.logger = logger;
    this.events = createEventBus(logger.child('events'));
    this.access = new AccessPolicy({
      adminId: options.adminId,
      verifier: options.identityVerifier,
      logger: logger.child('access'),
    });
    this.schedules = new ScheduleBook(backend);
    this.ledger = new PreferenceLedger({
      access: this.access,
      schedules: this.schedules,
      events: this.events,
      logger: logger.child('ledger'),
    });
    this.directory = new TeamDirectory(this.access, logger.child('directory'));
    this.optimizer = new ScheduleOptimizer({
      backend,
      access: this.access,
      ledger: this.ledger,
      directory: this.directory,
      schedules: this.schedules,
      events: this.events,
      overlapPairing: options.overlapPairing,
      logger: logger.child('optimizer'),
    });
    this.metrics = new MetricCalculator({
      backend,
      access: this.access,
      ledger: this.ledger,
      directory: this.directory,
      schedules: this.schedules,
      logger: logger.child('metrics'),
    });
    this.reveals = new DecryptionCoordinator({
      backend,
      oracle: options.oracle,
      verifier: options.proofVerifier,
      access: this.access,
      schedules: this.schedules,
      events: this.events,
      logger: logger.child('reveal'),
    });
  }

  static create(options: CloakroomEngineOptions): CloakroomEngine {
    return new CloakroomEngine(options);
  }

  /** Build an engine from a validated `cloakroom.config.json`. */
  static fromConfig(config: CloakroomConfig, deps: EngineDependencies): CloakroomEngine {
    return new CloakroomEngine({
      adminId: config.adminId,
      backend: deps.backend,
      oracle: deps.oracle,
      proofVerifier: new Ed25519ProofVerifier(config.coprocessorPublicKey),
      identityVerifier: new AllowListVerifier(config.employees),
      overlapPairing: config.overlapPairing,
      logger: deps.logger ?? createLogger({ component: 'cloakroom', level: parseLogLevel(config.logLevel) }),
    });
  }

  // ── Events ────────────────────────────────────────────────────────────

  on<K extends keyof CloakroomEventMap>(event: K, listener: EventListener<CloakroomEventMap[K]>): () => void {
    return this.events.on(event, listener);
  }

  off<K extends keyof CloakroomEventMap>(event: K, listener: EventListener<CloakroomEventMap[K]>): void {
    this.events.off(event, listener);
  }

  // ── Ledger and directory ──────────────────────────────────────────────

  submit(ctx: AuthContext, preference: PreferenceInput): RecordId {
    return this.ledger.submit(ctx, preference);
  }

  latest(employee: EmployeeId): RecordId | undefined {
    return this.ledger.latest(employee);
  }

  addMember(ctx: AuthContext, team: TeamId, employee: EmployeeId): void {
    this.directory.addMember(ctx, team, employee);
  }

  members(team: TeamId): EmployeeId[] {
    return this.directory.members(team);
  }

  // ── Optimization ──────────────────────────────────────────────────────

  optimizeTeam(ctx: AuthContext, team: TeamId): TeamSchedule {
    return this.optimizer.optimizeTeam(ctx, team);
  }

  assignPersonal(ctx: AuthContext, employee: EmployeeId, team: TeamId): PersonalSchedule {
    return this.optimizer.assignPersonal(ctx, employee, team);
  }

  adjustForTeamEvents(ctx: AuthContext, team: TeamId, eventDays: Ciphertext): TeamSchedule {
    return this.optimizer.adjustForTeamEvents(ctx, team, eventDays);
  }

  adjustForPersonalConstraints(ctx: AuthContext, employee: EmployeeId, constraintDays: Ciphertext): PersonalSchedule {
    return this.optimizer.adjustForPersonalConstraints(ctx, employee, constraintDays);
  }

  optimizeCrossTeamCollab(ctx: AuthContext, teamA: TeamId, teamB: TeamId): [TeamSchedule, TeamSchedule] {
    return this.optimizer.optimizeCrossTeamCollab(ctx, teamA, teamB);
  }

  // ── Reveal ────────────────────────────────────────────────────────────

  requestReveal(ctx: AuthContext): Promise<RequestId> {
    return this.reveals.requestReveal(ctx);
  }

  resolveReveal(result: DecryptionResult): Promise<RevealedSchedule> {
    return this.reveals.resolveReveal(result);
  }

  cancelReveal(ctx: AuthContext, requestId: RequestId): PendingReveal {
    return this.reveals.cancelReveal(ctx, requestId);
  }

  revealedSchedule(ctx: AuthContext): RevealedSchedule | undefined {
    return this.reveals.revealedSchedule(ctx);
  }

  revealStatus(employee: EmployeeId): RevealStatus {
    return this.reveals.status(employee);
  }

  /** Callback to hand to the co-processor's delivery mechanism. */
  decryptionCallback(): DecryptionCallback {
    return async (result) => {
      await this.reveals.resolveReveal(result);
    };
  }
}
