import type { AccessPolicy } from '@cloakroom/access';
import { defaultLogger, validateNonEmpty } from '@cloakroom/types';
import type { AuthContext, EmployeeId, Logger, TeamId } from '@cloakroom/types';

/**
 * Ordered team membership. Appends are unconditional, so an employee
 * added twice appears twice; callers wanting idempotent insertion
 * should check {@link TeamDirectory.isMember} first.
 */
export class TeamDirectory {
  private readonly membersByTeam = new Map<TeamId, EmployeeId[]>();
  private readonly access: AccessPolicy;
  private readonly logger: Logger;

  constructor(access: AccessPolicy, logger?: Logger) {
    this.access = access;
    this.logger = logger ?? defaultLogger.child('directory');
  }

  addMember(ctx: AuthContext, team: TeamId, employee: EmployeeId): void {
    this.access.requireAdmin(ctx, 'addMember');
    validateNonEmpty(team, 'team');
    validateNonEmpty(employee, 'employee');
    const members = this.membersByTeam.get(team) ?? [];
    members.push(employee);
    this.membersByTeam.set(team, members);
    this.logger.debug('member added', { team, employee, size: members.length });
  }

  /** Members in insertion order. Empty for an unknown team. */
  members(team: TeamId): EmployeeId[] {
    return [...(this.membersByTeam.get(team) ?? [])];
  }

  memberCount(team: TeamId): number {
    return this.membersByTeam.get(team)?.length ?? 0;
  }

  isMember(team: TeamId, employee: EmployeeId): boolean {
    return this.membersByTeam.get(team)?.includes(employee) ?? false;
  }

  teams(): TeamId[] {
    return [...this.membersByTeam.keys()];
  }
}
