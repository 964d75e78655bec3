import { describe, it, expect, beforeEach } from 'vitest';
import { AccessPolicy, AllowListVerifier } from '@cloakroom/access';
import { SimulatedFheBackend } from '@cloakroom/fhe';
import {
  AuthorizationError,
  CloakroomErrorCode,
  createEventBus,
  Logger,
  LogLevel,
  PreconditionError,
  ProtocolError,
} from '@cloakroom/types';
import type { CloakroomEventMap, CloakroomEvents } from '@cloakroom/types';

import { PreferenceLedger, ScheduleBook, TeamDirectory } from './index';
import type { PreferenceInput } from './index';

const silent = new Logger({ level: LogLevel.SILENT });
const admin = { caller: 'hr' };
const alice = { caller: 'alice' };
const bob = { caller: 'bob' };

let backend: SimulatedFheBackend;
let access: AccessPolicy;
let events: CloakroomEvents;
let schedules: ScheduleBook;
let ledger: PreferenceLedger;
let directory: TeamDirectory;

function preference(office: number, team: number, focus = 1, flexibility = 50): PreferenceInput {
  return {
    daysInOffice: backend.encrypt(office),
    teamDays: backend.encrypt(team),
    focusDays: backend.encrypt(focus),
    flexibility: backend.encrypt(flexibility),
  };
}

beforeEach(() => {
  backend = new SimulatedFheBackend();
  access = new AccessPolicy({
    adminId: 'hr',
    verifier: new AllowListVerifier(['alice', 'bob']),
    logger: silent,
  });
  events = createEventBus(silent);
  schedules = new ScheduleBook(backend);
  ledger = new PreferenceLedger({ access, schedules, events, logger: silent });
  directory = new TeamDirectory(access, silent);
});

describe('PreferenceLedger', () => {
  it('assigns sequential ids starting at 1 across employees', () => {
    expect(ledger.submit(alice, preference(3, 2))).toBe(1);
    expect(ledger.submit(bob, preference(4, 1))).toBe(2);
    expect(ledger.submit(alice, preference(2, 2))).toBe(3);
    expect(ledger.size).toBe(3);
  });

  it('latest returns undefined before any submission', () => {
    expect(ledger.latest('alice')).toBeUndefined();
    expect(ledger.latestRecord('alice')).toBeUndefined();
    expect(ledger.countFor('alice')).toBe(0);
  });

  it('keeps full history and tracks the latest submission', () => {
    const first = ledger.submit(alice, preference(3, 2));
    ledger.submit(bob, preference(1, 1));
    const second = ledger.submit(alice, preference(4, 4));

    expect(ledger.latest('alice')).toBe(second);
    expect(ledger.countFor('alice')).toBe(2);
    expect(ledger.history('alice').map((r) => r.id)).toEqual([first, second]);
    expect(ledger.employees()).toEqual(['alice', 'bob']);
  });

  it('records are frozen and carry the submitting employee', () => {
    const input = preference(3, 2);
    const id = ledger.submit(alice, input);
    const record = ledger.get(id);
    expect(record?.employee).toBe('alice');
    expect(record?.daysInOffice).toBe(input.daysInOffice);
    expect(Object.isFrozen(record)).toBe(true);
    expect(ledger.get(99)).toBeUndefined();
  });

  it('creates zero-valued schedules on first submission only', () => {
    expect(schedules.personal('alice')).toBeUndefined();
    ledger.submit(alice, preference(3, 2));
    const personal = schedules.personal('alice');
    expect(personal?.assigned).toBe(false);
    expect(schedules.revealed('alice')).toEqual({ officeDays: 0, collabDays: 0, revealed: false });

    ledger.submit(alice, preference(5, 5));
    expect(schedules.personal('alice')).toBe(personal);
  });

  it('emits preference:submitted without any preference values', () => {
    const seen: Array<CloakroomEventMap['preference:submitted']> = [];
    events.on('preference:submitted', (e) => seen.push(e));
    ledger.submit(bob, preference(3, 2));
    expect(seen).toHaveLength(1);
    expect(Object.keys(seen[0] ?? {}).sort()).toEqual(['employee', 'recordId', 'timestamp']);
    expect(seen[0]).toMatchObject({ recordId: 1, employee: 'bob' });
  });

  it('rejects callers that are not recognized employees', () => {
    expect(() => ledger.submit({ caller: 'mallory' }, preference(1, 1))).toThrow(AuthorizationError);
    expect(ledger.size).toBe(0);
  });
});

describe('TeamDirectory', () => {
  it('keeps insertion order and permits duplicates', () => {
    directory.addMember(admin, 'platform', 'alice');
    directory.addMember(admin, 'platform', 'bob');
    directory.addMember(admin, 'platform', 'alice');
    expect(directory.members('platform')).toEqual(['alice', 'bob', 'alice']);
    expect(directory.memberCount('platform')).toBe(3);
    expect(directory.isMember('platform', 'bob')).toBe(true);
    expect(directory.isMember('platform', 'carol')).toBe(false);
    expect(directory.teams()).toEqual(['platform']);
  });

  it('returns a copy of the member list', () => {
    directory.addMember(admin, 'platform', 'alice');
    directory.members('platform').push('mallory');
    expect(directory.members('platform')).toEqual(['alice']);
    expect(directory.members('unknown')).toEqual([]);
  });

  it('addMember is admin-only', () => {
    try {
      directory.addMember(alice, 'platform', 'alice');
      expect.unreachable();
    } catch (e) {
      expect((e as AuthorizationError).code).toBe(CloakroomErrorCode.NOT_ADMIN);
    }
    expect(directory.memberCount('platform')).toBe(0);
  });
});

describe('ScheduleBook', () => {
  it('returns an unoptimized default for unknown teams', () => {
    const schedule = schedules.team('platform');
    expect(schedule.optimized).toBe(false);
    expect(backend.decryptSerialized(backend.serialize(schedule.officeDays))).toBe(0);
  });

  it('setTeam overwrites the whole schedule', () => {
    const values = {
      officeDays: backend.constant(3),
      collabDays: backend.constant(2),
      overlapScore: backend.constant(1),
    };
    schedules.setTeam('platform', values);
    const stored = schedules.team('platform');
    expect(stored).toEqual({ ...values, optimized: true });
    expect(Object.isFrozen(stored)).toBe(true);
    expect(schedules.teams()).toEqual(['platform']);
  });

  it('setPersonal requires an existing schedule record', () => {
    expect(() =>
      schedules.setPersonal('carol', { officeDays: backend.constant(1), collabDays: backend.constant(1) }),
    ).toThrow(PreconditionError);
  });

  it('markRevealed succeeds once', () => {
    schedules.ensureEmployee('alice');
    expect(schedules.markRevealed('alice', 3, 2)).toEqual({ officeDays: 3, collabDays: 2, revealed: true });
    try {
      schedules.markRevealed('alice', 4, 4);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ProtocolError);
      expect((e as ProtocolError).code).toBe(CloakroomErrorCode.ALREADY_REVEALED);
    }
    expect(schedules.revealed('alice')).toEqual({ officeDays: 3, collabDays: 2, revealed: true });
  });
});
