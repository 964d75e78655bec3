/**
 * Interleaved reveal requests and out-of-order co-processor callbacks.
 */

import { describe, it, expect } from 'vitest';

import { createSimulatedDeployment } from '@cloakroom/sdk';
import { CloakroomErrorCode, Logger, LogLevel } from '@cloakroom/types';

const silent = new Logger({ level: LogLevel.SILENT });
const admin = { caller: 'hr' };

async function assignedTeam(size: number) {
  const d = await createSimulatedDeployment({ adminId: 'hr', logger: silent });
  const employees = Array.from({ length: size }, (_, i) => `employee-${i}`);
  employees.forEach((employee, i) => {
    d.engine.submit(
      { caller: employee },
      {
        daysInOffice: d.backend.encrypt(i % 6),
        teamDays: d.backend.encrypt(i * 3),
        focusDays: d.backend.encrypt(1),
        flexibility: d.backend.encrypt(50),
      },
    );
    d.engine.addMember(admin, 'big', employee);
  });
  d.engine.optimizeTeam(admin, 'big');
  for (const employee of employees) {
    d.engine.assignPersonal(admin, employee, 'big');
  }
  return { d, employees };
}

describe('concurrent reveals', () => {
  it('routes callbacks delivered in reverse order to the right employees', async () => {
    const { d, employees } = await assignedTeam(8);
    const expected = employees.map((employee) => {
      const personal = d.engine.schedules.personal(employee);
      if (!personal) {
        throw new Error(`missing schedule for ${employee}`);
      }
      return {
        officeDays: d.backend.decryptSerialized(d.backend.serialize(personal.officeDays)),
        collabDays: d.backend.decryptSerialized(d.backend.serialize(personal.collabDays)),
        revealed: true,
      };
    });

    const requestIds = await Promise.all(employees.map((employee) => d.engine.requestReveal({ caller: employee })));
    expect(new Set(requestIds).size).toBe(employees.length);
    expect(d.engine.reveals.pendingRequests()).toHaveLength(employees.length);

    for (const requestId of [...requestIds].reverse()) {
      await d.coprocessor.fulfill(requestId);
    }

    expect(employees.map((employee) => d.engine.revealedSchedule({ caller: employee }))).toEqual(expected);
    expect(d.engine.reveals.pendingRequests()).toEqual([]);
  });

  it('accepts exactly one of many simultaneous deliveries of the same result', async () => {
    const { d } = await assignedTeam(2);
    const requestId = await d.engine.requestReveal({ caller: 'employee-1' });
    const result = await d.coprocessor.produce(requestId);

    const outcomes = await Promise.allSettled(Array.from({ length: 5 }, () => d.engine.resolveReveal(result)));

    expect(outcomes.filter((o) => o.status === 'fulfilled')).toHaveLength(1);
    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') {
        expect(outcome.reason).toMatchObject({ code: CloakroomErrorCode.UNKNOWN_REQUEST });
      }
    }
  });

  it('keeps one pending request per employee under simultaneous requests', async () => {
    const { d } = await assignedTeam(3);
    const outcomes = await Promise.allSettled(
      Array.from({ length: 4 }, () => d.engine.requestReveal({ caller: 'employee-2' })),
    );
    expect(outcomes.filter((o) => o.status === 'fulfilled')).toHaveLength(1);
    expect(d.coprocessor.pendingIds()).toHaveLength(1);
    expect(d.engine.revealStatus('employee-2')).toBe('request-pending');
  });
});
