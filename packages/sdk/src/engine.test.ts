import { describe, it, expect } from 'vitest';
import { encodeUint32s, signDecryptionResult, SimulatedCoprocessor } from '@cloakroom/coprocessor';
import { generateKeyPair } from '@cloakroom/crypto';
import { SimulatedFheBackend } from '@cloakroom/fhe';
import { AllowListVerifier } from '@cloakroom/access';
import { CloakroomErrorCode, Logger, LogLevel } from '@cloakroom/types';
import type { LogEntry } from '@cloakroom/types';

import { CloakroomEngine, createSimulatedDeployment, parseConfig } from './index';
import type { SimulatedDeployment } from './index';

const silent = new Logger({ level: LogLevel.SILENT });
const admin = { caller: 'hr' };
const alice = { caller: 'alice' };

function submit({ engine, backend }: SimulatedDeployment, employee: string, office: number, teamDays: number): number {
  return engine.submit(
    { caller: employee },
    {
      daysInOffice: backend.encrypt(office),
      teamDays: backend.encrypt(teamDays),
      focusDays: backend.encrypt(1),
      flexibility: backend.encrypt(75),
    },
  );
}

describe('CloakroomEngine', () => {
  it('runs submission through reveal', async () => {
    const deployment = await createSimulatedDeployment({ adminId: 'hr', logger: silent });
    const { engine, coprocessor } = deployment;
    const revealed: string[] = [];
    engine.on('schedule:revealed', (e) => revealed.push(e.employee));

    submit(deployment, 'alice', 4, 6);
    submit(deployment, 'bob', 2, 8);
    engine.addMember(admin, 'platform', 'alice');
    engine.addMember(admin, 'platform', 'bob');
    engine.optimizeTeam(admin, 'platform');
    engine.assignPersonal(admin, 'alice', 'platform');

    const requestId = await engine.requestReveal(alice);
    expect(engine.revealStatus('alice')).toBe('request-pending');
    await coprocessor.fulfill(requestId);

    expect(engine.revealStatus('alice')).toBe('revealed');
    expect(engine.revealedSchedule(alice)).toEqual({ officeDays: 3, collabDays: 6, revealed: true });
    expect(revealed).toEqual(['alice']);
  });

  it('exposes ledger and directory reads', async () => {
    const deployment = await createSimulatedDeployment({ adminId: 'hr', logger: silent });
    submit(deployment, 'alice', 1, 1);
    const second = submit(deployment, 'alice', 2, 2);
    deployment.engine.addMember(admin, 'platform', 'alice');
    expect(deployment.engine.latest('alice')).toBe(second);
    expect(deployment.engine.members('platform')).toEqual(['alice']);
  });

  it('off removes a listener', async () => {
    const deployment = await createSimulatedDeployment({ adminId: 'hr', logger: silent });
    const seen: number[] = [];
    const listener = (e: { recordId: number }): void => {
      seen.push(e.recordId);
    };
    deployment.engine.on('preference:submitted', listener);
    submit(deployment, 'alice', 1, 1);
    deployment.engine.off('preference:submitted', listener);
    submit(deployment, 'alice', 1, 1);
    expect(seen).toEqual([1]);
  });

  it('never logs plaintext values', async () => {
    const entries: LogEntry[] = [];
    const logger = new Logger({ level: LogLevel.DEBUG, output: (e) => entries.push(e) });
    const deployment = await createSimulatedDeployment({ adminId: 'hr', logger });
    submit(deployment, 'alice', 4, 6);
    deployment.engine.addMember(admin, 'platform', 'alice');
    deployment.engine.optimizeTeam(admin, 'platform');
    deployment.engine.assignPersonal(admin, 'alice', 'platform');
    await deployment.coprocessor.fulfill(await deployment.engine.requestReveal(alice));

    expect(entries.map((e) => e.message)).toContain('schedule revealed');
    for (const entry of entries) {
      expect(entry['plaintext']).toBeUndefined();
      expect(entry['officeDays']).toBeUndefined();
      expect(entry['collabDays']).toBeUndefined();
    }
  });

  it('fromConfig trusts the configured key and honours the allowlist', async () => {
    const backend = new SimulatedFheBackend();
    const coprocessor = await SimulatedCoprocessor.create(backend, silent);
    const config = parseConfig({
      adminId: 'hr',
      coprocessorPublicKey: coprocessor.publicKeyHex,
      employees: ['alice'],
      overlapPairing: 'filtered-order',
      logLevel: 'silent',
    });
    const engine = CloakroomEngine.fromConfig(config, { backend, oracle: coprocessor, logger: silent });
    coprocessor.connect(engine.decryptionCallback());

    expect(engine.optimizer.overlapPairing).toBe('filtered-order');
    expect(() => engine.submit({ caller: 'mallory' }, {
      daysInOffice: backend.encrypt(1),
      teamDays: backend.encrypt(1),
      focusDays: backend.encrypt(1),
      flexibility: backend.encrypt(1),
    })).toThrow('submit requires a recognized employee');

    engine.submit(alice, {
      daysInOffice: backend.encrypt(4),
      teamDays: backend.encrypt(2),
      focusDays: backend.encrypt(1),
      flexibility: backend.encrypt(1),
    });
    engine.addMember(admin, 'solo', 'alice');
    engine.optimizeTeam(admin, 'solo');
    engine.assignPersonal(admin, 'alice', 'solo');
    await coprocessor.fulfill(await engine.requestReveal(alice));
    expect(engine.revealedSchedule(alice)).toEqual({ officeDays: 4, collabDays: 2, revealed: true });
  });

  it('rejects results signed by an untrusted co-processor', async () => {
    const deployment = await createSimulatedDeployment({
      adminId: 'hr',
      identityVerifier: new AllowListVerifier(['alice']),
      logger: silent,
    });
    submit(deployment, 'alice', 4, 6);
    deployment.engine.addMember(admin, 'platform', 'alice');
    deployment.engine.optimizeTeam(admin, 'platform');
    deployment.engine.assignPersonal(admin, 'alice', 'platform');
    const requestId = await deployment.engine.requestReveal(alice);

    const rogue = await generateKeyPair();
    const plaintext = encodeUint32s([5, 5]);
    const proof = await signDecryptionResult(requestId, plaintext, rogue.privateKey);

    await expect(deployment.engine.resolveReveal({ requestId, plaintext, proof })).rejects.toMatchObject({
      code: CloakroomErrorCode.INVALID_PROOF,
    });
    expect(deployment.engine.revealStatus('alice')).toBe('request-pending');
  });
});
