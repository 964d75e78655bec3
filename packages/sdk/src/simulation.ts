/**
 * A complete in-process deployment: simulated FHE backend, simulated
 * co-processor and an engine trusting that co-processor's key. Used by
 * tests and local demos.
 */

import type { IdentityVerifier } from '@cloakroom/access';
import { Ed25519ProofVerifier, SimulatedCoprocessor } from '@cloakroom/coprocessor';
import { SimulatedFheBackend } from '@cloakroom/fhe';
import type { OverlapPairing } from '@cloakroom/optimizer';
import type { EmployeeId, Logger } from '@cloakroom/types';

import { CloakroomEngine } from './engine';

export interface SimulatedDeploymentOptions {
  adminId: EmployeeId;
  identityVerifier?: IdentityVerifier;
  overlapPairing?: OverlapPairing;
  logger?: Logger;
}

export interface SimulatedDeployment {
  engine: CloakroomEngine;
  backend: SimulatedFheBackend;
  coprocessor: SimulatedCoprocessor;
}

export async function createSimulatedDeployment(options: SimulatedDeploymentOptions): Promise<SimulatedDeployment> {
  const backend = new SimulatedFheBackend();
  const coprocessor = await SimulatedCoprocessor.create(backend, options.logger?.child('coprocessor'));
  const engine = CloakroomEngine.create({
    adminId: options.adminId,
    backend,
    oracle: coprocessor,
    proofVerifier: new Ed25519ProofVerifier(coprocessor.publicKeyHex),
    identityVerifier: options.identityVerifier,
    overlapPairing: options.overlapPairing,
    logger: options.logger,
  });
  coprocessor.connect(engine.decryptionCallback());
  return { engine, backend, coprocessor };
}
