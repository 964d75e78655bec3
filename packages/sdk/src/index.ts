/**
 * @cloakroom/sdk — the engine facade, configuration loading and the
 * HTTP callback adapter.
 *
 * @packageDocumentation
 */

export { CloakroomEngine } from './engine';
export type { CloakroomEngineOptions, EngineDependencies } from './engine';
export { createSimulatedDeployment } from './simulation';
export type { SimulatedDeployment, SimulatedDeploymentOptions } from './simulation';
export {
  CONFIG_FILE_NAME,
  findConfigFile,
  loadConfig,
  parseConfig,
  readConfigFile,
} from './config';
export type { CloakroomConfig } from './config';
export * from './adapters/index';

export type { AuthContext, EmployeeId, TeamId, CloakroomEventMap } from '@cloakroom/types';
export { CloakroomError, CloakroomErrorCode, formatError } from '@cloakroom/types';
export type { Ciphertext, EncryptedBool, FheBackend } from '@cloakroom/fhe';
export type { DecryptionOracle, DecryptionResult, ProofVerifier, RequestId } from '@cloakroom/coprocessor';
export type { PreferenceInput, RevealedSchedule } from '@cloakroom/ledger';
export type { RevealStatus, PendingReveal } from '@cloakroom/reveal';
export type { OverlapPairing } from '@cloakroom/optimizer';
