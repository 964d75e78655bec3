/**
 * @cloakroom/reveal — exactly-once, proof-checked decryption of personal schedules.
 *
 * @packageDocumentation
 */

export { DecryptionCoordinator } from './decryption-coordinator';
export type { DecryptionCoordinatorOptions } from './decryption-coordinator';
export type { PendingReveal, RevealStatus } from './types';
