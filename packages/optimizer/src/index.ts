/**
 * @cloakroom/optimizer — encrypted team and personal schedule computation.
 *
 * @packageDocumentation
 */

export { ScheduleOptimizer } from './schedule-optimizer';
export type { ScheduleOptimizerOptions } from './schedule-optimizer';
export { OVERLAP_PAIRINGS, DEFAULT_OVERLAP_PAIRING } from './types';
export type { OverlapPairing } from './types';
