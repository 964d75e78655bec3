/**
 * @cloakroom/ledger — preference ledger, team directory and schedule state.
 *
 * @packageDocumentation
 */

export { PreferenceLedger } from './preference-ledger';
export type { PreferenceLedgerOptions } from './preference-ledger';
export { TeamDirectory } from './team-directory';
export { ScheduleBook } from './schedule-book';
export type {
  RecordId,
  PreferenceInput,
  PreferenceRecord,
  TeamSchedule,
  TeamScheduleValues,
  PersonalSchedule,
  PersonalScheduleValues,
  RevealedSchedule,
} from './types';
