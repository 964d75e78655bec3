import type { Ciphertext } from '@cloakroom/fhe';
import type { EmployeeId } from '@cloakroom/types';

/** Sequential identifier of a preference record, starting at 1. */
export type RecordId = number;

/** The four encrypted fields an employee submits. */
export interface PreferenceInput {
  daysInOffice: Ciphertext;
  teamDays: Ciphertext;
  focusDays: Ciphertext;
  flexibility: Ciphertext;
}

/** An immutable entry in the preference ledger. */
export interface PreferenceRecord extends Readonly<PreferenceInput> {
  readonly id: RecordId;
  readonly employee: EmployeeId;
  /** ISO 8601 submission time. */
  readonly submittedAt: string;
}

/** Encrypted team-level schedule. One live instance per team. */
export interface TeamSchedule {
  readonly officeDays: Ciphertext;
  readonly collabDays: Ciphertext;
  readonly overlapScore: Ciphertext;
  readonly optimized: boolean;
}

/** Encrypted per-employee schedule blending preference and team schedule. */
export interface PersonalSchedule {
  readonly officeDays: Ciphertext;
  readonly collabDays: Ciphertext;
  readonly assigned: boolean;
}

/** Plaintext schedule, written once by a verified decryption callback. */
export interface RevealedSchedule {
  readonly officeDays: number;
  readonly collabDays: number;
  readonly revealed: boolean;
}

export type TeamScheduleValues = Omit<TeamSchedule, 'optimized'>;
export type PersonalScheduleValues = Omit<PersonalSchedule, 'assigned'>;
