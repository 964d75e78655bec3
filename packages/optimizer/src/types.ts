/**
 * How `optimizeTeam` pairs members when accumulating the overlap score.
 *
 * - `adjacent-index`: pair `members[i - 1]` with `members[i]`, and only
 *   when both have a preference. A member without a preference breaks
 *   the chain on both sides.
 * - `filtered-order`: pair each preference-bearing member with the
 *   previous preference-bearing member, skipping those without one.
 */
export type OverlapPairing = 'adjacent-index' | 'filtered-order';

export const OVERLAP_PAIRINGS: readonly OverlapPairing[] = ['adjacent-index', 'filtered-order'];

export const DEFAULT_OVERLAP_PAIRING: OverlapPairing = 'adjacent-index';
