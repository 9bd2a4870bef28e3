/**
 * Round Index - Kill events grouped by round
 *
 * Round numbers in the source are unreliable in two ways: the field carrying
 * them changed name between API versions, and kill events are frequently
 * numbered one off from the rounds they belong to. Both are resolved here so
 * that every consumer (KAST, clutch, first blood, opening) sees the same
 * round for the same kill.
 *
 * @module analysis/calculators/round-index
 */

import type { KillEvent, RoundKillIndex } from "../types/inputs.types";

/**
 * Any of the round-number fields a raw round or kill may carry
 */
export interface RoundNumberFields {
  readonly round_num?: number | null | undefined;
  readonly round?: number | null | undefined;
  readonly round_number?: number | null | undefined;
}

/** Candidate keys, in priority order */
const ROUND_NUMBER_KEYS = ["round_num", "round", "round_number"] as const;

/**
 * Resolve the 1-based number of a raw round
 *
 * Takes the first positive integer among `round_num`, `round` and
 * `round_number`; falls back to the round's position in API order.
 *
 * @param position - 0-based index of the round in the rounds array
 */
export function resolveRoundNumber(raw: RoundNumberFields, position: number): number {
  for (const key of ROUND_NUMBER_KEYS) {
    const value = raw[key];
    if (typeof value === "number" && Number.isInteger(value) && value > 0) {
      return value;
    }
  }
  return position + 1;
}

/**
 * Resolve the round number a raw kill event is tagged with
 *
 * Kill numbering is left as reported (including 0); the ±1 skew is absorbed
 * at lookup time by {@link lookupRoundKills}.
 */
export function resolveKillRoundNumber(raw: RoundNumberFields): number {
  const value = raw.round ?? raw.round_num ?? raw.round_number;
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return value;
  }
  return 0;
}

/**
 * Group kills by round number, each group ordered by time in round
 *
 * The sort is stable, so simultaneous kills keep their input order.
 * The input array is not modified.
 */
export function indexKillsByRound(kills: readonly KillEvent[]): RoundKillIndex {
  const groups = new Map<number, KillEvent[]>();

  for (const kill of kills) {
    const group = groups.get(kill.roundNumber);
    if (group) {
      group.push(kill);
    } else {
      groups.set(kill.roundNumber, [kill]);
    }
  }

  for (const group of groups.values()) {
    group.sort((a, b) => a.timeInRoundMs - b.timeInRoundMs);
  }

  return groups;
}

/**
 * Kills of a round, tolerating off-by-one kill numbering
 *
 * Tries `roundNumber`, then `roundNumber + 1`, then `roundNumber - 1`.
 * Returns an empty list only when none of the three exist.
 */
export function lookupRoundKills(
  index: RoundKillIndex,
  roundNumber: number,
): readonly KillEvent[] {
  return (
    index.get(roundNumber) ??
    index.get(roundNumber + 1) ??
    index.get(roundNumber - 1) ??
    []
  );
}

/**
 * Earliest kill of a round, or null when the round has none
 */
export function firstKillOfRound(
  index: RoundKillIndex,
  roundNumber: number,
): KillEvent | null {
  return lookupRoundKills(index, roundNumber)[0] ?? null;
}
