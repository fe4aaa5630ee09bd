import type { ExperimentRecord } from "./types.js";

const SCORE_BASE = 0.5;
const SCORE_SPAN = 0.35;
const LENGTH_MODULUS = 7;

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Toy heuristic over the combined length of the three state descriptions.
 * Returns 0 unless all three are non-empty; otherwise one of seven values
 * between 0.5 and 0.8.
 */
export function computeConsistencyScore(
  record: Pick<ExperimentRecord, "past_state" | "future_constraint" | "final_state">
): number {
  if (!record.past_state || !record.future_constraint || !record.final_state) {
    return 0;
  }

  const lengthSum = record.past_state.length + record.future_constraint.length + record.final_state.length;
  const remainder = lengthSum % LENGTH_MODULUS;

  return roundTo(SCORE_BASE + SCORE_SPAN * (remainder / LENGTH_MODULUS), 2);
}
