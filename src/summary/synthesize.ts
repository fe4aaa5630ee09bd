import { computeConsistencyScore } from "./consistency-score.js";
import { buildConvergenceNotes } from "./convergence-notes.js";
import { resolveExperimentRecord } from "./record.js";
import {
  NO_NOTES_PLACEHOLDER,
  NOT_SPECIFIED_PLACEHOLDER,
  type ExperimentDetails,
  type ExperimentRecord,
  type ExperimentRecordInput,
  type ExperimentSummary
} from "./types.js";

export const EXPERIMENT_SUMMARY_DISCLAIMER = [
  "DISCLAIMER: This summary is generated from classical computational inference.",
  "It does NOT represent physical retrocausality or actual backward time propagation.",
  "All analysis is performed using standard forward-time simulation with post-hoc constraint evaluation.",
  "Results should be interpreted as theoretical exploration of time-symmetric scenarios,",
  "not as evidence of acausal phenomena."
].join(" ");

export function buildExperimentDetails(record: ExperimentRecord): ExperimentDetails {
  return {
    past_state: record.past_state || NOT_SPECIFIED_PLACEHOLDER,
    future_constraint: record.future_constraint || NOT_SPECIFIED_PLACEHOLDER,
    final_state: record.final_state || NOT_SPECIFIED_PLACEHOLDER,
    seed: record.seed,
    iterations: record.iterations,
    notes: record.notes || NO_NOTES_PLACEHOLDER
  };
}

/**
 * Maps an experiment record to its summary. Pure and total: missing fields
 * take their defaults and nothing is thrown.
 */
export function synthesizeExperimentSummary(input: ExperimentRecordInput): ExperimentSummary {
  const record = resolveExperimentRecord(input);

  return {
    consistency_score: computeConsistencyScore(record),
    convergence_notes: buildConvergenceNotes(record),
    disclaimer: EXPERIMENT_SUMMARY_DISCLAIMER,
    experiment_details: buildExperimentDetails(record)
  };
}
