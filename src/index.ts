export { computeConsistencyScore, roundTo } from "./summary/consistency-score.js";
export {
  buildConvergenceNotes,
  classifyConvergence,
  EARLY_TERMINATION_THRESHOLD,
  GOOD_CONVERGENCE_THRESHOLD,
  type ConvergenceLevel
} from "./summary/convergence-notes.js";
export { ExperimentRecordValidationError, type RecordIssue } from "./summary/errors.js";
export { hashExperimentSummary } from "./summary/fingerprint.js";
export { parseExperimentRecord, parseExperimentRecordJson, resolveExperimentRecord } from "./summary/record.js";
export { renderExperimentSummaryText, type RenderSummaryOptions } from "./summary/render.js";
export {
  buildExperimentDetails,
  EXPERIMENT_SUMMARY_DISCLAIMER,
  synthesizeExperimentSummary
} from "./summary/synthesize.js";
export {
  EXPERIMENT_DETAIL_KEYS,
  experimentRecordSchema,
  NO_NOTES_PLACEHOLDER,
  NOT_SPECIFIED_PLACEHOLDER,
  type ExperimentDetails,
  type ExperimentRecord,
  type ExperimentRecordInput,
  type ExperimentSummary
} from "./summary/types.js";
