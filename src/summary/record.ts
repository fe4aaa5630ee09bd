import type { ZodIssue } from "zod";
import { ExperimentRecordValidationError, type RecordIssue } from "./errors.js";
import { experimentRecordSchema, type ExperimentRecord, type ExperimentRecordInput } from "./types.js";

export function resolveExperimentRecord(input: ExperimentRecordInput): ExperimentRecord {
  return {
    past_state: input.past_state ?? "",
    future_constraint: input.future_constraint ?? "",
    final_state: input.final_state ?? "",
    seed: input.seed ?? 0,
    iterations: input.iterations ?? 0,
    notes: input.notes ?? ""
  };
}

function toRecordIssue(issue: ZodIssue): RecordIssue {
  return {
    path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message
  };
}

/**
 * Validates an untrusted value into a complete record. Rejects non-integer
 * `seed`/`iterations` and negative `iterations`; unknown keys are dropped.
 */
export function parseExperimentRecord(input: unknown): ExperimentRecord {
  const parsed = experimentRecordSchema.safeParse(input);
  if (!parsed.success) {
    throw new ExperimentRecordValidationError(parsed.error.issues.map(toRecordIssue));
  }

  return parsed.data;
}

export function parseExperimentRecordJson(text: string): ExperimentRecord {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw new ExperimentRecordValidationError([
      {
        path: "(root)",
        message: `Malformed JSON: ${error instanceof Error ? error.message : String(error)}`
      }
    ]);
  }

  return parseExperimentRecord(decoded);
}
