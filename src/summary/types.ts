import { z } from "zod";

export const NOT_SPECIFIED_PLACEHOLDER = "(not specified)";
export const NO_NOTES_PLACEHOLDER = "(none)";

const textFieldSchema = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

const integerFieldSchema = z
  .number()
  .int()
  .nullish()
  .transform((value) => value ?? 0);

export const experimentRecordSchema = z.object({
  past_state: textFieldSchema,
  future_constraint: textFieldSchema,
  final_state: textFieldSchema,
  seed: integerFieldSchema,
  iterations: z
    .number()
    .int()
    .min(0)
    .nullish()
    .transform((value) => value ?? 0),
  notes: textFieldSchema
});

export type ExperimentRecord = Readonly<z.output<typeof experimentRecordSchema>>;

/** What callers hand to the summarizer; anything left out takes its default. */
export type ExperimentRecordInput = Readonly<Partial<ExperimentRecord>>;

export interface ExperimentDetails {
  readonly past_state: string;
  readonly future_constraint: string;
  readonly final_state: string;
  readonly seed: number;
  readonly iterations: number;
  readonly notes: string;
}

export interface ExperimentSummary {
  readonly consistency_score: number;
  readonly convergence_notes: string;
  readonly disclaimer: string;
  readonly experiment_details: ExperimentDetails;
}

export const EXPERIMENT_DETAIL_KEYS = [
  "past_state",
  "future_constraint",
  "final_state",
  "seed",
  "iterations",
  "notes"
] as const satisfies ReadonlyArray<keyof ExperimentDetails>;
