import type { ExperimentRecord } from "./types.js";

export const EARLY_TERMINATION_THRESHOLD = 100;
export const GOOD_CONVERGENCE_THRESHOLD = 1000;

export type ConvergenceLevel = "unrecorded" | "early_termination" | "moderate" | "good";

export function classifyConvergence(iterations: number): ConvergenceLevel {
  if (iterations === 0) {
    return "unrecorded";
  }
  if (iterations < EARLY_TERMINATION_THRESHOLD) {
    return "early_termination";
  }
  if (iterations < GOOD_CONVERGENCE_THRESHOLD) {
    return "moderate";
  }
  return "good";
}

function describeConvergence(level: ConvergenceLevel, iterations: number): string {
  switch (level) {
    case "unrecorded":
      return "No iterations recorded; unable to assess convergence.";
    case "early_termination":
      return `Simulation ran for ${iterations} iterations. Early termination detected; results may not represent full convergence.`;
    case "moderate":
      return `Simulation completed ${iterations} iterations with moderate convergence characteristics.`;
    case "good":
      return `Simulation completed ${iterations} iterations with good convergence behavior. Stable solution reached.`;
  }
}

export function buildConvergenceNotes(record: Pick<ExperimentRecord, "iterations" | "seed">): string {
  const notes = describeConvergence(classifyConvergence(record.iterations), record.iterations);

  if (record.seed > 0) {
    return `${notes} (Reproducible with seed=${record.seed})`;
  }

  return notes;
}
