import { EXPERIMENT_DETAIL_KEYS, type ExperimentSummary } from "./types.js";

export interface RenderSummaryOptions {
  includeDetails?: boolean;
  includeDisclaimer?: boolean;
}

export function renderExperimentSummaryText(summary: ExperimentSummary, options: RenderSummaryOptions = {}): string {
  const lines = [
    `Consistency Score: ${summary.consistency_score}`,
    "",
    "Convergence Notes:",
    `  ${summary.convergence_notes}`
  ];

  if (options.includeDetails !== false) {
    lines.push("", "Experiment Details:");
    for (const key of EXPERIMENT_DETAIL_KEYS) {
      lines.push(`  ${key}: ${summary.experiment_details[key]}`);
    }
  }

  if (options.includeDisclaimer !== false) {
    lines.push("", summary.disclaimer);
  }

  return lines.join("\n");
}
