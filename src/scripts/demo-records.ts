import type { ExperimentRecordInput } from "../summary/types.js";
import type { RenderSummaryOptions } from "../summary/render.js";

export interface DemoExample {
  title: string;
  record: ExperimentRecordInput;
  render: RenderSummaryOptions;
}

export const DEMO_EXAMPLES: readonly DemoExample[] = [
  {
    title: "Example 1: Complete Experiment",
    record: {
      past_state: "quantum_system_ground_state",
      future_constraint: "excited_state_target_energy_5.2eV",
      final_state: "excited_state_achieved_energy_5.18eV",
      seed: 42,
      iterations: 1500,
      notes: "Standard perturbation analysis with time-symmetric boundary conditions"
    },
    render: {}
  },
  {
    title: "Example 2: Minimal Experiment",
    record: {
      past_state: "initial",
      future_constraint: "target",
      final_state: "result",
      seed: 123,
      iterations: 50,
      notes: "Quick test run"
    },
    render: { includeDisclaimer: false }
  },
  {
    title: "Example 3: High-Iteration Experiment",
    record: {
      past_state: "classical_harmonic_oscillator_at_rest",
      future_constraint: "maximum_displacement_at_t_10s",
      final_state: "oscillator_at_maximum_displacement",
      seed: 2024,
      iterations: 10000,
      notes: "Extended simulation for high-precision convergence analysis"
    },
    render: { includeDetails: false, includeDisclaimer: false }
  }
];
