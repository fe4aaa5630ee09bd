import { configureLogging, logError, logInfo, logWarn, serializeError } from "../lib/logging.js";
import { resolveLogLevel, resolveOutputFormat, type OutputFormat } from "../lib/settings.js";
import { ExperimentRecordValidationError } from "../summary/errors.js";
import { hashExperimentSummary } from "../summary/fingerprint.js";
import { parseExperimentRecord, parseExperimentRecordJson } from "../summary/record.js";
import { renderExperimentSummaryText } from "../summary/render.js";
import { synthesizeExperimentSummary } from "../summary/synthesize.js";
import type { ExperimentRecordInput, ExperimentSummary } from "../summary/types.js";
import { DEMO_EXAMPLES } from "./demo-records.js";

type CliCommand = "summarize" | "demo" | "help";

interface ParsedArgs {
  command: CliCommand;
  positionals: string[];
  options: Record<string, string | boolean>;
}

export interface CliWriter {
  write(chunk: string): unknown;
}

export interface CliIo {
  stdout: CliWriter;
  stderr: CliWriter;
  env?: Record<string, string | undefined>;
}

const BANNER_WIDTH = 70;
const INTEGER_PATTERN = /^-?\d+$/;

const TEXT_OPTIONS = [
  ["past-state", "past_state"],
  ["future-constraint", "future_constraint"],
  ["final-state", "final_state"],
  ["notes", "notes"]
] as const;

const INTEGER_OPTIONS = [
  ["seed", "seed"],
  ["iterations", "iterations"]
] as const;

export function parseArgs(argv: string[]): ParsedArgs {
  const command = argv[0] || "help";
  const options: Record<string, string | boolean> = {};
  const positionals: string[] = [];

  for (let index = 1; index < argv.length; index += 1) {
    const token = argv[index];

    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }

    const eqIndex = token.indexOf("=");
    if (eqIndex > 2) {
      options[token.slice(2, eqIndex)] = token.slice(eqIndex + 1);
      continue;
    }

    const key = token.slice(2);
    const next = argv[index + 1];

    if (next !== undefined && !next.startsWith("--")) {
      options[key] = next;
      index += 1;
    } else {
      options[key] = true;
    }
  }

  const knownCommands: CliCommand[] = ["summarize", "demo", "help"];
  const known = knownCommands.find((entry) => entry === command);

  return {
    command: known ?? "help",
    positionals,
    options
  };
}

function requireOptionValue(options: Record<string, string | boolean>, key: string): void {
  if (options[key] === true) {
    throw new Error(`Option --${key} requires a value. Use --${key}=<value> for values that start with "--".`);
  }
}

function optionString(options: Record<string, string | boolean>, key: string): string | undefined {
  const value = options[key];
  if (typeof value === "string") {
    return value.length > 0 ? value : undefined;
  }
  return undefined;
}

export function commandUsage(): string {
  return [
    "experiment-summary CLI",
    "",
    "Commands:",
    "  summarize [--past-state <text>] [--future-constraint <text>] [--final-state <text>] [--seed <n>] [--iterations <n>] [--notes <text>] [--record <json>] [--format text|json]",
    "  demo [--format text|json]",
    "  help",
    "",
    "Notes:",
    "  - Options given alongside --record override the matching record fields.",
    "  - Pass negative numbers as --seed=-1, and text starting with \"--\" as --notes=<text>.",
    "  - The default format comes from EXPERIMENT_SUMMARY_FORMAT (text when unset).",
    "  - Diagnostic events are written to stderr; EXPERIMENT_SUMMARY_LOG_LEVEL=silent disables them."
  ].join("\n");
}

export function buildRecordFromOptions(options: Record<string, string | boolean>): ExperimentRecordInput {
  requireOptionValue(options, "record");
  const recordJson = optionString(options, "record");
  const merged: Record<string, unknown> = recordJson ? { ...parseExperimentRecordJson(recordJson) } : {};
  const overridden: string[] = [];

  for (const [option, field] of TEXT_OPTIONS) {
    requireOptionValue(options, option);
    const value = optionString(options, option);
    if (value !== undefined) {
      merged[field] = value;
      overridden.push(field);
    }
  }

  for (const [option, field] of INTEGER_OPTIONS) {
    requireOptionValue(options, option);
    const value = optionString(options, option);
    if (value !== undefined) {
      // Anything other than plain decimal digits goes to the schema as text and is rejected there.
      merged[field] = INTEGER_PATTERN.test(value) ? Number(value) : value;
      overridden.push(field);
    }
  }

  if (recordJson && overridden.length > 0) {
    logWarn("experiment_summary.record_fields_overridden", { fields: overridden });
  }

  return parseExperimentRecord(merged);
}

function summarize(record: ExperimentRecordInput): { summary: ExperimentSummary; summaryHash: string } {
  const summary = synthesizeExperimentSummary(record);
  const summaryHash = hashExperimentSummary(summary);

  logInfo("experiment_summary.synthesized", {
    consistencyScore: summary.consistency_score,
    iterations: summary.experiment_details.iterations,
    summaryHash
  });

  return { summary, summaryHash };
}

function handleSummarize(input: {
  options: Record<string, string | boolean>;
  format: OutputFormat;
  io: CliIo;
}): number {
  const result = summarize(buildRecordFromOptions(input.options));

  if (input.format === "json") {
    input.io.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  } else {
    input.io.stdout.write(`${renderExperimentSummaryText(result.summary)}\n`);
  }

  return 0;
}

function handleDemo(input: { format: OutputFormat; io: CliIo }): number {
  if (input.format === "json") {
    const examples = DEMO_EXAMPLES.map((example) => ({
      title: example.title,
      ...summarize(example.record)
    }));
    input.io.stdout.write(`${JSON.stringify(examples, null, 2)}\n`);
    return 0;
  }

  const heavy = "=".repeat(BANNER_WIDTH);
  const light = "-".repeat(BANNER_WIDTH);
  const lines = [heavy, "Experiment Summary Demo", heavy, ""];

  for (const example of DEMO_EXAMPLES) {
    const { summary } = summarize(example.record);
    lines.push(heavy, example.title, light, renderExperimentSummaryText(summary, example.render), "");
  }

  lines.push(heavy, "Demo completed successfully!", heavy);
  input.io.stdout.write(`${lines.join("\n")}\n`);
  return 0;
}

export function runExperimentSummaryCli(argv: string[], io: CliIo): number {
  const parsed = parseArgs(argv);

  if (parsed.command === "help") {
    io.stdout.write(`${commandUsage()}\n`);
    return 0;
  }

  if (parsed.positionals.length > 0) {
    io.stderr.write(`Unexpected argument '${parsed.positionals[0]}'.\n${commandUsage()}\n`);
    return 1;
  }

  try {
    const env = io.env ?? process.env;
    configureLogging(resolveLogLevel(env), io.stderr);
    const format = resolveOutputFormat(optionString(parsed.options, "format"), env);

    if (parsed.command === "summarize") {
      return handleSummarize({ options: parsed.options, format, io });
    }

    return handleDemo({ format, io });
  } catch (error) {
    if (!(error instanceof ExperimentRecordValidationError)) {
      logError("experiment_summary.cli_failed", { command: parsed.command, error: serializeError(error) });
    }
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}
