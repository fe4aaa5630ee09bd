export type OutputFormat = "text" | "json";
export type LogLevel = "info" | "warn" | "error" | "silent";

export const OUTPUT_FORMAT_ENV = "EXPERIMENT_SUMMARY_FORMAT";
export const LOG_LEVEL_ENV = "EXPERIMENT_SUMMARY_LOG_LEVEL";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json"];
const LOG_LEVELS: readonly LogLevel[] = ["info", "warn", "error", "silent"];

type Environment = Record<string, string | undefined>;

function pickOption<T extends string>(allowed: readonly T[], raw: string): T | undefined {
  return allowed.find((entry) => entry === raw);
}

export function resolveOutputFormat(explicit?: string, env: Environment = process.env): OutputFormat {
  const rawExplicit = typeof explicit === "string" ? explicit.trim().toLowerCase() : "";
  if (rawExplicit) {
    const format = pickOption(OUTPUT_FORMATS, rawExplicit);
    if (!format) {
      throw new Error(`Option --format must be one of ${OUTPUT_FORMATS.join("|")}. Received '${explicit}'.`);
    }
    return format;
  }

  const configured = String(env[OUTPUT_FORMAT_ENV] || "").trim().toLowerCase();
  if (configured) {
    const format = pickOption(OUTPUT_FORMATS, configured);
    if (!format) {
      throw new Error(`${OUTPUT_FORMAT_ENV} must be one of ${OUTPUT_FORMATS.join("|")}. Received '${configured}'.`);
    }
    return format;
  }

  return "text";
}

export function resolveLogLevel(env: Environment = process.env): LogLevel {
  const configured = String(env[LOG_LEVEL_ENV] || "").trim().toLowerCase();
  if (!configured) {
    return "info";
  }

  const level = pickOption(LOG_LEVELS, configured);
  if (!level) {
    throw new Error(`${LOG_LEVEL_ENV} must be one of ${LOG_LEVELS.join("|")}. Received '${configured}'.`);
  }

  return level;
}
