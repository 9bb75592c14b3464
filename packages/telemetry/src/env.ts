import type { LogLevel } from "@switchyard/types";

export type TelemetryConfig = {
  tracingEnabled: boolean;
  serviceName: string;
  logLevel: LogLevel;
  logFormat: "json" | "human" | "auto";
  logFilePath: string | null;
  /** Attribute paths pino censors, e.g. `flash.password`. */
  redactKeys: string[];
};

const VALID_LOG_LEVELS = new Set<string>(["debug", "info", "warn", "error"]);

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && VALID_LOG_LEVELS.has(value);
}

function isLogFormat(value: string | undefined): value is TelemetryConfig["logFormat"] {
  return value === "json" || value === "human" || value === "auto";
}

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((key) => key.trim())
    .filter(Boolean);
}

export function readTelemetryEnv(env: NodeJS.ProcessEnv = process.env): TelemetryConfig {
  const rawLevel = env.SWITCHYARD_LOG_LEVEL;
  const rawFormat = env.SWITCHYARD_LOG_FORMAT;

  return {
    tracingEnabled: env.SWITCHYARD_TELEMETRY_ENABLED === "true",
    serviceName: env.OTEL_SERVICE_NAME ?? "switchyard-app",
    logLevel: isLogLevel(rawLevel) ? rawLevel : "info",
    logFormat: isLogFormat(rawFormat) ? rawFormat : "auto",
    logFilePath: env.SWITCHYARD_LOG_FILE_PATH ?? null,
    redactKeys: parseList(env.SWITCHYARD_LOG_REDACT_KEYS),
  };
}
