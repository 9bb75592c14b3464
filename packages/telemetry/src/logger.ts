import pino from "pino";
import type { LogAttributes, LogLevel, SwitchyardLogger } from "@switchyard/types";
import type { TelemetryConfig } from "./env";

/**
 * SwitchyardLogger on top of pino. Child names nest with a dot, so the
 * views logger of the dispatcher logs as `dispatcher.views`.
 */
export class PinoLogger implements SwitchyardLogger {
  constructor(
    private readonly pinoLogger: pino.Logger,
    readonly name?: string,
  ) {}

  debug(message: string, attributes?: LogAttributes): void {
    this.write("debug", message, attributes);
  }

  info(message: string, attributes?: LogAttributes): void {
    this.write("info", message, attributes);
  }

  warn(message: string, attributes?: LogAttributes): void {
    this.write("warn", message, attributes);
  }

  error(message: string, attributes?: LogAttributes): void {
    this.write("error", message, attributes);
  }

  child(name: string, attributes?: LogAttributes): SwitchyardLogger {
    const qualified = this.name ? `${this.name}.${name}` : name;
    return new PinoLogger(this.pinoLogger.child({ ...attributes, name: qualified }), qualified);
  }

  withContext(attributes: LogAttributes): SwitchyardLogger {
    return new PinoLogger(this.pinoLogger.child(attributes), this.name);
  }

  get level(): LogLevel {
    const current: string = this.pinoLogger.level;
    return current === "debug" || current === "warn" || current === "error" ? current : "info";
  }

  set level(level: LogLevel) {
    this.pinoLogger.level = level;
  }

  private write(level: LogLevel, message: string, attributes?: LogAttributes): void {
    if (attributes) this.pinoLogger[level](attributes, message);
    else this.pinoLogger[level](message);
  }
}

function resolveStreams(config: TelemetryConfig): pino.StreamEntry[] {
  const humanFormat =
    config.logFormat === "human" ||
    (config.logFormat === "auto" && process.env.NODE_ENV === "development");

  const streams: pino.StreamEntry[] = [
    {
      level: config.logLevel,
      stream: humanFormat
        ? pino.transport({ target: "pino-pretty", options: { destination: 1 } })
        : pino.destination(1),
    },
  ];
  if (config.logFilePath) {
    streams.push({ level: config.logLevel, stream: pino.destination(config.logFilePath) });
  }
  return streams;
}

/**
 * Builds the root logger. Records go to stdout (and `logFilePath`) unless
 * a destination is given.
 */
export function createLogger(
  config: TelemetryConfig,
  destination?: pino.DestinationStream,
): PinoLogger {
  const logger = pino(
    {
      level: config.logLevel,
      base: { service: config.serviceName },
      redact:
        config.redactKeys.length > 0
          ? { paths: config.redactKeys, censor: "[REDACTED]" }
          : undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination ?? pino.multistream(resolveStreams(config)),
  );
  return new PinoLogger(logger);
}
