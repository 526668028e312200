import pino, { type DestinationStream, type Logger, type LoggerOptions, stdTimeFunctions } from "pino";
import pretty from "pino-pretty";
import type { LogFormat, LogLevel } from "../schemas/config-schema";

export const SENSITIVE_HEADERS = [
  "authorization",
  "cookie",
  "set-cookie",
  "proxy-authorization",
  "x-api-key",
  "x-auth-token",
];

export const REDACTED = "[REDACTED]";

const HEADER_GROUPS = ["request_headers", "response_headers", "upstream_headers"];

export const REDACT_PATHS = HEADER_GROUPS.flatMap((group) =>
  SENSITIVE_HEADERS.map((header) => `${group}["${header}"]`)
);

export interface CreateLoggerOptions {
  level: LogLevel;
  format: LogFormat;
  serviceName: string;
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const pinoOptions: LoggerOptions = {
    level: options.level,
    base: { service: options.serviceName },
    timestamp: stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: REDACTED },
  };

  return pino(pinoOptions, options.destination ?? defaultDestination(options.format));
}

function defaultDestination(format: LogFormat): DestinationStream {
  if (format === "text") {
    return pretty({ colorize: false, sync: true, translateTime: "SYS:standard" });
  }
  return pino.destination({ dest: 1, sync: true });
}
