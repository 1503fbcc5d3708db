import type { Metadata } from "@grpc/grpc-js";
import { Logger } from "tslog";
import type { LoggingConfig } from "../config/types.js";

export type LogLevel = LoggingConfig["level"];

export const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/** Object keys whose values tslog masks. */
export const MASKED_KEYS = [
  "token",
  "password",
  "secret",
  "apiKey",
  "privateKey",
  "credential",
];

/** gRPC metadata keys (always lowercase on the wire) that carry credentials. */
export const MASKED_METADATA_KEYS = [
  "authorization",
  "cookie",
  "x-api-key",
  "x-auth-token",
];

export interface LoggerOptions {
  level?: LogLevel;
  redact?: boolean;
}

export function createLogger(name: string, options?: LoggerOptions): Logger<unknown> {
  const shouldRedact = options?.redact !== false;

  return new Logger({
    name,
    minLevel: LOG_LEVEL_MAP[options?.level ?? "info"],
    type: "pretty",
    ...(shouldRedact && {
      maskValuesOfKeys: [...MASKED_KEYS, ...MASKED_METADATA_KEYS],
      maskValuesOfKeysCaseInsensitive: true,
      maskPlaceholder: "[REDACTED]",
    }),
  });
}

/** A logger honouring the `logging` section of the service config. */
export function createConfiguredLogger(
  name: string,
  logging: LoggingConfig,
): Logger<unknown> {
  return createLogger(name, { level: logging.level, redact: logging.redactSecrets });
}

/**
 * Flatten call metadata into a record the logger can mask by key. Binary
 * (`-bin`) values are summarised by size.
 */
export function metadataForLog(metadata: Metadata): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const [key, value] of Object.entries(metadata.getMap())) {
    if (typeof value === "string") {
      entries[key] = value;
    } else {
      entries[key] = `<${value.length} bytes>`;
    }
  }
  return entries;
}
