import type { ServiceConfig } from "./types.js";

export class ConfigValidationError extends Error {
  constructor(
    public readonly errors: string[],
  ) {
    super(`Config validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
    this.name = "ConfigValidationError";
  }
}

/**
 * Cross-field validation that goes beyond what the Zod schema handles.
 */
export function validateConfig(config: ServiceConfig): void {
  const errors: string[] = [];
  const server = config.server;

  if (server.bind === "custom" && !server.host?.trim()) {
    errors.push('server.host is required when server.bind is "custom".');
  }

  if (server.tls?.enabled) {
    if (!server.tls.certPath) {
      errors.push("server.tls.certPath is required when TLS is enabled.");
    }
    if (!server.tls.keyPath) {
      errors.push("server.tls.keyPath is required when TLS is enabled.");
    }
  }

  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
}
