import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import JSON5 from "json5";
import { ConfigError } from "../infra/errors.js";
import { defaultConfig } from "./defaults.js";
import { ServiceConfigSchema } from "./schema.js";
import type { ServiceConfig } from "./types.js";
import { validateConfig } from "./validation.js";

export const DEFAULT_CONFIG_PATH = "connect4.json";

/**
 * Validate a raw config object and fill in defaults.
 */
export function parseConfig(raw: unknown): ServiceConfig {
  const result = ServiceConfigSchema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`,
    );
    throw new ConfigError(
      `Config validation failed:\n${messages.map((m) => `  - ${m}`).join("\n")}`,
      result.error,
    );
  }

  validateConfig(result.data);
  return result.data;
}

/**
 * Load and validate config from a JSON or JSON5 file.
 */
export async function loadConfig(filePath: string): Promise<ServiceConfig> {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const raw = readFileSync(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file is not valid JSON or JSON5: ${filePath}`, err);
  }

  return parseConfig(parsed);
}

/**
 * Load the config file if it exists, otherwise fall back to defaults.
 */
export async function loadConfigOrDefaults(
  filePath: string,
): Promise<ServiceConfig> {
  if (!existsSync(filePath)) return defaultConfig();
  return loadConfig(filePath);
}

export async function saveConfig(
  filePath: string,
  config: ServiceConfig,
): Promise<void> {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(filePath, JSON.stringify(config, null, 2) + "\n");
}

/**
 * Write a config file populated with defaults on first run.
 */
export async function initializeConfig(
  filePath: string,
): Promise<ServiceConfig> {
  const config = defaultConfig();
  await saveConfig(filePath, config);
  return config;
}
