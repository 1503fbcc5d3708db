import { ServiceConfigSchema } from "./schema.js";
import type { ServiceConfig } from "./types.js";

/**
 * Fully-defaulted config, as produced by parsing an empty object.
 */
export function defaultConfig(): ServiceConfig {
  return ServiceConfigSchema.parse({});
}
