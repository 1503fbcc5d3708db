import type { z } from "zod";
import type {
  ClientSchema,
  ClientTlsSchema,
  LoggingSchema,
  ServerSchema,
  ServerTlsSchema,
  ServiceConfigSchema,
} from "./schema.js";

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type ServerConfig = z.infer<typeof ServerSchema>;
export type ServerTls = z.infer<typeof ServerTlsSchema>;
export type ClientTls = z.infer<typeof ClientTlsSchema>;
export type ClientConfig = z.infer<typeof ClientSchema>;
export type LoggingConfig = z.infer<typeof LoggingSchema>;
