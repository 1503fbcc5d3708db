import { z } from "zod";

export const DEFAULT_PORT = 50051;

export const ServerTlsSchema = z.object({
  enabled: z.boolean().default(false),
  certPath: z.string().optional(),
  keyPath: z.string().optional(),
});

export const ServerSchema = z.object({
  port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
  bind: z.enum(["loopback", "lan", "custom"]).default("loopback"),
  host: z.string().optional(),
  tls: ServerTlsSchema.optional(),
  maxConcurrentStreams: z.number().int().min(1).optional(),
  maxReceiveMessageBytes: z.number().int().min(1).optional(),
  shutdownGraceMs: z.number().int().min(0).default(5_000),
});

export const ClientTlsSchema = z.object({
  enabled: z.boolean().default(false),
  caPath: z.string().optional(),
});

export const ClientSchema = z.object({
  target: z.string().min(1).default(`127.0.0.1:${DEFAULT_PORT}`),
  deadlineMs: z.number().int().min(1).default(5_000),
  tls: ClientTlsSchema.optional(),
});

export const LoggingSchema = z.object({
  level: z
    .enum(["silly", "trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  redactSecrets: z.boolean().default(true),
});

export const ServiceConfigSchema = z.object({
  server: ServerSchema.default({}),
  client: ClientSchema.default({}),
  logging: LoggingSchema.default({}),
});
