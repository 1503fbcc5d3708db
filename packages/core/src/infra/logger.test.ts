import { Metadata } from "@grpc/grpc-js";
import { describe, expect, it } from "vitest";
import {
  createConfiguredLogger,
  createLogger,
  LOG_LEVEL_MAP,
  MASKED_KEYS,
  MASKED_METADATA_KEYS,
  metadataForLog,
} from "./logger.js";

describe("createLogger", () => {
  it("creates a named logger", () => {
    const logger = createLogger("test");
    expect(typeof logger.info).toBe("function");
    expect(typeof logger.debug).toBe("function");
    expect(logger.settings.name).toBe("test");
  });

  it("defaults to info level", () => {
    const logger = createLogger("test");
    expect(logger.settings.minLevel).toBe(LOG_LEVEL_MAP.info);
  });

  it("creates a logger with custom level", () => {
    const logger = createLogger("test", { level: "debug" });
    expect(logger.settings.minLevel).toBe(2);
  });

  it("masks secret-like keys and credential metadata by default", () => {
    const logger = createLogger("test");
    expect(logger.settings.maskValuesOfKeys).toEqual([
      ...MASKED_KEYS,
      ...MASKED_METADATA_KEYS,
    ]);
    expect(logger.settings.maskValuesOfKeysCaseInsensitive).toBe(true);
    expect(logger.settings.maskPlaceholder).toBe("[REDACTED]");
  });

  it("creates a logger with redaction disabled", () => {
    const logger = createLogger("test", { redact: false });
    expect(logger.settings.maskValuesOfKeys).not.toContain("authorization");
  });
});

describe("createConfiguredLogger", () => {
  it("takes level and redaction from the logging config", () => {
    const logger = createConfiguredLogger("svc", { level: "warn", redactSecrets: false });
    expect(logger.settings.name).toBe("svc");
    expect(logger.settings.minLevel).toBe(LOG_LEVEL_MAP.warn);
    expect(logger.settings.maskValuesOfKeys).not.toContain("token");
  });
});

describe("metadataForLog", () => {
  it("flattens text entries and summarises binary ones", () => {
    const metadata = new Metadata();
    metadata.set("x-request-source", "unit-test");
    metadata.set("authorization", "Bearer test-secret");
    metadata.set("trace-bin", Buffer.from([1, 2, 3]));
    expect(metadataForLog(metadata)).toEqual({
      "x-request-source": "unit-test",
      authorization: "Bearer test-secret",
      "trace-bin": "<3 bytes>",
    });
  });

  it("returns an empty record for empty metadata", () => {
    expect(metadataForLog(new Metadata())).toEqual({});
  });
});
