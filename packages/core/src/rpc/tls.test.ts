import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { randomBytes } from "node:crypto";
import { ChannelCredentials, ServerCredentials } from "@grpc/grpc-js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  buildChannelCredentials,
  buildServerCredentials,
  readTlsKeyPair,
} from "./tls.js";

describe("readTlsKeyPair", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `connect4-tls-${randomBytes(8).toString("hex")}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("reads cert and key contents", () => {
    const certPath = join(tempDir, "cert.pem");
    const keyPath = join(tempDir, "key.pem");
    writeFileSync(certPath, "test-cert");
    writeFileSync(keyPath, "test-key");

    const pair = readTlsKeyPair({ certPath, keyPath });
    expect(pair.cert.toString("utf-8")).toBe("test-cert");
    expect(pair.key.toString("utf-8")).toBe("test-key");
  });

  it("throws when the cert is missing", () => {
    const certPath = join(tempDir, "missing-cert.pem");
    expect(() =>
      readTlsKeyPair({ certPath, keyPath: join(tempDir, "key.pem") }),
    ).toThrow(`TLS cert file not found: ${certPath}`);
  });

  it("throws when the key is missing", () => {
    const certPath = join(tempDir, "cert.pem");
    const keyPath = join(tempDir, "missing-key.pem");
    writeFileSync(certPath, "test-cert");
    expect(() => readTlsKeyPair({ certPath, keyPath })).toThrow(
      `TLS key file not found: ${keyPath}`,
    );
  });
});

describe("buildServerCredentials", () => {
  it("returns insecure credentials without TLS", () => {
    expect(buildServerCredentials()).toBeInstanceOf(ServerCredentials);
    expect(buildServerCredentials({ enabled: false })).toBeInstanceOf(
      ServerCredentials,
    );
  });

  it("requires both paths when enabled", () => {
    expect(() => buildServerCredentials({ enabled: true })).toThrow(
      "TLS is enabled but certPath or keyPath is missing",
    );
  });
});

describe("buildChannelCredentials", () => {
  it("returns insecure credentials without TLS", () => {
    expect(buildChannelCredentials()).toBeInstanceOf(ChannelCredentials);
  });

  it("uses the system roots when no CA is given", () => {
    expect(buildChannelCredentials({ enabled: true })).toBeInstanceOf(
      ChannelCredentials,
    );
  });

  it("throws for a missing CA file", () => {
    expect(() =>
      buildChannelCredentials({ enabled: true, caPath: "/nonexistent/ca.pem" }),
    ).toThrow("TLS CA file not found: /nonexistent/ca.pem");
  });
});
