import { existsSync, readFileSync } from "node:fs";
import { credentials, ServerCredentials, type ChannelCredentials } from "@grpc/grpc-js";
import type { ClientTls, ServerTls } from "../config/types.js";

export interface TlsCertPaths {
  certPath: string;
  keyPath: string;
}

export interface TlsKeyPair {
  cert: Buffer;
  key: Buffer;
}

/**
 * Read the PEM certificate chain and private key for the server.
 */
export function readTlsKeyPair(paths: TlsCertPaths): TlsKeyPair {
  if (!existsSync(paths.certPath)) {
    throw new Error(`TLS cert file not found: ${paths.certPath}`);
  }
  if (!existsSync(paths.keyPath)) {
    throw new Error(`TLS key file not found: ${paths.keyPath}`);
  }

  return {
    cert: readFileSync(paths.certPath),
    key: readFileSync(paths.keyPath),
  };
}

export function buildServerCredentials(tls?: ServerTls): ServerCredentials {
  if (!tls?.enabled) return ServerCredentials.createInsecure();

  if (!tls.certPath || !tls.keyPath) {
    throw new Error("TLS is enabled but certPath or keyPath is missing");
  }

  const { cert, key } = readTlsKeyPair({
    certPath: tls.certPath,
    keyPath: tls.keyPath,
  });
  return ServerCredentials.createSsl(null, [
    { cert_chain: cert, private_key: key },
  ]);
}

export function buildChannelCredentials(tls?: ClientTls): ChannelCredentials {
  if (!tls?.enabled) return credentials.createInsecure();

  if (tls.caPath && !existsSync(tls.caPath)) {
    throw new Error(`TLS CA file not found: ${tls.caPath}`);
  }
  const rootCerts = tls.caPath ? readFileSync(tls.caPath) : null;
  return credentials.createSsl(rootCerts);
}
