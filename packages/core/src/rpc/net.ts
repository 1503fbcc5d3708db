import { isIP } from "node:net";

export type BindMode = "loopback" | "lan" | "custom";

export function isLoopbackAddress(ip: string | undefined): boolean {
  if (!ip) return false;
  if (ip === "127.0.0.1" || ip === "::1" || ip === "localhost") return true;
  if (ip.startsWith("127.")) return true;
  if (ip.startsWith("::ffff:127.")) return true;
  return false;
}

/**
 * Resolve the host the gRPC server binds to.
 */
export function resolveBindHost(bind: BindMode, customHost?: string): string {
  switch (bind) {
    case "loopback":
      return "127.0.0.1";
    case "lan":
      return "0.0.0.0";
    case "custom":
      return customHost?.trim() || "0.0.0.0";
  }
}

/**
 * Format a host and port as a gRPC listen address. IPv6 literals are
 * bracketed: `[::1]:50051`.
 */
export function formatListenAddress(host: string, port: number): string {
  return isIP(host) === 6 ? `[${host}]:${port}` : `${host}:${port}`;
}
