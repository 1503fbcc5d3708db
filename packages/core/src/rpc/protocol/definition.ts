import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  loadSync,
  type MethodDefinition,
  type Options,
  type ServiceDefinition,
} from "@grpc/proto-loader";
import { SERVICE_NAME } from "./types.js";

/**
 * Runtime loading of the Connect4Service contract from its .proto file.
 * No code is generated; @grpc/proto-loader builds serializers on load.
 */

export const PROTO_FILE = "connect4/service/v1/service_v1.proto";

export const PROTO_LOADER_OPTIONS: Options = {
  keepCase: false,
  longs: String,
  enums: String,
  defaults: false,
  oneofs: true,
};

export interface Connect4ServiceDefinition {
  service: ServiceDefinition;
  connect: MethodDefinition<object, object>;
}

/**
 * Find the `protos/` directory by walking up from `startDir`. Works both
 * from the TypeScript sources and from the compiled output under dist/.
 */
export function resolveProtoRoot(
  startDir: string = dirname(fileURLToPath(import.meta.url)),
): string {
  let dir = startDir;
  for (;;) {
    const candidate = join(dir, "protos");
    if (existsSync(join(candidate, PROTO_FILE))) return candidate;
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`Could not locate protos/${PROTO_FILE} above ${startDir}`);
    }
    dir = parent;
  }
}

const cache = new Map<string, Connect4ServiceDefinition>();

export function loadConnect4Service(
  protoRoot: string = resolveProtoRoot(),
): Connect4ServiceDefinition {
  const cached = cache.get(protoRoot);
  if (cached) return cached;

  const packageDefinition = loadSync(PROTO_FILE, {
    ...PROTO_LOADER_OPTIONS,
    includeDirs: [protoRoot],
  });

  const service = packageDefinition[SERVICE_NAME];
  if (!service || "format" in service) {
    throw new Error(`${SERVICE_NAME} is not a service in ${PROTO_FILE}`);
  }

  const connect = service["Connect"];
  if (!connect) {
    throw new Error(`${SERVICE_NAME} does not declare Connect`);
  }

  const definition = { service, connect };
  cache.set(protoRoot, definition);
  return definition;
}
