import type { Logger } from "tslog";
import { validateConnectionRequest } from "../protocol/codec.js";
import type { ConnectionResponse } from "../protocol/types.js";
import type { Connect4ServiceHandlers } from "../server-grpc.js";

/**
 * Connect4Service.Connect. Stateless: validates the caller's identity
 * fields and acknowledges with an empty body.
 */

export function buildConnectionResponse(): ConnectionResponse {
  return { response: {} };
}

export function createConnectHandler(options?: {
  logger?: Logger<unknown>;
}): Connect4ServiceHandlers["connect"] {
  const logger = options?.logger;
  return (request, context) => {
    const { metadata } = validateConnectionRequest(request);
    logger?.debug(
      `Connect ${context.callId} client=${metadata.clientId} account=${metadata.accountId} peer=${context.peer}`,
    );
    return buildConnectionResponse();
  };
}
