import {
  status,
  type handleUnaryCall,
  type Metadata,
  type sendUnaryData,
  type ServerUnaryCall,
  type UntypedServiceImplementation,
} from "@grpc/grpc-js";
import type { ServiceDefinition } from "@grpc/proto-loader";
import type { Logger } from "tslog";
import { AppError } from "../infra/errors.js";
import { metadataForLog } from "../infra/logger.js";
import { decodeConnectionRequest } from "./protocol/codec.js";
import type { Connect4ServiceDefinition } from "./protocol/definition.js";
import type { ConnectionRequest, ConnectionResponse } from "./protocol/types.js";

/**
 * Adapts typed handlers to the grpc-js service implementation: decodes the
 * request bytes, runs the handler and maps thrown errors to a status.
 */

export interface CallContext {
  callId: string;
  peer: string;
  metadata: Metadata;
  /** Aborted when the client cancels or the deadline passes. */
  signal: AbortSignal;
}

export type UnaryHandler<Req, Res> = (
  request: Req,
  context: CallContext,
) => Promise<Res> | Res;

export interface Connect4ServiceHandlers {
  connect: UnaryHandler<ConnectionRequest, ConnectionResponse>;
}

export type StatusResponse = NonNullable<Parameters<sendUnaryData<object>>[0]>;

/**
 * AppErrors carry their own status. Anything else is an internal fault and
 * its message stays on the server.
 */
export function toStatusResponse(err: unknown): StatusResponse {
  if (err instanceof AppError) {
    return { code: err.grpcStatus, details: err.message };
  }
  return { code: status.INTERNAL, details: "Internal error" };
}

/**
 * Request bytes pass through undecoded; `bindUnary` decodes them so that a
 * decode failure maps to INVALID_ARGUMENT.
 */
export function withRawRequests(service: ServiceDefinition): ServiceDefinition {
  const raw: ServiceDefinition = {};
  for (const [name, method] of Object.entries(service)) {
    raw[name] = { ...method, requestDeserialize: (bytes: Buffer): Buffer => bytes };
  }
  return raw;
}

let nextCallId = 0;

export function createConnect4ServiceImplementation(options: {
  definition: Connect4ServiceDefinition;
  handlers: Connect4ServiceHandlers;
  logger: Logger<unknown>;
}): UntypedServiceImplementation {
  const { definition, handlers, logger } = options;
  return {
    Connect: bindUnary(
      "Connect",
      (bytes) => decodeConnectionRequest(bytes, definition),
      handlers.connect,
      logger,
    ),
  };
}

function bindUnary<Req, Res extends object>(
  method: string,
  decode: (bytes: Buffer) => Req,
  handler: UnaryHandler<Req, Res>,
  logger: Logger<unknown>,
): handleUnaryCall<Buffer, object> {
  return async (
    call: ServerUnaryCall<Buffer, object>,
    callback: sendUnaryData<object>,
  ) => {
    const callId = `call-${++nextCallId}`;
    const startedAt = Date.now();
    const controller = new AbortController();
    call.on("cancelled", () => controller.abort());

    const context: CallContext = {
      callId,
      peer: call.getPeer(),
      metadata: call.metadata,
      signal: controller.signal,
    };
    logger.debug(`${method} ${callId} from ${context.peer}`, metadataForLog(call.metadata));

    let outcome: { ok: true; response: Res } | { ok: false; error: unknown };
    try {
      outcome = { ok: true, response: await handler(decode(call.request), context) };
    } catch (err) {
      outcome = { ok: false, error: err };
    }

    if (call.cancelled) {
      logger.debug(`${method} ${callId} cancelled by ${context.peer}`);
      return;
    }

    const elapsedMs = Date.now() - startedAt;
    if (outcome.ok) {
      callback(null, outcome.response);
      logger.debug(`${method} ${callId} OK in ${elapsedMs}ms`);
      return;
    }

    const response = toStatusResponse(outcome.error);
    if (outcome.error instanceof AppError) {
      logger.warn(
        `${method} ${callId} rejected (${status[response.code ?? status.UNKNOWN]}): ${response.details}`,
      );
    } else {
      logger.error(`${method} ${callId} failed:`, outcome.error);
    }
    callback(response);
  };
}
