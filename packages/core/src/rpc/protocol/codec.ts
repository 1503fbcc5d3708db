import { ValidationError } from "../../infra/errors.js";
import { loadConnect4Service, type Connect4ServiceDefinition } from "./definition.js";
import {
  ConnectionRequestSchema,
  ConnectionResponseSchema,
  ValidConnectionRequestSchema,
} from "./schema.js";
import type {
  ConnectionRequest,
  ConnectionResponse,
  ValidConnectionRequest,
} from "./types.js";

/**
 * Shape a decoded wire object into a ConnectionRequest.
 * Throws ValidationError when the object does not fit the message.
 */
export function parseConnectionRequest(decoded: unknown): ConnectionRequest {
  const result = ConnectionRequestSchema.safeParse(decoded);
  if (!result.success) {
    throw new ValidationError(
      `Malformed ConnectionRequest: ${result.error.issues.map((i) => i.message).join(", ")}`,
      result.error,
    );
  }
  return result.data;
}

export function parseConnectionResponse(decoded: unknown): ConnectionResponse {
  const result = ConnectionResponseSchema.safeParse(decoded);
  if (!result.success) {
    throw new ValidationError(
      `Malformed ConnectionResponse: ${result.error.issues.map((i) => i.message).join(", ")}`,
      result.error,
    );
  }
  return result.data;
}

/**
 * Enforce the fields the contract documents as required: `metadata`, with
 * non-blank `client_id` and `account_id`.
 */
export function validateConnectionRequest(
  request: ConnectionRequest,
): ValidConnectionRequest {
  const result = ValidConnectionRequestSchema.safeParse(request);
  if (!result.success) {
    throw new ValidationError(
      `Invalid ConnectionRequest: ${result.error.issues.map((i) => i.message).join(", ")}`,
      result.error,
    );
  }
  return result.data;
}

export function encodeConnectionRequest(request: ConnectionRequest): Buffer {
  return loadConnect4Service().connect.requestSerialize(request);
}

/**
 * Decode and shape request bytes. Bytes that are not a valid protobuf
 * message throw ValidationError, like any other malformed caller input.
 */
export function decodeConnectionRequest(
  bytes: Buffer,
  definition: Connect4ServiceDefinition = loadConnect4Service(),
): ConnectionRequest {
  let decoded: object;
  try {
    decoded = definition.connect.requestDeserialize(bytes);
  } catch (err) {
    throw new ValidationError(
      `Malformed ConnectionRequest: ${err instanceof Error ? err.message : String(err)}`,
      err,
    );
  }
  return parseConnectionRequest(decoded);
}

export function encodeConnectionResponse(response: ConnectionResponse): Buffer {
  return loadConnect4Service().connect.responseSerialize(response);
}

export function decodeConnectionResponse(bytes: Buffer): ConnectionResponse {
  return parseConnectionResponse(
    loadConnect4Service().connect.responseDeserialize(bytes),
  );
}
