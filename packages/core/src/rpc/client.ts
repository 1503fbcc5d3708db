import { Client, Metadata, type ServiceError } from "@grpc/grpc-js";
import type { ClientTls } from "../config/types.js";
import { ValidationError } from "../infra/errors.js";
import { parseConnectionResponse } from "./protocol/codec.js";
import { loadConnect4Service } from "./protocol/definition.js";
import type { ConnectionRequest, ConnectionResponse } from "./protocol/types.js";
import { buildChannelCredentials } from "./tls.js";

const DEFAULT_DEADLINE_MS = 5_000;

export interface Connect4ClientOptions {
  /** `host:port` of the server. */
  target: string;
  deadlineMs?: number;
  tls?: ClientTls;
  protoRoot?: string;
}

export interface ConnectCallOptions {
  deadlineMs?: number;
  metadata?: Metadata;
}

export interface Connect4Client {
  /**
   * Call Connect4Service.Connect. No client-side validation is done; a
   * failed call rejects with the grpc-js ServiceError.
   */
  connect(
    request: ConnectionRequest,
    options?: ConnectCallOptions,
  ): Promise<ConnectionResponse>;
  close(): void;
}

export function isServiceError(err: unknown): err is ServiceError {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "number" &&
    "details" in err &&
    typeof err.details === "string"
  );
}

/** Deadlines must be a positive, finite number of milliseconds. */
export function checkDeadlineMs(deadlineMs: number): number {
  if (!Number.isFinite(deadlineMs) || deadlineMs <= 0) {
    throw new ValidationError(`Invalid deadlineMs: ${deadlineMs}`);
  }
  return deadlineMs;
}

export function createConnect4Client(options: Connect4ClientOptions): Connect4Client {
  const defaultDeadlineMs = checkDeadlineMs(options.deadlineMs ?? DEFAULT_DEADLINE_MS);
  const { connect: method } = loadConnect4Service(options.protoRoot);
  const client = new Client(options.target, buildChannelCredentials(options.tls));

  function connect(
    request: ConnectionRequest,
    callOptions?: ConnectCallOptions,
  ): Promise<ConnectionResponse> {
    return new Promise<ConnectionResponse>((resolve, reject) => {
      const deadline =
        Date.now() + checkDeadlineMs(callOptions?.deadlineMs ?? defaultDeadlineMs);
      client.makeUnaryRequest(
        method.path,
        method.requestSerialize,
        method.responseDeserialize,
        request,
        callOptions?.metadata ?? new Metadata(),
        { deadline },
        (err, value) => {
          if (err) {
            reject(err);
            return;
          }
          try {
            resolve(parseConnectionResponse(value));
          } catch (parseErr) {
            reject(parseErr);
          }
        },
      );
    });
  }

  function close(): void {
    client.close();
  }

  return { connect, close };
}
