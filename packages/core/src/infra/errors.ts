import { status } from "@grpc/grpc-js";

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly grpcStatus: status = status.INTERNAL,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class ConfigError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", status.INTERNAL, cause);
    this.name = "ConfigError";
  }
}

/** Caller input is malformed or missing a logically required field. */
export class ValidationError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, "VALIDATION_ERROR", status.INVALID_ARGUMENT, cause);
    this.name = "ValidationError";
  }
}

export class InternalError extends AppError {
  constructor(message: string = "Internal error", cause?: unknown) {
    super(message, "INTERNAL_ERROR", status.INTERNAL, cause);
    this.name = "InternalError";
  }
}
