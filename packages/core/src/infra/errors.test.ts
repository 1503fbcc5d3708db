import { status } from "@grpc/grpc-js";
import { describe, expect, it } from "vitest";
import {
  AppError,
  ConfigError,
  InternalError,
  ValidationError,
} from "./errors.js";

describe("Error types", () => {
  it("AppError has correct properties", () => {
    const err = new AppError("test error", "TEST_CODE", status.UNAVAILABLE);
    expect(err.message).toBe("test error");
    expect(err.code).toBe("TEST_CODE");
    expect(err.grpcStatus).toBe(status.UNAVAILABLE);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });

  it("AppError defaults to INTERNAL", () => {
    const err = new AppError("boom", "BOOM");
    expect(err.grpcStatus).toBe(status.INTERNAL);
  });

  it("AppError supports cause", () => {
    const cause = new Error("root cause");
    const err = new AppError("wrapper", "WRAP", status.INTERNAL, cause);
    expect(err.cause).toBe(cause);
  });

  it("ConfigError maps to INTERNAL", () => {
    const err = new ConfigError("bad config");
    expect(err.code).toBe("CONFIG_ERROR");
    expect(err.grpcStatus).toBe(status.INTERNAL);
    expect(err.name).toBe("ConfigError");
    expect(err).toBeInstanceOf(AppError);
  });

  it("ValidationError maps to INVALID_ARGUMENT", () => {
    const err = new ValidationError("metadata is required");
    expect(err.code).toBe("VALIDATION_ERROR");
    expect(err.grpcStatus).toBe(status.INVALID_ARGUMENT);
    expect(err.name).toBe("ValidationError");
    expect(err).toBeInstanceOf(AppError);
  });

  it("InternalError has a default message", () => {
    const err = new InternalError();
    expect(err.message).toBe("Internal error");
    expect(err.code).toBe("INTERNAL_ERROR");
    expect(err.grpcStatus).toBe(status.INTERNAL);
  });
});
