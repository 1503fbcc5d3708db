import type { z } from "zod";
import type {
  ConnectionRequestBodySchema,
  ConnectionRequestSchema,
  ConnectionResponseBodySchema,
  ConnectionResponseSchema,
  RequestMetadataSchema,
  RequestSettingsSchema,
  ValidConnectionRequestSchema,
} from "./schema.js";

/**
 * connect4.service.v1 message types.
 * Wire-optional fields are optional properties: an absent field is
 * `undefined`, never an empty string.
 */

export type RequestMetadata = z.infer<typeof RequestMetadataSchema>;

/** Reserved for per-request configuration. Has no fields yet. */
export type RequestSettings = z.infer<typeof RequestSettingsSchema>;

/** Reserved for the request payload. Has no fields yet. */
export type ConnectionRequestBody = z.infer<typeof ConnectionRequestBodySchema>;

export type ConnectionRequest = z.infer<typeof ConnectionRequestSchema>;

/** Reserved for the response payload. Has no fields yet. */
export type ConnectionResponseBody = z.infer<typeof ConnectionResponseBodySchema>;

export type ConnectionResponse = z.infer<typeof ConnectionResponseSchema>;

/** A ConnectionRequest carrying non-empty client and account ids. */
export type ValidConnectionRequest = z.infer<typeof ValidConnectionRequestSchema>;

export const PROTO_PACKAGE = "connect4.service.v1";
export const SERVICE_NAME = `${PROTO_PACKAGE}.Connect4Service`;
export const CONNECT_METHOD_PATH = `/${SERVICE_NAME}/Connect`;
