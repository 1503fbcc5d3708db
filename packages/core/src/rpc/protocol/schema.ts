import { z } from "zod";

/**
 * Zod schemas for the connect4.service.v1 messages, in the camelCase shape
 * that @grpc/proto-loader produces. Unknown keys are stripped, which drops
 * the loader's synthetic `_field` oneof markers and any fields added by a
 * newer contract revision.
 */

export const RequestMetadataSchema = z.object({
  clientId: z.string().optional(),
  accountId: z.string().optional(),
});

export const RequestSettingsSchema = z.object({});

export const ConnectionRequestBodySchema = z.object({});

export const ConnectionRequestSchema = z.object({
  metadata: RequestMetadataSchema.optional(),
  settings: RequestSettingsSchema.optional(),
  request: ConnectionRequestBodySchema.optional(),
});

export const ConnectionResponseBodySchema = z.object({});

export const ConnectionResponseSchema = z.object({
  response: ConnectionResponseBodySchema,
});

/**
 * A logically required id. Whitespace-only values count as empty; the value
 * itself is returned untrimmed.
 */
function requiredIdentifier(wireName: string) {
  return z
    .string({ required_error: `metadata.${wireName} is required` })
    .refine((value) => value.trim().length > 0, {
      message: `metadata.${wireName} must not be empty`,
    });
}

/**
 * A request whose logically required fields are present. The wire marks
 * them optional; this is where they become mandatory.
 */
export const ValidConnectionRequestSchema = ConnectionRequestSchema.extend({
  metadata: z.object(
    {
      clientId: requiredIdentifier("client_id"),
      accountId: requiredIdentifier("account_id"),
    },
    { required_error: "metadata is required" },
  ),
});
