/**
 * Wire shapes exchanged with the Blender add-on.
 *
 * Request:  {"type": "<command>", "params": {...}}
 * Response: {"status": "success", "result": {...}}
 *         | {"status": "error", "message": "..."}
 *
 * Documents are bare UTF-8 JSON with no length prefix or delimiter; the
 * frame reader finds the end of a response by decoding it.
 */

import { z } from "zod";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

export const JsonObjectSchema = z.record(JsonValueSchema);

export interface BridgeCommand {
  type: string;
  params: JsonObject;
}

export const BridgeCommandSchema = z.object({
  type: z.string().min(1, "Command type must not be empty."),
  params: JsonObjectSchema,
});

export interface BridgeSuccessResponse {
  status: "success";
  result: JsonObject;
}

export interface BridgeErrorResponse {
  status: "error";
  message: string;
}

export type BridgeResponse = BridgeSuccessResponse | BridgeErrorResponse;

// The add-on omits `result` for commands with nothing to report and has been
// seen to omit `message` on some failures.
export const BridgeResponseSchema: z.ZodType<BridgeResponse, z.ZodTypeDef, unknown> = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("success"),
    result: JsonObjectSchema.default({}),
  }),
  z.object({
    status: z.literal("error"),
    message: z.string().default("Unknown error"),
  }),
]);

export function isErrorResponse(response: BridgeResponse): response is BridgeErrorResponse {
  return response.status === "error";
}
