/**
 * Zod request body parsing.
 *
 * Handlers call `parseBody(c, Schema)` and receive the typed DTO.
 * Schema failures surface as ZodError, malformed JSON as ApiError;
 * the error handler renders both as 400 VALIDATION_ERROR.
 */

import type { Context } from "hono";
import type { ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

export async function parseBody<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ApiError("VALIDATION_ERROR", 400, "Invalid JSON in request body");
  }
  return schema.parse(body);
}
