/**
 * Auth Schemas
 * ============
 * Validation for authentication endpoints.
 */

import { z } from "zod";

import { ValidationError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";

const emailSchema = z.string().trim().toLowerCase().email();
const passwordSchema = z.string().min(1).max(200);

export const loginInputSchema = z.object({
  email: emailSchema,
  password: passwordSchema,
});

export type LoginInput = z.infer<typeof loginInputSchema>;

export function validateLoginInput(data: unknown): LoginInput {
  const parsed = loginInputSchema.safeParse(data ?? {});
  if (!parsed.success) {
    logger.warn("Invalid login input", { issues: parsed.error.issues.length });
    const first = parsed.error.issues[0];
    const field = first?.path.join(".") || "body";
    throw new ValidationError(`Invalid ${field}`, parsed.error.issues);
  }
  return parsed.data;
}

export const refreshInputSchema = z.object({
  // Optional: cookie clients send it as the refresh cookie instead
  refresh_token: z.string().trim().min(1).optional(),
});

export type RefreshInput = z.infer<typeof refreshInputSchema>;

/**
 * Lenient: a malformed body is treated as "no token in the body" so the
 * route can still fall back to the cookie.
 */
export function readRefreshInput(data: unknown): RefreshInput {
  const parsed = refreshInputSchema.safeParse(data ?? {});
  return parsed.success ? parsed.data : {};
}
