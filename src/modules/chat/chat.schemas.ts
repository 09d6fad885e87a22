/**
 * Chat Schemas
 * ============
 */

import { z } from "zod";

import { ValidationError } from "../../shared/errors.js";

export const chatInputSchema = z.object({
  question: z.string().trim().min(1, "question is required").max(4000, "question is too long"),
});

export type ChatInput = z.infer<typeof chatInputSchema>;

export function validateChatInput(data: unknown): ChatInput {
  const parsed = chatInputSchema.safeParse(data ?? {});
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const message = first?.code === "invalid_type" ? "question is required" : first?.message;
    throw new ValidationError(message || "Invalid chat input", parsed.error.issues);
  }
  return parsed.data;
}
