/**
 * Chat Routes
 * ===========
 * Question answering over the indexed document corpus.
 */

import { type Request, type Response, Router } from "express";

import { asyncHandler } from "../../middleware/async-handler.js";
import { requireAuth } from "../../middleware/authz.js";
import { requireRequestAuth } from "../../shared/auth-context.js";
import { ok } from "../../shared/http.js";
import type { AuthService } from "../auth/auth.service.js";
import { validateChatInput } from "./chat.schemas.js";
import type { RagService } from "./chat.service.js";

export function createChatRouter(deps: {
  auth: Pick<AuthService, "verify">;
  rag: RagService;
}): Router {
  const router = Router();

  /**
   * @swagger
   * /chat:
   *   post:
   *     tags: [Chat]
   *     summary: Ask a question answered from the document corpus
   *     security: [{ bearerAuth: [] }]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [question]
   *             properties:
   *               question: { type: string }
   *     responses:
   *       200:
   *         description: Answer
   *       401:
   *         description: Missing or invalid access token
   *       502:
   *         description: Upstream LLM failure
   */
  router.post(
    "/",
    requireAuth(deps.auth),
    asyncHandler(async (req: Request, res: Response) => {
      const user = requireRequestAuth(req);
      const input = validateChatInput(req.body);

      const result = await deps.rag.answer({ question: input.question, user });
      return ok(res, { answer: result.answer, model: result.model });
    })
  );

  return router;
}
