/**
 * Chat Service
 * ============
 * Boundary to the retrieval-augmented answer service.
 *
 * The question goes to the OpenAI Responses API with the `file_search` tool
 * bound to a managed vector store; embeddings, retrieval and prompting all
 * happen on the provider side.
 */

import { AppError, ExternalApiError } from "../../shared/errors.js";
import { logger } from "../../shared/logger.js";
import type { UserIdentity } from "../auth/auth.types.js";

export type RagAnswer = {
  answer: string;
  model: string;
};

export interface RagService {
  answer(params: { question: string; user: UserIdentity }): Promise<RagAnswer>;
}

type FileSearchRequest = {
  model: string;
  input: string;
  tools: Array<{ type: "file_search"; vector_store_ids: string[] }>;
  user?: string;
};

/**
 * The slice of the OpenAI client this service calls. An `OpenAI` instance
 * satisfies it.
 */
export type ResponsesClient = {
  responses: {
    create(body: FileSearchRequest): PromiseLike<{ output_text: string; model: string }>;
  };
};

export function createOpenAiRagService(params: {
  client: ResponsesClient;
  model: string;
  vectorStoreId: string;
}): RagService {
  const { client, model, vectorStoreId } = params;

  return {
    async answer({ question, user }) {
      const startedAt = Date.now();
      try {
        const response = await client.responses.create({
          model,
          input: question,
          tools: [{ type: "file_search", vector_store_ids: [vectorStoreId] }],
          user: user.userId,
        });

        logger.info("RAG answer generated", {
          userId: user.userId,
          model: response.model,
          ms: Date.now() - startedAt,
        });
        return { answer: response.output_text, model: response.model };
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error("RAG request failed", { userId: user.userId, error: message });
        throw new ExternalApiError("OpenAI", message, err);
      }
    },
  };
}

/**
 * Stand-in used when the OpenAI settings are missing: every call answers 503.
 */
export function createUnavailableRagService(reason: string): RagService {
  return {
    answer() {
      logger.warn("Chat requested while RAG service is unavailable", { reason });
      return Promise.reject(new AppError("Chat is currently unavailable", 503, "SERVICE_UNAVAILABLE"));
    },
  };
}
