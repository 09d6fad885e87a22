import { describe, expect, it, vi } from "vitest";

import { createOpenAiRagService, type ResponsesClient } from "../src/modules/chat/index.js";
import { ExternalApiError } from "../src/shared/errors.js";

const user = { userId: "user_1", email: "a@x.com", roles: ["user"] };

function fakeClient(create: ResponsesClient["responses"]["create"]): ResponsesClient {
  return { responses: { create } };
}

describe("OpenAI answer service", () => {
  it("asks with file_search over the configured vector store", async () => {
    const create = vi.fn<ResponsesClient["responses"]["create"]>(() =>
      Promise.resolve({ output_text: "Refunds take 5 days.", model: "gpt-4o-mini-2024-07-18" })
    );
    const service = createOpenAiRagService({
      client: fakeClient(create),
      model: "gpt-4o-mini",
      vectorStoreId: "vs_test",
    });

    const answer = await service.answer({ question: "How long do refunds take?", user });

    expect(answer).toEqual({ answer: "Refunds take 5 days.", model: "gpt-4o-mini-2024-07-18" });
    expect(create).toHaveBeenCalledWith({
      model: "gpt-4o-mini",
      input: "How long do refunds take?",
      tools: [{ type: "file_search", vector_store_ids: ["vs_test"] }],
      user: "user_1",
    });
  });

  it("wraps provider failures as ExternalApiError", async () => {
    const service = createOpenAiRagService({
      client: fakeClient(() => Promise.reject(new Error("429 rate limited"))),
      model: "gpt-4o-mini",
      vectorStoreId: "vs_test",
    });

    const pending = service.answer({ question: "hello", user });
    await expect(pending).rejects.toBeInstanceOf(ExternalApiError);
    await expect(pending).rejects.toMatchObject({
      statusCode: 502,
      message: "OpenAI API error: 429 rate limited",
    });
  });
});
