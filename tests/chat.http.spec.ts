import request from "supertest";
import { describe, expect, it } from "vitest";

import { createUnavailableRagService } from "../src/modules/chat/index.js";
import { ExternalApiError } from "../src/shared/errors.js";
import { makeApp } from "./test-app.js";
import { loginTestUser } from "./test-auth.js";

async function setup(params: Parameters<typeof makeApp>[0] = {}) {
  const t = await makeApp(params);
  const pair = await loginTestUser(t);
  return { ...t, bearer: `Bearer ${pair.accessToken}` };
}

describe("POST /chat", () => {
  it("answers a question for an authenticated user", async () => {
    const t = await setup();

    const res = await request(t.app)
      .post("/chat")
      .set("Authorization", t.bearer)
      .send({ question: "  What is the refund policy? " });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: true,
      answer: "echo: What is the refund policy?",
      model: "fake-model",
    });
    expect(t.rag.calls).toEqual([
      {
        question: "What is the refund policy?",
        user: { kind: "user", userId: "user_1", email: "a@x.com", roles: ["user"] },
      },
    ]);
  });

  it("rejects unauthenticated requests before calling the model", async () => {
    const t = await setup();

    const res = await request(t.app).post("/chat").send({ question: "hello" });

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ success: false, error: "Unauthorized", code: "AUTHENTICATION_ERROR" });
    expect(t.rag.calls).toEqual([]);
  });

  it("rejects a tampered access token", async () => {
    const t = await setup();

    const res = await request(t.app)
      .post("/chat")
      .set("Authorization", `${t.bearer}x`)
      .send({ question: "hello" });

    expect(res.status).toBe(401);
    expect(t.rag.calls).toEqual([]);
  });

  it.each([{}, { question: "   " }, { question: 42 }])("answers 400 for %j", async (body) => {
    const t = await setup();

    const res = await request(t.app).post("/chat").set("Authorization", t.bearer).send(body);

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, error: "question is required", code: "VALIDATION_ERROR" });
  });

  it("answers 400 for an overlong question", async () => {
    const t = await setup();

    const res = await request(t.app)
      .post("/chat")
      .set("Authorization", t.bearer)
      .send({ question: "a".repeat(4001) });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe("question is too long");
  });

  it("maps an upstream failure to 502", async () => {
    const t = await setup();
    t.rag.failWith = new ExternalApiError("OpenAI", "upstream down");

    const res = await request(t.app).post("/chat").set("Authorization", t.bearer).send({ question: "hello" });

    expect(res.status).toBe(502);
    expect(res.body).toEqual({
      success: false,
      error: "OpenAI API error: upstream down",
      code: "EXTERNAL_API_ERROR",
    });
  });

  it("hides unexpected errors behind a generic 500", async () => {
    const t = await setup();
    t.rag.failWith = new Error("secret internals");

    const res = await request(t.app).post("/chat").set("Authorization", t.bearer).send({ question: "hello" });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ success: false, error: "Internal server error" });
  });

  it("answers 503 when the answer service is not configured", async () => {
    const t = await setup({ ragService: createUnavailableRagService("missing OPENAI_VECTOR_STORE_ID") });

    const res = await request(t.app).post("/chat").set("Authorization", t.bearer).send({ question: "hello" });

    expect(res.status).toBe(503);
    expect(res.body).toEqual({
      success: false,
      error: "Chat is currently unavailable",
      code: "SERVICE_UNAVAILABLE",
    });
  });
});
