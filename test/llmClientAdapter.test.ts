import { describe, it, expect, vi } from "vitest";
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/index";
import { z } from "zod";
import { LLMClientAdapter, classifyProviderError, withJsonInstruction } from "../lib/llm/LLMClientAdapter";
import type { ChatCompletionsClient, ProviderConfig } from "../lib/llm/providers";
import { RetryPolicy } from "../lib/llm/RetryPolicy";
import type { LlmProvider, StructuredSchema } from "../lib/llm/types";

/**
 * LLMClientAdapter 單元測試：以假的 chat completions client 取代 SDK，
 * 驗證 JSON 清理、schema 驗證、重試與錯誤分類。
 */

const testSchema: StructuredSchema<{ word: string; count: number }> = {
  name: "TestSchema",
  shape: '{"word": string, "count": number}',
  schema: z.object({ word: z.string(), count: z.number() }),
};

function completion(content: string | null, finishReason: ChatCompletion["choices"][number]["finish_reason"] = "stop"): ChatCompletion {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 0,
    model: "test-model",
    choices: [
      {
        index: 0,
        message: { role: "assistant", content, refusal: null },
        finish_reason: finishReason,
        logprobs: null,
      },
    ],
    usage: { prompt_tokens: 12, completion_tokens: 8, total_tokens: 20 },
  };
}

function httpError(status: number, code?: string): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status, code });
}

function setup(responses: Array<ChatCompletion | Error>, apiKey: string | null = "test-secret") {
  const create = vi.fn(async (_params: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion> => {
    const next = responses.shift();
    if (!next) throw new Error("no more responses");
    if (next instanceof Error) throw next;
    return next;
  });
  const client: ChatCompletionsClient = { chat: { completions: { create } } };
  const clientFactory = vi.fn(() => client);
  const adapter = new LLMClientAdapter({
    defaultProvider: "openai",
    retryPolicy: new RetryPolicy({ maxRetries: 2, baseDelayMs: 0, factor: 2 }),
    clientFactory,
    resolveConfig: (provider: LlmProvider): ProviderConfig => ({
      provider,
      apiKey: apiKey ?? undefined,
      baseURL: undefined,
      defaultModel: "test-model",
    }),
  });
  return { adapter, create, clientFactory };
}

describe("LLMClientAdapter", () => {
  it("returns validated data from a fenced JSON reply", async () => {
    const { adapter } = setup([completion('```json\n{"word": "makan", "count": 2}\n```')]);

    const result = await adapter.generate({ prompt: "Describe makan", schema: testSchema });

    expect(result).toEqual({
      data: { word: "makan", count: 2 },
      usage: { promptTokens: 12, completionTokens: 8, totalTokens: 20 },
      provider: "openai",
      model: "test-model",
    });
  });

  it("appends the strict JSON instruction and uses the request settings", async () => {
    const { adapter, create } = setup([completion('Here: {"word": "makan", "count": 1}')]);

    await adapter.generate({ prompt: "Describe makan", schema: testSchema, model: "other-model", temperature: 0.3 });

    const params = create.mock.calls[0]?.[0];
    expect(params?.model).toBe("other-model");
    expect(params?.temperature).toBe(0.3);
    expect(params?.messages[0]).toEqual({
      role: "system",
      content: "You are a careful lexicographer and language teacher.",
    });
    expect(params?.messages[1]).toEqual({
      role: "user",
      content: withJsonInstruction("Describe makan", testSchema),
    });
    expect(withJsonInstruction("Describe makan", testSchema)).toContain('conforming to the "TestSchema" structure');
  });

  it("returns raw text when no schema is given", async () => {
    const { adapter } = setup([completion("Makan means to eat.")]);

    const result = await adapter.generate({ prompt: "Explain makan" });

    expect(result).toMatchObject({ data: "Makan means to eat.", provider: "openai" });
  });

  it("retries malformed JSON and succeeds on a later attempt", async () => {
    const { adapter, create } = setup([completion("not json at all"), completion('{"word": "makan", "count": 3}')]);

    const result = await adapter.generate({ prompt: "p", schema: testSchema });

    expect(result).toMatchObject({ data: { word: "makan", count: 3 } });
    expect(create).toHaveBeenCalledTimes(2);
  });

  it("returns the schema_validation sentinel with the last raw text after exhausting retries", async () => {
    const raw = '{"word": "makan"}';
    const { adapter, create } = setup([completion(raw), completion(raw), completion(raw)]);

    const result = await adapter.generate({ prompt: "p", schema: testSchema });

    expect(result).toEqual({ error: "schema_validation", rawText: raw });
    expect(create).toHaveBeenCalledTimes(3);
  });

  it("reports the last failure when attempts fail in different ways", async () => {
    const { adapter, create } = setup([httpError(429), httpError(429), completion("not json at all")]);

    expect(await adapter.generate({ prompt: "p", schema: testSchema })).toEqual({
      error: "malformed_json",
      rawText: "not json at all",
    });
    expect(create).toHaveBeenCalledTimes(3);
  });

  it("classifies a blocked reply and retries it", async () => {
    const { adapter, create } = setup([
      completion(null, "content_filter"),
      completion(null, "content_filter"),
      completion(null, "content_filter"),
    ]);

    expect(await adapter.generate({ prompt: "p", schema: testSchema })).toEqual({ error: "blocked", rawText: null });
    expect(create).toHaveBeenCalledTimes(3);
  });

  it("classifies an empty reply", async () => {
    const { adapter } = setup([completion("  "), completion(""), completion("\n")]);

    expect(await adapter.generate({ prompt: "p", schema: testSchema })).toEqual({
      error: "empty_response",
      rawText: null,
    });
  });

  it("retries a rate limit", async () => {
    const { adapter, create } = setup([httpError(429), completion('{"word": "makan", "count": 1}')]);

    const result = await adapter.generate({ prompt: "p", schema: testSchema });

    expect(result).toMatchObject({ data: { word: "makan", count: 1 } });
    expect(create).toHaveBeenCalledTimes(2);
  });

  it("does not retry authentication or quota failures", async () => {
    const auth = setup([httpError(401)]);
    expect(await auth.adapter.generate({ prompt: "p", schema: testSchema })).toEqual({
      error: "authentication",
      rawText: null,
    });
    expect(auth.create).toHaveBeenCalledTimes(1);

    const quota = setup([httpError(429, "insufficient_quota")]);
    expect(await quota.adapter.generate({ prompt: "p", schema: testSchema })).toEqual({
      error: "insufficient_quota",
      rawText: null,
    });
    expect(quota.create).toHaveBeenCalledTimes(1);
  });

  it("honours a per-request retry override", async () => {
    const { adapter, create } = setup([httpError(503), completion('{"word": "makan", "count": 1}')]);

    const result = await adapter.generate({ prompt: "p", schema: testSchema, retry: { maxRetries: 0 } });

    expect(result).toEqual({ error: "server_error", rawText: null });
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("reports a provider without an API key as not configured", async () => {
    const { adapter, clientFactory } = setup([], null);

    expect(await adapter.generate({ prompt: "p", provider: "deepseek" })).toEqual({
      error: "provider_not_configured",
      rawText: null,
    });
    expect(clientFactory).not.toHaveBeenCalled();
  });

  it("creates one client per provider", async () => {
    const { adapter, clientFactory } = setup([completion("one"), completion("two")]);

    await adapter.generate({ prompt: "p" });
    await adapter.generate({ prompt: "p" });

    expect(clientFactory).toHaveBeenCalledTimes(1);
  });
});

describe("classifyProviderError", () => {
  it.each([
    [httpError(401), "authentication"],
    [httpError(403), "authentication"],
    [httpError(402), "insufficient_quota"],
    [httpError(429, "insufficient_quota"), "insufficient_quota"],
    [httpError(429), "rate_limited"],
    [httpError(500), "server_error"],
    [httpError(400), "invalid_request"],
    [new Error("ECONNRESET"), "transport_error"],
  ])("classifies %s", (error, reason) => {
    expect(classifyProviderError(error)).toBe(reason);
  });
});
