import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import { loadEnv } from "../lib/utils/env";
import { EnrichmentJobMessageSchema, createQueueClient, parseJobMessage } from "../worker/queueClient";

/**
 * Upstash 佇列 client 單元測試
 *
 * 測試項目：
 *  - 設定 UPSTASH_REDIS_URL 時使用 ioredis（brpop / rpush）
 *  - 只有 REST 設定時以 fetch 推送
 *  - 完全未設定時回傳 noop client
 *
 * ioredis 以 vi.mock 取代，呼叫紀錄放在 vi.hoisted 建立的共用狀態中。
 */

const redis = vi.hoisted(() => {
  const urls: string[] = [];
  const pending: string[] = [];
  const pushed: Array<{ queue: string; msg: string }> = [];
  return { urls, pending, pushed, quitCount: 0 };
});

vi.mock("ioredis", () => {
  class MockRedis {
    constructor(url: string) {
      redis.urls.push(url);
    }
    async brpop(queue: string, _timeoutSec: number): Promise<[string, string] | null> {
      const msg = redis.pending.shift();
      return msg === undefined ? null : [queue, msg];
    }
    async rpush(queue: string, msg: string) {
      redis.pushed.push({ queue, msg });
      return 1;
    }
    async quit() {
      redis.quitCount += 1;
      return "OK";
    }
  }
  return { default: MockRedis, Redis: MockRedis };
});

const job = EnrichmentJobMessageSchema.parse({
  jobId: "job-1",
  headword: "makan",
  sourceLanguage: "id",
  targetLanguage: "en",
  batchId: "batch-7",
});

beforeEach(() => {
  redis.urls.length = 0;
  redis.pending.length = 0;
  redis.pushed.length = 0;
  redis.quitCount = 0;
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("parseJobMessage", () => {
  it("fills defaults for optional fields", () => {
    expect(
      parseJobMessage(JSON.stringify({ jobId: "job-2", headword: "minum", sourceLanguage: "id", targetLanguage: "fr" })),
    ).toEqual({
      jobId: "job-2",
      headword: "minum",
      sourceLanguage: "id",
      targetLanguage: "fr",
      categories: [],
      forceReenrich: false,
      tags: [],
      attempt: 0,
    });
  });

  it("rejects invalid JSON and invalid fields", () => {
    expect(parseJobMessage("not json")).toBeNull();
    expect(
      parseJobMessage(JSON.stringify({ jobId: "job-3", headword: "makan", sourceLanguage: "Indonesian", targetLanguage: "en" })),
    ).toBeNull();
    expect(
      parseJobMessage(
        JSON.stringify({ jobId: "job-4", headword: "makan", sourceLanguage: "id", targetLanguage: "en", provider: "acme" }),
      ),
    ).toBeNull();
  });
});

describe("createQueueClient", () => {
  it("pushes and pops jobs through ioredis when UPSTASH_REDIS_URL is set", async () => {
    const client = await createQueueClient({
      envVars: loadEnv({ UPSTASH_REDIS_URL: "redis://localhost:6379", UPSTASH_QUEUE_NAME: "test_enrichment_jobs" }),
    });

    await client.push(job);
    expect(redis.urls).toEqual(["redis://localhost:6379"]);
    expect(redis.pushed).toHaveLength(1);
    expect(redis.pushed[0]?.queue).toBe("test_enrichment_jobs");
    expect(JSON.parse(redis.pushed[0]?.msg ?? "null")).toEqual(job);

    redis.pending.push(redis.pushed[0]?.msg ?? "", "{broken");
    expect(await client.pop()).toEqual(job);
    expect(await client.pop()).toBeNull();
    expect(await client.pop()).toBeNull();

    await client.close();
    expect(redis.quitCount).toBe(1);
  });

  it("falls back to Upstash REST when only REST variables exist", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response("", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    const client = await createQueueClient({
      envVars: loadEnv({
        UPSTASH_REDIS_URL: undefined,
        UPSTASH_REST_URL: "https://queue.example.test/push",
        UPSTASH_REST_TOKEN: "test-secret",
        UPSTASH_QUEUE_NAME: "rest_enrichment_jobs",
      }),
    });
    await client.push(job);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://queue.example.test/push");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ Authorization: "Bearer test-secret", "Content-Type": "application/json" });
    expect(JSON.parse(String(init?.body))).toEqual({ queue: "rest_enrichment_jobs", messages: [JSON.stringify(job)] });
    expect(await client.pop()).toBeNull();
  });

  it("surfaces a failed REST push", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("quota exceeded", { status: 429 })));

    const client = await createQueueClient({
      envVars: loadEnv({
        UPSTASH_REDIS_URL: undefined,
        UPSTASH_REST_URL: "https://queue.example.test/push",
        UPSTASH_REST_TOKEN: "test-secret",
      }),
    });

    await expect(client.push(job)).rejects.toThrow("Upstash REST push failed 429 quota exceeded");
  });

  it("returns a noop client without configuration", async () => {
    const client = await createQueueClient({
      envVars: loadEnv({ UPSTASH_REDIS_URL: undefined, UPSTASH_REST_URL: undefined, UPSTASH_REST_TOKEN: undefined }),
    });

    expect(await client.pop()).toBeNull();
    await expect(client.push(job)).rejects.toThrow("UPSTASH not configured; cannot push job job-1");
  });
});
