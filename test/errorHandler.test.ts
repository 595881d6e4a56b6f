import { describe, it, expect, vi, afterEach } from "vitest";
import type { NewFailedEnrichment } from "../db/schema";
import { ErrorHandler, formatError, getErrorCode, type FailureContext, type FailureStore } from "../lib/enrichment/ErrorHandler";

const context: FailureContext = {
  headword: "makan",
  sourceLanguage: "id",
  targetLanguage: "en",
  step: "persist",
  batchId: "batch-1",
};

class MemoryStore implements FailureStore {
  readonly rows: NewFailedEnrichment[] = [];
  async insert(record: NewFailedEnrichment): Promise<void> {
    this.rows.push(record);
  }
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("ErrorHandler", () => {
  it("stores one row per failure", async () => {
    const store = new MemoryStore();
    const handler = new ErrorHandler({ store });

    await handler.recordFailure(context, { error: "rate_limited", rawText: null });

    expect(store.rows).toEqual([
      {
        headword: "makan",
        sourceLanguage: "id",
        targetLanguage: "en",
        step: "persist",
        batchId: "batch-1",
        errorCode: "rate_limited",
        errorMessage: '{"error":"rate_limited","rawText":null}',
      },
    ]);
  });

  it("posts to Slack when enabled", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => new Response("ok", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    const handler = new ErrorHandler({ notifySlack: true, slackWebhook: "https://hooks.example.test/T000" });

    await handler.recordFailure({ ...context, batchId: undefined }, new Error("save failed"));

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://hooks.example.test/T000");
    expect(JSON.parse(String(init?.body))).toEqual({
      text: ":warning: word enrichment failed\n• word: makan (id -> en)\n• step: persist\n• batch: -\n• error: Error: save failed",
    });
  });

  it("does not throw when Slack is unreachable", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => Promise.reject(new Error("getaddrinfo ENOTFOUND"))));
    const handler = new ErrorHandler({ notifySlack: true, slackWebhook: "https://hooks.example.test/T000" });

    await expect(handler.recordFailure(context, new Error("boom"))).resolves.toBeUndefined();
  });

  it("skips Slack unless notifySlack is set", async () => {
    const fetchMock = vi.fn(async () => new Response("ok", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    await new ErrorHandler({ slackWebhook: "https://hooks.example.test/T000" }).recordFailure(context, "boom");

    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("propagates a store failure to the caller", async () => {
    const store: FailureStore = {
      insert: async () => {
        throw new Error("relation does not exist");
      },
    };

    await expect(new ErrorHandler({ store }).recordFailure(context, "boom")).rejects.toThrow("relation does not exist");
  });
});

describe("error formatting", () => {
  it("formats errors, strings and objects", () => {
    expect(formatError(new TypeError("bad input"))).toBe("TypeError: bad input");
    expect(formatError("plain")).toBe("plain");
    expect(formatError({ code: 1 })).toBe('{"code":1}');
  });

  it("extracts a code from sentinels, call errors and driver errors", () => {
    expect(getErrorCode({ error: "blocked", rawText: null })).toBe("blocked");
    expect(getErrorCode(Object.assign(new Error("x"), { reason: "malformed_json" }))).toBe("malformed_json");
    expect(getErrorCode(Object.assign(new Error("x"), { code: "ECONNREFUSED" }))).toBe("ECONNREFUSED");
    expect(getErrorCode(new RangeError("x"))).toBe("RangeError");
    expect(getErrorCode("text")).toBeNull();
  });
});
