import type { ChatCompletion, ChatCompletionMessageParam } from "openai/resources/chat/index";
import { env } from "../utils/env";
import { extractJson } from "./jsonExtraction";
import {
  createOpenAIClientFactory,
  resolveProviderConfig,
  type ChatCompletionsClient,
  type ClientFactory,
  type ProviderConfig,
} from "./providers";
import { RetryPolicy } from "./RetryPolicy";
import type {
  GenerateRequest,
  GenerateResult,
  LlmErrorReason,
  LlmErrorResult,
  LlmProvider,
  StructuredGenerateRequest,
  StructuredGenerator,
  StructuredSchema,
  TokenUsage,
} from "./types";

const DEFAULT_SYSTEM_PROMPT = "You are a careful lexicographer and language teacher.";
const LOG_PREVIEW_LENGTH = 2000;

const NON_RETRYABLE: ReadonlySet<LlmErrorReason> = new Set<LlmErrorReason>([
  "authentication",
  "insufficient_quota",
  "invalid_request",
  "provider_not_configured",
]);

/**
 * 單次呼叫失敗時拋出的內部錯誤，帶有分類與最後一次的原始回應。
 */
export class LlmCallError extends Error {
  readonly reason: LlmErrorReason;
  readonly rawText: string | null;

  constructor(reason: LlmErrorReason, message: string, rawText: string | null = null) {
    super(message);
    this.name = "LlmCallError";
    this.reason = reason;
    this.rawText = rawText;
  }

  get retryable(): boolean {
    return !NON_RETRYABLE.has(this.reason);
  }
}

/**
 * Type-guard / helper to safely read numeric status from unknown error objects.
 */
function getStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err) {
    const s = err.status;
    if (typeof s === "number") return s;
  }
  return undefined;
}

function getErrorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const c = err.code;
    if (typeof c === "string") return c;
  }
  return undefined;
}

function getErrorName(err: unknown): string | undefined {
  if (err instanceof Error) return err.name;
  return undefined;
}

/**
 * 將 SDK / 網路錯誤分類為 LlmErrorReason。
 */
export function classifyProviderError(err: unknown): LlmErrorReason {
  const status = getStatus(err);
  const code = getErrorCode(err);

  if (code === "insufficient_quota" || status === 402) return "insufficient_quota";
  if (status === 401 || status === 403) return "authentication";
  if (status === 429) return "rate_limited";
  if (status !== undefined && status >= 500) return "server_error";
  if (status !== undefined && status >= 400) return "invalid_request";

  // APIConnectionError / APIConnectionTimeoutError / fetch failures 皆沒有 status
  return "transport_error";
}

/**
 * Tolerant extractor for usage objects (handles snake_case and camelCase).
 */
function extractUsage(obj: unknown): TokenUsage | undefined {
  if (typeof obj !== "object" || obj === null) return undefined;
  const usageObj: Record<string, unknown> = { ...obj };
  const prompt = usageObj.prompt_tokens ?? usageObj.promptTokens;
  const completion = usageObj.completion_tokens ?? usageObj.completionTokens;
  const total = usageObj.total_tokens ?? usageObj.totalTokens;
  if (typeof prompt === "number" && typeof completion === "number" && typeof total === "number") {
    return {
      promptTokens: prompt,
      completionTokens: completion,
      totalTokens: total,
    };
  }
  return undefined;
}

function preview(text: string | null): string | null {
  return text === null ? null : text.slice(0, LOG_PREVIEW_LENGTH);
}

/**
 * 在 prompt 後附加「只能回傳 JSON」的硬性指示。
 */
export function withJsonInstruction<T>(prompt: string, schema: StructuredSchema<T>): string {
  return `${prompt}

IMPORTANT (STRICT): Your ENTIRE reply MUST be a single valid JSON value conforming to the "${schema.name}" structure below, and NOTHING ELSE: no explanatory text, no headings, no markdown, no code fences. Use double quotes for all strings and escape internal quotes.
The JSON MUST match this structure:
${schema.shape}`;
}

export interface LLMClientAdapterOptions {
  defaultProvider?: LlmProvider;
  retryPolicy?: RetryPolicy;
  clientFactory?: ClientFactory;
  resolveConfig?: (provider: LlmProvider) => ProviderConfig;
}

/**
 * 多 provider 的 LLM 客戶端封裝，負責 prompt 組裝、JSON 清理、schema 驗證、重試與錯誤分類。
 *
 * 重試耗盡或遇到不可重試錯誤時，回傳 `{ error, rawText }` 哨兵值而不是拋出；
 * 成功時回傳的 data 必定已通過 schema 驗證。
 */
export class LLMClientAdapter implements StructuredGenerator {
  private readonly defaultProvider: LlmProvider;
  private readonly retryPolicy: RetryPolicy;
  private readonly clientFactory: ClientFactory;
  private readonly resolveConfig: (provider: LlmProvider) => ProviderConfig;
  private readonly clients = new Map<LlmProvider, ChatCompletionsClient>();

  constructor(options: LLMClientAdapterOptions = {}) {
    this.defaultProvider = options.defaultProvider ?? env.DEFAULT_LLM_PROVIDER;
    this.retryPolicy =
      options.retryPolicy ??
      new RetryPolicy({
        maxRetries: env.LLM_MAX_RETRIES,
        baseDelayMs: env.LLM_RETRY_BASE_DELAY_MS,
        factor: env.LLM_RETRY_FACTOR,
      });
    this.clientFactory = options.clientFactory ?? createOpenAIClientFactory();
    this.resolveConfig = options.resolveConfig ?? ((provider) => resolveProviderConfig(provider));
  }

  generate<T>(request: StructuredGenerateRequest<T>): Promise<GenerateResult<T>>;
  generate(request: GenerateRequest): Promise<GenerateResult<string>>;
  async generate<T>(request: GenerateRequest & { schema?: StructuredSchema<T> }): Promise<GenerateResult<T | string>> {
    const provider = request.provider ?? this.defaultProvider;
    const config = this.resolveConfig(provider);
    const model = request.model ?? config.defaultModel;

    if (!config.apiKey) {
      console.error("[LLMClientAdapter] provider not configured (missing API key)", { provider });
      return { error: "provider_not_configured", rawText: null };
    }

    const client = this.getClient(provider, { ...config, apiKey: config.apiKey });
    const schema = request.schema;
    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: request.systemPrompt ?? DEFAULT_SYSTEM_PROMPT },
      { role: "user", content: schema ? withJsonInstruction(request.prompt, schema) : request.prompt },
    ];
    const policy = this.retryPolicy.with(request.retry);
    const start = performance.now();
    let lastRawText: string | null = null;

    try {
      const result = await policy.execute(
        async (attemptNumber) => {
          let response: ChatCompletion;
          try {
            response = await client.chat.completions.create({
              model,
              messages,
              temperature: request.temperature ?? 0.5,
              stream: false,
            });
          } catch (error) {
            const reason = classifyProviderError(error);
            throw new LlmCallError(reason, `${provider} request failed: ${getErrorName(error) ?? "error"} ${String(error)}`);
          }

          const rawText = this.readContent(response);
          lastRawText = rawText;
          console.info("[LLMClientAdapter] raw response", {
            provider,
            model,
            attemptNumber,
            preview: preview(rawText),
          });

          if (!schema) {
            return { data: rawText, usage: extractUsage(response.usage) };
          }
          return { data: this.parseStructured(rawText, schema), usage: extractUsage(response.usage) };
        },
        (error) => error instanceof LlmCallError && error.retryable,
        ({ attemptNumber, retriesLeft, error }) => {
          console.warn("[LLMClientAdapter] attempt failed, retrying", {
            provider,
            model,
            attemptNumber,
            retriesLeft,
            nextDelayMs: policy.delayFor(attemptNumber),
            error: error.message,
          });
        },
      );

      console.info("[LLMClientAdapter] generation success", {
        provider,
        model,
        schema: schema?.name,
        durationMs: performance.now() - start,
        usage: result.usage,
      });
      return { ...result, provider, model };
    } catch (error) {
      const failure: LlmErrorResult =
        error instanceof LlmCallError
          ? { error: error.reason, rawText: error.rawText ?? lastRawText }
          : { error: classifyProviderError(error), rawText: lastRawText };
      console.error("[LLMClientAdapter] generation failed", {
        provider,
        model,
        schema: schema?.name,
        durationMs: performance.now() - start,
        reason: failure.error,
        message: error instanceof Error ? error.message : String(error),
        rawText: preview(failure.rawText),
      });
      return failure;
    }
  }

  private getClient(provider: LlmProvider, config: ProviderConfig & { apiKey: string }): ChatCompletionsClient {
    const cached = this.clients.get(provider);
    if (cached) return cached;
    const client = this.clientFactory(config);
    this.clients.set(provider, client);
    return client;
  }

  /**
   * 取出第一個 choice 的文字；空回應或被安全過濾時拋出對應的 LlmCallError。
   */
  private readContent(response: ChatCompletion): string {
    const choice = response.choices[0];
    if (!choice) {
      throw new LlmCallError("empty_response", "response contained no choices");
    }
    if (choice.finish_reason === "content_filter" || choice.message.refusal) {
      throw new LlmCallError("blocked", "response blocked by provider safety filter", choice.message.refusal ?? null);
    }
    const content = choice.message.content;
    if (typeof content !== "string" || content.trim() === "") {
      throw new LlmCallError("empty_response", "response message content was empty");
    }
    return content;
  }

  private parseStructured<T>(rawText: string, schema: StructuredSchema<T>): T {
    const extracted = extractJson(rawText);
    if (!extracted.ok) {
      throw new LlmCallError("malformed_json", `could not parse JSON for ${schema.name}`, rawText);
    }
    const validated = schema.schema.safeParse(extracted.value);
    if (!validated.success) {
      throw new LlmCallError(
        "schema_validation",
        `${schema.name} validation failed: ${validated.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`,
        rawText,
      );
    }
    return validated.data;
  }
}
