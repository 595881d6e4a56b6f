import type { z } from "zod";

export const LLM_PROVIDERS = ["openai", "deepseek", "googleai"] as const;

export type LlmProvider = (typeof LLM_PROVIDERS)[number];

export function isLlmProvider(value: string): value is LlmProvider {
  return (LLM_PROVIDERS as readonly string[]).includes(value);
}

/**
 * 期望的結構化輸出：name 與 shape 會被寫進 prompt，schema 用於驗證回應。
 */
export interface StructuredSchema<T> {
  name: string;
  /** 給模型看的 JSON 結構說明（單行） */
  shape: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * 成功結果，沿用 `{ data, usage }` 的統一格式，上層不直接依賴 SDK 型別。
 */
export interface ChatCompletionResult<T> {
  data: T;
  usage?: TokenUsage;
  provider: LlmProvider;
  model: string;
}

export type LlmErrorReason =
  | "empty_response"
  | "blocked"
  | "malformed_json"
  | "schema_validation"
  | "rate_limited"
  | "server_error"
  | "transport_error"
  | "authentication"
  | "insufficient_quota"
  | "invalid_request"
  | "provider_not_configured";

/**
 * 重試耗盡（或不可重試）後回傳的錯誤哨兵值；adapter 不會把這類錯誤拋出。
 */
export interface LlmErrorResult {
  error: LlmErrorReason;
  rawText: string | null;
}

export type GenerateResult<T> = ChatCompletionResult<T> | LlmErrorResult;

export function isLlmError<T>(result: GenerateResult<T>): result is LlmErrorResult {
  return "error" in result;
}

export interface RetryOverrides {
  maxRetries?: number;
  baseDelayMs?: number;
  factor?: number;
}

export interface GenerateRequest {
  prompt: string;
  provider?: LlmProvider;
  model?: string;
  temperature?: number;
  systemPrompt?: string;
  retry?: RetryOverrides;
}

export interface StructuredGenerateRequest<T> extends GenerateRequest {
  schema: StructuredSchema<T>;
}

/**
 * 編排器所需的最小能力介面：「給定 provider / model / schema 產生文字或 JSON」。
 * LLMClientAdapter 為正式實作，測試可注入任何符合此介面的假物件。
 */
export interface StructuredGenerator {
  generate<T>(request: StructuredGenerateRequest<T>): Promise<GenerateResult<T>>;
  generate(request: GenerateRequest): Promise<GenerateResult<string>>;
}
