import { z } from "zod";

/**
 * 環境變數 schema，於模組載入時即刻驗證。
 *
 * 三家 LLM provider 的金鑰皆為 optional：未設定金鑰的 provider 視為「未設定」，
 * 呼叫時由 LLMClientAdapter 回傳 provider_not_configured，而不是在啟動時失敗。
 */
const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  OPENAI_API_KEY: z.string().min(1).optional(),
  DEEPSEEK_API_KEY: z.string().min(1).optional(),
  GOOGLE_API_KEY: z.string().min(1).optional(),
  DEFAULT_LLM_PROVIDER: z.enum(["openai", "deepseek", "googleai"]).default("googleai"),
  DEFAULT_OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  DEFAULT_DEEPSEEK_MODEL: z.string().min(1).default("deepseek-chat"),
  DEFAULT_GOOGLE_MODEL: z.string().min(1).default("gemini-1.5-flash"),
  LLM_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  LLM_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  LLM_RETRY_FACTOR: z.coerce.number().min(1.5, "LLM_RETRY_FACTOR must be >= 1.5").default(2),
  LLM_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  MAX_LINK_CHAINS_PER_SENSE: z.coerce.number().int().positive().default(2),
  DATABASE_URL: z.string().optional(),
  SLACK_WEBHOOK: z.string().url().optional(),
  UPSTASH_REDIS_URL: z.string().optional(),
  UPSTASH_REST_URL: z.string().optional(),
  UPSTASH_REST_TOKEN: z.string().optional(),
  UPSTASH_QUEUE_NAME: z.string().min(1).default("enrichment_jobs"),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(3),
  WORKER_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
  WORKER_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
});

/**
 * 匯出 Env 型別以供其他模組使用（避免在多處使用 typeof env 引起型別循環）
 */
export type Env = z.infer<typeof envSchema>;

/**
 * 空字串視為未設定，避免 `.env` 中留白的 key 被當成有效值。
 */
function readVar(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * 由 process.env 解析出 Env；測試可傳入自訂來源。
 */
export function loadEnv(source: Record<string, string | undefined> = {}): Env {
  const keys = Object.keys(envSchema.shape);
  const raw: Record<string, string | undefined> = {};
  for (const key of keys) {
    raw[key] = key in source ? source[key] : readVar(key);
  }
  return envSchema.parse(raw);
}

/**
 * 匯出已驗證的環境變數（以及其明確型別 Env）
 */
export const env: Env = loadEnv();
