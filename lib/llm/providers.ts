import OpenAI from "openai";
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/index";
import { env as defaultEnv, type Env } from "../utils/env";
import type { LlmProvider } from "./types";

/**
 * adapter 實際使用到的 SDK 表面；測試可注入符合此形狀的假 client。
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(params: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export interface ProviderConfig {
  provider: LlmProvider;
  apiKey: string | undefined;
  baseURL: string | undefined;
  defaultModel: string;
}

export const DEEPSEEK_BASE_URL = "https://api.deepseek.com/v1";
// Gemini 的 OpenAI 相容端點，讓三家 provider 共用同一套 SDK
export const GOOGLE_OPENAI_COMPAT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai/";

/**
 * 依 provider 取出金鑰、baseURL 與預設模型。
 */
export function resolveProviderConfig(provider: LlmProvider, envVars: Env = defaultEnv): ProviderConfig {
  switch (provider) {
    case "openai":
      return {
        provider,
        apiKey: envVars.OPENAI_API_KEY,
        baseURL: undefined,
        defaultModel: envVars.DEFAULT_OPENAI_MODEL,
      };
    case "deepseek":
      return {
        provider,
        apiKey: envVars.DEEPSEEK_API_KEY,
        baseURL: DEEPSEEK_BASE_URL,
        defaultModel: envVars.DEFAULT_DEEPSEEK_MODEL,
      };
    case "googleai":
      return {
        provider,
        apiKey: envVars.GOOGLE_API_KEY,
        baseURL: GOOGLE_OPENAI_COMPAT_BASE_URL,
        defaultModel: envVars.DEFAULT_GOOGLE_MODEL,
      };
  }
}

export type ClientFactory = (config: ProviderConfig & { apiKey: string }) => ChatCompletionsClient;

/**
 * 預設 client 工廠。SDK 內建的重試關閉，統一交由 RetryPolicy 處理。
 */
export function createOpenAIClientFactory(timeoutMs: number = defaultEnv.LLM_REQUEST_TIMEOUT_MS): ClientFactory {
  return (config) =>
    new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: timeoutMs,
      maxRetries: 0,
    });
}
