import type { Database } from "../../db/client";
import { failedEnrichments, type NewFailedEnrichment } from "../../db/schema";
import { env } from "../utils/env";
import type { EnrichmentStep } from "./types";

/**
 * ErrorHandler
 *
 * 負責：
 * - 將致命的 enrichment 失敗寫入 failed_enrichments（供後台檢視與人工重跑）
 * - 選擇性通知 Slack（若設定 SLACK_WEBHOOK）
 *
 * 不決定重跑與否；worker 依 runEnrichment 的回傳值自行重新排入佇列。
 */

/**
 * 失敗紀錄的最小上下文結構。
 */
export interface FailureContext {
  headword: string;
  sourceLanguage: string;
  targetLanguage: string;
  step: EnrichmentStep;
  batchId?: string;
}

/**
 * 失敗紀錄的寫入端；預設寫入 Postgres，測試可注入記憶體實作。
 */
export interface FailureStore {
  insert(record: NewFailedEnrichment): Promise<void>;
}

/**
 * 編排器依賴的最小介面。
 */
export interface FailureRecorder {
  recordFailure(context: FailureContext, error: unknown): Promise<void>;
}

export class DrizzleFailureStore implements FailureStore {
  constructor(private readonly db: Database) {}

  async insert(record: NewFailedEnrichment): Promise<void> {
    await this.db.insert(failedEnrichments).values(record);
  }
}

export interface ErrorHandlerOptions {
  /** 未提供時只寫 log，不落地 */
  store?: FailureStore;
  /**
   * 是否在記錄後發出 Slack 通知（若未設定 webhook，則不會發送）。
   */
  notifySlack?: boolean;
  slackWebhook?: string;
}

const SLACK_MESSAGE_LIMIT = 2000;

/**
 * 將錯誤物件格式化為單一字串。
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * 從錯誤或 LLM 哨兵值擷取錯誤代碼。
 */
export function getErrorCode(error: unknown): string | null {
  if (typeof error === "object" && error !== null) {
    if ("error" in error && typeof error.error === "string") return error.error;
    if ("reason" in error && typeof error.reason === "string") return error.reason;
    if ("code" in error && typeof error.code === "string") return error.code;
    if (error instanceof Error) return error.name;
  }
  return null;
}

export class ErrorHandler implements FailureRecorder {
  private readonly store?: FailureStore;
  private readonly slackWebhook?: string;
  private readonly notifySlackFlag: boolean;

  constructor(opts: ErrorHandlerOptions = {}) {
    this.store = opts.store;
    this.slackWebhook = opts.slackWebhook ?? env.SLACK_WEBHOOK;
    this.notifySlackFlag = opts.notifySlack ?? false;
  }

  /**
   * 記錄一次失敗。寫入失敗時拋出，由呼叫端決定是否吞掉。
   */
  async recordFailure(context: FailureContext, error: unknown): Promise<void> {
    const errorMessage = formatError(error);
    const errorCode = getErrorCode(error);

    console.error("[ErrorHandler] enrichment failed", { ...context, errorCode, errorMessage });

    if (this.store) {
      await this.store.insert({
        headword: context.headword,
        sourceLanguage: context.sourceLanguage,
        targetLanguage: context.targetLanguage,
        step: context.step,
        batchId: context.batchId ?? null,
        errorCode,
        errorMessage,
      });
    }

    if (this.notifySlackFlag && this.slackWebhook) {
      try {
        await this.notifySlack(this.slackWebhook, context, errorMessage);
      } catch (slackErr) {
        console.error("[ErrorHandler] failed to send slack notification", slackErr);
      }
    }
  }

  private async notifySlack(webhook: string, context: FailureContext, errorMessage: string): Promise<void> {
    const payload = {
      text: `:warning: word enrichment failed\n• word: ${context.headword} (${context.sourceLanguage} -> ${context.targetLanguage})\n• step: ${context.step}\n• batch: ${context.batchId ?? "-"}\n• error: ${errorMessage.slice(0, SLACK_MESSAGE_LIMIT)}`,
    };

    const resp = await fetch(webhook, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
    });

    if (!resp.ok) {
      const text = await resp.text().catch(() => "<no body>");
      console.error("[ErrorHandler] Slack webhook failed", resp.status, text);
    }
  }
}

export default ErrorHandler;
