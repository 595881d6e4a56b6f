import type { EnrichmentRequest } from "../lib/enrichment/types";
import type { Word } from "../lib/enrichment/schemas";
import type { EnrichmentJobMessage, QueueClient } from "./queueClient";

/**
 * JobHandler 需要的編排器能力。
 */
export interface EnrichmentRunner {
  runEnrichment(request: EnrichmentRequest): Promise<Word | null>;
}

export type JobOutcome = "completed" | "requeued" | "failed";

/**
 * 將佇列訊息轉為 enrichment 請求。
 * 沒有 batchId 的 job 以 jobId 當作批次，重試時仍寫入同一批次。
 */
export function toEnrichmentRequest(job: EnrichmentJobMessage): EnrichmentRequest {
  return {
    headword: job.headword,
    sourceLanguage: job.sourceLanguage,
    targetLanguage: job.targetLanguage,
    categories: job.categories,
    provider: job.provider,
    model: job.model,
    forceReenrich: job.forceReenrich,
    batchInfo: { batchId: job.batchId ?? job.jobId, tags: job.tags },
  };
}

/**
 * 同一個 jobId 正在執行時，把訊息推回佇列稍後再處理。
 * @returns 已推回時為 true
 */
export async function requeueIfRunning(
  job: EnrichmentJobMessage,
  running: ReadonlySet<string>,
  queue: QueueClient,
): Promise<boolean> {
  if (!running.has(job.jobId)) return false;
  await queue.push(job);
  console.warn("[JobHandler] job already processing, pushed back to queue", { job });
  return true;
}

/**
 * JobHandler
 *
 * 處理單一 enrichment job：
 * - 執行編排器
 * - 回傳 null 時，未達上限則 attempt + 1 後重新推回佇列
 */
export class JobHandler {
  constructor(
    private readonly runner: EnrichmentRunner,
    private readonly queue: QueueClient,
    private readonly maxAttempts: number,
  ) {}

  async handle(job: EnrichmentJobMessage): Promise<JobOutcome> {
    const word = await this.runner.runEnrichment(toEnrichmentRequest(job));
    if (word) {
      console.info("[JobHandler] job completed", { jobId: job.jobId, wordId: word.wordId });
      return "completed";
    }

    const attempt = job.attempt + 1;
    if (attempt >= this.maxAttempts) {
      console.error("[JobHandler] job failed, max attempts reached", {
        jobId: job.jobId,
        headword: job.headword,
        attempt,
        maxAttempts: this.maxAttempts,
      });
      return "failed";
    }

    await this.queue.push({ ...job, attempt, timestamp: Date.now() });
    console.warn("[JobHandler] job requeued", { jobId: job.jobId, attempt, maxAttempts: this.maxAttempts });
    return "requeued";
  }
}
