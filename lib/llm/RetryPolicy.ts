import pRetry, { AbortError } from "p-retry";

export interface RetryPolicyOptions {
  /** 失敗後最多再試幾次（總嘗試次數 = maxRetries + 1） */
  maxRetries: number;
  baseDelayMs: number;
  factor: number;
}

export interface RetryAttemptInfo {
  attemptNumber: number;
  retriesLeft: number;
  error: Error;
}

/**
 * 指數退避重試策略，包裝 p-retry。
 *
 * 單次呼叫本身不需要知道重試細節：丟出錯誤即可，是否重試由 isRetryable 決定。
 * 不可重試的錯誤會以 AbortError 中止，p-retry 會把原始錯誤原封不動拋回。
 */
export class RetryPolicy {
  static readonly MIN_FACTOR = 1.5;

  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly factor: number;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxRetries) || options.maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${options.maxRetries}`);
    }
    if (options.baseDelayMs < 0) {
      throw new RangeError(`baseDelayMs must be >= 0, got ${options.baseDelayMs}`);
    }
    if (options.factor < RetryPolicy.MIN_FACTOR) {
      throw new RangeError(`factor must be >= ${RetryPolicy.MIN_FACTOR}, got ${options.factor}`);
    }
    this.maxRetries = options.maxRetries;
    this.baseDelayMs = options.baseDelayMs;
    this.factor = options.factor;
  }

  /**
   * 產生覆寫部分設定後的新策略。
   */
  with(overrides: Partial<RetryPolicyOptions> = {}): RetryPolicy {
    return new RetryPolicy({
      maxRetries: overrides.maxRetries ?? this.maxRetries,
      baseDelayMs: overrides.baseDelayMs ?? this.baseDelayMs,
      factor: overrides.factor ?? this.factor,
    });
  }

  /**
   * 第 n 次重試前的等待時間（n 從 1 開始）。
   */
  delayFor(retryNumber: number): number {
    return Math.round(this.baseDelayMs * Math.pow(this.factor, retryNumber - 1));
  }

  /**
   * 重試用盡時拋出最後一次失敗的錯誤（p-retry 本身會拋出出現最多次的那個）。
   */
  async execute<T>(
    operation: (attemptNumber: number) => Promise<T>,
    isRetryable: (error: unknown) => boolean,
    onRetry?: (info: RetryAttemptInfo) => void,
  ): Promise<T> {
    let lastFailure: { error: unknown } | undefined;
    try {
      return await pRetry(
        async (attemptNumber) => {
          try {
            return await operation(attemptNumber);
          } catch (error) {
            lastFailure = { error };
            if (!isRetryable(error)) {
              throw new AbortError(error instanceof Error ? error : new Error(String(error)));
            }
            throw error;
          }
        },
        {
          retries: this.maxRetries,
          factor: this.factor,
          minTimeout: this.baseDelayMs,
          randomize: false,
          onFailedAttempt: (error) => {
            if (error.retriesLeft > 0) {
              onRetry?.({ attemptNumber: error.attemptNumber, retriesLeft: error.retriesLeft, error });
            }
          },
        },
      );
    } catch (error) {
      throw lastFailure ? lastFailure.error : error;
    }
  }
}
