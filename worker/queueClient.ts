import { z } from 'zod';
import type { Env } from '../lib/utils/env';
import { env } from '../lib/utils/env';
import { LanguageCodeSchema } from '../lib/enrichment/schemas';
import { LLM_PROVIDERS } from '../lib/llm/types';

/**
 * 佇列中的 enrichment job（由 CLI --enqueue 或其他批次來源推送）
 */
export const EnrichmentJobMessageSchema = z.object({
	jobId: z.string().min(1),
	headword: z.string().min(1),
	sourceLanguage: LanguageCodeSchema,
	targetLanguage: LanguageCodeSchema,
	categories: z.array(z.string()).default([]),
	provider: z.enum(LLM_PROVIDERS).optional(),
	model: z.string().min(1).optional(),
	forceReenrich: z.boolean().default(false),
	batchId: z.string().min(1).optional(),
	tags: z.array(z.string()).default([]),
	/** 已失敗的次數 */
	attempt: z.number().int().min(0).default(0),
	timestamp: z.number().optional(),
});

export type EnrichmentJobMessage = z.infer<typeof EnrichmentJobMessageSchema>;

/**
 * 解析一則原始訊息；JSON 或欄位不合法時回傳 null。
 */
export function parseJobMessage(raw: string): EnrichmentJobMessage | null {
	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (e) {
		console.warn('[queueClient] failed to parse message JSON', e, { raw });
		return null;
	}
	const parsed = EnrichmentJobMessageSchema.safeParse(json);
	if (!parsed.success) {
		console.warn('[queueClient] message failed validation', {
			raw,
			issues: parsed.error.issues,
		});
		return null;
	}
	return parsed.data;
}

/**
 * Queue client interface
 */
export interface QueueClient {
	/**
	 * 取出一則訊息（若無可取則回傳 null）
	 */
	pop(): Promise<EnrichmentJobMessage | null>;

	/**
	 * 推入一則訊息（新 job 或 requeue）
	 */
	push(msg: EnrichmentJobMessage): Promise<void>;

	/**
	 * 關閉 client（關閉 redis 連線等）
	 */
	close(): Promise<void>;
}

/**
 * No-op client: 用於未設定 Upstash 時，避免 runtime crash
 */
class NoopQueueClient implements QueueClient {
	async pop(): Promise<EnrichmentJobMessage | null> {
		return null;
	}
	async push(msg: EnrichmentJobMessage): Promise<void> {
		throw new Error(`UPSTASH not configured; cannot push job ${msg.jobId}`);
	}
	async close(): Promise<void> {}
}

/**
 * Upstash REST 推送（只支援 push，REST 沒有通用的 blocking pop）。
 */
class RestQueueClient implements QueueClient {
	constructor(
		private readonly restUrl: string,
		private readonly token: string,
		private readonly queueName: string
	) {}

	async pop(): Promise<EnrichmentJobMessage | null> {
		return null;
	}

	async push(msg: EnrichmentJobMessage): Promise<void> {
		const body = { queue: this.queueName, messages: [JSON.stringify(msg)] };
		const resp = await fetch(this.restUrl, {
			method: 'POST',
			headers: {
				Authorization: `Bearer ${this.token}`,
				'Content-Type': 'application/json',
			},
			body: JSON.stringify(body),
		});
		if (!resp.ok) {
			const text = await resp.text().catch(() => '<no body>');
			throw new Error(`Upstash REST push failed ${resp.status} ${text}`);
		}
	}

	async close(): Promise<void> {}
}

const BRPOP_TIMEOUT_SEC = 5;

/**
 * 建立 queue client：優先使用 ioredis（UPSTASH_REDIS_URL），否則回退到 REST (push-only)，最後回傳 noop client。
 *
 * @param opts 可選參數，允許覆寫 env 與 queueName（方便測試）
 */
export async function createQueueClient(opts?: {
	envVars?: Env;
	queueName?: string;
}): Promise<QueueClient> {
	const envVars = opts?.envVars ?? env;
	const queueName = opts?.queueName ?? envVars.UPSTASH_QUEUE_NAME;

	if (envVars.UPSTASH_REDIS_URL) {
		try {
			const { default: Redis } = await import('ioredis');
			const redis = new Redis(envVars.UPSTASH_REDIS_URL);

			return {
				async pop() {
					try {
						const resp = await redis.brpop(queueName, BRPOP_TIMEOUT_SEC);
						if (!resp) return null;
						return parseJobMessage(resp[1]);
					} catch (err) {
						console.error('[queueClient] redis brpop error', err);
						return null;
					}
				},
				async push(msg) {
					try {
						await redis.rpush(queueName, JSON.stringify(msg));
					} catch (err) {
						console.error('[queueClient] redis rpush error', err);
						throw err;
					}
				},
				async close() {
					try {
						await redis.quit();
					} catch (err) {
						console.warn('[queueClient] error closing redis client', err);
					}
				},
			};
		} catch (err) {
			console.warn(
				'[createQueueClient] Redis client initialization failed, falling back to REST',
				err
			);
		}
	}

	if (envVars.UPSTASH_REST_URL && envVars.UPSTASH_REST_TOKEN) {
		return new RestQueueClient(
			envVars.UPSTASH_REST_URL,
			envVars.UPSTASH_REST_TOKEN,
			queueName
		);
	}

	console.info(
		'[createQueueClient] No Upstash configuration found; returning noop client'
	);
	return new NoopQueueClient();
}
