import 'dotenv/config';
import { pathToFileURL } from 'node:url';
import { closeDb, getDb } from '../db/client';
import { DrizzleFailureStore, ErrorHandler } from '../lib/enrichment/ErrorHandler';
import { WordEnrichmentOrchestrator } from '../lib/enrichment/WordEnrichmentOrchestrator';
import { LLMClientAdapter } from '../lib/llm/LLMClientAdapter';
import { DrizzleWordRepository } from '../lib/storage/WordRepository';
import { env } from '../lib/utils/env';
import { JobHandler, requeueIfRunning } from './jobHandler';
import { createQueueClient, type EnrichmentJobMessage } from './queueClient';

/**
 * Worker entrypoint: 從 Upstash 佇列拉取 enrichment job，交由 JobHandler 處理。
 *
 * 使用方式：
 *   npm run worker
 *
 * env vars:
 *  - UPSTASH_REDIS_URL | UPSTASH_REST_URL + UPSTASH_REST_TOKEN
 *  - UPSTASH_QUEUE_NAME
 *  - WORKER_CONCURRENCY / WORKER_POLL_INTERVAL_MS / WORKER_MAX_ATTEMPTS
 *  - DATABASE_URL 以及至少一家 LLM provider 的金鑰
 */
const SHORT_WAIT_MS = 500;
const SHUTDOWN_TIMEOUT_MS = 30000;
let stopped = false;

const running = new Set<string>();

/**
 * 暫停工具
 * @param ms 毫秒
 */
async function sleep(ms: number) {
	return new Promise((r) => setTimeout(r, ms));
}

/**
 * 主流程：建立 queue client 與 job handler，進入拉取迴圈。
 */
async function main() {
	const concurrency = env.WORKER_CONCURRENCY;
	const pollIntervalMs = env.WORKER_POLL_INTERVAL_MS;
	console.info('[worker] starting worker', {
		concurrency,
		queue: env.UPSTASH_QUEUE_NAME,
		maxAttempts: env.WORKER_MAX_ATTEMPTS,
	});

	const queueClient = await createQueueClient();
	const db = getDb();
	const orchestrator = new WordEnrichmentOrchestrator(
		new LLMClientAdapter(),
		new DrizzleWordRepository(db),
		{
			errorHandler: new ErrorHandler({
				store: new DrizzleFailureStore(db),
				notifySlack: true,
			}),
		}
	);
	const handler = new JobHandler(orchestrator, queueClient, env.WORKER_MAX_ATTEMPTS);

	async function runJob(job: EnrichmentJobMessage) {
		const startedAt = Date.now();
		try {
			console.info('[worker] processing job', {
				jobId: job.jobId,
				headword: job.headword,
				attempt: job.attempt,
			});
			const outcome = await handler.handle(job);
			console.info('[worker] job finished', {
				jobId: job.jobId,
				outcome,
				durationMs: Date.now() - startedAt,
			});
		} catch (err) {
			console.error('[worker] job failed', { jobId: job.jobId, err });
		} finally {
			running.delete(job.jobId);
		}
	}

	async function loop() {
		while (!stopped) {
			try {
				if (running.size >= concurrency) {
					await sleep(SHORT_WAIT_MS);
					continue;
				}

				const job = await queueClient.pop();
				if (!job) {
					await sleep(pollIntervalMs);
					continue;
				}

				// 同一個 job 不並行處理
				if (await requeueIfRunning(job, running, queueClient)) {
					await sleep(SHORT_WAIT_MS);
					continue;
				}

				running.add(job.jobId);
				void runJob(job);
			} catch (err) {
				console.error('[worker] loop error', err);
				await sleep(pollIntervalMs);
			}
		}
	}

	async function shutdown() {
		if (stopped) return;
		stopped = true;
		console.info('[worker] shutdown requested, waiting for running jobs', {
			runningCount: running.size,
		});
		const startWait = Date.now();
		while (running.size > 0 && Date.now() - startWait < SHUTDOWN_TIMEOUT_MS) {
			await sleep(SHORT_WAIT_MS);
		}
		await queueClient.close();
		try {
			await closeDb();
		} catch (e) {
			console.warn('[worker] error closing database pool', e);
		}
		console.info('[worker] exiting');
		process.exit(0);
	}

	const onSignal = () => {
		shutdown().catch((e) => {
			console.error('[worker] shutdown error', e);
			process.exit(1);
		});
	};
	process.on('SIGINT', onSignal);
	process.on('SIGTERM', onSignal);

	await loop();
}

// allow running directly
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
	main().catch((e) => {
		console.error('[worker] fatal error', e);
		process.exit(1);
	});
}
