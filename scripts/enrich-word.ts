import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import { closeDb, getDb } from '../db/client';
import { DrizzleFailureStore, ErrorHandler } from '../lib/enrichment/ErrorHandler';
import { WordEnrichmentOrchestrator } from '../lib/enrichment/WordEnrichmentOrchestrator';
import { LLMClientAdapter } from '../lib/llm/LLMClientAdapter';
import { DrizzleWordRepository } from '../lib/storage/WordRepository';
import { createQueueClient } from '../worker/queueClient';
import { parseEnrichArgs, USAGE, type EnrichOptions } from './enrich-options';

async function enqueue(options: EnrichOptions): Promise<void> {
  const queue = await createQueueClient();
  try {
    const jobId = randomUUID();
    await queue.push({
      jobId,
      headword: options.headword,
      sourceLanguage: options.sourceLanguage,
      targetLanguage: options.targetLanguage,
      categories: options.categories,
      provider: options.provider,
      model: options.model,
      forceReenrich: options.force,
      batchId: options.batchId,
      tags: options.tags,
      attempt: 0,
      timestamp: Date.now(),
    });
    console.log(JSON.stringify({ enqueued: jobId }));
  } finally {
    await queue.close();
  }
}

async function enrich(options: EnrichOptions): Promise<boolean> {
  const db = getDb();
  const orchestrator = new WordEnrichmentOrchestrator(new LLMClientAdapter(), new DrizzleWordRepository(db), {
    errorHandler: new ErrorHandler({ store: new DrizzleFailureStore(db) }),
  });

  try {
    const word = await orchestrator.runEnrichment({
      headword: options.headword,
      sourceLanguage: options.sourceLanguage,
      targetLanguage: options.targetLanguage,
      categories: options.categories,
      provider: options.provider,
      model: options.model,
      forceReenrich: options.force,
      batchInfo: { batchId: options.batchId ?? randomUUID(), tags: options.tags },
    });
    if (!word) {
      console.error(`Enrichment failed for "${options.headword}" (${options.sourceLanguage} -> ${options.targetLanguage})`);
      return false;
    }
    console.log(JSON.stringify(word, null, 2));
    return true;
  } finally {
    await closeDb();
  }
}

async function main(): Promise<void> {
  let options: EnrichOptions;
  try {
    options = parseEnrichArgs(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  if (options.enqueue) {
    await enqueue(options);
    return;
  }
  if (!(await enrich(options))) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('Failed to enrich word', error);
  process.exit(1);
});
