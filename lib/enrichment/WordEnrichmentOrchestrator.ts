import { randomUUID } from "node:crypto";
import { env } from "../utils/env";
import type { StructuredGenerator } from "../llm/types";
import { isLlmError } from "../llm/types";
import type { WordRepository } from "../storage/WordRepository";
import ErrorHandler, { type FailureRecorder } from "./ErrorHandler";
import {
  coreDetailsSchema,
  coreLanguageDetailsSchema,
  linkChainsSchema,
  senseDetailsSchema,
  type CoreDetailsResponse,
} from "./llmSchemas";
import {
  countLinkChainsForLanguage,
  extractCoreDetails,
  extractSenseIdentities,
  findSenseInWorking,
  mergeMultilingualData,
  mergeOrCreateSense,
  missingMultilingualFields,
  senseHasTargetLanguageDetails,
  sourceDefinitionText,
} from "./MergeHelpers";
import { PromptToolkit, STEP_TEMPERATURES, type SensePromptContext } from "./PromptToolkit";
import { ResultAssembler } from "./ResultAssembler";
import type { LanguageCode, Pronunciation, Word } from "./schemas";
import type { BatchInfo, EnrichmentRequest, EnrichmentStep, SenseDraft, WordDraft } from "./types";

export interface WordEnrichmentOrchestratorOptions {
  errorHandler?: FailureRecorder;
  /** 每個 (詞義, 目標語言) 最多保留的 link chain 數 */
  maxChainsPerSense?: number;
  prompts?: PromptToolkit;
  assembler?: ResultAssembler;
}

/**
 * 致命步驟失敗時在流程內部拋出，由 runEnrichment 統一轉為 null。
 */
class FatalStepError extends Error {
  constructor(
    readonly step: EnrichmentStep,
    message: string,
    readonly detail?: unknown,
  ) {
    super(message);
    this.name = "FatalStepError";
  }
}

interface RunContext {
  request: EnrichmentRequest;
  headword: string;
  sourceLanguage: LanguageCode;
  targetLanguage: LanguageCode;
  force: boolean;
  batchInfo: BatchInfo;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

function toPronunciation(value: CoreDetailsResponse["pronunciation"]): Pronunciation | null {
  if (!value) return null;
  const audioUrl = value.audio_url && isHttpUrl(value.audio_url) ? value.audio_url : null;
  if (!value.ipa && !value.phonetic_spelling && !audioUrl) return null;
  return {
    ipa: value.ipa,
    phoneticSpelling: value.phonetic_spelling,
    audioUrl,
  };
}

/**
 * WordEnrichmentOrchestrator
 *
 * 以六個依序執行的步驟補齊一個詞條的多語言資料：
 *  1. load_or_init：讀取既有紀錄或建立空白草稿
 *  2. core_details_and_senses：核心資料與詞義辨識（致命）
 *  3. core_language_details：目標語言的語源 / 搭配詞 / 語義關係 / 用法說明
 *  4. 逐一詞義：sense_details 與 link_chains
 *  5. final_assembly：組裝並驗證最終 Word（致命）
 *  6. persist：寫回儲存層（致命）
 *
 * 步驟 3、4 失敗只記 log，沿用既有資料繼續；致命失敗交由 ErrorHandler 記錄後回傳 null。
 * runEnrichment 不會拋出錯誤。
 */
export class WordEnrichmentOrchestrator {
  private readonly errorHandler: FailureRecorder;
  private readonly maxChainsPerSense: number;
  private readonly prompts: PromptToolkit;
  private readonly assembler: ResultAssembler;

  constructor(
    private readonly llm: StructuredGenerator,
    private readonly repository: WordRepository,
    options: WordEnrichmentOrchestratorOptions = {},
  ) {
    this.errorHandler = options.errorHandler ?? new ErrorHandler();
    this.maxChainsPerSense = options.maxChainsPerSense ?? env.MAX_LINK_CHAINS_PER_SENSE;
    this.prompts = options.prompts ?? new PromptToolkit();
    this.assembler = options.assembler ?? new ResultAssembler();
  }

  /**
   * 執行一次完整的 enrichment。
   *
   * @returns 儲存後重新讀出的 Word；任何致命失敗回傳 null
   */
  async runEnrichment(request: EnrichmentRequest): Promise<Word | null> {
    const ctx: RunContext = {
      request,
      headword: request.headword.trim(),
      sourceLanguage: request.sourceLanguage,
      targetLanguage: request.targetLanguage,
      force: request.forceReenrich ?? false,
      batchInfo: request.batchInfo ?? { batchId: randomUUID(), tags: [] },
    };
    let currentStep: EnrichmentStep = "load_or_init";

    console.info("[WordEnrichmentOrchestrator] enrichment started", {
      headword: ctx.headword,
      sourceLanguage: ctx.sourceLanguage,
      targetLanguage: ctx.targetLanguage,
      provider: request.provider,
      model: request.model,
      force: ctx.force,
      batchId: ctx.batchInfo.batchId,
    });

    try {
      // 1) 讀取既有紀錄或初始化
      const { wordId, existing, working } = await this.loadOrInit(ctx);

      // 2) 核心資料與詞義辨識
      currentStep = "core_details_and_senses";
      if (existing && existing.senses.length > 0 && !ctx.force) {
        console.info("[WordEnrichmentOrchestrator] skipping core details, senses already present", {
          wordId,
          senses: existing.senses.length,
        });
      } else {
        await this.discoverSenses(ctx, working, existing);
      }

      // 3) 目標語言核心說明
      currentStep = "core_language_details";
      await this.enrichCoreLanguageDetails(ctx, working);

      // 4) 逐一詞義處理（依序執行，保持 senses 順序）
      const senses = working.senses ?? [];
      for (let index = 0; index < senses.length; index++) {
        const sense = senses[index];
        if (!sense) continue;
        currentStep = "sense_details";
        const detailed = await this.enrichSenseDetails(ctx, sense);
        currentStep = "link_chains";
        senses[index] = await this.enrichLinkChains(ctx, detailed);
      }
      working.senses = senses;

      // 5) 組裝最終 Word
      currentStep = "final_assembly";
      const assembled = this.assembler.assembleWord(working, wordId, ctx.batchInfo);
      if (!assembled.ok) {
        console.error("[WordEnrichmentOrchestrator] final assembly failed validation", {
          wordId,
          issues: assembled.error.issues,
          draft: assembled.draft,
        });
        throw new FatalStepError("final_assembly", "assembled word failed validation", assembled.error);
      }

      // 6) 寫回儲存層
      currentStep = "persist";
      const saved = await this.repository.save(assembled.word);
      if (!saved) {
        throw new FatalStepError("persist", `failed to save word ${wordId}`);
      }

      console.info("[WordEnrichmentOrchestrator] enrichment completed", {
        wordId,
        headword: ctx.headword,
        targetLanguage: ctx.targetLanguage,
        senses: saved.senses.length,
      });
      return saved;
    } catch (err) {
      const step = err instanceof FatalStepError ? err.step : currentStep;
      if (!(err instanceof FatalStepError)) {
        console.error("[WordEnrichmentOrchestrator] unexpected error during step", {
          step,
          headword: ctx.headword,
          error: err,
        });
      }
      await this.reportFailure(ctx, step, err instanceof FatalStepError ? (err.detail ?? err) : err);
      return null;
    }
  }

  private async loadOrInit(ctx: RunContext): Promise<{ wordId: string; existing: Word | null; working: WordDraft }> {
    let existing: Word | null = null;
    try {
      const candidates = await this.repository.findByHeadwordAndLanguage(ctx.headword, ctx.sourceLanguage, 1);
      // 儲存層可能是前綴搜尋，再以完全相等過濾一次
      existing = candidates.find((word) => word.headword === ctx.headword) ?? null;
    } catch (err) {
      console.warn("[WordEnrichmentOrchestrator] lookup failed, treating as not found", {
        headword: ctx.headword,
        error: err,
      });
    }

    const categories = ctx.request.categories ?? [];
    const working = extractCoreDetails(existing);

    if (existing) {
      working.categories = [...new Set([...(working.categories ?? []), ...categories])];
      console.info("[WordEnrichmentOrchestrator] loaded existing word", {
        wordId: existing.wordId,
        senses: existing.senses.length,
      });
      return { wordId: existing.wordId, existing, working };
    }

    working.headword = ctx.headword;
    working.language = ctx.sourceLanguage;
    working.categories = [...new Set(categories)];
    return { wordId: randomUUID(), existing: null, working };
  }

  private async discoverSenses(ctx: RunContext, working: WordDraft, existing: Word | null): Promise<void> {
    const prompt = this.prompts.getCoreDetailsPrompt(
      ctx.headword,
      ctx.sourceLanguage,
      extractSenseIdentities(existing),
    );
    const result = await this.llm.generate({
      prompt,
      schema: coreDetailsSchema,
      provider: ctx.request.provider,
      model: ctx.request.model,
      temperature: STEP_TEMPERATURES.coreDetails,
    });

    if (isLlmError(result)) {
      throw new FatalStepError("core_details_and_senses", `core details call failed: ${result.error}`, result);
    }
    const details = result.data;
    if (details.senses.length === 0) {
      throw new FatalStepError("core_details_and_senses", "model returned no senses");
    }

    const pronunciation = toPronunciation(details.pronunciation);
    if (pronunciation && (ctx.force || !working.pronunciation)) {
      working.pronunciation = pronunciation;
    }
    if (details.frequency_rank != null && (ctx.force || working.frequencyRank == null)) {
      working.frequencyRank = details.frequency_rank;
    }
    if (details.register && (ctx.force || !working.register)) {
      working.register = details.register;
    }

    const senses = (working.senses ??= []);
    let created = 0;
    for (const info of details.senses) {
      const identity = { partOfSpeech: info.part_of_speech, briefDescription: info.brief_description };
      const match = findSenseInWorking(working, identity.partOfSpeech, identity.briefDescription);
      const merged = mergeOrCreateSense(match, identity, null, ctx.sourceLanguage, ctx.targetLanguage, ctx.force);
      if (match) {
        senses[senses.indexOf(match)] = merged;
      } else {
        senses.push(merged);
        created++;
      }
    }

    console.info("[WordEnrichmentOrchestrator] senses discovered", {
      headword: ctx.headword,
      returned: details.senses.length,
      created,
      total: senses.length,
    });
  }

  private async enrichCoreLanguageDetails(ctx: RunContext, working: WordDraft): Promise<void> {
    const missing = missingMultilingualFields(working, ctx.targetLanguage);
    if (!ctx.force && missing.length === 0) {
      console.info("[WordEnrichmentOrchestrator] skipping core language details, already present", {
        targetLanguage: ctx.targetLanguage,
      });
      return;
    }

    const result = await this.llm.generate({
      prompt: this.prompts.getCoreLanguageDetailsPrompt(ctx.headword, ctx.sourceLanguage, ctx.targetLanguage),
      schema: coreLanguageDetailsSchema,
      provider: ctx.request.provider,
      model: ctx.request.model,
      temperature: STEP_TEMPERATURES.coreLanguageDetails,
    });
    if (isLlmError(result)) {
      console.warn("[WordEnrichmentOrchestrator] core language details failed, keeping existing data", {
        targetLanguage: ctx.targetLanguage,
        reason: result.error,
      });
      return;
    }

    const updated = mergeMultilingualData(working, result.data, ctx.targetLanguage, ctx.force);
    console.info("[WordEnrichmentOrchestrator] core language details merged", {
      targetLanguage: ctx.targetLanguage,
      updated,
    });
  }

  private promptContext(ctx: RunContext, sense: SenseDraft): SensePromptContext {
    return {
      headword: ctx.headword,
      sourceLanguage: ctx.sourceLanguage,
      targetLanguage: ctx.targetLanguage,
      partOfSpeech: sense.partOfSpeech ?? "unknown",
      sourceDescription: sourceDefinitionText(sense, ctx.sourceLanguage) ?? ctx.headword,
    };
  }

  private async enrichSenseDetails(ctx: RunContext, sense: SenseDraft): Promise<SenseDraft> {
    if (!ctx.force && senseHasTargetLanguageDetails(sense, ctx.targetLanguage)) {
      return sense;
    }

    const promptContext = this.promptContext(ctx, sense);
    const result = await this.llm.generate({
      prompt: this.prompts.getSenseDetailsPrompt(promptContext),
      schema: senseDetailsSchema,
      provider: ctx.request.provider,
      model: ctx.request.model,
      temperature: STEP_TEMPERATURES.senseDetails,
    });
    if (isLlmError(result)) {
      console.warn("[WordEnrichmentOrchestrator] sense details failed, keeping existing data", {
        senseId: sense.senseId,
        reason: result.error,
      });
      return sense;
    }

    return mergeOrCreateSense(
      sense,
      { partOfSpeech: promptContext.partOfSpeech, briefDescription: promptContext.sourceDescription, senseId: sense.senseId },
      result.data,
      ctx.sourceLanguage,
      ctx.targetLanguage,
      ctx.force,
    );
  }

  private async enrichLinkChains(ctx: RunContext, sense: SenseDraft): Promise<SenseDraft> {
    if (ctx.force) {
      // 強制模式：先丟棄該目標語言的舊 chain，再要求整批新的
      sense.linkChainVariations = (sense.linkChainVariations ?? []).filter(
        (chain) => chain.targetLanguage !== ctx.targetLanguage,
      );
    }

    const chainsNeeded = Math.max(0, this.maxChainsPerSense - countLinkChainsForLanguage(sense, ctx.targetLanguage));
    if (chainsNeeded === 0) {
      return sense;
    }

    const prompt = this.prompts.getLinkChainsPrompt(this.promptContext(ctx, sense), sense, chainsNeeded);
    const result = await this.llm.generate({
      prompt,
      schema: linkChainsSchema,
      provider: ctx.request.provider,
      model: ctx.request.model,
      temperature: STEP_TEMPERATURES.linkChains,
    });
    if (isLlmError(result)) {
      console.warn("[WordEnrichmentOrchestrator] link chain generation failed", {
        senseId: sense.senseId,
        reason: result.error,
      });
      return sense;
    }

    const chains = (sense.linkChainVariations ??= []);
    let added = 0;
    for (const raw of result.data.link_chains) {
      if (added === chainsNeeded) break;
      try {
        chains.push(this.assembler.assembleLinkChain(raw, ctx.targetLanguage, prompt));
        added++;
      } catch (err) {
        console.warn("[WordEnrichmentOrchestrator] dropping link chain that failed assembly", {
          senseId: sense.senseId,
          error: err,
        });
      }
    }

    console.info("[WordEnrichmentOrchestrator] link chains added", {
      senseId: sense.senseId,
      requested: chainsNeeded,
      returned: result.data.link_chains.length,
      added,
    });
    return sense;
  }

  private async reportFailure(ctx: RunContext, step: EnrichmentStep, error: unknown): Promise<void> {
    try {
      await this.errorHandler.recordFailure(
        {
          headword: ctx.headword,
          sourceLanguage: ctx.sourceLanguage,
          targetLanguage: ctx.targetLanguage,
          step,
          batchId: ctx.batchInfo.batchId,
        },
        error,
      );
    } catch (recordErr) {
      // 記錄失敗只寫 log，不影響回傳值
      console.error("[WordEnrichmentOrchestrator] failed to record error", recordErr);
    }
  }
}
