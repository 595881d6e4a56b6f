import { randomUUID } from "node:crypto";
import type { z } from "zod";
import type { LlmLinkChain } from "./llmSchemas";
import {
  LinkChainSchema,
  WordSchema,
  isLanguageCode,
  type ImageData,
  type LanguageCode,
  type LinkChain,
  type SyllableLink,
  type Word,
} from "./schemas";
import type { BatchInfo, LinkChainDraft, SenseDraft, WordDraft } from "./types";

export const PENDING_IMAGE_PLACEHOLDER_URL = "https://placehold.co/1024x1024/png?text=Image+Pending";
export const MISSING_IMAGE_PLACEHOLDER_URL = "https://placehold.co/1024x1024/png?text=Image+Missing";
export const MISSING_IMAGE_PROMPT_MARKER = "[image prompt missing]";

export type AssembleWordResult = { ok: true; word: Word } | { ok: false; error: z.ZodError; draft: unknown };

/**
 * ResultAssembler 負責把流程中的草稿轉為最終結構：
 * - assembleLinkChain：模型輸出的單條 link chain -> LinkChain（含圖片占位資料）
 * - assembleWord：WordDraft -> Word（最後一道 schema 驗證）
 */
export class ResultAssembler {
  /**
   * 由模型輸出決定 imageData。
   * 有 prompt -> pending 占位；有 image_data 但沒有 prompt 或完全沒有 image_data -> missing 占位。
   */
  resolveImageData(chain: LlmLinkChain): ImageData {
    const imageData = chain.image_data;
    const prompt = imageData?.prompt?.trim();

    if (prompt) {
      return {
        type: "placeholder",
        url: PENDING_IMAGE_PLACEHOLDER_URL,
        prompt,
        sourceModel: null,
        source: "llm_prompt",
      };
    }

    if (imageData) {
      console.warn("[ResultAssembler] image_data supplied without a prompt; treating as missing", {
        imageData,
      });
    }

    return {
      type: "placeholder",
      url: MISSING_IMAGE_PLACEHOLDER_URL,
      prompt: MISSING_IMAGE_PROMPT_MARKER,
      sourceModel: null,
      source: "missing_prompt",
    };
  }

  /**
   * 組裝單條 LinkChain；結果不符合 LinkChainSchema（例如沒有 narrative）時拋出 ZodError，
   * 呼叫端應記錄並略過該條。
   */
  assembleLinkChain(chain: LlmLinkChain, targetLang: LanguageCode, promptUsed?: string): LinkChain {
    const syllableLinks: SyllableLink[] = [];
    for (const link of chain.syllable_links) {
      if (!isLanguageCode(link.keyword_language)) {
        console.warn("[ResultAssembler] dropping syllable link with invalid keyword_language", { link });
        continue;
      }
      syllableLinks.push({
        syllable: link.syllable,
        keywordNoun: link.keyword_noun,
        keywordLanguage: link.keyword_language,
      });
    }

    const draft: LinkChainDraft = {
      chainId: randomUUID(),
      targetLanguage: targetLang,
      syllables: chain.syllables,
      syllableLinks,
      narrative: chain.narrative ?? undefined,
      mnemonicRhyme: chain.mnemonic_rhyme ?? null,
      explanation: chain.explanation ?? null,
      imageData: this.resolveImageData(chain),
      validationScore: null,
      promptUsed: promptUsed ?? null,
      feedbackData: {},
    };

    return LinkChainSchema.parse(draft);
  }

  private completeSense(sense: SenseDraft, wordId: string): unknown {
    return {
      ...sense,
      baseWordId: wordId,
      definitions: sense.definitions ?? [],
      translations: sense.translations ?? {},
      examples: sense.examples ?? [],
      senseCollocations: sense.senseCollocations ?? {},
      senseSemanticRelations: sense.senseSemanticRelations ?? {},
      relatedForms: sense.relatedForms ?? [],
      linkChainVariations: sense.linkChainVariations ?? [],
    };
  }

  /**
   * 由草稿建立最終 Word：補齊預設值、強制 baseWordId、附加一筆 enrichmentHistory 後整體驗證。
   */
  assembleWord(draft: WordDraft, wordId: string, batchInfo: BatchInfo, now: Date = new Date()): AssembleWordResult {
    const candidate = {
      wordId,
      headword: draft.headword,
      language: draft.language,
      categories: draft.categories ?? [],
      pronunciation: draft.pronunciation ?? null,
      frequencyRank: draft.frequencyRank ?? null,
      register: draft.register ?? null,
      etymology: draft.etymology ?? {},
      collocations: draft.collocations ?? {},
      semanticRelations: draft.semanticRelations ?? {},
      usageNotes: draft.usageNotes ?? {},
      senses: (draft.senses ?? []).map((sense) => this.completeSense(sense, wordId)),
      enrichmentHistory: [
        ...(draft.enrichmentHistory ?? []),
        { batchId: batchInfo.batchId, timestamp: now.toISOString(), tags: batchInfo.tags ?? [] },
      ],
      createdAt: draft.createdAt,
    };

    const parsed = WordSchema.safeParse(candidate);
    if (!parsed.success) {
      return { ok: false, error: parsed.error, draft: candidate };
    }
    return { ok: true, word: parsed.data };
  }
}
