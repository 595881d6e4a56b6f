import type { LanguageCode } from "./schemas";
import type { SenseDraft, SenseIdentity } from "./types";

/**
 * 各步驟使用的 temperature。
 */
export const STEP_TEMPERATURES = {
  coreDetails: 0.3,
  coreLanguageDetails: 0.4,
  senseDetails: 0.4,
  linkChains: 0.7,
} as const;

export interface SensePromptContext {
  headword: string;
  sourceLanguage: LanguageCode;
  targetLanguage: LanguageCode;
  partOfSpeech: string;
  sourceDescription: string;
}

/**
 * PromptToolkit 提供 enrichment 四個 LLM 呼叫的 prompt 模板與占位符注入。
 * JSON 格式要求由 LLMClientAdapter 依 schema 統一附加，這裡只描述內容。
 */
export class PromptToolkit {
  /**
   * Step 2：核心資料與詞義辨識。
   * @param existingSenses 既有詞義，請模型在同一詞義時沿用原本的描述文字
   */
  getCoreDetailsPrompt(headword: string, sourceLanguage: LanguageCode, existingSenses: SenseIdentity[]): string {
    const known =
      existingSenses.length > 0
        ? `
Senses already recorded for this word (if one of your senses is the same meaning, reuse its part_of_speech and brief_description EXACTLY as written):
${existingSenses.map((sense) => `- (${sense.partOfSpeech}) ${sense.briefDescription}`).join("\n")}`
        : "";

    return `Analyze the word "${headword}" (language: ${sourceLanguage}).
Provide its core linguistic details:
- pronunciation: IPA and a phonetic spelling if applicable, or null
- frequency_rank: estimated integer rank among common words of the language, or null
- register: e.g. formal, informal, neutral, or null
- senses: the distinct senses of the word, each with "part_of_speech" and a concise "brief_description" written in ${sourceLanguage}${known}`;
  }

  /**
   * Step 3：以目標語言撰寫的核心說明。
   */
  getCoreLanguageDetailsPrompt(headword: string, sourceLanguage: LanguageCode, targetLanguage: LanguageCode): string {
    return `For the word "${headword}" (language: ${sourceLanguage}), write the following for a learner whose language is ${targetLanguage}. Write every explanation in ${targetLanguage}; keep quoted words of ${sourceLanguage} in their original form.
- etymology: brief origin of the word, or null
- collocations: common word combinations with "${headword}" (in ${sourceLanguage}), or null
- semantic_relations: synonyms, antonyms and related_concepts (words in ${sourceLanguage}), or null
- usage_notes: short notes on how the word is used, or null`;
  }

  /**
   * Step 4a：單一詞義的目標語言細節。
   */
  getSenseDetailsPrompt(context: SensePromptContext): string {
    const { headword, sourceLanguage, targetLanguage, partOfSpeech, sourceDescription } = context;
    return `For the word "${headword}" (${sourceLanguage}), specifically the ${partOfSpeech} sense meaning "${sourceDescription}":
- definition: a clear definition of this sense written in ${targetLanguage} (language "${targetLanguage}")
- translations: translations of this sense into ${targetLanguage}, each with an optional nuance note
- examples: 2-3 example sentences in ${sourceLanguage} using this sense, each with its "translation" into ${targetLanguage} and an estimated "cefr_level" (A1-C2)
- sense_register: register specific to this sense, or null
- sense_collocations: collocations specific to this sense, or null
- sense_semantic_relations: synonyms, antonyms and related_concepts specific to this sense, or null`;
  }

  /**
   * Step 4b：單一詞義的記憶聯想鏈。
   * @param count 需要產生的數量
   */
  getLinkChainsPrompt(context: SensePromptContext, sense: SenseDraft, count: number): string {
    const { headword, sourceLanguage, targetLanguage, partOfSpeech, sourceDescription } = context;
    const targetDefinition = sense.definitions?.find((definition) => definition.language === targetLanguage)?.text;
    const meaning = targetDefinition ? `${sourceDescription} / ${targetDefinition}` : sourceDescription;

    return `Create exactly ${count} distinct, creative and memorable mnemonic link chain(s) that help a speaker of ${targetLanguage} remember the ${sourceLanguage} word "${headword}" (${partOfSpeech}) meaning "${meaning}".
Each chain must include:
- syllables: the word split into syllables
- syllable_links: for each syllable, a concrete, imageable keyword noun that sounds like it ("keyword_noun") and the language of that keyword ("keyword_language", a language code)
- narrative: a short vivid story in ${targetLanguage} linking the keywords to the meaning
- mnemonic_rhyme: an optional short rhyme in ${targetLanguage}, or null
- explanation: one sentence in ${targetLanguage} explaining how the chain maps to the meaning, or null
- image_data: an object whose "prompt" describes a single illustration of the narrative`;
  }
}
