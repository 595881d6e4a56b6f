import { randomUUID } from "node:crypto";
import type { CoreLanguageDetailsResponse, LlmSemanticRelations, SenseDetailsResponse } from "./llmSchemas";
import type { Example, LanguageCode, LanguageMap, SemanticRelations, Word } from "./schemas";
import type { SenseDraft, SenseIdentity, WordDraft } from "./types";

/**
 * 合併 / 組裝輔助函式。
 *
 * 全部作用於 Draft 結構：既有紀錄先投影成可變的草稿，再依「已存在則略過，除非 force」規則
 * 寫入新產生的資料。這些函式不呼叫 LLM、不碰儲存層。
 */

export type MultilingualField = "etymology" | "usageNotes" | "collocations" | "semanticRelations";

export const MULTILINGUAL_FIELDS: readonly MultilingualField[] = [
  "etymology",
  "collocations",
  "semanticRelations",
  "usageNotes",
];

/**
 * 將既有 Word 投影為可變的草稿；沒有既有紀錄時回傳空結構。
 * 回傳值與輸入不共用任何參照。
 */
export function extractCoreDetails(existing: Word | null): WordDraft {
  if (!existing) {
    return {
      categories: [],
      pronunciation: null,
      frequencyRank: null,
      register: null,
      etymology: {},
      collocations: {},
      semanticRelations: {},
      usageNotes: {},
      senses: [],
      enrichmentHistory: [],
    };
  }

  const copy = structuredClone(existing);
  return {
    headword: copy.headword,
    language: copy.language,
    categories: copy.categories,
    pronunciation: copy.pronunciation ?? null,
    frequencyRank: copy.frequencyRank ?? null,
    register: copy.register ?? null,
    etymology: copy.etymology,
    collocations: copy.collocations,
    semanticRelations: copy.semanticRelations,
    usageNotes: copy.usageNotes,
    senses: copy.senses,
    enrichmentHistory: copy.enrichmentHistory,
    createdAt: copy.createdAt,
  };
}

/**
 * 取得詞義的來源語言定義文字（內容識別的一半）。
 */
export function sourceDefinitionText(sense: SenseDraft, sourceLang: LanguageCode): string | undefined {
  return sense.definitions?.find((definition) => definition.language === sourceLang)?.text;
}

/**
 * 列出既有詞義的識別資訊，供 prompt 與比對使用。
 * 沒有來源語言定義的詞義無法被內容識別，因此不列出。
 */
export function extractSenseIdentities(existing: Word | WordDraft | null): SenseIdentity[] {
  if (!existing?.language) return [];
  const sourceLang = existing.language;
  const identities: SenseIdentity[] = [];
  for (const sense of existing.senses ?? []) {
    const briefDescription = sourceDefinitionText(sense, sourceLang);
    if (!sense.partOfSpeech || !briefDescription) continue;
    identities.push({ partOfSpeech: sense.partOfSpeech, briefDescription, senseId: sense.senseId });
  }
  return identities;
}

/**
 * 模型輸出的語義關係整筆轉換；缺少的清單一律補成空陣列。
 */
export function toSemanticRelations(value: LlmSemanticRelations): SemanticRelations {
  return {
    synonyms: value.synonyms ?? [],
    antonyms: value.antonyms ?? [],
    relatedConcepts: value.related_concepts ?? [],
  };
}

function shouldWrite<V>(map: LanguageMap<V>, languageCode: LanguageCode, forceOverwrite: boolean): boolean {
  return forceOverwrite || map[languageCode] === undefined;
}

/**
 * 將單一語言的核心資料寫入 etymology / usageNotes / collocations / semanticRelations。
 * 該語言 key 不存在或 forceOverwrite 時才寫入；semanticRelations 整筆取代，不做欄位層級合併。
 *
 * @returns 實際被寫入的欄位名稱
 */
export function mergeMultilingualData(
  working: WordDraft,
  output: CoreLanguageDetailsResponse,
  languageCode: LanguageCode,
  forceOverwrite: boolean,
): MultilingualField[] {
  const updated: MultilingualField[] = [];
  const etymology = (working.etymology ??= {});
  const usageNotes = (working.usageNotes ??= {});
  const collocations = (working.collocations ??= {});
  const semanticRelations = (working.semanticRelations ??= {});

  if (output.etymology && shouldWrite(etymology, languageCode, forceOverwrite)) {
    etymology[languageCode] = output.etymology;
    updated.push("etymology");
  }
  if (output.usage_notes && shouldWrite(usageNotes, languageCode, forceOverwrite)) {
    usageNotes[languageCode] = output.usage_notes;
    updated.push("usageNotes");
  }
  if (output.collocations && output.collocations.length > 0 && shouldWrite(collocations, languageCode, forceOverwrite)) {
    collocations[languageCode] = [...output.collocations];
    updated.push("collocations");
  }
  if (output.semantic_relations && shouldWrite(semanticRelations, languageCode, forceOverwrite)) {
    semanticRelations[languageCode] = toSemanticRelations(output.semantic_relations);
    updated.push("semanticRelations");
  }
  return updated;
}

/**
 * 目標語言缺少哪些核心欄位；空陣列表示 step 3 可以略過。
 */
export function missingMultilingualFields(working: WordDraft, languageCode: LanguageCode): MultilingualField[] {
  return MULTILINGUAL_FIELDS.filter((field) => working[field]?.[languageCode] === undefined);
}

/**
 * 以 (partOfSpeech, 來源語言定義文字) 線性搜尋詞義。
 * 定義文字一旦被修改就無法再比對到原詞義，這是內容識別的既有行為。
 */
export function findSenseInWorking(working: WordDraft, partOfSpeech: string, description: string): SenseDraft | null {
  const sourceLang = working.language;
  if (!sourceLang) return null;
  return (
    working.senses?.find(
      (sense) => sense.partOfSpeech === partOfSpeech && sourceDefinitionText(sense, sourceLang) === description,
    ) ?? null
  );
}

function toExamples(details: SenseDetailsResponse, sourceLang: LanguageCode, targetLang: LanguageCode): Example[] {
  return details.examples.map((example) => {
    const translations: LanguageMap<string> = {};
    if (example.translation) {
      translations[targetLang] = example.translation;
    }
    return {
      text: example.text,
      language: sourceLang,
      translations,
      cefrLevel: example.cefr_level ?? null,
    };
  });
}

/**
 * 由既有詞義（或新建骨架）合併單一詞義的目標語言細節。
 *
 * - definitions：目標語言定義不存在或 force 時寫入（每種語言只保留一筆）
 * - translations[target] / senseCollocations[target] / senseSemanticRelations[target]：不存在或 force 時整筆寫入
 * - examples：force 時整批取代，否則附加在後（不去重）
 * - senseRegister：目前為空或 force 時寫入
 */
export function mergeOrCreateSense(
  existingSense: SenseDraft | null,
  identity: SenseIdentity,
  details: SenseDetailsResponse | null,
  sourceLang: LanguageCode,
  targetLang: LanguageCode,
  forceOverwrite: boolean,
): SenseDraft {
  const sense: SenseDraft = existingSense
    ? structuredClone(existingSense)
    : {
        senseId: identity.senseId ?? randomUUID(),
        partOfSpeech: identity.partOfSpeech,
        definitions: [{ language: sourceLang, text: identity.briefDescription }],
        translations: {},
        examples: [],
        senseRegister: null,
        senseCollocations: {},
        senseSemanticRelations: {},
        relatedForms: [],
        linkChainVariations: [],
      };

  sense.senseId ??= identity.senseId ?? randomUUID();
  sense.partOfSpeech ??= identity.partOfSpeech;

  if (!details) {
    return sense;
  }

  const definitions = (sense.definitions ??= []);
  // 來源語言定義是識別依據，目標語言與來源相同時不覆寫
  if (details.definition && targetLang !== sourceLang) {
    const index = definitions.findIndex((definition) => definition.language === targetLang);
    if (index === -1) {
      definitions.push({ language: targetLang, text: details.definition.text });
    } else if (forceOverwrite) {
      definitions[index] = { language: targetLang, text: details.definition.text };
    }
  }

  const translations = (sense.translations ??= {});
  if (details.translations.length > 0 && shouldWrite(translations, targetLang, forceOverwrite)) {
    translations[targetLang] = details.translations.map((translation) => ({
      text: translation.text,
      nuance: translation.nuance ?? null,
    }));
  }

  const newExamples = toExamples(details, sourceLang, targetLang);
  // 回覆沒有例句時，即使 forceOverwrite 也保留原本的例句
  if (newExamples.length > 0) {
    sense.examples = forceOverwrite ? newExamples : [...(sense.examples ?? []), ...newExamples];
  }

  if (details.sense_register && (forceOverwrite || sense.senseRegister == null)) {
    sense.senseRegister = details.sense_register;
  }

  const senseCollocations = (sense.senseCollocations ??= {});
  if (
    details.sense_collocations &&
    details.sense_collocations.length > 0 &&
    shouldWrite(senseCollocations, targetLang, forceOverwrite)
  ) {
    senseCollocations[targetLang] = [...details.sense_collocations];
  }

  const senseSemanticRelations = (sense.senseSemanticRelations ??= {});
  if (details.sense_semantic_relations && shouldWrite(senseSemanticRelations, targetLang, forceOverwrite)) {
    senseSemanticRelations[targetLang] = toSemanticRelations(details.sense_semantic_relations);
  }

  return sense;
}

/**
 * 詞義是否已經有目標語言的定義或翻譯。
 */
export function senseHasTargetLanguageDetails(sense: SenseDraft, targetLang: LanguageCode): boolean {
  const hasDefinition = sense.definitions?.some((definition) => definition.language === targetLang) ?? false;
  const hasTranslations = (sense.translations?.[targetLang]?.length ?? 0) > 0;
  return hasDefinition || hasTranslations;
}

/**
 * 計算詞義中指定目標語言的 link chain 數量。
 * 清單裡可能同時有已組裝完成的 LinkChain 與草稿物件，兩者都以 targetLanguage 判斷。
 */
export function countLinkChainsForLanguage(sense: SenseDraft, targetLang: LanguageCode): number {
  return (sense.linkChainVariations ?? []).filter((chain) => chain.targetLanguage === targetLang).length;
}
