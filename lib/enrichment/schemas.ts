import { z } from "zod";

/**
 * 詞條（Word）最終結構的 zod schema。
 *
 * 這裡的 schema 是「最終」型別：所有欄位都已補齊、所有不變條件都已檢查。
 * 流程中間狀態請使用 types.ts 的 Draft 型別，於 ResultAssembler.assembleWord 時才轉換驗證。
 */

export const LANGUAGE_CODE_PATTERN = /^[a-z]{2,3}(-[A-Z]{2})?$/;

export const LanguageCodeSchema = z
  .string()
  .regex(LANGUAGE_CODE_PATTERN, "invalid language code")
  .brand<"LanguageCode">();

export type LanguageCode = z.infer<typeof LanguageCodeSchema>;

/**
 * 以語言代碼為 key 的對照表（etymology、collocations 等皆使用）。
 */
export type LanguageMap<V> = Partial<Record<LanguageCode, V>>;

/**
 * 建立 LanguageMap 的 zod schema，key 於邊界處統一驗證。
 */
export function languageMap<V extends z.ZodTypeAny>(value: V) {
  return z.record(LanguageCodeSchema, value);
}

/**
 * 將字串轉為 LanguageCode；格式不符時拋出 ZodError。
 */
export function toLanguageCode(value: string): LanguageCode {
  return LanguageCodeSchema.parse(value);
}

/**
 * 非拋錯版本，供 CLI / worker 驗證輸入使用。
 */
export function isLanguageCode(value: string): value is LanguageCode {
  return LANGUAGE_CODE_PATTERN.test(value);
}

export const PronunciationSchema = z.object({
  ipa: z.string().nullable().optional(),
  phoneticSpelling: z.string().nullable().optional(),
  audioUrl: z.string().url().nullable().optional(),
});

export const SemanticRelationsSchema = z.object({
  synonyms: z.array(z.string()),
  antonyms: z.array(z.string()),
  relatedConcepts: z.array(z.string()),
});

export const DefinitionSchema = z.object({
  language: LanguageCodeSchema,
  text: z.string().min(1),
});

export const TranslationSchema = z.object({
  text: z.string().min(1),
  nuance: z.string().nullable().optional(),
});

export const ExampleSchema = z.object({
  text: z.string().min(1),
  language: LanguageCodeSchema,
  translations: languageMap(z.string()),
  cefrLevel: z.string().nullable().optional(),
});

export const SyllableLinkSchema = z.object({
  syllable: z.string().min(1),
  keywordNoun: z.string().min(1),
  keywordLanguage: LanguageCodeSchema,
});

export const IMAGE_DATA_TYPES = ["ai_generated", "stock", "user_uploaded", "placeholder"] as const;

export const ImageDataSchema = z.object({
  type: z.enum(IMAGE_DATA_TYPES),
  url: z.string().min(1),
  prompt: z.string().nullable().optional(),
  sourceModel: z.string().nullable().optional(),
  source: z.string().nullable().optional(),
});

export const FeedbackCountersSchema = z.object({
  upvotes: z.number().int().min(0),
  downvotes: z.number().int().min(0),
  pins: z.number().int().min(0),
});

export const LinkChainSchema = z.object({
  chainId: z.string().uuid(),
  targetLanguage: LanguageCodeSchema,
  syllables: z.array(z.string()),
  syllableLinks: z.array(SyllableLinkSchema),
  narrative: z.string().min(1),
  mnemonicRhyme: z.string().nullable().optional(),
  explanation: z.string().nullable().optional(),
  imageData: ImageDataSchema,
  validationScore: z.number().nullable().optional(),
  promptUsed: z.string().nullable().optional(),
  feedbackData: languageMap(FeedbackCountersSchema),
});

export const SenseSchema = z
  .object({
    senseId: z.string().uuid(),
    baseWordId: z.string().uuid(),
    partOfSpeech: z.string().min(1),
    definitions: z.array(DefinitionSchema),
    translations: languageMap(z.array(TranslationSchema)),
    examples: z.array(ExampleSchema),
    senseRegister: z.string().nullable().optional(),
    senseCollocations: languageMap(z.array(z.string())),
    senseSemanticRelations: languageMap(SemanticRelationsSchema),
    relatedForms: z.array(z.string()),
    cefrLevel: z.string().nullable().optional(),
    usageFrequency: z.string().nullable().optional(),
    phoneticTranscription: z.string().nullable().optional(),
    linkChainVariations: z.array(LinkChainSchema),
  })
  .superRefine((sense, ctx) => {
    const seen = new Set<string>();
    sense.definitions.forEach((definition, index) => {
      if (seen.has(definition.language)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["definitions", index, "language"],
          message: `duplicate definition language "${definition.language}"`,
        });
      }
      seen.add(definition.language);
    });
  });

export const EnrichmentInfoSchema = z.object({
  batchId: z.string().min(1),
  timestamp: z.string().datetime({ offset: true }),
  tags: z.array(z.string()),
});

export const WordSchema = z
  .object({
    wordId: z.string().uuid(),
    headword: z.string().min(1),
    language: LanguageCodeSchema,
    categories: z.array(z.string()),
    pronunciation: PronunciationSchema.nullable().optional(),
    frequencyRank: z.number().int().positive().nullable().optional(),
    register: z.string().nullable().optional(),
    etymology: languageMap(z.string()),
    collocations: languageMap(z.array(z.string())),
    semanticRelations: languageMap(SemanticRelationsSchema),
    usageNotes: languageMap(z.string()),
    senses: z.array(SenseSchema),
    enrichmentHistory: z.array(EnrichmentInfoSchema),
    createdAt: z.string().datetime({ offset: true }).optional(),
    updatedAt: z.string().datetime({ offset: true }).optional(),
  })
  .superRefine((word, ctx) => {
    word.senses.forEach((sense, index) => {
      if (sense.baseWordId !== word.wordId) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["senses", index, "baseWordId"],
          message: "sense.baseWordId must equal word.wordId",
        });
      }
    });
  });

export type Pronunciation = z.infer<typeof PronunciationSchema>;
export type SemanticRelations = z.infer<typeof SemanticRelationsSchema>;
export type Definition = z.infer<typeof DefinitionSchema>;
export type Translation = z.infer<typeof TranslationSchema>;
export type Example = z.infer<typeof ExampleSchema>;
export type SyllableLink = z.infer<typeof SyllableLinkSchema>;
export type ImageData = z.infer<typeof ImageDataSchema>;
export type FeedbackCounters = z.infer<typeof FeedbackCountersSchema>;
export type LinkChain = z.infer<typeof LinkChainSchema>;
export type Sense = z.infer<typeof SenseSchema>;
export type EnrichmentInfo = z.infer<typeof EnrichmentInfoSchema>;
export type Word = z.infer<typeof WordSchema>;
