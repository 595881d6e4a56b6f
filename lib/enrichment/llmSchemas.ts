import { z } from "zod";
import type { StructuredSchema } from "../llm/types";

/**
 * 模型回傳的中間結構（snake_case，與 prompt 中要求的格式一致）。
 * 這些 schema 只驗證「形狀」，語言代碼等領域規則留給 MergeHelpers / ResultAssembler。
 */

const optionalText = z.string().nullish();
const optionalList = z.array(z.string()).nullish();

const LlmSemanticRelationsSchema = z.object({
  synonyms: optionalList,
  antonyms: optionalList,
  related_concepts: optionalList,
});

// 模型常把 IPA 寫成大寫 key，兩種都接受
const LlmPronunciationSchema = z
  .object({
    ipa: optionalText,
    IPA: optionalText,
    phonetic_spelling: optionalText,
    audio_url: optionalText,
  })
  .transform((value) => ({
    ipa: value.ipa ?? value.IPA ?? null,
    phonetic_spelling: value.phonetic_spelling ?? null,
    audio_url: value.audio_url ?? null,
  }));

export const LlmSenseInfoSchema = z.object({
  part_of_speech: z.string().min(1),
  brief_description: z.string().min(1),
});

export const CoreDetailsResponseSchema = z.object({
  pronunciation: LlmPronunciationSchema.nullish(),
  frequency_rank: z.number().int().positive().nullish(),
  register: optionalText,
  senses: z.array(LlmSenseInfoSchema),
});

export const CoreLanguageDetailsResponseSchema = z.object({
  etymology: optionalText,
  collocations: optionalList,
  semantic_relations: LlmSemanticRelationsSchema.nullish(),
  usage_notes: optionalText,
});

export const SenseDetailsResponseSchema = z.object({
  definition: z
    .object({
      text: z.string().min(1),
      language: z.string().nullish(),
    })
    .nullish(),
  translations: z
    .array(
      z.object({
        text: z.string().min(1),
        nuance: optionalText,
      }),
    )
    .default([]),
  examples: z
    .array(
      z.object({
        text: z.string().min(1),
        translation: optionalText,
        cefr_level: optionalText,
      }),
    )
    .default([]),
  sense_register: optionalText,
  sense_collocations: optionalList,
  sense_semantic_relations: LlmSemanticRelationsSchema.nullish(),
});

// narrative 在這一層刻意為 optional：單一條 chain 不完整時只丟棄該條，不讓整批回應失敗
export const LlmLinkChainSchema = z.object({
  syllables: z.array(z.string()).default([]),
  syllable_links: z
    .array(
      z.object({
        syllable: z.string(),
        keyword_noun: z.string(),
        keyword_language: z.string(),
      }),
    )
    .default([]),
  narrative: optionalText,
  mnemonic_rhyme: optionalText,
  explanation: optionalText,
  image_data: z
    .object({
      prompt: optionalText,
      type: optionalText,
      url: optionalText,
    })
    .nullish(),
});

export const LinkChainsResponseSchema = z.object({
  link_chains: z.array(LlmLinkChainSchema),
});

export type LlmSemanticRelations = z.infer<typeof LlmSemanticRelationsSchema>;
export type LlmSenseInfo = z.infer<typeof LlmSenseInfoSchema>;
export type CoreDetailsResponse = z.infer<typeof CoreDetailsResponseSchema>;
export type CoreLanguageDetailsResponse = z.infer<typeof CoreLanguageDetailsResponseSchema>;
export type SenseDetailsResponse = z.infer<typeof SenseDetailsResponseSchema>;
export type LlmLinkChain = z.infer<typeof LlmLinkChainSchema>;
export type LinkChainsResponse = z.infer<typeof LinkChainsResponseSchema>;

const SEMANTIC_RELATIONS_SHAPE =
  '{"synonyms": string[], "antonyms": string[], "related_concepts": string[]}';

export const coreDetailsSchema: StructuredSchema<CoreDetailsResponse> = {
  name: "CoreDetailsResponse",
  shape:
    '{"pronunciation": {"ipa": string, "phonetic_spelling": string | null} | null, "frequency_rank": number | null, "register": string | null, "senses": [{"part_of_speech": string, "brief_description": string}]}',
  schema: CoreDetailsResponseSchema,
};

export const coreLanguageDetailsSchema: StructuredSchema<CoreLanguageDetailsResponse> = {
  name: "CoreLanguageDetailsResponse",
  shape: `{"etymology": string | null, "collocations": string[] | null, "semantic_relations": ${SEMANTIC_RELATIONS_SHAPE} | null, "usage_notes": string | null}`,
  schema: CoreLanguageDetailsResponseSchema,
};

export const senseDetailsSchema: StructuredSchema<SenseDetailsResponse> = {
  name: "SenseDetailsResponse",
  shape: `{"definition": {"text": string, "language": string}, "translations": [{"text": string, "nuance": string | null}], "examples": [{"text": string, "translation": string, "cefr_level": string | null}], "sense_register": string | null, "sense_collocations": string[] | null, "sense_semantic_relations": ${SEMANTIC_RELATIONS_SHAPE} | null}`,
  schema: SenseDetailsResponseSchema,
};

export const linkChainsSchema: StructuredSchema<LinkChainsResponse> = {
  name: "LinkChainsResponse",
  shape:
    '{"link_chains": [{"syllables": string[], "syllable_links": [{"syllable": string, "keyword_noun": string, "keyword_language": string}], "narrative": string, "mnemonic_rhyme": string | null, "explanation": string | null, "image_data": {"prompt": string}}]}',
  schema: LinkChainsResponseSchema,
};
