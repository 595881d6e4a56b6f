import type {
  Definition,
  EnrichmentInfo,
  Example,
  FeedbackCounters,
  ImageData,
  LanguageCode,
  LanguageMap,
  Pronunciation,
  SemanticRelations,
  SyllableLink,
  Translation,
} from "./schemas";
import type { LlmProvider } from "../llm/types";

/**
 * 流程中的「草稿」型別。
 *
 * 與 schemas.ts 的最終型別一一對應，但所有欄位皆為 optional：
 * 各步驟逐步補齊資料，直到 ResultAssembler.assembleWord 才以 WordSchema 驗證為最終 Word。
 */

export interface LinkChainDraft {
  chainId?: string;
  targetLanguage?: LanguageCode;
  syllables?: string[];
  syllableLinks?: SyllableLink[];
  narrative?: string;
  mnemonicRhyme?: string | null;
  explanation?: string | null;
  imageData?: ImageData;
  validationScore?: number | null;
  promptUsed?: string | null;
  feedbackData?: LanguageMap<FeedbackCounters>;
}

export interface SenseDraft {
  senseId?: string;
  baseWordId?: string;
  partOfSpeech?: string;
  definitions?: Definition[];
  translations?: LanguageMap<Translation[]>;
  examples?: Example[];
  senseRegister?: string | null;
  senseCollocations?: LanguageMap<string[]>;
  senseSemanticRelations?: LanguageMap<SemanticRelations>;
  relatedForms?: string[];
  cefrLevel?: string | null;
  usageFrequency?: string | null;
  phoneticTranscription?: string | null;
  linkChainVariations?: LinkChainDraft[];
}

export interface WordDraft {
  headword?: string;
  language?: LanguageCode;
  categories?: string[];
  pronunciation?: Pronunciation | null;
  frequencyRank?: number | null;
  register?: string | null;
  etymology?: LanguageMap<string>;
  collocations?: LanguageMap<string[]>;
  semanticRelations?: LanguageMap<SemanticRelations>;
  usageNotes?: LanguageMap<string>;
  senses?: SenseDraft[];
  enrichmentHistory?: EnrichmentInfo[];
  createdAt?: string;
}

/**
 * 詞義識別資訊：以 (partOfSpeech, 來源語言定義文字) 作為內容識別。
 */
export interface SenseIdentity {
  partOfSpeech: string;
  briefDescription: string;
  senseId?: string;
}

/**
 * 一次 enrichment 執行所屬的批次資訊，會寫入 enrichmentHistory。
 */
export interface BatchInfo {
  batchId: string;
  tags?: string[];
}

/**
 * runEnrichment 的輸入。
 */
export interface EnrichmentRequest {
  headword: string;
  sourceLanguage: LanguageCode;
  targetLanguage: LanguageCode;
  categories?: string[];
  provider?: LlmProvider;
  model?: string;
  forceReenrich?: boolean;
  batchInfo?: BatchInfo;
}

/**
 * 編排流程的步驟名稱，用於日誌與失敗紀錄。
 */
export type EnrichmentStep =
  | "load_or_init"
  | "core_details_and_senses"
  | "core_language_details"
  | "sense_details"
  | "link_chains"
  | "final_assembly"
  | "persist";
