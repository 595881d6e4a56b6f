import { toLanguageCode } from "../../lib/enrichment/schemas";

export const ID = toLanguageCode("id");
export const EN = toLanguageCode("en");
export const FR = toLanguageCode("fr");

export const EAT_DESCRIPTION = "memasukkan makanan ke dalam mulut";

export function coreDetails(senses = [{ part_of_speech: "verb", brief_description: EAT_DESCRIPTION }]) {
  return {
    pronunciation: { ipa: "ˈma.kan", phonetic_spelling: "MAH-kahn" },
    frequency_rank: 120,
    register: "neutral",
    senses,
  };
}

export function coreLanguageDetails(etymology = "From Proto-Malayic *makan.") {
  return {
    etymology,
    collocations: ["makan nasi", "makan siang"],
    semantic_relations: { synonyms: ["santap"], related_concepts: ["makanan"] },
    usage_notes: "The everyday verb for eating.",
  };
}

export function senseDetails(
  definition = "to eat",
  language = "en",
  examples = [{ text: "Saya makan nasi.", translation: "I eat rice.", cefr_level: "A1" }],
) {
  return {
    definition: { text: definition, language },
    translations: [{ text: definition.replace(/^to /, ""), nuance: null }],
    examples,
    sense_register: "neutral",
    sense_collocations: ["makan pagi"],
    sense_semantic_relations: { synonyms: ["santap"], antonyms: ["puasa"], related_concepts: [] },
  };
}

export function linkChain(narrative: string | null = "Mama opens a can of soup to eat.", prompt: string | null = "A mother eating soup from a can") {
  return {
    syllables: ["ma", "kan"],
    syllable_links: [
      { syllable: "ma", keyword_noun: "mama", keyword_language: "en" },
      { syllable: "kan", keyword_noun: "can", keyword_language: "en" },
    ],
    narrative,
    mnemonic_rhyme: null,
    explanation: "Mama + can sounds like makan.",
    image_data: prompt === null ? null : { prompt },
  };
}

export function linkChains(...chains: ReturnType<typeof linkChain>[]) {
  return { link_chains: chains };
}
