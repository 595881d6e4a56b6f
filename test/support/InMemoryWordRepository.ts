import { WordSchema, type Word } from "../../lib/enrichment/schemas";
import type { WordRepository } from "../../lib/storage/WordRepository";

/**
 * 記憶體版 WordRepository：save 時與資料庫一樣保留 createdAt、更新 updatedAt，
 * 並回傳重新驗證過的複本。
 */
export class InMemoryWordRepository implements WordRepository {
  readonly rows = new Map<string, Word>();
  saveCount = 0;
  failSave = false;
  failFind = false;

  async findByHeadwordAndLanguage(headword: string, language: string, limit: number): Promise<Word[]> {
    if (this.failFind) {
      throw new Error("connection refused");
    }
    return [...this.rows.values()]
      .filter((word) => word.language === language && word.headword.startsWith(headword))
      .sort((a, b) => a.headword.localeCompare(b.headword))
      .slice(0, limit)
      .map((word) => structuredClone(word));
  }

  async getById(wordId: string): Promise<Word | null> {
    const word = this.rows.get(wordId);
    return word ? structuredClone(word) : null;
  }

  async save(word: Word): Promise<Word | null> {
    if (this.failSave) {
      return null;
    }
    this.saveCount += 1;
    const now = new Date().toISOString();
    const stored = WordSchema.parse({
      ...structuredClone(word),
      createdAt: this.rows.get(word.wordId)?.createdAt ?? now,
      updatedAt: now,
    });
    this.rows.set(word.wordId, stored);
    return this.getById(word.wordId);
  }

  /** 直接放入一筆資料（測試前置用） */
  seed(word: Word): void {
    this.rows.set(word.wordId, WordSchema.parse(structuredClone(word)));
  }
}
