import { and, eq, like } from "drizzle-orm";
import type { Database } from "../../db/client";
import { words, type WordRow } from "../../db/schema";
import { WordSchema, type Word } from "../enrichment/schemas";

/**
 * 編排器使用的儲存介面。
 */
export interface WordRepository {
  /** 依 headword 前綴與語言搜尋，最多回傳 limit 筆 */
  findByHeadwordAndLanguage(headword: string, language: string, limit: number): Promise<Word[]>;
  getById(wordId: string): Promise<Word | null>;
  /** upsert；成功時回傳重新讀出的紀錄，失敗回傳 null */
  save(word: Word): Promise<Word | null>;
}

/**
 * 跳脫 LIKE 的萬用字元，讓 headword 只做字面前綴比對。
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * 將資料列還原為 Word；內容不符合 WordSchema 時回傳 null。
 */
export function rowToWord(row: WordRow): Word | null {
  const parsed = WordSchema.safeParse({
    ...row.document,
    wordId: row.id,
    headword: row.headword,
    language: row.language,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  });
  if (!parsed.success) {
    console.error("[WordRepository] stored document failed validation", {
      wordId: row.id,
      issues: parsed.error.issues,
    });
    return null;
  }
  return parsed.data;
}

/**
 * Drizzle / Postgres 實作。driver 錯誤一律記錄後回傳空結果，不向上拋出。
 */
export class DrizzleWordRepository implements WordRepository {
  constructor(private readonly db: Database) {}

  async findByHeadwordAndLanguage(headword: string, language: string, limit: number): Promise<Word[]> {
    try {
      const rows = await this.db
        .select()
        .from(words)
        .where(and(eq(words.language, language), like(words.headword, `${escapeLikePattern(headword)}%`)))
        .orderBy(words.headword)
        .limit(limit);
      return rows.map(rowToWord).filter((word): word is Word => word !== null);
    } catch (error) {
      console.error("[WordRepository] search failed", { headword, language, limit, error });
      return [];
    }
  }

  async getById(wordId: string): Promise<Word | null> {
    try {
      const rows = await this.db.select().from(words).where(eq(words.id, wordId)).limit(1);
      const row = rows[0];
      return row ? rowToWord(row) : null;
    } catch (error) {
      console.error("[WordRepository] getById failed", { wordId, error });
      return null;
    }
  }

  async save(word: Word): Promise<Word | null> {
    const { wordId, createdAt: _createdAt, updatedAt: _updatedAt, ...document } = word;
    void _createdAt;
    void _updatedAt;

    try {
      // created_at 只在 insert 時由預設值寫入；衝突更新時保持不變
      await this.db
        .insert(words)
        .values({
          id: wordId,
          headword: word.headword,
          language: word.language,
          document,
        })
        .onConflictDoUpdate({
          target: words.id,
          set: {
            headword: word.headword,
            language: word.language,
            document,
            updatedAt: new Date(),
          },
        });
    } catch (error) {
      console.error("[WordRepository] save failed", { wordId, error });
      return null;
    }

    return this.getById(wordId);
  }
}
