import { index, jsonb, pgTable, timestamp, uuid, varchar } from "drizzle-orm/pg-core";
import type { Word } from "../../lib/enrichment/schemas";

/**
 * words.document 內存放的內容：Word 去掉主鍵與時間戳（兩者由欄位本身保存）。
 */
export type WordDocument = Omit<Word, "wordId" | "createdAt" | "updatedAt">;

/**
 * 詞條資料表定義（文件式儲存，結構化內容放在 jsonb document 欄位）。
 */
export const words = pgTable(
  "words",
  {
    id: uuid("id").primaryKey(),
    headword: varchar("headword", { length: 200 }).notNull(),
    language: varchar("language", { length: 16 }).notNull(),
    document: jsonb("document").$type<WordDocument>().notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    languageHeadwordIdx: index("words_language_headword_idx").on(table.language, table.headword),
  }),
);

export type WordRow = typeof words.$inferSelect;
