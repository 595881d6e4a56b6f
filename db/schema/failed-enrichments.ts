import { pgTable, text, timestamp, uuid, varchar } from "drizzle-orm/pg-core";

/**
 * 失敗的 enrichment 執行紀錄（供後台檢視與人工重跑）。
 */
export const failedEnrichments = pgTable("failed_enrichments", {
  id: uuid("id").defaultRandom().primaryKey(),
  headword: varchar("headword", { length: 200 }).notNull(),
  sourceLanguage: varchar("source_language", { length: 16 }).notNull(),
  targetLanguage: varchar("target_language", { length: 16 }).notNull(),
  step: varchar("step", { length: 60 }).notNull(),
  // batchId 可為空：CLI 單筆執行時不一定有批次
  batchId: varchar("batch_id", { length: 120 }),
  errorCode: text("error_code"),
  errorMessage: text("error_message").notNull(),
  resolved: text("resolved").notNull().default("false"),
  createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
});

export type NewFailedEnrichment = typeof failedEnrichments.$inferInsert;
