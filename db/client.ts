import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import { env } from "../lib/utils/env";
import * as schema from "./schema";

export type Database = NodePgDatabase<typeof schema>;

let poolInstance: Pool | undefined;
let dbInstance: Database | undefined;

/**
 * 全域單例 pg Pool，首次使用時才建立，避免在未設定 DATABASE_URL 的環境（測試）於 import 時失敗。
 */
export function getPool(): Pool {
  if (!poolInstance) {
    if (!env.DATABASE_URL) {
      throw new Error("DATABASE_URL is not configured. Set a connection string before using the database client.");
    }
    poolInstance = new Pool({ connectionString: env.DATABASE_URL });
  }
  return poolInstance;
}

/**
 * 資料庫實例，提供 Drizzle ORM 操作並載入所有 schema。
 */
export function getDb(): Database {
  if (!dbInstance) {
    dbInstance = drizzle(getPool(), { schema });
  }
  return dbInstance;
}

/**
 * 關閉連線池（CLI / worker 結束時呼叫）。
 */
export async function closeDb(): Promise<void> {
  if (poolInstance) {
    await poolInstance.end();
    poolInstance = undefined;
    dbInstance = undefined;
  }
}
