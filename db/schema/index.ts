/**
 * 資料庫主 Schema 匯出點。
 */
export * from "./words";
export * from "./failed-enrichments";
