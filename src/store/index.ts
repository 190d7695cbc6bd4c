/**
 * 字段库模块入口
 */

export type {
  Catalogue,
  CategorySummary,
  EncodingCode,
  EncodingEntry,
  EncodingTable,
  FieldRecord,
  RecommendedField,
} from "./types.js";
export { FieldStore } from "./field-store.js";
export { EncodingResolver } from "./encoding-resolver.js";
export { loadFieldStore, DEFAULT_STORE_PATH, formatZodIssues } from "./loader.js";
export { catalogueSchema } from "./schema.js";
