/**
 * ToolResult：按操作区分的结构化结果，交给模型组织回答，单轮后丢弃
 */

import type { CategorySummary, EncodingEntry, FieldRecord } from "../store/types.js";
import type { Language } from "../types.js";

export interface EncodingSummary {
  ref: number;
  title: string;
  entryCount: number;
  /** 仅前若干条，完整列表用 list_encoding_values */
  entries: readonly EncodingEntry[];
}

export interface RelatedField {
  field: FieldRecord;
  /** 共享关键词数，同分类再加 CATEGORY_BONUS（2）；未取整 */
  score: number;
  /** score / (种子关键词数 + 2)，保留两位小数 */
  confidence: number;
  /**
   * 字段种子：与种子字段同分类。
   * 关键词种子：候选字段的分类名包含任一种子关键词
   */
  sharedCategory: boolean;
  sharedKeywords: string[];
}

export interface RecommendedFieldResult {
  field: FieldRecord;
  reason?: string;
}

export type ToolResult =
  | { operation: "lookup_by_id"; field: FieldRecord; encoding: EncodingSummary | null }
  | { operation: "search_by_keyword"; term: string; language: Language; total: number; fields: FieldRecord[] }
  | { operation: "list_category"; category: string; total: number; fields: FieldRecord[] }
  | { operation: "resolve_encoding"; encodingRef: number; title: string; entry: EncodingEntry }
  | { operation: "recommend_related"; seed: number | string; related: RelatedField[] }
  | { operation: "list_categories"; categories: CategorySummary[] }
  | { operation: "list_encoding_values"; encodingRef: number; title: string; total: number; entries: EncodingEntry[] }
  | { operation: "recommended_fields"; category: string | null; fields: RecommendedFieldResult[] };

export interface DispatchOptions {
  /** recommend_related 返回条数上限 */
  relatedCap: number;
  searchLimit: number;
  encodingPreview: number;
  encodingListLimit: number;
  recommendedLimit: number;
}

export const DEFAULT_DISPATCH_OPTIONS: DispatchOptions = {
  relatedCap: 10,
  searchLimit: 20,
  encodingPreview: 20,
  encodingListLimit: 50,
  recommendedLimit: 20,
};
