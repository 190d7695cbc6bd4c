/**
 * 意图分发：把 ToolCall 翻译为对字段库 / 编码解析的只读查询
 * 确定性、无副作用；NotFound / InvalidArgument 由调用方回报给模型
 */

import { NotFoundError } from "../errors.js";
import { EncodingResolver } from "../store/encoding-resolver.js";
import type { CategoryGroup, FieldStore } from "../store/field-store.js";
import { detectLanguage } from "../text.js";
import { relatedToField, relatedToKeywords } from "./related.js";
import { searchFields } from "./search.js";
import type { ToolCall } from "./tool-call.js";
import {
  DEFAULT_DISPATCH_OPTIONS,
  type DispatchOptions,
  type RecommendedFieldResult,
  type ToolResult,
} from "./types.js";

export class IntentDispatcher {
  private readonly encodings: EncodingResolver;
  private readonly options: DispatchOptions;

  constructor(private readonly store: FieldStore, options: Partial<DispatchOptions> = {}) {
    this.encodings = new EncodingResolver(store);
    this.options = { ...DEFAULT_DISPATCH_OPTIONS, ...options };
  }

  dispatch(call: ToolCall): ToolResult {
    switch (call.operation) {
      case "lookup_by_id":
        return this.lookupById(call.arguments.id);
      case "search_by_keyword": {
        const { term, language, limit } = call.arguments;
        const fields = searchFields(this.store.allFields(), term);
        return {
          operation: "search_by_keyword",
          term,
          language: language ?? detectLanguage(term),
          total: fields.length,
          fields: fields.slice(0, limit ?? this.options.searchLimit),
        };
      }
      case "list_category": {
        const { categoryName, limit } = call.arguments;
        const group = this.requireCategory(categoryName);
        return {
          operation: "list_category",
          category: group.name,
          total: group.fields.length,
          fields: group.fields.slice(0, limit ?? group.fields.length),
        };
      }
      case "resolve_encoding": {
        const { encodingRef, code } = call.arguments;
        const table = this.encodings.table(encodingRef);
        return {
          operation: "resolve_encoding",
          encodingRef,
          title: table.title,
          entry: this.encodings.resolve(encodingRef, code),
        };
      }
      case "recommend_related": {
        const { idOrKeywords, limit } = call.arguments;
        const cap = Math.min(limit ?? this.options.relatedCap, this.options.relatedCap);
        const related =
          typeof idOrKeywords === "number"
            ? relatedToField(this.store, idOrKeywords, cap)
            : /^\d+$/.test(idOrKeywords)
              ? relatedToField(this.store, Number(idOrKeywords), cap)
              : relatedToKeywords(this.store, idOrKeywords, cap);
        return { operation: "recommend_related", seed: idOrKeywords, related };
      }
      case "list_categories":
        return { operation: "list_categories", categories: this.store.listCategories() };
      case "list_encoding_values": {
        const { encodingRef, limit } = call.arguments;
        const table = this.encodings.table(encodingRef);
        return {
          operation: "list_encoding_values",
          encodingRef,
          title: table.title,
          total: table.entries.length,
          entries: table.entries.slice(0, limit ?? this.options.encodingListLimit),
        };
      }
      case "recommended_fields": {
        const { categoryName, limit } = call.arguments;
        const group = categoryName ? this.requireCategory(categoryName) : null;
        const inGroup = group ? new Set(group.fields.map((f) => f.id)) : null;
        const fields: RecommendedFieldResult[] = [];
        for (const rec of this.store.recommended()) {
          const field = this.store.getField(rec.fieldId);
          if (!field || (inGroup && !inGroup.has(field.id))) continue;
          fields.push(rec.reason ? { field, reason: rec.reason } : { field });
        }
        return {
          operation: "recommended_fields",
          category: group ? group.name : null,
          fields: fields.slice(0, limit ?? this.options.recommendedLimit),
        };
      }
      default: {
        const unreachable: never = call;
        return unreachable;
      }
    }
  }

  private lookupById(id: number): ToolResult {
    const field = this.store.getField(id);
    if (!field) throw new NotFoundError("field", `Field ${id} not found`, { fieldId: id });
    const table = field.encodingRef != null ? this.store.getEncoding(field.encodingRef) : undefined;
    return {
      operation: "lookup_by_id",
      field,
      encoding: table
        ? {
            ref: table.ref,
            title: table.title,
            entryCount: table.entries.length,
            entries: table.entries.slice(0, this.options.encodingPreview),
          }
        : null,
    };
  }

  private requireCategory(name: string): CategoryGroup {
    const group = this.store.getCategory(name);
    if (!group) {
      throw new NotFoundError("category", `Category "${name}" not found`, { categoryName: name });
    }
    return group;
  }
}
