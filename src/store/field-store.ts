/**
 * 字段库：启动时由 Catalogue 构建的不可变值，按 id / 分类 / 编码查询
 * 可在并发请求间共享，无需加锁
 */

import { StoreUnavailableError } from "../errors.js";
import { normalizeText } from "../text.js";
import { codeKey } from "./encoding-resolver.js";
import type {
  Catalogue,
  CategorySummary,
  EncodingTable,
  FieldRecord,
  RecommendedField,
} from "./types.js";

export interface CategoryGroup {
  readonly name: string;
  /** 按 id 升序 */
  readonly fields: readonly FieldRecord[];
}

function freezeField(field: FieldRecord): FieldRecord {
  return Object.freeze({ ...field });
}

function freezeTable(table: EncodingTable): EncodingTable {
  return Object.freeze({
    ref: table.ref,
    title: table.title,
    entries: Object.freeze(table.entries.map((e) => Object.freeze({ code: e.code, label: e.label }))),
  });
}

export class FieldStore {
  private constructor(
    private readonly byId: ReadonlyMap<number, FieldRecord>,
    private readonly ordered: readonly FieldRecord[],
    private readonly categories: ReadonlyMap<string, CategoryGroup>,
    private readonly encodings: ReadonlyMap<number, EncodingTable>,
    private readonly recommendedList: readonly RecommendedField[]
  ) {}

  /** 校验唯一性与引用完整性；违反时抛 StoreUnavailableError */
  static fromCatalogue(catalogue: Catalogue): FieldStore {
    const problems: string[] = [];

    const encodings = new Map<number, EncodingTable>();
    for (const table of catalogue.encodings) {
      if (encodings.has(table.ref)) {
        problems.push(`duplicate encoding table ${table.ref}`);
        continue;
      }
      const codes = new Set<string>();
      for (const entry of table.entries) {
        const key = codeKey(entry.code);
        if (codes.has(key)) problems.push(`duplicate code ${key} in encoding ${table.ref}`);
        codes.add(key);
      }
      encodings.set(table.ref, freezeTable(table));
    }

    const byId = new Map<number, FieldRecord>();
    for (const field of catalogue.fields) {
      if (byId.has(field.id)) {
        problems.push(`duplicate field id ${field.id}`);
        continue;
      }
      if (field.encodingRef != null && !encodings.has(field.encodingRef)) {
        problems.push(`field ${field.id} references missing encoding ${field.encodingRef}`);
      }
      byId.set(field.id, freezeField(field));
    }

    for (const rec of catalogue.recommended) {
      if (!byId.has(rec.fieldId)) problems.push(`recommended field ${rec.fieldId} does not exist`);
    }

    if (problems.length) {
      throw new StoreUnavailableError(`Invalid catalogue: ${problems.join("; ")}`);
    }

    const ordered = Object.freeze([...byId.values()].sort((a, b) => a.id - b.id));
    const grouped = new Map<string, { name: string; fields: FieldRecord[] }>();
    for (const field of ordered) {
      const key = normalizeText(field.category);
      const group = grouped.get(key) ?? { name: field.category.trim(), fields: [] };
      group.fields.push(field);
      grouped.set(key, group);
    }
    const categories = new Map<string, CategoryGroup>();
    for (const [key, group] of grouped) {
      categories.set(key, { name: group.name, fields: Object.freeze(group.fields) });
    }

    const recommended = Object.freeze(catalogue.recommended.map((r) => Object.freeze({ ...r })));
    return new FieldStore(byId, ordered, categories, encodings, recommended);
  }

  get size(): number {
    return this.ordered.length;
  }

  get encodingCount(): number {
    return this.encodings.size;
  }

  getField(id: number): FieldRecord | undefined {
    return this.byId.get(id);
  }

  /** 全部字段，按 id 升序 */
  allFields(): readonly FieldRecord[] {
    return this.ordered;
  }

  /** 分类名大小写不敏感；未知分类返回 undefined */
  getCategory(name: string): CategoryGroup | undefined {
    return this.categories.get(normalizeText(name));
  }

  listCategories(): CategorySummary[] {
    return [...this.categories.values()]
      .map((c) => ({ name: c.name, fieldCount: c.fields.length }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  getEncoding(ref: number): EncodingTable | undefined {
    return this.encodings.get(ref);
  }

  recommended(): readonly RecommendedField[] {
    return this.recommendedList;
  }
}
