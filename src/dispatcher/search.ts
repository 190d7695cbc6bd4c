/**
 * 关键词检索：名称或描述包含全部 token（大小写不敏感）
 * 排序：名称完全匹配 > 名称包含全部 token > 其余（描述命中），同级按 id 升序
 */

import { InvalidArgumentError } from "../errors.js";
import type { FieldRecord } from "../store/types.js";
import { normalizeText, tokenize } from "../text.js";

export interface SearchHit {
  field: FieldRecord;
  rank: 0 | 1 | 2;
}

function rankField(field: FieldRecord, normalizedTerm: string, tokens: readonly string[]): SearchHit | null {
  const name = normalizeText(field.name);
  const description = normalizeText(field.description);
  if (!tokens.every((t) => name.includes(t) || description.includes(t))) return null;
  if (name === normalizedTerm) return { field, rank: 0 };
  if (tokens.every((t) => name.includes(t))) return { field, rank: 1 };
  return { field, rank: 2 };
}

export function searchFields(fields: readonly FieldRecord[], term: string): FieldRecord[] {
  const tokens = tokenize(term);
  if (!tokens.length) {
    throw new InvalidArgumentError(`Search term "${term}" contains no searchable words`);
  }
  const normalizedTerm = normalizeText(term);
  const hits: SearchHit[] = [];
  for (const field of fields) {
    const hit = rankField(field, normalizedTerm, tokens);
    if (hit) hits.push(hit);
  }
  hits.sort((a, b) => a.rank - b.rank || a.field.id - b.field.id);
  return hits.map((h) => h.field);
}
