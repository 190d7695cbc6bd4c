/**
 * 相关字段推荐：同分类 + 关键词重叠打分
 * 分数降序，同分按 id 升序；不含种子字段本身，分数为 0 的候选丢弃
 */

import type { FieldStore } from "../store/field-store.js";
import type { FieldRecord } from "../store/types.js";
import { keywordSet, normalizeText } from "../text.js";
import type { RelatedField } from "./types.js";

export const CATEGORY_BONUS = 2;

function keywordsOf(field: FieldRecord): Set<string> {
  return keywordSet(`${field.name} ${field.description}`);
}

function shared(seed: ReadonlySet<string>, candidate: ReadonlySet<string>): string[] {
  return [...seed].filter((k) => candidate.has(k)).sort();
}

function rankCandidates(
  candidates: readonly FieldRecord[],
  seedKeywords: ReadonlySet<string>,
  inSeedCategory: (field: FieldRecord) => boolean,
  cap: number
): RelatedField[] {
  const maxScore = seedKeywords.size + CATEGORY_BONUS;
  const scored: RelatedField[] = [];
  for (const field of candidates) {
    const sharedKeywords = shared(seedKeywords, keywordsOf(field));
    const sharedCategory = inSeedCategory(field);
    const score = sharedKeywords.length + (sharedCategory ? CATEGORY_BONUS : 0);
    if (score === 0) continue;
    scored.push({
      field,
      score,
      confidence: Math.round((score / maxScore) * 100) / 100,
      sharedCategory,
      sharedKeywords,
    });
  }
  scored.sort((a, b) => b.score - a.score || a.field.id - b.field.id);
  return scored.slice(0, cap);
}

export function relatedToField(store: FieldStore, seedId: number, cap: number): RelatedField[] {
  const seed = store.getField(seedId);
  if (!seed) return [];
  const category = normalizeText(seed.category);
  return rankCandidates(
    store.allFields().filter((f) => f.id !== seed.id),
    keywordsOf(seed),
    (f) => normalizeText(f.category) === category,
    cap
  );
}

export function relatedToKeywords(store: FieldStore, keywords: string, cap: number): RelatedField[] {
  const seedKeywords = keywordSet(keywords);
  if (!seedKeywords.size) return [];
  return rankCandidates(
    store.allFields(),
    seedKeywords,
    (f) => {
      const category = normalizeText(f.category);
      return [...seedKeywords].some((k) => category.includes(k));
    },
    cap
  );
}
