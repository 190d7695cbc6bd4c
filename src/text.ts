/**
 * 文本处理：规范化、中英文分词、语言检测、相关度关键词
 */

import type { Language } from "./types.js";

const CJK_CHAR = /[\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]/;
const CJK_RUN = /[\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff]+/g;
/** 空白、ASCII 标点与常见中文标点 */
const SEPARATORS = /[\s!-\/:-@\[-`{-~\u3000-\u303f\uff01-\uff0f\uff1a-\uff20\u2018-\u201f]+/;

const STOP_WORDS = new Set([
  "and", "are", "for", "from", "has", "had", "have", "how", "its", "not", "off", "one",
  "the", "that", "this", "was", "were", "which", "with", "when", "what", "who", "why",
  "any", "all", "can", "may", "per", "you", "your", "into", "than", "then", "been",
  "field", "fields", "data", "value", "values",
]);

/** NFKC + 小写 + 合并空白 */
export function normalizeText(text: string): string {
  return text.normalize("NFKC").toLowerCase().replace(/\s+/g, " ").trim();
}

export function isCjk(char: string): boolean {
  return CJK_CHAR.test(char);
}

/** 中文字符占非空白字符比例超过 30% 视为中文 */
export function detectLanguage(text: string): Language {
  const chars = [...text.replace(/\s+/g, "")];
  if (chars.length === 0) return "zh";
  const cjk = chars.filter(isCjk).length;
  return cjk / chars.length > 0.3 ? "zh" : "en";
}

/**
 * 分词：按空白与标点切分，再把中文连续段与拉丁段拆开。
 * 中文无词间分隔，连续汉字整体作为一个 token（按子串匹配）
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const piece of normalizeText(text).split(SEPARATORS)) {
    if (!piece) continue;
    let last = 0;
    for (const m of piece.matchAll(CJK_RUN)) {
      const start = m.index ?? 0;
      if (start > last) tokens.push(piece.slice(last, start));
      tokens.push(m[0]);
      last = start + m[0].length;
    }
    if (last < piece.length) tokens.push(piece.slice(last));
  }
  return tokens;
}

function bigrams(run: string): string[] {
  const chars = [...run];
  if (chars.length === 1) return chars;
  const out: string[] = [];
  for (let i = 0; i < chars.length - 1; i++) out.push(chars[i] + chars[i + 1]);
  return out;
}

/** 相关度关键词：英文取长度 ≥3 的非停用词，中文段取二元组 */
export function keywordSet(text: string): Set<string> {
  const out = new Set<string>();
  for (const token of tokenize(text)) {
    if (isCjk(token[0])) {
      for (const gram of bigrams(token)) out.add(gram);
    } else if (token.length >= 3 && !STOP_WORDS.has(token) && !/^\d+$/.test(token)) {
      out.add(token);
    }
  }
  return out;
}
