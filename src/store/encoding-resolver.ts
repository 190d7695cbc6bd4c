/**
 * 编码解析：把字段的编码值映射为可读标签
 */

import { NotFoundError } from "../errors.js";
import type { FieldStore } from "./field-store.js";
import type { EncodingCode, EncodingEntry, EncodingTable } from "./types.js";

export function codeKey(code: EncodingCode): string {
  return String(code).trim();
}

export class EncodingResolver {
  /** ref -> (code 去空白后的字符串形式 -> entry)；整数 1 与字符串 " 1" 视为同一编码 */
  private readonly index = new Map<number, Map<string, EncodingEntry>>();

  constructor(private readonly store: FieldStore) {}

  table(ref: number): EncodingTable {
    const table = this.store.getEncoding(ref);
    if (!table) throw new NotFoundError("encoding", `Encoding ${ref} not found`, { encodingRef: ref });
    return table;
  }

  resolve(ref: number, code: EncodingCode): EncodingEntry {
    const entry = this.entriesByCode(ref).get(codeKey(code));
    if (!entry) {
      throw new NotFoundError("encoding_code", `Code ${code} not found in encoding ${ref}`, {
        encodingRef: ref,
        code,
      });
    }
    return entry;
  }

  private entriesByCode(ref: number): Map<string, EncodingEntry> {
    const cached = this.index.get(ref);
    if (cached) return cached;
    const map = new Map(this.table(ref).entries.map((e) => [codeKey(e.code), e] as const));
    this.index.set(ref, map);
    return map;
  }
}
