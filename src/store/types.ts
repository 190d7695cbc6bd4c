/**
 * 数据字典类型
 * 启动时一次性加载，运行期只读
 */

export interface FieldRecord {
  /** 字段 ID，全库唯一 */
  readonly id: number;
  readonly name: string;
  readonly description: string;
  readonly category: string;
  /** 编码表引用；无编码的字段不设 */
  readonly encodingRef?: number;
  readonly valueType?: string;
  readonly units?: string;
  readonly participants?: number;
  readonly notes?: string;
}

export type EncodingCode = number | string;

export interface EncodingEntry {
  readonly code: EncodingCode;
  readonly label: string;
}

export interface EncodingTable {
  readonly ref: number;
  readonly title: string;
  readonly entries: readonly EncodingEntry[];
}

/** 推荐字段：常用、重要的字段 */
export interface RecommendedField {
  readonly fieldId: number;
  readonly reason?: string;
}

/** 分类由字段派生，不单独存储 */
export interface CategorySummary {
  readonly name: string;
  readonly fieldCount: number;
}

export interface Catalogue {
  readonly fields: readonly FieldRecord[];
  readonly encodings: readonly EncodingTable[];
  readonly recommended: readonly RecommendedField[];
}
