/**
 * ToolCall：模型发起的工具调用，按 operation 区分的标签联合
 * 参数 schema 同时用于向模型声明工具（tools/index.ts）与运行时校验
 */

import { z } from "zod";
import { InvalidArgumentError } from "../errors.js";
import { formatZodIssues } from "../store/loader.js";

const fieldId = z.number().int().positive();
const limit = z.number().int().positive().max(200);

export const lookupByIdArgs = z.object({
  id: fieldId.describe("UK Biobank 字段 ID，如 31"),
});

export const searchByKeywordArgs = z.object({
  term: z.string().trim().min(1).describe("搜索关键词，英文单词效果最好，如 heart、diabetes"),
  language: z.enum(["zh", "en"]).optional().describe("关键词语言；不填则自动检测"),
  limit: limit.optional().describe("最多返回条数，默认 20"),
});

export const listCategoryArgs = z.object({
  categoryName: z.string().trim().min(1).describe("分类名，如 cardiovascular"),
  limit: limit.optional().describe("最多返回条数；不填返回全部"),
});

export const resolveEncodingArgs = z.object({
  encodingRef: fieldId.describe("编码表 ID，如 9"),
  code: z.union([z.number().int(), z.string().trim().min(1)]).describe("要解析的编码值"),
});

export const recommendRelatedArgs = z.object({
  idOrKeywords: z
    .union([fieldId, z.string().trim().min(1)])
    .describe("种子字段 ID，或描述主题的关键词"),
  limit: limit.optional().describe("最多返回条数，不超过系统上限"),
});

export const listCategoriesArgs = z.object({});

export const listEncodingValuesArgs = z.object({
  encodingRef: fieldId.describe("编码表 ID"),
  limit: limit.optional().describe("最多返回条数，默认 50"),
});

export const recommendedFieldsArgs = z.object({
  categoryName: z.string().trim().min(1).optional().describe("按分类过滤；不填返回全部推荐字段"),
  limit: limit.optional().describe("最多返回条数，默认 20"),
});

export const toolCallSchema = z.discriminatedUnion("operation", [
  z.object({ operation: z.literal("lookup_by_id"), arguments: lookupByIdArgs }),
  z.object({ operation: z.literal("search_by_keyword"), arguments: searchByKeywordArgs }),
  z.object({ operation: z.literal("list_category"), arguments: listCategoryArgs }),
  z.object({ operation: z.literal("resolve_encoding"), arguments: resolveEncodingArgs }),
  z.object({ operation: z.literal("recommend_related"), arguments: recommendRelatedArgs }),
  z.object({ operation: z.literal("list_categories"), arguments: listCategoriesArgs }),
  z.object({ operation: z.literal("list_encoding_values"), arguments: listEncodingValuesArgs }),
  z.object({ operation: z.literal("recommended_fields"), arguments: recommendedFieldsArgs }),
]);

export type ToolCall = z.infer<typeof toolCallSchema>;
export type Operation = ToolCall["operation"];

export const OPERATIONS: readonly Operation[] = toolCallSchema.options.map((o) => o.shape.operation.value);

export function isOperation(name: string): name is Operation {
  return (OPERATIONS as readonly string[]).includes(name);
}

/** 把模型给出的 (name, args) 解析为 ToolCall；未知操作或参数不合法抛 InvalidArgumentError */
export function parseToolCall(name: string, args: unknown): ToolCall {
  if (!isOperation(name)) {
    throw new InvalidArgumentError(`Unknown operation "${name}". Available: ${OPERATIONS.join(", ")}`);
  }
  const parsed = toolCallSchema.safeParse({ operation: name, arguments: args ?? {} });
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new InvalidArgumentError(`Invalid arguments for ${name}: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}
