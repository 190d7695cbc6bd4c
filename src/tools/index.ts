/**
 * 工具注册：向模型声明可调用的查询操作
 * 每个工具的执行都经由 IntentDispatcher，结果为 JSON 字符串
 */

import { tool } from "@langchain/core/tools";
import type { StructuredToolInterface } from "@langchain/core/tools";
import { runToolCall } from "../dispatcher/execute.js";
import type { IntentDispatcher } from "../dispatcher/dispatcher.js";
import {
  listCategoriesArgs,
  listCategoryArgs,
  listEncodingValuesArgs,
  lookupByIdArgs,
  recommendRelatedArgs,
  recommendedFieldsArgs,
  resolveEncodingArgs,
  searchByKeywordArgs,
  type Operation,
} from "../dispatcher/tool-call.js";

export const toolNameMap: Record<Operation, string> = {
  lookup_by_id: "字段详情",
  search_by_keyword: "关键词搜索",
  list_category: "分类字段",
  resolve_encoding: "编码解析",
  recommend_related: "相关字段推荐",
  list_categories: "分类列表",
  list_encoding_values: "编码取值",
  recommended_fields: "推荐字段",
};

export function createTools(dispatcher: IntentDispatcher): StructuredToolInterface[] {
  const run = (name: Operation, args: unknown): string => runToolCall(dispatcher, name, args).content;

  return [
    tool(async (args) => run("lookup_by_id", args), {
      name: "lookup_by_id",
      description: "根据字段 ID 获取 UK Biobank 字段的完整信息，包括描述、分类、单位、参与者数量及编码表摘要。",
      schema: lookupByIdArgs,
    }),
    tool(async (args) => run("search_by_keyword", args), {
      name: "search_by_keyword",
      description: "按关键词搜索字段名称与描述（大小写不敏感）。名称完全匹配的字段排在最前。",
      schema: searchByKeywordArgs,
    }),
    tool(async (args) => run("list_category", args), {
      name: "list_category",
      description: "列出某个数据分类下的全部字段，按字段 ID 升序。",
      schema: listCategoryArgs,
    }),
    tool(async (args) => run("resolve_encoding", args), {
      name: "resolve_encoding",
      description: "查询编码表中某个编码值对应的含义。",
      schema: resolveEncodingArgs,
    }),
    tool(async (args) => run("recommend_related", args), {
      name: "recommend_related",
      description: "根据字段 ID 或主题关键词推荐相关字段（同分类、描述关键词重叠），按相关度排序。",
      schema: recommendRelatedArgs,
    }),
    tool(async (args) => run("list_categories", args), {
      name: "list_categories",
      description: "获取所有数据分类及各分类的字段数量。",
      schema: listCategoriesArgs,
    }),
    tool(async (args) => run("list_encoding_values", args), {
      name: "list_encoding_values",
      description: "列出某个编码表的全部取值及含义。",
      schema: listEncodingValuesArgs,
    }),
    tool(async (args) => run("recommended_fields", args), {
      name: "recommended_fields",
      description: "获取常用推荐字段，可按分类过滤。",
      schema: recommendedFieldsArgs,
    }),
  ];
}
