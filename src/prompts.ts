/**
 * 系统提示与用户可见消息（中英双语）
 */

import type { ErrorCode } from "./errors.js";
import type { Language } from "./types.js";

const SYSTEM_PROMPT_ZH = `你是 UK Biobank 数据字典的专家助手，帮助研究者查找和理解数据字段。

## 可用工具

1. **lookup_by_id** - 根据字段 ID 查询字段详情（描述、分类、单位、参与者数量、编码表摘要）
2. **search_by_keyword** - 按关键词搜索字段名称与描述
3. **list_category** - 列出某个分类下的全部字段
4. **list_categories** - 获取所有分类及字段数量
5. **resolve_encoding** - 查询某个编码值的含义
6. **list_encoding_values** - 列出某个编码表的全部取值
7. **recommend_related** - 根据字段 ID 或主题关键词推荐相关字段
8. **recommended_fields** - 获取常用推荐字段，可按分类过滤

## 检索建议

- 数据字典为英文，搜索时优先使用单个英文关键词：
  - 心理健康：mental、depression、anxiety、mood
  - 心血管：heart、cardiac、blood pressure
  - 糖尿病：diabetes、glucose、insulin
  - 癌症：cancer、tumour
  - 脑部与认知：brain、cognitive
- 用户询问具体字段 ID 时调用 lookup_by_id；询问主题时调用 search_by_keyword
- 不确定分类名时先调用 list_categories

## 回复规范

- 仅基于工具返回结果回答，不要编造字段或编码
- 工具返回 NOT_FOUND 时，如实告知未找到，并建议换个关键词或检查 ID
- 工具返回 INVALID_ARGUMENT 时，向用户说明需要补充或更正的信息
- 使用中文清晰地解释结果，列出字段时附上字段 ID
- 适当推荐相关字段`;

const SYSTEM_PROMPT_EN = `You are an expert assistant for the UK Biobank data dictionary, helping researchers find and understand data fields.

## Available tools

1. **lookup_by_id** - details of a field by id (description, category, units, participant count, encoding summary)
2. **search_by_keyword** - search field names and descriptions by keyword
3. **list_category** - list every field in a category
4. **list_categories** - all categories with their field counts
5. **resolve_encoding** - the meaning of one coded value
6. **list_encoding_values** - every value of an encoding table
7. **recommend_related** - fields related to a field id or a topic
8. **recommended_fields** - commonly used fields, optionally by category

## Search tips

- Single English keywords work best: mental, depression, heart, blood pressure, diabetes, glucose, cancer, brain, cognitive
- Use lookup_by_id when the user names a field id; use search_by_keyword for topics
- Call list_categories when unsure of a category name

## Answering

- Answer only from tool results; never invent fields or codes
- When a tool returns NOT_FOUND, say nothing was found and suggest another keyword or id
- When a tool returns INVALID_ARGUMENT, ask the user to clarify or correct the request
- Explain results clearly in English and cite field ids
- Suggest related fields where helpful`;

const SYSTEM_PROMPTS: Record<Language, string> = { zh: SYSTEM_PROMPT_ZH, en: SYSTEM_PROMPT_EN };

export function getSystemPrompt(language: Language, extra?: string): string {
  const prompt = SYSTEM_PROMPTS[language];
  return extra?.trim() ? `${prompt}\n\n## 补充说明 / Additional instructions\n${extra.trim()}` : prompt;
}

type TurnFailureCode = Exclude<ErrorCode, "STORE_UNAVAILABLE" | "CONFIGURATION_ERROR">;

const FAILURE_MESSAGES: Record<TurnFailureCode, Record<Language, string>> = {
  NOT_FOUND: {
    zh: "没有找到相关结果，请检查字段 ID 或换个关键词再试。",
    en: "No results were found. Please check the field ID or try another keyword.",
  },
  INVALID_ARGUMENT: {
    zh: "无法理解查询参数，请补充或更正您的问题。",
    en: "The request could not be understood. Please clarify or correct your question.",
  },
  TIMEOUT: {
    zh: "抱歉，模型响应超时，请稍后重试。",
    en: "Sorry, the model took too long to respond. Please try again later.",
  },
  TOOL_LOOP_EXCEEDED: {
    zh: "抱歉，对话轮次过多，请简化您的问题重新提问。",
    en: "Sorry, too many lookup rounds were needed. Please simplify your question.",
  },
  RATE_LIMITED: {
    zh: "请求频率过高，请稍后再试。",
    en: "Rate limit exceeded. Please try again later.",
  },
  LLM_ERROR: {
    zh: "抱歉，模型服务暂时不可用，请稍后重试。",
    en: "Sorry, the language model service is temporarily unavailable. Please try again later.",
  },
  UNEXPECTED_ERROR: {
    zh: "搜索服务暂时不可用，请稍后重试。",
    en: "Search service temporarily unavailable, please try again later.",
  },
};

export function getFailureMessage(code: ErrorCode, language: Language): string {
  const messages =
    code === "STORE_UNAVAILABLE" || code === "CONFIGURATION_ERROR"
      ? FAILURE_MESSAGES.UNEXPECTED_ERROR
      : FAILURE_MESSAGES[code];
  return messages[language];
}
