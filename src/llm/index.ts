/**
 * LLM 工厂：OpenAI 兼容接口（openai / deepseek / qwen / 智谱 GLM）
 */

import { ChatOpenAI } from "@langchain/openai";
import type { AIMessage, AIMessageChunk, BaseMessage } from "@langchain/core/messages";
import type { StructuredToolInterface } from "@langchain/core/tools";
import type { LLMConfig } from "../config.js";

/** 对话层依赖的最小模型接口：测试中以假模型替换 */
export interface ToolCallingModel {
  invoke(messages: BaseMessage[], options?: { signal?: AbortSignal }): Promise<AIMessage | AIMessageChunk>;
}

export function createLLM(config: LLMConfig): ChatOpenAI {
  return new ChatOpenAI({
    openAIApiKey: config.apiKey,
    modelName: config.model,
    temperature: config.temperature ?? 0.4,
    maxTokens: config.maxTokens,
    timeout: config.timeoutMs,
    maxRetries: 1,
    configuration: config.baseUrl ? { baseURL: config.baseUrl } : undefined,
  });
}

/** 绑定工具声明后的模型，模型按 function calling 规范返回 tool_calls */
export function createToolCallingModel(config: LLMConfig, tools: StructuredToolInterface[]): ToolCallingModel {
  return createLLM(config).bindTools(tools);
}

export { SlidingWindowRateLimiter } from "./rate-limit.js";
export { invokeWithTimeout } from "./timeout.js";
