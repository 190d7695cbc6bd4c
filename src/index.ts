/**
 * npm 包入口：供外部组装 Agent 或直接使用字段库与分发器
 */

export { createAgent, type Agent, type AgentDeps, type AgentStreamChunk, type TurnOptions, type TurnOutcome } from "./agent.js";
export { getConfig, validateConfig, type AppConfig, type LLMConfig, type LLMProvider } from "./config.js";
export * from "./dispatcher/index.js";
export * from "./errors.js";
export { createApp, type AppDeps } from "./http/app.js";
export { createLLM, createToolCallingModel, SlidingWindowRateLimiter, type ToolCallingModel } from "./llm/index.js";
export { SessionStore } from "./memory.js";
export * from "./store/index.js";
export { createTools, toolNameMap } from "./tools/index.js";
export type { ChatMessage, Language, MessageRole, ToolCallResult } from "./types.js";
