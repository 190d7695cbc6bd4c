/**
 * 应用配置（环境变量）
 * 支持 .env / .env.local；getConfig 只读取传入的 env，便于测试
 */

import dotenv from "dotenv";
import { ConfigurationError } from "./errors.js";
import { DEFAULT_STORE_PATH } from "./store/loader.js";
import type { Language } from "./types.js";

dotenv.config();
dotenv.config({ path: ".env.local" });

export type LLMProvider = "openai" | "deepseek" | "qwen" | "zhipu" | "custom";

const PROVIDERS: readonly LLMProvider[] = ["openai", "deepseek", "qwen", "zhipu", "custom"];

export interface LLMConfig {
  provider: LLMProvider;
  apiKey: string;
  baseUrl?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  /** 单次模型调用超时（毫秒） */
  timeoutMs: number;
}

export interface AgentSettings {
  /** 单轮最多工具调用次数 */
  maxToolCalls: number;
  relatedCap: number;
  /** 携带的历史消息条数，0 表示不保留历史 */
  historyLimit: number;
  /** 内存中保留的会话数上限，超出时淘汰最久未访问的会话 */
  maxSessions: number;
  /** 每分钟模型调用上限，0 表示不限流 */
  rateLimitPerMinute: number;
  defaultLanguage: Language;
}

export interface AppConfig {
  appName: string;
  appVersion: string;
  llm: LLMConfig;
  agent: AgentSettings;
  server: { port: number; corsOrigins: string[] | true };
  store: { path: string };
}

type Env = Record<string, string | undefined>;

const PROVIDER_DEFAULTS: Record<LLMProvider, { model: string; baseUrl?: string }> = {
  openai: { model: "gpt-4o", baseUrl: "https://api.openai.com/v1" },
  deepseek: { model: "deepseek-chat", baseUrl: "https://api.deepseek.com" },
  qwen: { model: "qwen-plus", baseUrl: "https://dashscope.aliyuncs.com/compatible-mode/v1" },
  zhipu: { model: "glm-4.5-flash", baseUrl: "https://open.bigmodel.cn/api/paas/v4" },
  custom: { model: "gpt-3.5-turbo" },
};

const PLACEHOLDER_KEYS = new Set(["your-api-key-here", "changeme"]);

function isProvider(value: string): value is LLMProvider {
  return (PROVIDERS as readonly string[]).includes(value);
}

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : Number.NaN;
}

export function getConfig(env: Env = process.env): AppConfig {
  const rawProvider = env.LLM_PROVIDER?.trim().toLowerCase() || "openai";
  const provider: LLMProvider = isProvider(rawProvider) ? rawProvider : "custom";
  const d = PROVIDER_DEFAULTS[provider];
  const cors = env.CORS_ORIGINS?.trim();

  return {
    appName: env.APP_NAME || "UKB Data Dictionary Assistant",
    appVersion: env.APP_VERSION || "0.2.0",
    llm: {
      provider,
      apiKey: env.LLM_API_KEY || env.OPENAI_API_KEY || env.GLM_API_KEY || "",
      baseUrl: env.LLM_BASE_URL || d.baseUrl,
      model: env.LLM_MODEL || d.model,
      temperature: readNumber(env, "LLM_TEMPERATURE", 0.4),
      maxTokens: readNumber(env, "LLM_MAX_TOKENS", 4096),
      timeoutMs: readNumber(env, "LLM_TIMEOUT_MS", 30_000),
    },
    agent: {
      maxToolCalls: readNumber(env, "MAX_TOOL_CALLS", 5),
      relatedCap: readNumber(env, "RELATED_FIELDS_CAP", 10),
      historyLimit: readNumber(env, "HISTORY_LIMIT", 10),
      maxSessions: readNumber(env, "MAX_SESSIONS", 1000),
      rateLimitPerMinute: readNumber(env, "RATE_LIMIT_PER_MINUTE", 60),
      defaultLanguage: env.DEFAULT_LANGUAGE === "en" ? "en" : "zh",
    },
    server: {
      port: readNumber(env, "PORT", 3002),
      corsOrigins: !cors || cors === "*" ? true : cors.split(",").map((o) => o.trim()).filter(Boolean),
    },
    store: { path: env.UKB_STORE_PATH || DEFAULT_STORE_PATH },
  };
}

/** 启动校验：收集全部问题后一次性抛出 ConfigurationError */
export function validateConfig(config: AppConfig): void {
  const problems: string[] = [];
  const { llm, agent, server } = config;

  if (!llm.apiKey || PLACEHOLDER_KEYS.has(llm.apiKey)) {
    problems.push("LLM_API_KEY (or OPENAI_API_KEY / GLM_API_KEY) is required");
  }
  if (llm.provider === "custom" && !llm.baseUrl) {
    problems.push("LLM_BASE_URL is required for the custom provider");
  }
  const positiveInts: Array<[string, number]> = [
    ["LLM_TIMEOUT_MS", llm.timeoutMs],
    ["MAX_TOOL_CALLS", agent.maxToolCalls],
    ["RELATED_FIELDS_CAP", agent.relatedCap],
    ["MAX_SESSIONS", agent.maxSessions],
    ["PORT", server.port],
  ];
  for (const [key, value] of positiveInts) {
    if (!Number.isInteger(value) || value <= 0) problems.push(`${key} must be a positive integer`);
  }
  const nonNegativeInts: Array<[string, number]> = [
    ["HISTORY_LIMIT", agent.historyLimit],
    ["RATE_LIMIT_PER_MINUTE", agent.rateLimitPerMinute],
  ];
  for (const [key, value] of nonNegativeInts) {
    if (!Number.isInteger(value) || value < 0) problems.push(`${key} must be a non-negative integer`);
  }
  if (llm.temperature != null && !(llm.temperature >= 0 && llm.temperature <= 2)) {
    problems.push("LLM_TEMPERATURE must be between 0 and 2");
  }
  if (llm.maxTokens != null && !(Number.isInteger(llm.maxTokens) && llm.maxTokens > 0)) {
    problems.push("LLM_MAX_TOKENS must be a positive integer");
  }

  if (problems.length) throw new ConfigurationError(problems);
}
