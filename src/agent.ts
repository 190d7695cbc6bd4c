/**
 * Agent 核心：单轮对话门面
 * 用户问题 → 模型 →（工具调用 → 分发）* → 最终回答；流式产出 chunk
 * 单轮内的全部错误在此转换为用户可读消息，不会向上抛出
 */

import { HumanMessage, SystemMessage, isAIMessage, type BaseMessage } from "@langchain/core/messages";
import { IntentDispatcher } from "./dispatcher/dispatcher.js";
import { isOperation } from "./dispatcher/tool-call.js";
import type { DispatchOptions } from "./dispatcher/types.js";
import { AssistantError, errorMessage, type ErrorCode } from "./errors.js";
import { createTurnGraph, contentToText, pendingToolCalls, type TurnGraph } from "./graph/index.js";
import type { ToolCallingModel } from "./llm/index.js";
import type { SlidingWindowRateLimiter } from "./llm/rate-limit.js";
import { createChildLogger } from "./logger.js";
import { convertToLangChainMessages, type SessionStore } from "./memory.js";
import { getFailureMessage, getSystemPrompt } from "./prompts.js";
import type { FieldStore } from "./store/field-store.js";
import { detectLanguage } from "./text.js";
import { toolNameMap } from "./tools/index.js";
import type { ChatMessage, Language, ToolCallResult } from "./types.js";

const log = createChildLogger("agent");

export interface AgentDeps {
  store: FieldStore;
  model: ToolCallingModel;
  maxToolCalls: number;
  timeoutMs: number;
  /** 0 表示不携带历史 */
  historyLimit?: number;
  dispatch?: Partial<DispatchOptions>;
  sessions?: SessionStore;
  rateLimiter?: SlidingWindowRateLimiter;
  /** 无法从问题中判断语言时（空问题）使用 */
  defaultLanguage?: Language;
}

export interface TurnOptions {
  sessionId?: string;
  language?: Language;
  /** 追加到系统提示之后的自定义说明 */
  systemPrompt?: string;
}

export type AgentStreamChunk =
  | { type: "thinking" | "tool_call" | "tool_result" | "text" | "done"; content: string; toolName?: string }
  | { type: "error"; content: string; code: ErrorCode };

export type TurnOutcome =
  | {
      ok: true;
      query: string;
      answer: string;
      language: Language;
      sessionId: string;
      toolCalls: ToolCallResult[];
    }
  | { ok: false; query: string; error: ErrorCode; message: string; language: Language; sessionId: string };

export interface Agent {
  stream(input: string, options?: TurnOptions): AsyncGenerator<AgentStreamChunk>;
  run(input: string, options?: TurnOptions): Promise<TurnOutcome>;
}

function generateId(): string {
  return `msg-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}

function displayName(name: string): string {
  return isOperation(name) ? toolNameMap[name] : name;
}

/** 将单轮内的任意错误归类为错误码 */
export function classifyFailure(e: unknown): ErrorCode {
  return e instanceof AssistantError ? e.code : "UNEXPECTED_ERROR";
}

/** 新增消息 → chunk：AI 的工具调用请求与工具返回结果 */
function* describeMessage(message: BaseMessage): Generator<AgentStreamChunk> {
  if (isAIMessage(message)) {
    const text = contentToText(message.content).trim();
    const calls = pendingToolCalls([message]);
    if (calls.length && text) yield { type: "thinking", content: text };
    for (const tc of calls) {
      const args = tc.invalid ? (tc.invalid.raw ?? "") : JSON.stringify(tc.args, null, 2);
      yield { type: "thinking", content: `🔧 决策: 调用 ${displayName(tc.name)}` };
      yield {
        type: "tool_call",
        content: `正在调用 ${displayName(tc.name)}...\n参数: ${args}`,
        toolName: tc.name,
      };
    }
    return;
  }
  if (message._getType() === "tool") {
    const name = message.name ?? "";
    yield { type: "thinking", content: `📥 观察: ${displayName(name)} 返回结果` };
    yield { type: "tool_result", content: contentToText(message.content), toolName: name };
  }
}

export function createAgent(deps: AgentDeps): Agent {
  const dispatcher = new IntentDispatcher(deps.store, deps.dispatch);
  const graph: TurnGraph = createTurnGraph({
    model: deps.model,
    dispatcher,
    maxToolCalls: deps.maxToolCalls,
    timeoutMs: deps.timeoutMs,
    rateLimiter: deps.rateLimiter,
  });
  const historyLimit = deps.historyLimit ?? 10;
  // 每次工具分发对应 callModel + dispatchTools 两步，另留余量给首尾节点
  const recursionLimit = deps.maxToolCalls * 2 + 5;

  function resolveLanguage(question: string, options: TurnOptions): Language {
    return options.language ?? (question ? detectLanguage(question) : (deps.defaultLanguage ?? "zh"));
  }

  /** dispatched 收集本轮实际执行的工具调用，供 run() 返回 */
  async function* turn(
    input: string,
    options: TurnOptions,
    dispatched: ToolCallResult[]
  ): AsyncGenerator<AgentStreamChunk> {
    const question = input.trim();
    const language = resolveLanguage(question, options);
    const sessionId = options.sessionId || generateId();
    const sessions = deps.sessions;

    const history = sessions ? convertToLangChainMessages(sessions.getRecentMessages(sessionId, historyLimit)) : [];
    const messages: BaseMessage[] = [
      new SystemMessage(getSystemPrompt(language, options.systemPrompt)),
      ...history,
      new HumanMessage(question),
    ];

    const started = Date.now();
    let finalReply = "";
    let toolCalls: ToolCallResult[] = [];
    const reasoning: string[] = [];
    log.info({ sessionId, language, query: question.slice(0, 100) }, "Turn started");

    try {
      const states = await graph.stream({ messages }, { streamMode: "values", recursionLimit });
      let seen = messages.length;
      for await (const state of states) {
        const fresh = state.messages.slice(seen);
        seen = state.messages.length;
        for (const m of fresh) {
          for (const chunk of describeMessage(m)) {
            if (chunk.type === "tool_call" && chunk.toolName) reasoning.push(`调用工具: ${displayName(chunk.toolName)}`);
            yield chunk;
          }
        }
        toolCalls = state.dispatched;
        finalReply = state.finalReply;
        dispatched.splice(0, dispatched.length, ...toolCalls);
      }
    } catch (e) {
      const code = classifyFailure(e);
      const level = code === "UNEXPECTED_ERROR" || code === "LLM_ERROR" ? "error" : "warn";
      log[level]({ sessionId, code, error: errorMessage(e), duration: Date.now() - started }, "Turn failed");
      yield { type: "error", content: getFailureMessage(code, language), code };
      yield { type: "done", content: sessionId };
      return;
    }

    // 模型未给出任何文字（如参数始终无法解析）时，提示用户补充或更正问题
    if (!finalReply.trim()) {
      log.warn({ sessionId, toolCalls: toolCalls.length }, "Model returned an empty reply");
      finalReply = getFailureMessage("INVALID_ARGUMENT", language);
    }

    yield { type: "text", content: finalReply };
    log.info({ sessionId, toolCalls: toolCalls.length, duration: Date.now() - started }, "Turn completed");

    if (sessions) {
      const userMessage: ChatMessage = { id: generateId(), role: "user", content: question, timestamp: new Date() };
      const aiMessage: ChatMessage = {
        id: generateId(),
        role: "assistant",
        content: finalReply,
        timestamp: new Date(),
        toolCalls,
        reasoning,
      };
      sessions.addMessage(sessionId, userMessage);
      sessions.addMessage(sessionId, aiMessage);
    }

    yield { type: "done", content: sessionId };
  }

  function stream(input: string, options: TurnOptions = {}): AsyncGenerator<AgentStreamChunk> {
    return turn(input, options, []);
  }

  async function run(input: string, options: TurnOptions = {}): Promise<TurnOutcome> {
    const question = input.trim();
    const language = resolveLanguage(question, options);
    let answer = "";
    let sessionId = options.sessionId ?? "";
    const toolCalls: ToolCallResult[] = [];
    let failure: { code: ErrorCode; message: string } | null = null;

    for await (const chunk of turn(question, { ...options, language }, toolCalls)) {
      if (chunk.type === "error") failure = { code: chunk.code, message: chunk.content };
      else if (chunk.type === "text") answer = chunk.content;
      else if (chunk.type === "done") sessionId = chunk.content;
    }

    if (failure) {
      return { ok: false, query: question, error: failure.code, message: failure.message, language, sessionId };
    }
    return { ok: true, query: question, answer, language, sessionId, toolCalls };
  }

  return { stream, run };
}
