/**
 * LangGraph 节点：调用模型、分发工具、组织回答
 * AwaitingModel → (ToolRequested → Dispatching → AwaitingModel)* → Responding → Done
 */

import { ToolMessage, isAIMessage, type BaseMessage, type MessageContent } from "@langchain/core/messages";
import type { IntentDispatcher } from "../dispatcher/dispatcher.js";
import { rejectToolCall, runToolCall } from "../dispatcher/execute.js";
import { ToolLoopExceededError } from "../errors.js";
import type { ToolCallingModel } from "../llm/index.js";
import type { SlidingWindowRateLimiter } from "../llm/rate-limit.js";
import { invokeWithTimeout } from "../llm/timeout.js";
import { createChildLogger } from "../logger.js";
import type { ToolCallResult } from "../types.js";
import type { TurnState, TurnUpdate } from "./state.js";

const log = createChildLogger("graph");

export interface NodeDeps {
  model: ToolCallingModel;
  dispatcher: IntentDispatcher;
  maxToolCalls: number;
  timeoutMs: number;
  rateLimiter?: SlidingWindowRateLimiter;
}

export interface RequestedToolCall {
  id: string;
  name: string;
  args: Record<string, unknown>;
  /** 参数无法解析的调用：原始参数文本与解析错误 */
  invalid?: { raw?: string; error: string };
}

export function contentToText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((part) => {
      if (typeof part === "string") return part;
      return part.type === "text" && "text" in part && typeof part.text === "string" ? part.text : "";
    })
    .join("");
}

/** 最后一条消息若为 AI 消息，取出其中的工具调用请求（含参数解析失败的 invalid_tool_calls） */
export function pendingToolCalls(messages: BaseMessage[]): RequestedToolCall[] {
  const last = messages[messages.length - 1];
  if (!last || !isAIMessage(last)) return [];
  const valid = (last.tool_calls ?? []).map((tc, i): RequestedToolCall => ({
    id: tc.id ?? `call_${i}`,
    name: tc.name,
    args: tc.args,
  }));
  const invalid = (last.invalid_tool_calls ?? []).map((tc, i): RequestedToolCall => ({
    id: tc.id ?? `invalid_call_${i}`,
    name: tc.name ?? "unknown",
    args: {},
    invalid: { raw: tc.args, error: tc.error ?? "arguments are not valid JSON" },
  }));
  return [...valid, ...invalid];
}

export function createCallModelNode(deps: NodeDeps) {
  return async (state: TurnState): Promise<TurnUpdate> => {
    deps.rateLimiter?.acquire();
    const started = Date.now();
    const reply = await invokeWithTimeout(deps.model, state.messages, deps.timeoutMs);
    log.debug({ duration: Date.now() - started, toolCalls: reply.tool_calls?.length ?? 0 }, "Model replied");
    return { messages: [reply] };
  };
}

export function createDispatchToolsNode(deps: NodeDeps) {
  return async (state: TurnState): Promise<TurnUpdate> => {
    const messages: BaseMessage[] = [];
    const dispatched: ToolCallResult[] = [];
    let count = state.toolCallCount;

    for (const call of pendingToolCalls(state.messages)) {
      if (count >= deps.maxToolCalls) {
        log.warn({ maxToolCalls: deps.maxToolCalls }, "Tool call limit reached");
        throw new ToolLoopExceededError(deps.maxToolCalls);
      }
      count += 1;
      const started = Date.now();
      const outcome = call.invalid
        ? rejectToolCall(call.name, call.invalid.error)
        : runToolCall(deps.dispatcher, call.name, call.args);
      const duration = Date.now() - started;
      log.debug({ tool: call.name, success: outcome.success, duration }, "Tool dispatched");

      messages.push(new ToolMessage({ content: outcome.content, tool_call_id: call.id, name: call.name }));
      dispatched.push({
        toolName: call.name,
        input: call.invalid?.raw !== undefined ? { raw: call.invalid.raw } : call.args,
        output: outcome.content,
        duration,
        success: outcome.success,
        ...(outcome.success ? {} : { error: outcome.error }),
      });
    }

    return { messages, dispatched, toolCallCount: count };
  };
}

export function respondNode(state: TurnState): TurnUpdate {
  const last = state.messages[state.messages.length - 1];
  return { finalReply: last ? contentToText(last.content) : "" };
}

/** 路由：模型请求了工具则分发，否则进入回答 */
export function routeAfterModel(state: TurnState): "dispatchTools" | "respond" {
  return pendingToolCalls(state.messages).length ? "dispatchTools" : "respond";
}
