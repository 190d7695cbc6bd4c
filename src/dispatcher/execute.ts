/**
 * 执行一次工具调用并序列化为工具消息内容
 * NotFound / InvalidArgument 作为结果回报给模型，其他错误继续抛出
 */

import { InvalidArgumentError, NotFoundError, type ErrorCode } from "../errors.js";
import type { IntentDispatcher } from "./dispatcher.js";
import { parseToolCall } from "./tool-call.js";
import type { ToolResult } from "./types.js";

export type ToolOutcome =
  | { success: true; result: ToolResult; content: string }
  | { success: false; error: ErrorCode; message: string; content: string };

export function runToolCall(dispatcher: IntentDispatcher, name: string, args: unknown): ToolOutcome {
  try {
    const result = dispatcher.dispatch(parseToolCall(name, args));
    return { success: true, result, content: JSON.stringify(result) };
  } catch (e) {
    if (e instanceof NotFoundError || e instanceof InvalidArgumentError) return failedOutcome(e);
    throw e;
  }
}

/** 模型给出的参数无法解析（非 JSON）时，同样作为 INVALID_ARGUMENT 回报 */
export function rejectToolCall(name: string, reason: string): ToolOutcome {
  return failedOutcome(new InvalidArgumentError(`Invalid arguments for ${name}: ${reason}`));
}

function failedOutcome(e: NotFoundError | InvalidArgumentError): ToolOutcome {
  return {
    success: false,
    error: e.code,
    message: e.message,
    content: JSON.stringify({ error: e.code, message: e.message }),
  };
}
