/**
 * 带超时的模型调用：到期中止请求并抛 TurnTimeoutError；其他失败包装为 LlmError
 */

import type { AIMessage, AIMessageChunk, BaseMessage } from "@langchain/core/messages";
import { AssistantError, LlmError, TurnTimeoutError, errorMessage } from "../errors.js";
import type { ToolCallingModel } from "./index.js";

export async function invokeWithTimeout(
  model: ToolCallingModel,
  messages: BaseMessage[],
  timeoutMs: number
): Promise<AIMessage | AIMessageChunk> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TurnTimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([model.invoke(messages, { signal: controller.signal }), expired]);
  } catch (e) {
    if (e instanceof AssistantError) throw e;
    if (controller.signal.aborted) throw new TurnTimeoutError(timeoutMs);
    throw new LlmError(`Model request failed: ${errorMessage(e)}`, e);
  } finally {
    clearTimeout(timer);
  }
}
