/**
 * LangGraph 单轮状态
 * messages / dispatched 为追加式 reducer，其余为覆盖式
 */

import { Annotation } from "@langchain/langgraph";
import type { BaseMessage } from "@langchain/core/messages";
import type { ToolCallResult } from "../types.js";

export const TurnStateAnnotation = Annotation.Root({
  messages: Annotation<BaseMessage[]>({ reducer: (x, y) => x.concat(y), default: () => [] }),
  /** 本轮已分发的工具调用次数 */
  toolCallCount: Annotation<number>({ reducer: (_, y) => y, default: () => 0 }),
  dispatched: Annotation<ToolCallResult[]>({ reducer: (x, y) => x.concat(y), default: () => [] }),
  finalReply: Annotation<string>({ reducer: (_, y) => y, default: () => "" }),
});

export type TurnState = typeof TurnStateAnnotation.State;
export type TurnUpdate = typeof TurnStateAnnotation.Update;
