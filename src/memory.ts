/**
 * 对话记忆：按 sessionId 保存消息，启动时创建实例并注入，不使用模块级单例
 * 会话数超过上限时淘汰最久未访问的会话（Map 按插入顺序迭代，访问时重新插入）
 */

import { HumanMessage, AIMessage, type BaseMessage } from "@langchain/core/messages";
import type { ChatMessage } from "./types.js";

export class SessionStore {
  private readonly sessions = new Map<string, ChatMessage[]>();

  constructor(
    private readonly maxMessagesPerSession = 100,
    private readonly maxSessions = 1000
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  getSessionMessages(sessionId: string): ChatMessage[] {
    return this.touch(sessionId) ?? [];
  }

  addMessage(sessionId: string, message: ChatMessage): void {
    const messages = this.touch(sessionId) ?? [];
    messages.push(message);
    if (messages.length > this.maxMessagesPerSession) {
      messages.splice(0, messages.length - this.maxMessagesPerSession);
    }
    this.sessions.set(sessionId, messages);
    while (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
  }

  clearSession(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  getRecentMessages(sessionId: string, limit = 10): ChatMessage[] {
    return limit > 0 ? this.getSessionMessages(sessionId).slice(-limit) : [];
  }

  /** 取出会话并移到最近使用的位置 */
  private touch(sessionId: string): ChatMessage[] | undefined {
    const messages = this.sessions.get(sessionId);
    if (messages) {
      this.sessions.delete(sessionId);
      this.sessions.set(sessionId, messages);
    }
    return messages;
  }
}

export function convertToLangChainMessages(messages: ChatMessage[]): BaseMessage[] {
  return messages.map((msg) =>
    msg.role === "user" ? new HumanMessage(msg.content) : new AIMessage(msg.content)
  );
}
