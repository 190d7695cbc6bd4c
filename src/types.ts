/**
 * 服务端共享类型
 */

export type Language = "zh" | "en";

export type MessageRole = "user" | "assistant" | "system";

export interface ChatMessage {
  id: string;
  role: MessageRole;
  content: string;
  timestamp: Date;
  toolCalls?: ToolCallResult[];
  reasoning?: string[];
}

/** 单次工具调用的执行记录（用于会话记录与接口返回） */
export interface ToolCallResult {
  toolName: string;
  input: Record<string, unknown>;
  output: string;
  duration: number;
  success: boolean;
  error?: string;
}

