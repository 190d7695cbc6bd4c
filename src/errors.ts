/**
 * 错误分类
 * 单轮内的错误在对话层统一转换为用户可读消息；StoreUnavailable / Configuration 仅在启动时出现且致命
 */

export type ErrorCode =
  | "NOT_FOUND"
  | "INVALID_ARGUMENT"
  | "TIMEOUT"
  | "TOOL_LOOP_EXCEEDED"
  | "RATE_LIMITED"
  | "LLM_ERROR"
  | "STORE_UNAVAILABLE"
  | "CONFIGURATION_ERROR"
  | "UNEXPECTED_ERROR";

export class AssistantError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AssistantError";
  }
}

export type NotFoundSubject = "field" | "category" | "encoding" | "encoding_code";

export class NotFoundError extends AssistantError {
  constructor(
    public readonly subject: NotFoundSubject,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(message, "NOT_FOUND", { subject, ...details });
    this.name = "NotFoundError";
  }
}

export class InvalidArgumentError extends AssistantError {
  constructor(message: string, public readonly issues: readonly string[] = []) {
    super(message, "INVALID_ARGUMENT", issues.length ? { issues } : {});
    this.name = "InvalidArgumentError";
  }
}

export class TurnTimeoutError extends AssistantError {
  constructor(public readonly timeoutMs: number) {
    super(`Model call timed out after ${timeoutMs}ms`, "TIMEOUT", { timeoutMs });
    this.name = "TurnTimeoutError";
  }
}

export class ToolLoopExceededError extends AssistantError {
  constructor(public readonly maxToolCalls: number) {
    super(`Turn exceeded the limit of ${maxToolCalls} tool calls`, "TOOL_LOOP_EXCEEDED", { maxToolCalls });
    this.name = "ToolLoopExceededError";
  }
}

export class RateLimitError extends AssistantError {
  constructor(public readonly limitPerMinute: number, public readonly retryAfterMs: number) {
    super(`Rate limit of ${limitPerMinute} model calls per minute exceeded`, "RATE_LIMITED", {
      limitPerMinute,
      retryAfterMs,
    });
    this.name = "RateLimitError";
  }
}

export class LlmError extends AssistantError {
  constructor(message: string, cause?: unknown) {
    super(message, "LLM_ERROR", {}, { cause });
    this.name = "LlmError";
  }
}

export class StoreUnavailableError extends AssistantError {
  constructor(message: string, public readonly path?: string, cause?: unknown) {
    super(message, "STORE_UNAVAILABLE", path ? { path } : {}, { cause });
    this.name = "StoreUnavailableError";
  }
}

export class ConfigurationError extends AssistantError {
  constructor(public readonly problems: readonly string[]) {
    super(`Configuration validation failed:\n${problems.map((p) => `- ${p}`).join("\n")}`, "CONFIGURATION_ERROR", {
      problems,
    });
    this.name = "ConfigurationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
