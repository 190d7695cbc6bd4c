import { describe, it, expect } from "vitest";
import { AIMessage, ToolMessage } from "@langchain/core/messages";
import { createAgent, type AgentDeps, type AgentStreamChunk } from "./agent.js";
import { SlidingWindowRateLimiter } from "./llm/rate-limit.js";
import type { ToolCallingModel } from "./llm/index.js";
import { SessionStore } from "./memory.js";
import { createSampleStore } from "./testing/catalogue.js";
import { ScriptedModel, invalidCallReply, toolCallReply } from "./testing/scripted-model.js";

const store = createSampleStore();

function agentWith(model: ToolCallingModel, overrides: Partial<AgentDeps> = {}) {
  return createAgent({ store, model, maxToolCalls: 5, timeoutMs: 1_000, ...overrides });
}

async function collect(stream: AsyncGenerator<AgentStreamChunk>): Promise<AgentStreamChunk[]> {
  const chunks: AgentStreamChunk[] = [];
  for await (const chunk of stream) chunks.push(chunk);
  return chunks;
}

describe("createAgent", () => {
  it("should answer directly when no tool is needed", async () => {
    const agent = agentWith(new ScriptedModel([new AIMessage("Hello! Ask me about any field.")]));
    const outcome = await agent.run("Hello there", { sessionId: "s-1" });
    expect(outcome).toEqual({
      ok: true,
      query: "Hello there",
      answer: "Hello! Ask me about any field.",
      language: "en",
      sessionId: "s-1",
      toolCalls: [],
    });
  });

  it("should dispatch a tool call and feed the result back to the model", async () => {
    const model = new ScriptedModel([toolCallReply("lookup_by_id", { id: 31 }), new AIMessage("Field 31 is Sex.")]);
    const outcome = await agentWith(model).run("What is field 31?");

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.answer).toBe("Field 31 is Sex.");
    expect(outcome.toolCalls).toHaveLength(1);
    expect(outcome.toolCalls[0]).toMatchObject({ toolName: "lookup_by_id", input: { id: 31 }, success: true });

    const observed = model.received[1][model.received[1].length - 1];
    expect(observed).toBeInstanceOf(ToolMessage);
    expect(JSON.parse(String(observed.content))).toMatchObject({ field: { id: 31, name: "Sex" } });
  });

  it("should pass lookup misses to the model rather than failing the turn", async () => {
    const model = new ScriptedModel([
      toolCallReply("lookup_by_id", { id: 999999 }),
      new AIMessage("Field 999999 does not exist."),
    ]);
    const outcome = await agentWith(model).run("What is field 999999?");
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.toolCalls[0]).toMatchObject({ success: false, error: "NOT_FOUND" });
  });

  it("should report unparseable tool arguments to the model as invalid", async () => {
    const model = new ScriptedModel([
      invalidCallReply("lookup_by_id", "{id: 31", "bad json"),
      new AIMessage("Which field id do you mean?"),
    ]);
    const outcome = await agentWith(model).run("What is field 31?");

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.answer).toBe("Which field id do you mean?");
    expect(outcome.toolCalls).toHaveLength(1);
    expect(outcome.toolCalls[0]).toMatchObject({
      toolName: "lookup_by_id",
      input: { raw: "{id: 31" },
      success: false,
      error: "INVALID_ARGUMENT",
    });

    expect(model.received).toHaveLength(2);
    const observed = model.received[1][model.received[1].length - 1];
    expect(observed).toBeInstanceOf(ToolMessage);
    expect(JSON.parse(String(observed.content))).toEqual({
      error: "INVALID_ARGUMENT",
      message: "Invalid arguments for lookup_by_id: bad json",
    });
  });

  it("should count unparseable tool calls against the limit", async () => {
    const model = new ScriptedModel([(call) => invalidCallReply("lookup_by_id", "{", "bad json", `bad_${call}`)]);
    const outcome = await agentWith(model, { maxToolCalls: 5 }).run("What is field 31?");
    expect(outcome).toMatchObject({ ok: false, error: "TOOL_LOOP_EXCEEDED" });
    expect(model.received).toHaveLength(6);
  });

  it("should ask the user to clarify when the model returns no text", async () => {
    const outcome = await agentWith(new ScriptedModel([new AIMessage("")])).run("What is field 31?");
    expect(outcome).toMatchObject({
      ok: true,
      answer: "The request could not be understood. Please clarify or correct your question.",
    });
  });

  it("should stream progress chunks in order", async () => {
    const model = new ScriptedModel([toolCallReply("lookup_by_id", { id: 31 }), new AIMessage("Field 31 is Sex.")]);
    const chunks = await collect(agentWith(model).stream("What is field 31?", { sessionId: "s-2" }));
    expect(chunks.map((c) => c.type)).toEqual(["thinking", "tool_call", "thinking", "tool_result", "text", "done"]);
    expect(chunks[0].content).toBe("🔧 决策: 调用 字段详情");
    expect(chunks[4]).toEqual({ type: "text", content: "Field 31 is Sex." });
    expect(chunks[5]).toEqual({ type: "done", content: "s-2" });
  });

  it("should stop after the tool call limit", async () => {
    const model = new ScriptedModel([(call) => toolCallReply("list_categories", {}, `call_${call}`)]);
    const outcome = await agentWith(model, { maxToolCalls: 5 }).run("List every category");
    expect(outcome).toMatchObject({
      ok: false,
      error: "TOOL_LOOP_EXCEEDED",
      message: "Sorry, too many lookup rounds were needed. Please simplify your question.",
      language: "en",
    });
    expect(model.received).toHaveLength(6);
  });

  it("should report a timeout in the question's language", async () => {
    const model: ToolCallingModel = {
      invoke: (_messages, options) =>
        new Promise<AIMessage>((_, reject) => {
          options?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    };
    const outcome = await agentWith(model, { timeoutMs: 20 }).run("字段 31 是什么？");
    expect(outcome).toMatchObject({ ok: false, error: "TIMEOUT", message: "抱歉，模型响应超时，请稍后重试。", language: "zh" });
  });

  it("should report provider failures", async () => {
    const model: ToolCallingModel = {
      invoke: async () => {
        throw new Error("connection reset");
      },
    };
    const outcome = await agentWith(model).run("What is field 31?");
    expect(outcome).toMatchObject({ ok: false, error: "LLM_ERROR" });
  });

  it("should enforce the rate limit", async () => {
    const agent = agentWith(new ScriptedModel([new AIMessage("ok")]), {
      rateLimiter: new SlidingWindowRateLimiter(1, () => 0),
    });
    expect((await agent.run("first question")).ok).toBe(true);
    expect(await agent.run("second question")).toMatchObject({
      ok: false,
      error: "RATE_LIMITED",
      message: "Rate limit exceeded. Please try again later.",
    });
  });

  it("should carry session history into the next turn", async () => {
    const sessions = new SessionStore();
    const model = new ScriptedModel([new AIMessage("first answer"), new AIMessage("second answer")]);
    const agent = agentWith(model, { sessions });

    await agent.run("first question", { sessionId: "s-3" });
    await agent.run("second question", { sessionId: "s-3" });

    expect(model.received[1].map((m) => m.content)).toEqual([
      expect.stringContaining("You are an expert assistant"),
      "first question",
      "first answer",
      "second question",
    ]);
    expect(sessions.getSessionMessages("s-3").map((m) => m.role)).toEqual(["user", "assistant", "user", "assistant"]);
  });

  it("should keep a bounded number of sessions for anonymous turns", async () => {
    const sessions = new SessionStore(100, 50);
    const agent = agentWith(new ScriptedModel([new AIMessage("ok")]), { sessions });
    for (let i = 0; i < 200; i++) await agent.run(`hello ${i}`);
    expect(sessions.size).toBe(50);
  });

  it("should generate a session id when none is given", async () => {
    const outcome = await agentWith(new ScriptedModel([new AIMessage("ok")])).run("hello");
    expect(outcome.sessionId).toMatch(/^msg-\d+-[a-z0-9]+$/);
  });
});
