import { describe, it, expect } from "vitest";
import { AIMessage, HumanMessage } from "@langchain/core/messages";
import { SessionStore, convertToLangChainMessages } from "./memory.js";
import type { ChatMessage } from "./types.js";

function message(id: number, role: ChatMessage["role"] = "user"): ChatMessage {
  return { id: `m${id}`, role, content: `message ${id}`, timestamp: new Date(0) };
}

describe("SessionStore", () => {
  it("should keep messages per session", () => {
    const sessions = new SessionStore();
    sessions.addMessage("a", message(1));
    sessions.addMessage("b", message(2));
    expect(sessions.getSessionMessages("a").map((m) => m.id)).toEqual(["m1"]);
    expect(sessions.getSessionMessages("missing")).toEqual([]);
  });

  it("should drop the oldest messages beyond the cap", () => {
    const sessions = new SessionStore(3);
    for (let i = 1; i <= 5; i++) sessions.addMessage("a", message(i));
    expect(sessions.getSessionMessages("a").map((m) => m.id)).toEqual(["m3", "m4", "m5"]);
  });

  it("should return the most recent messages", () => {
    const sessions = new SessionStore();
    for (let i = 1; i <= 4; i++) sessions.addMessage("a", message(i));
    expect(sessions.getRecentMessages("a", 2).map((m) => m.id)).toEqual(["m3", "m4"]);
    expect(sessions.getRecentMessages("a", 0)).toEqual([]);
  });

  it("should evict the least recently used session beyond the session cap", () => {
    const sessions = new SessionStore(100, 2);
    sessions.addMessage("a", message(1));
    sessions.addMessage("b", message(2));
    sessions.getRecentMessages("a");
    sessions.addMessage("c", message(3));
    expect(sessions.size).toBe(2);
    expect(sessions.getSessionMessages("b")).toEqual([]);
    expect(sessions.getSessionMessages("a").map((m) => m.id)).toEqual(["m1"]);
    expect(sessions.getSessionMessages("c").map((m) => m.id)).toEqual(["m3"]);
  });

  it("should clear a session", () => {
    const sessions = new SessionStore();
    sessions.addMessage("a", message(1));
    sessions.clearSession("a");
    expect(sessions.getSessionMessages("a")).toEqual([]);
  });
});

describe("convertToLangChainMessages", () => {
  it("should map roles to message classes", () => {
    const converted = convertToLangChainMessages([message(1), message(2, "assistant")]);
    expect(converted[0]).toBeInstanceOf(HumanMessage);
    expect(converted[1]).toBeInstanceOf(AIMessage);
    expect(converted[1].content).toBe("message 2");
  });
});
