import { describe, it, expect } from "vitest";
import { getFailureMessage, getSystemPrompt } from "./prompts.js";

describe("getSystemPrompt", () => {
  it("should choose the prompt by language", () => {
    expect(getSystemPrompt("zh").startsWith("你是 UK Biobank 数据字典的专家助手")).toBe(true);
    expect(getSystemPrompt("en").startsWith("You are an expert assistant for the UK Biobank data dictionary")).toBe(true);
  });

  it("should append extra instructions", () => {
    expect(getSystemPrompt("en", " Answer briefly ").endsWith("## 补充说明 / Additional instructions\nAnswer briefly")).toBe(
      true
    );
    expect(getSystemPrompt("en", "   ")).toBe(getSystemPrompt("en"));
  });
});

describe("getFailureMessage", () => {
  it("should localise failure messages", () => {
    expect(getFailureMessage("TIMEOUT", "en")).toBe("Sorry, the model took too long to respond. Please try again later.");
    expect(getFailureMessage("TOOL_LOOP_EXCEEDED", "zh")).toBe("抱歉，对话轮次过多，请简化您的问题重新提问。");
  });

  it("should hide startup failures behind the generic message", () => {
    expect(getFailureMessage("STORE_UNAVAILABLE", "en")).toBe("Search service temporarily unavailable, please try again later.");
  });
});
