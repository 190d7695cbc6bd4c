import { describe, it, expect } from "vitest";
import { IntentDispatcher } from "../dispatcher/dispatcher.js";
import { OPERATIONS } from "../dispatcher/tool-call.js";
import { createSampleStore } from "../testing/catalogue.js";
import { createTools, toolNameMap } from "./index.js";

describe("createTools", () => {
  const tools = createTools(new IntentDispatcher(createSampleStore()));

  function findTool(name: string) {
    const found = tools.find((t) => t.name === name);
    if (!found) throw new Error(`tool ${name} missing`);
    return found;
  }

  it("should declare one tool per operation", () => {
    expect(tools.map((t) => t.name)).toEqual([...OPERATIONS]);
    expect(Object.keys(toolNameMap).sort()).toEqual([...OPERATIONS].sort());
  });

  it("should return dispatcher results as JSON", async () => {
    const output: unknown = await findTool("lookup_by_id").invoke({ id: 31 });
    expect(typeof output).toBe("string");
    expect(JSON.parse(String(output))).toMatchObject({ operation: "lookup_by_id", field: { id: 31, name: "Sex" } });
  });

  it("should report missing records as a tool result", async () => {
    const output: unknown = await findTool("list_category").invoke({ categoryName: "oncology" });
    expect(JSON.parse(String(output))).toEqual({ error: "NOT_FOUND", message: 'Category "oncology" not found' });
  });
});
