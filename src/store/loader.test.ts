import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { StoreUnavailableError } from "../errors.js";
import { DEFAULT_STORE_PATH, loadFieldStore } from "./loader.js";

describe("loadFieldStore", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "ukb-store-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should load the bundled data dictionary", () => {
    const store = loadFieldStore(DEFAULT_STORE_PATH);
    expect(store.size).toBe(28);
    expect(store.encodingCount).toBe(10);
    expect(store.getField(31)?.encodingRef).toBe(9);
    expect(store.getEncoding(9)?.entries.map((e) => e.label)).toEqual(["Female", "Male"]);
  });

  it("should report a missing file", () => {
    const path = join(dir, "missing.json");
    expect(() => loadFieldStore(path)).toThrow(StoreUnavailableError);
    expect(() => loadFieldStore(path)).toThrow(`Cannot read field store ${path}: file not found`);
  });

  it("should report malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadFieldStore(path)).toThrow(`Invalid JSON in field store ${path}`);
  });

  it("should report schema violations with their paths", () => {
    const path = join(dir, "invalid.json");
    writeFileSync(path, JSON.stringify({ fields: [{ id: -1, name: "Bad", description: "", category: "x" }] }));
    expect(() => loadFieldStore(path)).toThrow(`Field store ${path} failed validation: fields.0.id`);
  });

  it("should trim string codes when loading", () => {
    const path = join(dir, "padded.json");
    writeFileSync(
      path,
      JSON.stringify({
        fields: [{ id: 8, name: "Coded", description: "", category: "misc", encodingRef: 3 }],
        encodings: [{ ref: 3, title: "Padded", entries: [{ code: " B2 ", label: "Second" }] }],
      })
    );
    expect(loadFieldStore(path).getEncoding(3)?.entries).toEqual([{ code: "B2", label: "Second" }]);
  });

  it("should default encodings and recommended to empty lists", () => {
    const path = join(dir, "minimal.json");
    writeFileSync(path, JSON.stringify({ fields: [{ id: 7, name: "Seven", description: "", category: "misc" }] }));
    const store = loadFieldStore(path);
    expect(store.size).toBe(1);
    expect(store.encodingCount).toBe(0);
    expect(store.recommended()).toEqual([]);
  });
});
