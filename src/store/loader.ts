/**
 * 字段库加载：启动时从本地 JSON 读取并校验，失败即致命（StoreUnavailable）
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { ZodError } from "zod";
import { StoreUnavailableError, errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";
import { FieldStore } from "./field-store.js";
import { catalogueSchema } from "./schema.js";

const log = createChildLogger("store");

const __dirname = dirname(fileURLToPath(import.meta.url));

/** 默认数据文件：项目根目录 data/ 下（src/ 与 dist/ 均位于根目录下一层） */
export const DEFAULT_STORE_PATH = join(__dirname, "..", "..", "data", "ukb-datadict.json");

function readJsonFile(path: string): unknown {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (e) {
    const code = e instanceof Error && "code" in e ? e.code : undefined;
    const reason = code === "ENOENT" ? "file not found" : errorMessage(e);
    throw new StoreUnavailableError(`Cannot read field store ${path}: ${reason}`, path, e);
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (e) {
    throw new StoreUnavailableError(`Invalid JSON in field store ${path}: ${errorMessage(e)}`, path, e);
  }
}

export function loadFieldStore(path: string = DEFAULT_STORE_PATH): FieldStore {
  const started = Date.now();
  const parsed = catalogueSchema.safeParse(readJsonFile(path));
  if (!parsed.success) {
    throw new StoreUnavailableError(
      `Field store ${path} failed validation: ${formatZodIssues(parsed.error).join("; ")}`,
      path,
      parsed.error
    );
  }
  const store = FieldStore.fromCatalogue(parsed.data);
  log.info(
    { path, fields: store.size, encodings: store.encodingCount, duration: Date.now() - started },
    "Field store loaded"
  );
  return store;
}

export function formatZodIssues(error: ZodError): string[] {
  return error.errors.map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message));
}
