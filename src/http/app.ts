/**
 * HTTP 服务
 * POST /api/chat  流式对话（SSE，data: JSON chunk，结束时 data: [DONE]）
 * GET  /api/search 单次问答（JSON）
 * GET  /health、/info，以及 public/ 下的静态页面
 */

import express from "express";
import cors from "cors";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import type { Agent } from "../agent.js";
import type { AppConfig } from "../config.js";
import { createChildLogger } from "../logger.js";
import type { FieldStore } from "../store/field-store.js";
import { errorHandler } from "./error-handler.js";
import { chatRequestSchema, searchQuerySchema } from "./requests.js";

const log = createChildLogger("http");

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_STATIC_DIR = join(__dirname, "..", "..", "public");

export interface AppDeps {
  agent: Agent;
  store: FieldStore;
  config: Pick<AppConfig, "appName" | "appVersion" | "llm" | "server">;
  staticDir?: string;
}

export function createApp(deps: AppDeps): express.Express {
  const { agent, store, config } = deps;
  const app = express();
  app.use(cors({ origin: config.server.corsOrigins }));
  app.use(express.json({ limit: "64kb" }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      log.info(
        { method: req.method, path: req.path, status: res.statusCode, duration: Date.now() - start, ip: req.ip },
        "Request completed"
      );
    });
    next();
  });

  app.post("/api/chat", async (req, res, next) => {
    const parsed = chatRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      next(parsed.error);
      return;
    }
    const { input, sessionId, language } = parsed.data;

    try {
      res.setHeader("Content-Type", "text/event-stream");
      res.setHeader("Cache-Control", "no-cache");
      res.setHeader("Connection", "keep-alive");
      res.flushHeaders();
      for await (const chunk of agent.stream(input, { sessionId, language })) {
        res.write(`data: ${JSON.stringify(chunk)}\n\n`);
      }
      res.write("data: [DONE]\n\n");
      res.end();
    } catch (e) {
      next(e);
    }
  });

  app.get("/api/search", async (req, res, next) => {
    const parsed = searchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      next(parsed.error);
      return;
    }
    const { q, lang, session, sys_prompt } = parsed.data;
    try {
      const outcome = await agent.run(q, { language: lang, sessionId: session, systemPrompt: sys_prompt });
      log.info({ query: q.slice(0, 50), ok: outcome.ok }, "Search completed");
      res.json(outcome);
    } catch (e) {
      next(e);
    }
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/info", (_req, res) => {
    res.json({
      app: { name: config.appName, version: config.appVersion },
      llm: { provider: config.llm.provider, model: config.llm.model, timeoutMs: config.llm.timeoutMs },
      store: { fields: store.size, encodings: store.encodingCount, categories: store.listCategories().length },
    });
  });

  const staticDir = deps.staticDir ?? DEFAULT_STATIC_DIR;
  if (existsSync(staticDir)) {
    app.use(express.static(staticDir));
  } else {
    log.warn({ staticDir }, "Static directory not found");
  }

  app.use(errorHandler);
  return app;
}
