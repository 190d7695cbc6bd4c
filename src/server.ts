/**
 * 服务启动：校验配置 → 加载字段库 → 组装 Agent → 监听端口
 * 配置缺失或字段库加载失败时直接退出，不对外服务
 */

import { createAgent } from "./agent.js";
import { getConfig, validateConfig } from "./config.js";
import { IntentDispatcher } from "./dispatcher/dispatcher.js";
import { errorMessage } from "./errors.js";
import { createApp } from "./http/app.js";
import { createToolCallingModel } from "./llm/index.js";
import { SlidingWindowRateLimiter } from "./llm/rate-limit.js";
import { logger } from "./logger.js";
import { SessionStore } from "./memory.js";
import { loadFieldStore } from "./store/loader.js";
import type { FieldStore } from "./store/field-store.js";
import { createTools } from "./tools/index.js";

function main(): void {
  const config = getConfig();

  let store: FieldStore;
  try {
    validateConfig(config);
    store = loadFieldStore(config.store.path);
  } catch (e) {
    logger.fatal({ error: errorMessage(e) }, "Startup failed");
    process.exit(1);
  }

  const dispatch = { relatedCap: config.agent.relatedCap };
  const tools = createTools(new IntentDispatcher(store, dispatch));
  const agent = createAgent({
    store,
    model: createToolCallingModel(config.llm, tools),
    maxToolCalls: config.agent.maxToolCalls,
    timeoutMs: config.llm.timeoutMs,
    historyLimit: config.agent.historyLimit,
    dispatch,
    sessions: new SessionStore(100, config.agent.maxSessions),
    rateLimiter: new SlidingWindowRateLimiter(config.agent.rateLimitPerMinute),
    defaultLanguage: config.agent.defaultLanguage,
  });

  const app = createApp({ agent, store, config });
  app.listen(config.server.port, () => {
    logger.info(
      { port: config.server.port, provider: config.llm.provider, model: config.llm.model },
      `${config.appName} v${config.appVersion} listening on http://localhost:${config.server.port}`
    );
  });
}

main();
