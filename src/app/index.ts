// App 入口：读取配置、装配编排器与存储，启动 Hono 服务

import "dotenv/config";
import { serve } from "@hono/node-server";
import { loadConfig } from "../config/index.js";
import { initUserDir, LOCAL_FEEDS_PATH } from "../config/paths.js";
import { SqliteSourceStore } from "../db/index.js";
import { FetchOrchestrator } from "../feeder/index.js";
import { defaultHttpClient } from "../fetcher/index.js";
import { logger, errMessage } from "../logger/index.js";
import { createApp } from "./router.js";


async function main(): Promise<void> {
  await initUserDir();
  const config = await loadConfig();
  const sources = new SqliteSourceStore();
  const orchestrator = new FetchOrchestrator({
    config,
    http: defaultHttpClient,
    sources,
    localFeedsPath: LOCAL_FEEDS_PATH,
  });
  const app = createApp({ orchestrator, sources });
  serve({ fetch: app.fetch, port: config.server.port });
  logger.info("app", `feedline: http://127.0.0.1:${config.server.port}/`);
}


main().catch((err) => {
  logger.error("app", "启动失败", { err: errMessage(err) });
  process.exitCode = 1;
});
