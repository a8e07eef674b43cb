// Router：Hono 实现，与 feeder 解耦，仅负责 HTTP 层；视图变化经事件总线以 SSE 推送

import { Hono } from "hono";
import type { Context } from "hono";
import { streamSSE } from "hono/streaming";
import { z } from "zod";
import type { FeedSourceRepository } from "../db/index.js";
import { onFaviconUpdated, onViewEvent } from "../events/index.js";
import type { FetchOrchestrator } from "../feeder/orchestrator.js";
import type { FetchResult } from "../feeder/types.js";
import { logger, errMessage } from "../logger/index.js";
import { EventBusView } from "./view.js";


const HEARTBEAT_MS = 25000;


const FetchBodySchema = z.object({
  viewId: z.string().min(1),
  sourceUrl: z.string(),
  sourceName: z.string().min(1),
  categoryId: z.string().min(1),
  categoryName: z.string().min(1),
  searchQuery: z.string().default(""),
});

const LocalBodySchema = z.object({
  viewId: z.string().min(1),
  searchQuery: z.string().default(""),
});

const SourceBodySchema = z.object({
  name: z.string().trim().min(1),
  url: z.string().trim().url(),
});

const SourceDeleteSchema = z.object({
  url: z.string().trim().min(1),
});


export interface AppDeps {
  orchestrator: FetchOrchestrator;
  sources: FeedSourceRepository;
}


/** 读取 JSON 请求体；不是合法 JSON 时返回 undefined */
async function readJson(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch (err) {
    logger.debug("app", "请求体不是合法 JSON", { err: errMessage(err) });
    return undefined;
  }
}


function issuesOf(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(body)"}: ${i.message}`).join("; ");
}


function toJson(result: FetchResult) {
  return {
    epoch: result.epoch,
    state: result.state,
    label: result.label ?? null,
    networkFailure: result.networkFailure,
  };
}


/** 创建 Hono 应用，编排器与存储通过参数注入便于测试 */
export function createApp(deps: AppDeps) {
  const app = new Hono();

  // API：拉取单个 feed 到指定视图；结果条目经 /api/events 推送，响应只返回终态
  app.post("/api/fetch", async (c) => {
    const parsed = FetchBodySchema.safeParse(await readJson(c));
    if (!parsed.success) return c.json({ ok: false, message: issuesOf(parsed.error) }, 400);
    const { viewId, ...request } = parsed.data;
    const result = await deps.orchestrator.fetch(new EventBusView(viewId), request);
    if (result.state === "delivered") {
      try {
        await deps.sources.updateLastFetched(request.sourceUrl.trim());
      } catch (err) {
        logger.warn("app", "更新最近拉取时间失败", { source_url: request.sourceUrl, err: errMessage(err) });
      }
    }
    return c.json({ ok: result.state === "delivered", ...toJson(result) });
  });

  // API：本地新闻（.feedline/local_feeds 中的全部 feed）
  app.post("/api/local", async (c) => {
    const parsed = LocalBodySchema.safeParse(await readJson(c));
    if (!parsed.success) return c.json({ ok: false, message: issuesOf(parsed.error) }, 400);
    const result = await deps.orchestrator.fetchLocalFeeds(new EventBusView(parsed.data.viewId), parsed.data.searchQuery);
    return c.json({ ok: result.state === "delivered", ...toJson(result) });
  });

  // API：视图状态
  app.get("/api/views/:viewId", (c) => {
    const viewId = c.req.param("viewId");
    return c.json({ viewId, state: deps.orchestrator.stateOf(viewId) });
  });

  // API：订阅源列表
  app.get("/api/sources", async (c) => {
    const sources = await deps.sources.getAllSources();
    return c.json({ sources });
  });

  app.post("/api/sources", async (c) => {
    const parsed = SourceBodySchema.safeParse(await readJson(c));
    if (!parsed.success) return c.json({ ok: false, message: issuesOf(parsed.error) }, 400);
    const added = await deps.sources.addSource(parsed.data.name, parsed.data.url);
    if (!added) return c.json({ ok: false, message: "订阅源已存在" }, 409);
    logger.info("app", "新增订阅源", { source_url: parsed.data.url, name: parsed.data.name });
    return c.json({ ok: true }, 201);
  });

  app.delete("/api/sources", async (c) => {
    const parsed = SourceDeleteSchema.safeParse(await readJson(c));
    if (!parsed.success) return c.json({ ok: false, message: issuesOf(parsed.error) }, 400);
    const removed = await deps.sources.removeSource(parsed.data.url);
    if (!removed) return c.json({ ok: false, message: "订阅源不存在" }, 404);
    return c.json({ ok: true });
  });

  // SSE：视图事件与站点图标更新推送；带 viewId 时视图事件只推该视图
  app.get("/api/events", (c) => {
    const viewId = c.req.query("viewId");
    return streamSSE(c, async (stream) => {
      const push = (event: string, payload: unknown): void => {
        stream.writeSSE({ data: JSON.stringify(payload), event }).catch((err) => {
          logger.debug("app", "SSE 写入失败", { err: errMessage(err) });
        });
      };
      const offView = onViewEvent((e) => {
        if (viewId && e.viewId !== viewId) return;
        push(e.type, e);
      });
      const offFavicon = onFaviconUpdated((e) => push("favicon", e));
      await stream.writeSSE({ data: JSON.stringify({ type: "connected" }) });
      const heartbeat = setInterval(() => {
        stream.writeSSE({ data: "", event: "ping" }).catch((err) => {
          logger.debug("app", "SSE 心跳失败", { err: errMessage(err) });
        });
      }, HEARTBEAT_MS);
      stream.onAbort(() => {
        offView();
        offFavicon();
        clearInterval(heartbeat);
      });
      await new Promise<void>((resolve) => stream.onAbort(resolve));
    });
  });

  return app;
}
