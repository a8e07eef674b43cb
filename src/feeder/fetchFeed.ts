// 单个 feed 的拉取：校验 URL → 本地文件或 HTTP → 解析投递；失败按最具体的原因写标题，高条目量分类顺带清理失效 URL

import { readFile, stat } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { isDnsError, isSuccessStatus } from "../fetcher/http.js";
import type { HttpClient } from "../fetcher/types.js";
import { pruneLocalFeed } from "../localFeeds/index.js";
import { logger, errMessage } from "../logger/index.js";
import { parseRssAndDisplay } from "../parser/index.js";
import type { FeedContext, ParseDeps, ParseOutcome } from "../parser/index.js";
import type { ResultSink } from "../types/feedItem.js";
import { FEED_ERROR_LABELS, FeedFetchError, httpErrorLabel } from "./errors.js";
import type { FeedFailureKind } from "./errors.js";


const SUPPORTED_SCHEME = /^(?:https?|file):\/\//;


export interface FetchFeedDeps {
  http: HttpClient;
  parse: ParseDeps;
  timeoutMs?: number;
  /** 本地 feed 列表路径，缺省为 .feedline/local_feeds */
  localFeedsPath?: string;
}


export interface FetchFeedResult {
  ok: boolean;
  failure?: FeedFailureKind;
  label?: string;
  networkFailure: boolean;
  outcome?: ParseOutcome;
}


function validateUrl(url: string): string {
  const trimmed = url.trim();
  if (trimmed.length === 0) throw new FeedFetchError("empty-url", FEED_ERROR_LABELS.emptyUrl);
  if (/\s/.test(trimmed) || !SUPPORTED_SCHEME.test(trimmed)) {
    throw new FeedFetchError("invalid-url", FEED_ERROR_LABELS.invalidUrl);
  }
  return trimmed;
}


async function readLocalFeedFile(url: string): Promise<string> {
  let path: string;
  try {
    path = fileURLToPath(url);
  } catch (err) {
    throw new FeedFetchError("invalid-url", FEED_ERROR_LABELS.invalidUrl, { cause: err });
  }
  try {
    await stat(path);
  } catch (err) {
    logger.warn("feeder", "本地 RSS 文件不存在", { path });
    throw new FeedFetchError("local-missing", FEED_ERROR_LABELS.localMissing, { cause: err });
  }
  let body: string;
  try {
    body = await readFile(path, "utf-8");
  } catch (err) {
    logger.warn("feeder", "本地 RSS 文件读取失败", { path, err: errMessage(err) });
    throw new FeedFetchError("local-unreadable", FEED_ERROR_LABELS.localUnreadable, { cause: err });
  }
  if (body.length === 0) {
    logger.warn("feeder", "本地 RSS 文件为空", { path });
    throw new FeedFetchError("local-unreadable", FEED_ERROR_LABELS.localUnreadable);
  }
  return body;
}


async function fetchRemoteFeed(url: string, ctx: FeedContext, deps: FetchFeedDeps): Promise<string> {
  const res = await deps.http.fetchText(url, { timeoutMs: deps.timeoutMs });
  if (res.statusCode === 0) {
    const reason = res.errorMessage || "unknown error";
    const message = isDnsError(res.errorMessage) ? "域名解析失败" : "网络错误";
    logger.warn("feeder", `${message}：${ctx.sourceName}`, { source_url: url, err: reason });
    throw new FeedFetchError("network", FEED_ERROR_LABELS.network);
  }
  if (!isSuccessStatus(res.statusCode)) {
    logger.warn("feeder", `HTTP ${res.statusCode}：${ctx.sourceName}`, { source_url: url });
    throw new FeedFetchError("http", httpErrorLabel(res.statusCode));
  }
  if (res.body.length === 0) {
    logger.warn("feeder", `空响应：${ctx.sourceName}`, { source_url: url });
    throw new FeedFetchError("empty-response", FEED_ERROR_LABELS.emptyResponse);
  }
  return res.body;
}


/**
 * 拉取并解析一个 feed。从不抛出：失败时通过 sink.setLabel 展示原因，
 * 高条目量分类的远端失败会从本地 feed 列表中剔除该 URL（尽力而为）。
 */
export async function fetchRssUrl(url: string, ctx: FeedContext, sink: ResultSink, deps: FetchFeedDeps): Promise<FetchFeedResult> {
  try {
    const target = validateUrl(url);
    const body = target.startsWith("file://") ? await readLocalFeedFile(target) : await fetchRemoteFeed(target, ctx, deps);
    const outcome = parseRssAndDisplay(body, ctx, sink, deps.parse);
    if (!outcome.ok) return { ok: false, failure: "parse", networkFailure: false, outcome };
    return { ok: true, networkFailure: false, outcome };
  } catch (err) {
    let failure: FeedFetchError;
    if (err instanceof FeedFetchError) {
      failure = err;
    } else {
      logger.error("feeder", "feed 拉取异常", { source_url: url, err: errMessage(err) });
      failure = new FeedFetchError("unexpected", FEED_ERROR_LABELS.generic, { cause: err });
    }
    if (failure.kind === "empty-url" || failure.kind === "invalid-url") {
      logger.warn("feeder", `URL 无效：${ctx.sourceName}`, { source_url: url });
    }
    sink.setLabel(failure.label);
    if (failure.isRemoteFailure && ctx.categoryId === deps.parse.config.categories.highVolume) {
      await pruneLocalFeed(url.trim(), deps.localFeedsPath);
    }
    return { ok: false, failure: failure.kind, label: failure.label, networkFailure: failure.isNetworkFailure };
  }
}
