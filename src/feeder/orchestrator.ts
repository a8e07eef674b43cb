// 抓取编排：每个请求推进代次、维护视图状态机与安全定时器，按分类调整图片缓存容量与分批策略

import { LruCache } from "../cacher/lru.js";
import type { FeedlineConfig } from "../config/index.js";
import type { FeedSourceStore } from "../db/index.js";
import { EnrichThrottle, createCdnHighResFetcher, createOpenGraphFetcher } from "../enrich/index.js";
import type { EnrichFn, EnrichResult } from "../enrich/index.js";
import type { HttpClient } from "../fetcher/types.js";
import { readLocalFeeds } from "../localFeeds/index.js";
import { logger, errMessage } from "../logger/index.js";
import { feedLabel } from "../parser/index.js";
import type { FeedContext, ParseDeps } from "../parser/index.js";
import type { ResultSink } from "../types/feedItem.js";
import { UiDispatcher } from "./dispatcher.js";
import { EpochGuard } from "./epoch.js";
import { FEED_ERROR_LABELS, VIEW_ERROR_MESSAGES } from "./errors.js";
import { fetchRssUrl } from "./fetchFeed.js";
import type { FetchFeedDeps, FetchFeedResult } from "./fetchFeed.js";
import { guardSink } from "./sink.js";
import type { GuardedSink } from "./sink.js";
import type { FetchRequest, FetchResult, PresentationView, ViewState } from "./types.js";


export const LOCAL_FEED_SOURCE_NAME = "Local Feed";
export const LOCAL_FEED_CATEGORY_NAME = "Local News";


export interface OrchestratorDeps {
  config: FeedlineConfig;
  http: HttpClient;
  sources?: FeedSourceStore;
  guard?: EpochGuard;
  dispatcher?: UiDispatcher;
  throttle?: EnrichThrottle;
  localFeedsPath?: string;
  /** 覆盖默认补图实现（测试用） */
  cdnFetcher?: EnrichFn;
  ogFetcher?: EnrichFn;
}


/** 单代的运行期记录 */
interface EpochRun {
  epoch: number;
  view: PresentationView;
  populated: number;
  networkFailure: boolean;
  /** 已进入终态；之后才出队的安全定时任务直接丢弃 */
  settled: boolean;
  timer?: ReturnType<typeof setTimeout>;
}


export class FetchOrchestrator {
  readonly guard: EpochGuard;
  readonly dispatcher: UiDispatcher;
  readonly throttle: EnrichThrottle;
  readonly imageCache: LruCache<string, EnrichResult>;
  private readonly states = new Map<string, ViewState>();
  private run: EpochRun | undefined;
  private readonly cdnFetcher: EnrichFn;
  private readonly ogFetcher: EnrichFn;

  constructor(private readonly deps: OrchestratorDeps) {
    const { config } = deps;
    this.guard = deps.guard ?? new EpochGuard();
    this.dispatcher = deps.dispatcher ?? new UiDispatcher();
    this.throttle = deps.throttle ?? new EnrichThrottle({
      maxConcurrent: config.enrich.maxConcurrent,
      retryDelayMinMs: config.enrich.retryDelayMinMs,
      retryDelayMaxMs: config.enrich.retryDelayMaxMs,
    });
    this.imageCache = new LruCache(config.imageCache.capacity);
    const enrichDeps = { http: deps.http, throttle: this.throttle, cache: this.imageCache, timeoutMs: config.http.timeoutMs };
    this.cdnFetcher = deps.cdnFetcher ?? createCdnHighResFetcher(enrichDeps);
    this.ogFetcher = deps.ogFetcher ?? createOpenGraphFetcher(enrichDeps);
  }

  stateOf(viewId: string): ViewState {
    return this.states.get(viewId) ?? "idle";
  }

  /** 拉取单个 feed 到视图；Promise 总是 resolve */
  async fetch(view: PresentationView, request: FetchRequest): Promise<FetchResult> {
    const run = this.begin(view, request.categoryId);
    const ctx: FeedContext = {
      sourceName: request.sourceName,
      categoryName: request.categoryName,
      categoryId: request.categoryId,
      searchQuery: request.searchQuery,
    };
    const sink = this.sinkFor(run, request.categoryId);
    try {
      const result = await fetchRssUrl(request.sourceUrl, ctx, sink, this.feedDeps());
      run.networkFailure = result.networkFailure;
      if (result.failure === "parse") this.showErrorIfCurrent(run, VIEW_ERROR_MESSAGES.generic);
      const done = this.finish(run, sink, request.categoryId, result.ok ? "delivered" : "errored", result.label);
      return { ...done, background: result.outcome?.background ?? done.background };
    } catch (err) {
      logger.error("feeder", "抓取编排异常", { source_url: request.sourceUrl, err: errMessage(err) });
      return this.finish(run, sink, request.categoryId, "errored", FEED_ERROR_LABELS.generic);
    }
  }

  /**
   * 本地新闻：读取 feed 列表，为空时提示未配置；否则只清空一次，
   * 并发拉取每个 URL（信源名 "Local Feed"、分类名 "Local News"），子任务的标题不覆盖视图标题。
   */
  async fetchLocalFeeds(view: PresentationView, searchQuery = ""): Promise<FetchResult> {
    const categoryId = this.deps.config.categories.highVolume;
    const run = this.begin(view, categoryId);
    const sink = this.sinkFor(run, categoryId);
    try {
      const urls = await readLocalFeeds(this.deps.localFeedsPath);
      if (urls.length === 0) {
        sink.setLabel(FEED_ERROR_LABELS.noLocalFeeds);
        return this.finish(run, sink, categoryId, "delivered");
      }
      const ctx: FeedContext = {
        sourceName: LOCAL_FEED_SOURCE_NAME,
        categoryName: LOCAL_FEED_CATEGORY_NAME,
        categoryId,
        searchQuery,
      };
      sink.setLabel(feedLabel(ctx));
      sink.clearItems();
      const subSink: ResultSink = {
        setLabel: () => undefined,
        clearItems: () => undefined,
        addItem: sink.addItem,
      };
      const results = await Promise.all(urls.map((url) => this.fetchLocalOne(run, url, ctx, subSink)));
      const anyOk = results.some((r) => r.ok);
      logger.info("feeder", `本地新闻拉取完成：${results.filter((r) => r.ok).length}/${urls.length} 个 feed 成功`);
      const done = this.finish(run, sink, categoryId, anyOk ? "delivered" : "errored");
      const background = Promise.all(results.map((r) => r.outcome?.background)).then(() => undefined);
      return { ...done, background };
    } catch (err) {
      logger.error("feeder", "本地新闻编排异常", { err: errMessage(err) });
      return this.finish(run, sink, categoryId, "errored", FEED_ERROR_LABELS.generic);
    }
  }

  /** 单个本地 feed；网络失败立即记到本代，安全定时器据此区分离线提示 */
  private async fetchLocalOne(run: EpochRun, url: string, ctx: FeedContext, sink: ResultSink): Promise<FetchFeedResult> {
    const result = await fetchRssUrl(url, ctx, sink, this.feedDeps());
    if (result.networkFailure) run.networkFailure = true;
    if (!result.ok) logger.debug("feeder", `本地 feed 失败：${result.label ?? result.failure ?? ""}`, { source_url: url });
    return result;
  }

  private feedDeps(): FetchFeedDeps {
    const parse: ParseDeps = {
      config: this.deps.config,
      sources: this.deps.sources,
      cdnFetcher: this.cdnFetcher,
      ogFetcher: this.ogFetcher,
    };
    return {
      http: this.deps.http,
      parse,
      timeoutMs: this.deps.config.http.timeoutMs,
      localFeedsPath: this.deps.localFeedsPath,
    };
  }

  /** 新请求：推进代次、进入 fetching、按分类调整图片缓存容量并启动安全定时器 */
  private begin(view: PresentationView, categoryId: string): EpochRun {
    const { config } = this.deps;
    if (this.run?.timer != null) clearTimeout(this.run.timer);
    const epoch = this.guard.beginNewEpoch(view.id);
    this.states.set(view.id, "fetching");
    const highVolume = categoryId === config.categories.highVolume;
    this.imageCache.setCapacity(highVolume ? config.imageCache.highVolumeCapacity : config.imageCache.capacity);
    const run: EpochRun = { epoch, view, populated: 0, networkFailure: false, settled: false };
    run.timer = setTimeout(() => this.dispatcher.post(() => this.onSafetyTimeout(run)), config.loading.initialMaxWaitMs);
    this.run = run;
    logger.debug("feeder", `开始第 ${epoch} 代抓取`, { view: view.id, category: categoryId });
    return run;
  }

  private sinkFor(run: EpochRun, categoryId: string): GuardedSink {
    const { config } = this.deps;
    return guardSink(run.view, {
      guard: this.guard,
      dispatcher: this.dispatcher,
      epoch: run.epoch,
      batch: categoryId === config.categories.highVolume ? config.batch : undefined,
      onItemAdded: () => {
        run.populated++;
      },
    });
  }

  /** 安全定时器：仍无条目则报错（区分离线），已有条目则直接结束加载态 */
  private onSafetyTimeout(run: EpochRun): void {
    run.timer = undefined;
    if (run.settled || !this.guard.isCurrent(run.epoch)) return;
    if (run.populated === 0) {
      logger.warn("feeder", "等待超时且没有任何条目", { view: run.view.id });
      run.view.showError?.(run.networkFailure ? VIEW_ERROR_MESSAGES.offline : VIEW_ERROR_MESSAGES.generic);
      this.states.set(run.view.id, "errored");
    } else {
      run.view.reveal?.();
      this.states.set(run.view.id, "delivered");
    }
  }

  private showErrorIfCurrent(run: EpochRun, message: string): void {
    this.dispatcher.post(() => {
      if (this.guard.isCurrent(run.epoch)) run.view.showError?.(message);
    });
  }

  /** 进入终态：取消安全定时器，待条目全部落到视图后刷新角标 */
  private finish(run: EpochRun, sink: GuardedSink, categoryId: string, state: ViewState, label?: string): FetchResult {
    run.settled = true;
    if (this.guard.isCurrent(run.epoch)) {
      if (run.timer != null) {
        clearTimeout(run.timer);
        run.timer = undefined;
      }
      this.states.set(run.view.id, state);
      sink.whenDrained(() => run.view.refreshBadge?.(categoryId));
    }
    return { epoch: run.epoch, state, label, networkFailure: run.networkFailure, background: Promise.resolve() };
  }
}
