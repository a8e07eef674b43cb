import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { defaultConfig } from "../src/config/index.js";
import type { FeedlineConfig } from "../src/config/index.js";
import type { EnrichFn } from "../src/enrich/index.js";
import { FetchOrchestrator } from "../src/feeder/orchestrator.js";
import type { FetchRequest, PresentationView } from "../src/feeder/types.js";
import type { HttpClient, HttpTextResult } from "../src/fetcher/types.js";


const FEED = `<?xml version="1.0"?>
<rss version="2.0"><channel><title>Example</title>
<item><title>One</title><link>https://example.com/1</link></item>
<item><title>Two</title><link>https://example.com/2</link></item>
</channel></rss>`;


type Handler = (url: string) => Promise<HttpTextResult>;

class FakeHttp implements HttpClient {
  constructor(private readonly handler: Handler) {}

  fetchText(url: string): Promise<HttpTextResult> {
    return this.handler(url);
  }
}

function ok(url: string, body: string): Promise<HttpTextResult> {
  return Promise.resolve({ statusCode: 200, body, finalUrl: url });
}

/** 永不返回的请求 */
function hang(): Promise<HttpTextResult> {
  return new Promise<HttpTextResult>(() => undefined);
}


class RecordingView implements PresentationView {
  readonly calls: string[] = [];

  constructor(readonly id: string) {}

  setLabel = (text: string): void => {
    this.calls.push(`label:${text}`);
  };

  clearItems = (): void => {
    this.calls.push("clear");
  };

  addItem = (title: string): void => {
    this.calls.push(`add:${title}`);
  };

  showError(message: string): void {
    this.calls.push(`error:${message}`);
  }

  reveal(): void {
    this.calls.push("reveal");
  }

  refreshBadge(categoryId: string): void {
    this.calls.push(`badge:${categoryId}`);
  }
}


const noEnrich: EnrichFn = async () => false;

function orchestrator(handler: Handler, config: FeedlineConfig = defaultConfig(), localFeedsPath?: string) {
  return new FetchOrchestrator({
    config,
    http: new FakeHttp(handler),
    localFeedsPath,
    cdnFetcher: noEnrich,
    ogFetcher: noEnrich,
  });
}

function request(overrides: Partial<FetchRequest> = {}): FetchRequest {
  return {
    sourceUrl: "https://example.com/feed",
    sourceName: "Example",
    categoryId: "tech",
    categoryName: "Tech",
    searchQuery: "",
    ...overrides,
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function quickTimeout(): FeedlineConfig {
  const config = defaultConfig();
  return { ...config, loading: { initialMaxWaitMs: 100 } };
}


let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "feedline-orch-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});


describe("FetchOrchestrator.fetch", () => {
  it("成功：标题、清空、条目依序落地，最后刷新角标", async () => {
    const orch = orchestrator((url) => ok(url, FEED));
    const view = new RecordingView("main");
    expect(orch.stateOf("main")).toBe("idle");
    const result = await orch.fetch(view, request());
    await orch.dispatcher.idle();
    expect(result.state).toBe("delivered");
    expect(result.epoch).toBe(1);
    expect(orch.stateOf("main")).toBe("delivered");
    expect(view.calls).toEqual(["label:Tech — Example", "clear", "add:One", "add:Two", "badge:tech"]);
  });

  it("失败：标题展示原因，状态为 errored", async () => {
    const orch = orchestrator((url) => Promise.resolve({ statusCode: 503, body: "", finalUrl: url }));
    const view = new RecordingView("main");
    const result = await orch.fetch(view, request());
    await orch.dispatcher.idle();
    expect(result.state).toBe("errored");
    expect(result.label).toBe("Error loading feed — HTTP 503");
    expect(view.calls).toEqual(["label:Error loading feed — HTTP 503", "badge:tech"]);
  });

  it("解析失败：视图显示通用错误", async () => {
    const orch = orchestrator((url) => ok(url, "hello world"));
    const view = new RecordingView("main");
    const result = await orch.fetch(view, request());
    await orch.dispatcher.idle();
    expect(result.state).toBe("errored");
    expect(view.calls).toEqual([
      "label:Tech — Example",
      "clear",
      "error:No articles could be loaded. Try refreshing or check your source settings.",
      "badge:tech",
    ]);
  });

  it("新请求开始后，旧请求的结果全部丢弃", async () => {
    let releaseSlow: () => void = () => undefined;
    const orch = orchestrator((url) => {
      if (url === "https://slow.example.com/feed") {
        return new Promise((resolve) => {
          releaseSlow = () => resolve({ statusCode: 200, body: FEED, finalUrl: url });
        });
      }
      return ok(url, FEED);
    });
    const first = new RecordingView("first");
    const second = new RecordingView("second");
    const slow = orch.fetch(first, request({ sourceUrl: "https://slow.example.com/feed", sourceName: "Slow" }));
    const fast = await orch.fetch(second, request());
    releaseSlow();
    const stale = await slow;
    await orch.dispatcher.idle();
    expect(stale.epoch).toBe(1);
    expect(fast.epoch).toBe(2);
    expect(orch.guard.isCurrent(stale.epoch)).toBe(false);
    expect(first.calls).toEqual([]);
    expect(second.calls).toEqual(["label:Tech — Example", "clear", "add:One", "add:Two", "badge:tech"]);
  });

  it("按分类调整图片缓存容量", async () => {
    const orch = orchestrator((url) => ok(url, FEED));
    const view = new RecordingView("main");
    await orch.fetch(view, request({ categoryId: "local_news", categoryName: "Local News" }));
    expect(orch.imageCache.capacity).toBe(6);
    await orch.fetch(view, request());
    expect(orch.imageCache.capacity).toBe(12);
    await orch.dispatcher.idle();
  });

  it("安全定时器到期且没有条目：显示通用错误", async () => {
    const orch = orchestrator(() => hang(), quickTimeout());
    const view = new RecordingView("main");
    void orch.fetch(view, request());
    await sleep(180);
    await orch.dispatcher.idle();
    expect(view.calls).toEqual(["error:No articles could be loaded. Try refreshing or check your source settings."]);
    expect(orch.stateOf("main")).toBe("errored");
  });

  it("安全定时器与响应同一轮到达：已完成的请求不再报错", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout"] });
    try {
      let respond: () => void = () => undefined;
      const orch = orchestrator(
        (url) =>
          new Promise((resolve) => {
            respond = () => resolve({ statusCode: 200, body: FEED, finalUrl: url });
          }),
        quickTimeout(),
      );
      const view = new RecordingView("main");
      const pending = orch.fetch(view, request());
      vi.advanceTimersByTime(100);
      respond();
      const result = await pending;
      await orch.dispatcher.idle();
      expect(result.state).toBe("delivered");
      expect(orch.stateOf("main")).toBe("delivered");
      expect(view.calls).toEqual(["label:Tech — Example", "clear", "add:One", "add:Two", "badge:tech"]);
    } finally {
      vi.useRealTimers();
    }
  });
});


describe("FetchOrchestrator.fetchLocalFeeds", () => {
  it("没有配置本地 feed", async () => {
    const orch = orchestrator((url) => ok(url, FEED), defaultConfig(), join(dir, "missing"));
    const view = new RecordingView("local");
    const result = await orch.fetchLocalFeeds(view);
    await orch.dispatcher.idle();
    expect(result.state).toBe("delivered");
    expect(view.calls).toEqual(["label:Local News — No local feeds configured", "badge:local_news"]);
  });

  it("部分失败：只清空一次，失败 URL 从列表剔除", async () => {
    const list = join(dir, "local_feeds");
    await writeFile(list, "https://good.example.com/rss\nhttps://gone.example.com/rss\n", "utf-8");
    const orch = orchestrator((url) => {
      if (url === "https://gone.example.com/rss") return Promise.resolve({ statusCode: 404, body: "", finalUrl: url });
      return ok(url, FEED);
    }, defaultConfig(), list);
    const view = new RecordingView("local");
    const result = await orch.fetchLocalFeeds(view);
    await orch.dispatcher.idle();
    expect(result.state).toBe("delivered");
    expect(view.calls).toEqual(["label:Local News — Local Feed", "clear", "add:One", "add:Two", "badge:local_news"]);
    expect(await readFile(list, "utf-8")).toBe("https://good.example.com/rss\n");
  });

  it("全部失败时状态为 errored", async () => {
    const list = join(dir, "local_feeds");
    await writeFile(list, "https://gone.example.com/rss\n", "utf-8");
    const orch = orchestrator((url) => Promise.resolve({ statusCode: 410, body: "", finalUrl: url }), defaultConfig(), list);
    const result = await orch.fetchLocalFeeds(new RecordingView("local"));
    await orch.dispatcher.idle();
    expect(result.state).toBe("errored");
  });

  it("搜索词应用到每个本地 feed", async () => {
    const list = join(dir, "local_feeds");
    await writeFile(list, "https://good.example.com/rss\n", "utf-8");
    const orch = orchestrator((url) => ok(url, FEED), defaultConfig(), list);
    const view = new RecordingView("local");
    await orch.fetchLocalFeeds(view, "two");
    await orch.dispatcher.idle();
    expect(view.calls).toEqual(['label:Search Results: "two" in Local News — Local Feed', "clear", "add:Two", "badge:local_news"]);
  });

  it("安全定时器到期但已有条目：结束加载态", async () => {
    const list = join(dir, "local_feeds");
    await writeFile(list, "https://good.example.com/rss\nhttps://slow.example.com/rss\n", "utf-8");
    const orch = orchestrator((url) => (url === "https://slow.example.com/rss" ? hang() : ok(url, FEED)), quickTimeout(), list);
    const view = new RecordingView("local");
    void orch.fetchLocalFeeds(view);
    await sleep(180);
    await orch.dispatcher.idle();
    expect(view.calls).toEqual(["label:Local News — Local Feed", "clear", "add:One", "add:Two", "reveal"]);
    expect(orch.stateOf("local")).toBe("delivered");
  });

  it("安全定时器到期、无条目且遇到网络失败：显示离线提示", async () => {
    const list = join(dir, "local_feeds");
    await writeFile(list, "https://offline.example.com/rss\nhttps://slow.example.com/rss\n", "utf-8");
    const orch = orchestrator((url) => {
      if (url === "https://slow.example.com/rss") return hang();
      return Promise.resolve({ statusCode: 0, body: "", finalUrl: url, errorMessage: "getaddrinfo ENOTFOUND offline.example.com" });
    }, quickTimeout(), list);
    const view = new RecordingView("local");
    void orch.fetchLocalFeeds(view);
    await sleep(180);
    await orch.dispatcher.idle();
    expect(view.calls).toEqual([
      "label:Local News — Local Feed",
      "clear",
      "error:No network connection detected. Check your connection and try again.",
    ]);
    expect(orch.stateOf("local")).toBe("errored");
    expect(await readFile(list, "utf-8")).toBe("https://slow.example.com/rss\n");
  });
});


describe("FetchOrchestrator 补图接线", () => {
  it("无缩略图条目交给 Open Graph 抓取，background 等待其完成", async () => {
    const ogFetcher = vi.fn<EnrichFn>(async (articleUrl, deliver, categoryId, sourceName) => {
      deliver("OG title", articleUrl, "https://example.com/og.jpg", categoryId, sourceName);
      return true;
    });
    const orch = new FetchOrchestrator({
      config: defaultConfig(),
      http: new FakeHttp((url) => ok(url, FEED)),
      cdnFetcher: noEnrich,
      ogFetcher,
    });
    const view = new RecordingView("main");
    const result = await orch.fetch(view, request());
    await result.background;
    await orch.dispatcher.idle();
    expect(ogFetcher).toHaveBeenCalledTimes(2);
    expect(view.calls).toEqual(["label:Tech — Example", "clear", "add:One", "add:Two", "add:OG title", "add:OG title", "badge:tech"]);
  });
});
