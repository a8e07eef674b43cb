import { describe, it, expect, vi } from "vitest";
import { LruCache } from "../src/cacher/lru.js";
import { EnrichThrottle, createEnricher, resolveCdnHighRes, resolveOpenGraph } from "../src/enrich/index.js";
import type { EnrichResult, ResolveFn } from "../src/enrich/index.js";
import type { HttpClient, HttpTextResult } from "../src/fetcher/types.js";
import type { AddItemFn } from "../src/types/feedItem.js";


class FakeHttp implements HttpClient {
  readonly requested: string[] = [];

  constructor(private readonly result: Omit<HttpTextResult, "finalUrl">) {}

  async fetchText(url: string): Promise<HttpTextResult> {
    this.requested.push(url);
    return { ...this.result, finalUrl: url };
  }
}


function throttle(): EnrichThrottle {
  return new EnrichThrottle({ maxConcurrent: 2, retryDelayMinMs: 1, retryDelayMaxMs: 2 });
}


describe("resolveOpenGraph", () => {
  it("og:image 与 og:title", () => {
    const html = `<html><head>
      <meta property="og:title" content="Article title">
      <meta property="og:image" content="//cdn.example.com/og.jpg">
    </head><body><h1>Heading</h1></body></html>`;
    expect(resolveOpenGraph(html, "https://example.com/a")).toEqual({ title: "Article title", image: "https://cdn.example.com/og.jpg" });
  });

  it("name= 写法，标题退回 <h1>", () => {
    const html = '<meta name="og:image" content="https://example.com/i.png"><h1> Heading </h1>';
    expect(resolveOpenGraph(html, "https://example.com/a")).toEqual({ title: "Heading", image: "https://example.com/i.png" });
  });

  it("没有 h1 时标题为文章 URL", () => {
    const html = '<meta property="og:image" content="https://example.com/i.png">';
    expect(resolveOpenGraph(html, "https://example.com/a")?.title).toBe("https://example.com/a");
  });

  it("og:image 去掉缩放参数", () => {
    const html = '<meta property="og:image" content="https://example.com/uploads/a.jpg?resize=1200%2C630&amp;ssl=1">';
    expect(resolveOpenGraph(html, "https://example.com/a")?.image).toBe("https://example.com/uploads/a.jpg?ssl=1");
  });

  it("没有 og:image 返回 undefined", () => {
    expect(resolveOpenGraph('<meta property="og:title" content="x">', "https://example.com/a")).toBeUndefined();
  });
});


describe("resolveCdnHighRes", () => {
  const url = "https://www.bbc.co.uk/news/world-1";

  it("JSON-LD image 优先", () => {
    const html = `<script type="application/ld+json">{"@context":"https://schema.org","@graph":[{"@type":"NewsArticle","image":{"url":"http://ichef.bbci.co.uk/news/1024/cpsprodpb/a.jpg"}}]}</script>
      <img src="https://example.com/other.jpg">`;
    expect(resolveCdnHighRes(html, url)).toEqual({ title: url, image: "https://ichef.bbci.co.uk/news/1024/cpsprodpb/a.jpg" });
  });

  it("JSON-LD 损坏时退回图片属性，srcset 取最大项", () => {
    const html = `<script type="application/ld+json">{not json</script>
      <img src="data:image/gif;base64,R0lGOD" srcset="https://ichef.bbci.co.uk/a/240.jpg 240w, https://ichef.bbci.co.uk/a/976.jpg 976w">`;
    expect(resolveCdnHighRes(html, url)?.image).toBe("https://ichef.bbci.co.uk/a/976.jpg");
  });

  it("相对地址按文章 URL 解析，非 http(s) 地址跳过", () => {
    expect(resolveCdnHighRes('<img src="/static/a.jpg">', url)?.image).toBe("https://www.bbc.co.uk/static/a.jpg");
    expect(resolveCdnHighRes('<img src="ftp://files.example.com/a.jpg"><img src="https://example.com/b.jpg">', url)?.image).toBe(
      "https://example.com/b.jpg",
    );
  });

  it("最后在正文里找 ichef 直链", () => {
    const html = "<p>see http://ichef.bbci.co.uk/images/ic/976x549/p0.jpg for details</p>";
    expect(resolveCdnHighRes(html, url)?.image).toBe("https://ichef.bbci.co.uk/images/ic/976x549/p0.jpg");
  });

  it("找不到图片返回 undefined", () => {
    expect(resolveCdnHighRes("<p>text only</p>", url)).toBeUndefined();
  });
});


describe("createEnricher", () => {
  const resolve: ResolveFn = (html) => (html.includes("img") ? { title: "T", image: "https://example.com/i.jpg" } : undefined);

  it("抓取成功后投递并写入缓存", async () => {
    const http = new FakeHttp({ statusCode: 200, body: "<img>" });
    const cache = new LruCache<string, EnrichResult>(4);
    const deliver = vi.fn<AddItemFn>();
    const enrich = createEnricher("test", resolve, { http, throttle: throttle(), cache });
    await expect(enrich("https://example.com/a", deliver, "tech", "Example")).resolves.toBe(true);
    expect(deliver).toHaveBeenCalledWith("T", "https://example.com/a", "https://example.com/i.jpg", "tech", "Example");
    expect(cache.get("https://example.com/a")).toEqual({ title: "T", image: "https://example.com/i.jpg" });
  });

  it("缓存命中不发请求", async () => {
    const http = new FakeHttp({ statusCode: 200, body: "<img>" });
    const cache = new LruCache<string, EnrichResult>(4);
    cache.set("https://example.com/a", { title: "Cached", image: "https://example.com/c.jpg" });
    const deliver = vi.fn<AddItemFn>();
    const enrich = createEnricher("test", resolve, { http, throttle: throttle(), cache });
    await enrich("https://example.com/a", deliver, "tech", "Example");
    expect(http.requested).toEqual([]);
    expect(deliver).toHaveBeenCalledWith("Cached", "https://example.com/a", "https://example.com/c.jpg", "tech", "Example");
  });

  it("非 2xx、解析不出或解析抛错时返回 false 且不投递", async () => {
    const deliver = vi.fn<AddItemFn>();
    const bad = createEnricher("test", resolve, { http: new FakeHttp({ statusCode: 500, body: "<img>" }), throttle: throttle() });
    const none = createEnricher("test", resolve, { http: new FakeHttp({ statusCode: 200, body: "<p>" }), throttle: throttle() });
    const t = throttle();
    const throwing = createEnricher("test", () => {
      throw new Error("boom");
    }, { http: new FakeHttp({ statusCode: 200, body: "<img>" }), throttle: t });
    await expect(bad("https://example.com/a", deliver, "tech", "Example")).resolves.toBe(false);
    await expect(none("https://example.com/a", deliver, "tech", "Example")).resolves.toBe(false);
    await expect(throwing("https://example.com/a", deliver, "tech", "Example")).resolves.toBe(false);
    expect(deliver).not.toHaveBeenCalled();
    expect(t.activeCount).toBe(0);
  });
});
