import { describe, it, expect, beforeEach } from "vitest";
import { openDb, SqliteSourceStore } from "../src/db/index.js";


let store: SqliteSourceStore;

beforeEach(() => {
  store = new SqliteSourceStore(openDb(":memory:"));
});


describe("SqliteSourceStore", () => {
  it("新增与查询订阅源", async () => {
    expect(await store.addSource("Example", "https://example.com/feed")).toBe(true);
    const source = await store.getSourceByUrl("https://example.com/feed");
    expect(source?.name).toBe("Example");
    expect(source?.faviconUrl).toBeNull();
    expect(source?.lastFetchedAt).toBe(0);
    expect(await store.getSourceByUrl("https://missing.example.com/feed")).toBeUndefined();
  });

  it("URL 重复时返回 false", async () => {
    await store.addSource("Example", "https://example.com/feed");
    expect(await store.addSource("Again", "https://example.com/feed")).toBe(false);
    expect(await store.getAllSources()).toHaveLength(1);
  });

  it("按创建顺序列出", async () => {
    await store.addSource("A", "https://a.example.com/feed");
    await store.addSource("B", "https://b.example.com/feed");
    expect((await store.getAllSources()).map((s) => s.name)).toEqual(["A", "B"]);
  });

  it("更新站点图标与最近拉取时间", async () => {
    await store.addSource("Example", "https://example.com/feed");
    expect(await store.updateFaviconUrl("https://example.com/feed", "https://example.com/icon.png")).toBe(true);
    expect(await store.updateLastFetched("https://example.com/feed")).toBe(true);
    const source = await store.getSourceByUrl("https://example.com/feed");
    expect(source?.faviconUrl).toBe("https://example.com/icon.png");
    expect(source?.lastFetchedAt).toBeGreaterThan(0);
    expect(await store.updateFaviconUrl("https://missing.example.com/feed", null)).toBe(false);
  });

  it("删除订阅源", async () => {
    await store.addSource("Example", "https://example.com/feed");
    expect(await store.removeSource("https://example.com/feed")).toBe(true);
    expect(await store.removeSource("https://example.com/feed")).toBe(false);
    expect(await store.getAllSources()).toEqual([]);
  });
});
