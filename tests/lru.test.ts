import { describe, it, expect } from "vitest";
import { LruCache } from "../src/cacher/lru.js";


describe("LruCache", () => {
  it("超出容量淘汰最久未用的条目", () => {
    const evicted: string[] = [];
    const cache = new LruCache<string, number>(2, (key) => evicted.push(key));
    cache.set("a", 1);
    cache.set("b", 2);
    expect(cache.get("a")).toBe(1);
    cache.set("c", 3);
    expect(cache.has("b")).toBe(false);
    expect(cache.has("a")).toBe(true);
    expect(evicted).toEqual(["b"]);
    expect(cache.size).toBe(2);
  });

  it("缩小容量时立即淘汰", () => {
    const cache = new LruCache<string, number>(12);
    for (let i = 0; i < 12; i++) cache.set(`k${i}`, i);
    cache.setCapacity(6);
    expect(cache.capacity).toBe(6);
    expect(cache.size).toBe(6);
    expect(cache.has("k5")).toBe(false);
    expect(cache.has("k6")).toBe(true);
  });

  it("重复 set 刷新位置与值", () => {
    const cache = new LruCache<string, number>(2);
    cache.set("a", 1);
    cache.set("b", 2);
    cache.set("a", 10);
    cache.set("c", 3);
    expect(cache.get("a")).toBe(10);
    expect(cache.has("b")).toBe(false);
  });

  it("remove / clear 不触发 onEvict，容量至少为 1", () => {
    const evicted: string[] = [];
    const cache = new LruCache<string, number>(0, (key) => evicted.push(key));
    expect(cache.capacity).toBe(1);
    cache.set("a", 1);
    expect(cache.remove("a")).toBe(true);
    cache.set("b", 2);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(evicted).toEqual([]);
  });
});
