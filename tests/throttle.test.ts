import { describe, it, expect, vi, afterEach } from "vitest";
import { EnrichThrottle } from "../src/enrich/throttle.js";


function throttle(maxConcurrent: number, random?: () => number) {
  return new EnrichThrottle({ maxConcurrent, retryDelayMinMs: 200, retryDelayMaxMs: 1000, random });
}


function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}


afterEach(() => {
  vi.useRealTimers();
});


describe("EnrichThrottle", () => {
  it("tryAcquire 满额返回 false，release 不会低于 0", () => {
    const t = throttle(2);
    expect(t.tryAcquire()).toBe(true);
    expect(t.tryAcquire()).toBe(true);
    expect(t.tryAcquire()).toBe(false);
    expect(t.activeCount).toBe(2);
    t.release();
    t.release();
    t.release();
    expect(t.activeCount).toBe(0);
  });

  it("上限至少为 1", () => {
    expect(throttle(0).maxConcurrent).toBe(1);
  });

  it("重试延迟落在 [min, max] 闭区间", () => {
    expect(throttle(1, () => 0).retryDelay()).toBe(200);
    expect(throttle(1, () => 0.5).retryDelay()).toBe(600);
    expect(throttle(1, () => 0.9999).retryDelay()).toBe(1000);
  });

  it("满额时按随机延迟重新调度", async () => {
    vi.useFakeTimers();
    const t = throttle(1, () => 0.5);
    const first = deferred();
    const p1 = t.submit(() => first.promise, "https://example.com/1");

    let started = false;
    const p2 = t.submit(async () => {
      started = true;
      return "second";
    }, "https://example.com/2");
    expect(started).toBe(false);

    first.resolve();
    await p1;
    expect(t.activeCount).toBe(0);

    vi.advanceTimersByTime(599);
    expect(started).toBe(false);
    vi.advanceTimersByTime(1);
    expect(started).toBe(true);
    await expect(p2).resolves.toBe("second");
    expect(t.activeCount).toBe(0);
  });

  it("并发峰值不超过上限", async () => {
    const t = new EnrichThrottle({ maxConcurrent: 2, retryDelayMinMs: 1, retryDelayMaxMs: 3 });
    let running = 0;
    let peak = 0;
    const job = (n: number) => async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 5));
      running--;
      return n;
    };
    const results = await Promise.all([1, 2, 3, 4, 5, 6].map((n) => t.submit(job(n))));
    expect(results).toEqual([1, 2, 3, 4, 5, 6]);
    expect(peak).toBeLessThanOrEqual(2);
    expect(t.activeCount).toBe(0);
  });

  it("job 抛错或 reject 时仍释放名额", async () => {
    const t = throttle(1);
    await expect(t.submit(() => {
      throw new Error("boom");
    })).rejects.toThrow("boom");
    await expect(t.submit(() => Promise.reject(new Error("later")))).rejects.toThrow("later");
    expect(t.activeCount).toBe(0);
  });
});
