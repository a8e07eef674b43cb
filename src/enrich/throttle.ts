// 补图并发闸门：同时进行的抓取不超过上限，满额时随机延迟后重试同一调用

import { logger } from "../logger/index.js";


export interface ThrottleOptions {
  /** 同时进行的抓取上限 */
  maxConcurrent: number;
  /** 满额时重新调度的随机延迟区间（ms，闭区间） */
  retryDelayMinMs: number;
  retryDelayMaxMs: number;
  /** [0, 1) 随机源，测试时注入 */
  random?: () => number;
}


/** 可注入的并发闸门：acquire 在启动前、release 在 finally 中，active 始终落在 [0, max] */
export class EnrichThrottle {
  private active = 0;
  private readonly max: number;
  private readonly minDelay: number;
  private readonly maxDelay: number;
  private readonly random: () => number;

  constructor(opts: ThrottleOptions) {
    this.max = Math.max(1, Math.floor(opts.maxConcurrent));
    this.minDelay = opts.retryDelayMinMs;
    this.maxDelay = Math.max(opts.retryDelayMinMs, opts.retryDelayMaxMs);
    this.random = opts.random ?? Math.random;
  }

  get activeCount(): number {
    return this.active;
  }

  get maxConcurrent(): number {
    return this.max;
  }

  /** 尝试占用一个名额，满额返回 false */
  tryAcquire(): boolean {
    if (this.active >= this.max) return false;
    this.active++;
    return true;
  }

  release(): void {
    if (this.active > 0) this.active--;
  }

  /** 下一次重试的延迟：[min, max] 上均匀分布的整数毫秒 */
  retryDelay(): number {
    return this.minDelay + Math.floor(this.random() * (this.maxDelay - this.minDelay + 1));
  }

  /** 占到名额后执行 job，结束后无条件释放；满额时延迟重试，不排队 */
  submit<T>(job: () => Promise<T>, label = ""): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const attempt = (): void => {
        if (!this.tryAcquire()) {
          const delay = this.retryDelay();
          logger.debug("enrich", `并发已满（${this.max}），${delay}ms 后重试`, { url: label });
          setTimeout(attempt, delay);
          return;
        }
        let running: Promise<T>;
        try {
          running = job();
        } catch (err) {
          running = Promise.reject(err);
        }
        running.finally(() => this.release()).then(resolve, reject);
      };
      attempt();
    });
  }
}
