// UI 调度器：单消费者 FIFO 任务队列，代表展示层独占的执行上下文；后台任务只能向它投递闭包

import { logger, errMessage } from "../logger/index.js";


export type UiTask = () => void;


export class UiDispatcher {
  private readonly queue: UiTask[] = [];
  private scheduled = false;
  private timers = 0;
  private waiters: Array<() => void> = [];

  /** 投递任务，按投递顺序在下一轮事件循环执行 */
  post(task: UiTask): void {
    this.queue.push(task);
    this.schedule();
  }

  /** 延迟 ms 后再投递 */
  postDelayed(task: UiTask, ms: number): void {
    this.timers++;
    setTimeout(() => {
      this.timers--;
      this.post(task);
    }, ms);
  }

  get pending(): number {
    return this.queue.length + this.timers;
  }

  /** 队列清空且没有待触发的延迟任务时 resolve（测试与优雅退出用） */
  idle(): Promise<void> {
    if (this.pending === 0 && !this.scheduled) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => this.drain());
  }

  private drain(): void {
    this.scheduled = false;
    while (this.queue.length > 0) {
      const task = this.queue.shift();
      if (task == null) break;
      try {
        task();
      } catch (err) {
        logger.error("feeder", "UI 任务执行异常", { err: errMessage(err) });
      }
    }
    if (this.pending === 0) {
      const waiters = this.waiters;
      this.waiters = [];
      for (const w of waiters) w();
    }
  }
}
