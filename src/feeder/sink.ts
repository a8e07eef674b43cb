// 受代次保护的 ResultSink：每次调用都投递到 UI 调度器，执行前复查代次；清空在同一代内只生效一次；高条目量分类分批渲染

import type { AddItemFn, ClearItemsFn, ResultSink, SetLabelFn } from "../types/feedItem.js";
import type { UiDispatcher } from "./dispatcher.js";
import type { EpochGuard } from "./epoch.js";


export interface BatchOptions {
  /** 每批渲染条数 */
  size: number;
  /** 批间隔（ms） */
  intervalMs: number;
}


export interface GuardedSinkOptions {
  guard: EpochGuard;
  dispatcher: UiDispatcher;
  epoch: number;
  /** 设置时 addItem 先入队，按批投递 */
  batch?: BatchOptions;
  /** 每条目实际落到视图后调用（在调度器上执行） */
  onItemAdded?: () => void;
}


interface PendingAdd {
  title: string;
  url: string;
  thumbnail: string | undefined;
  categoryId: string;
  sourceName: string;
}


export class GuardedSink implements ResultSink {
  private cleared = false;
  private readonly backlog: PendingAdd[] = [];
  private draining = false;
  private afterDrain: Array<() => void> = [];

  constructor(private readonly target: ResultSink, private readonly opts: GuardedSinkOptions) {}

  get epoch(): number {
    return this.opts.epoch;
  }

  private isCurrent(): boolean {
    return this.opts.guard.isCurrent(this.opts.epoch);
  }

  /** 投递到调度器，执行时代次已过期则丢弃 */
  private marshal(apply: () => void): void {
    this.opts.dispatcher.post(() => {
      if (this.isCurrent()) apply();
    });
  }

  readonly setLabel: SetLabelFn = (text) => {
    this.marshal(() => this.target.setLabel(text));
  };

  readonly clearItems: ClearItemsFn = () => {
    this.marshal(() => {
      if (this.cleared) return;
      this.cleared = true;
      this.target.clearItems();
    });
  };

  readonly addItem: AddItemFn = (title, url, thumbnail, categoryId, sourceName) => {
    const pending: PendingAdd = { title, url, thumbnail, categoryId, sourceName };
    if (this.opts.batch == null) {
      this.marshal(() => this.apply(pending));
      return;
    }
    this.backlog.push(pending);
    if (!this.draining) {
      this.draining = true;
      this.opts.dispatcher.post(() => this.drainBatch());
    }
  };

  /**
   * 在此前所有 addItem 落到视图之后执行 fn（同样受代次保护）。
   * 分批模式下等积压队列清空，否则按调度器 FIFO 顺序排在后面。
   */
  whenDrained(fn: () => void): void {
    if (this.draining) {
      this.afterDrain.push(fn);
      return;
    }
    this.marshal(fn);
  }

  private apply(p: PendingAdd): void {
    this.target.addItem(p.title, p.url, p.thumbnail, p.categoryId, p.sourceName);
    this.opts.onItemAdded?.();
  }

  /** 每批最多 size 条，队列未空则 intervalMs 后继续；清空后执行 whenDrained 回调 */
  private drainBatch(): void {
    const batch = this.opts.batch;
    if (batch == null) return;
    if (!this.isCurrent()) {
      this.backlog.length = 0;
      this.draining = false;
      this.afterDrain = [];
      return;
    }
    for (const p of this.backlog.splice(0, batch.size)) {
      this.apply(p);
    }
    if (this.backlog.length > 0) {
      this.opts.dispatcher.postDelayed(() => this.drainBatch(), batch.intervalMs);
      return;
    }
    this.draining = false;
    const callbacks = this.afterDrain;
    this.afterDrain = [];
    for (const fn of callbacks) fn();
  }
}


/** 为某一代包装视图 */
export function guardSink(target: ResultSink, opts: GuardedSinkOptions): GuardedSink {
  return new GuardedSink(target, opts);
}
