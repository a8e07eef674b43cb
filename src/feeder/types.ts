// 编排层类型：展示视图、抓取请求与结果

import type { ResultSink } from "../types/feedItem.js";


/** 展示层的一个逻辑视图：ResultSink 之外的状态回调均可选 */
export interface PresentationView extends ResultSink {
  readonly id: string;
  /** 安全定时器到期且没有任何条目时调用 */
  showError?(message: string): void;
  /** 安全定时器到期但已有条目时调用，结束加载态 */
  reveal?(): void;
  /** 条目全部投递完成后刷新分类角标 */
  refreshBadge?(categoryId: string): void;
}


/** 一次抓取请求 */
export interface FetchRequest {
  sourceUrl: string;
  sourceName: string;
  categoryId: string;
  categoryName: string;
  /** 空串表示不过滤 */
  searchQuery: string;
}


/** 每个视图的状态机：idle → fetching → (delivered | errored)，新请求重新进入 fetching */
export type ViewState = "idle" | "fetching" | "delivered" | "errored";


export interface FetchResult {
  epoch: number;
  state: ViewState;
  /** 失败时展示给用户的标题 */
  label?: string;
  /** 是否遇到传输层（网络/DNS）失败 */
  networkFailure: boolean;
  /** 站点图标回写与补图等后台任务，从不 reject */
  background: Promise<void>;
}
