// Feed Parser 的输入上下文、依赖与结果

import type { FeedlineConfig } from "../config/index.js";
import type { FeedSourceStore } from "../db/index.js";
import type { EnrichFn } from "../enrich/types.js";
import type { FeedItem } from "../types/feedItem.js";


/** 一次解析对应的信源与分类 */
export interface FeedContext {
  sourceName: string;
  categoryName: string;
  categoryId: string;
  /** 空串表示不过滤 */
  searchQuery: string;
}


export interface ParseDeps {
  config: FeedlineConfig;
  /** 站点图标回写目标；缺省时跳过 */
  sources?: FeedSourceStore;
  /** CDN 高清图补图；缺省或开关关闭时不排队 */
  cdnFetcher?: EnrichFn;
  /** 无缩略图条目的 Open Graph 补图；缺省时不排队 */
  ogFetcher?: EnrichFn;
}


export interface ParseOutcome {
  /** 文档是否成功解析（零条目也算成功） */
  ok: boolean;
  /** 解析出的条目（限量后、搜索过滤前） */
  items: FeedItem[];
  /** 实际投递给 sink 的条目数 */
  delivered: number;
  siteIcon?: string;
  /** 排队的补图抓取数 */
  upgradesQueued: number;
  /** 图标回写与补图的后台任务，从不 reject */
  background: Promise<void>;
}
