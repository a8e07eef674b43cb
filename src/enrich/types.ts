// 后台补图类型定义

import type { LruCache } from "../cacher/lru.js";
import type { HttpClient } from "../fetcher/types.js";
import type { AddItemFn } from "../types/feedItem.js";
import type { EnrichThrottle } from "./throttle.js";


/** 单篇文章的补图结果 */
export interface EnrichResult {
  title: string;
  image: string;
}


/**
 * 补图抓取：后台执行，成功时至多调用一次 deliver，任何失败只记 debug 日志。
 * 返回的 Promise 从不 reject，值表示是否已投递。
 */
export type EnrichFn = (articleUrl: string, deliver: AddItemFn, categoryId: string, sourceName: string) => Promise<boolean>;


/** 从文章页 HTML 中解析结果；找不到返回 undefined */
export type ResolveFn = (html: string, articleUrl: string) => EnrichResult | undefined;


export interface EnrichDeps {
  http: HttpClient;
  throttle: EnrichThrottle;
  /** 按文章 URL 记忆已解析的图片，命中时不再发请求 */
  cache?: LruCache<string, EnrichResult>;
  timeoutMs?: number;
}
