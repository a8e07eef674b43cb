// 补图执行骨架：缓存命中直接投递，否则经闸门拉取文章页再解析；失败一律吞掉并记 debug

import { browserHeaders, isSuccessStatus } from "../fetcher/http.js";
import { logger, errMessage } from "../logger/index.js";
import { truncate } from "../utils/url.js";
import type { AddItemFn } from "../types/feedItem.js";
import type { EnrichDeps, EnrichFn, ResolveFn } from "./types.js";


/** 用解析函数构造一个 EnrichFn */
export function createEnricher(name: string, resolve: ResolveFn, deps: EnrichDeps): EnrichFn {
  return async (articleUrl: string, deliver: AddItemFn, categoryId: string, sourceName: string): Promise<boolean> => {
    try {
      const memo = deps.cache?.get(articleUrl);
      if (memo != null) {
        deliver(memo.title, articleUrl, memo.image, categoryId, sourceName);
        return true;
      }
      const result = await deps.throttle.submit(async () => {
        const res = await deps.http.fetchText(articleUrl, { headers: browserHeaders(), timeoutMs: deps.timeoutMs });
        if (!isSuccessStatus(res.statusCode) || !res.body) {
          logger.debug("enrich", `${name}：文章页拉取失败`, { source_url: articleUrl, status: res.statusCode, err: res.errorMessage });
          return undefined;
        }
        return resolve(res.body, articleUrl);
      }, articleUrl);
      if (result == null) {
        logger.debug("enrich", `${name}：未找到图片`, { source_url: articleUrl });
        return false;
      }
      deps.cache?.set(articleUrl, result);
      logger.debug("enrich", `${name}：补图完成`, { source_url: articleUrl, image: truncate(result.image) });
      deliver(result.title, articleUrl, result.image, categoryId, sourceName);
      return true;
    } catch (err) {
      logger.debug("enrich", `${name}：补图异常`, { source_url: articleUrl, err: errMessage(err) });
      return false;
    }
  };
}
