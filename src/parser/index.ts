// Feed Parser：RSS/Atom 正文 → FeedItem，经 ResultSink 按文档顺序投递；站点图标回写与补图在后台进行

import { isCdnExtractEnabled } from "../config/flags.js";
import { emitFaviconUpdated } from "../events/index.js";
import { isKnownCdnUrl, normalizeKnownCdn } from "../image/index.js";
import { logger, errMessage } from "../logger/index.js";
import { truncate } from "../utils/url.js";
import type { FeedSourceStore } from "../db/index.js";
import type { AddItemFn, FeedItem, ResultSink } from "../types/feedItem.js";
import { parseFeedDocument } from "./document.js";
import type { FeedDocument } from "./document.js";
import { extractItem, extractSiteIcon, itemContainers, itemNodes } from "./items.js";
import type { FeedContext, ParseDeps, ParseOutcome } from "./types.js";

export type { FeedContext, ParseDeps, ParseOutcome } from "./types.js";
export { parseFeedDocument, FeedDocument } from "./document.js";
export { sanitizeXml, stripDoctype } from "./sanitize.js";


/** CDN 补图只针对缩略图缺失或过短（多为小尺寸占位）的条目 */
const SHORT_THUMBNAIL_LENGTH = 50;


/** 分类标题，搜索时带上查询词 */
export function feedLabel(ctx: FeedContext): string {
  if (ctx.searchQuery.length > 0) {
    return `Search Results: "${ctx.searchQuery}" in ${ctx.categoryName} — ${ctx.sourceName}`;
  }
  return `${ctx.categoryName} — ${ctx.sourceName}`;
}


/** 标题或链接包含查询词（忽略大小写）；空查询全部保留 */
export function matchesSearch(item: FeedItem, query: string): boolean {
  if (query.length === 0) return true;
  const q = query.toLowerCase();
  return item.title.toLowerCase().includes(q) || item.link.toLowerCase().includes(q);
}


interface Extracted {
  items: FeedItem[];
  siteIcon?: string;
}


function collectItems(doc: FeedDocument, ctx: FeedContext, deps: ParseDeps, cdnEnabled: boolean): Extracted {
  const { highVolume, highVolumeItemCap } = deps.config.categories;
  const capped = ctx.categoryId === highVolume;
  const items: FeedItem[] = [];
  let skipped = 0;
  for (const container of itemContainers(doc)) {
    for (const node of itemNodes(container)) {
      const item = extractItem(doc, node);
      if (item == null) continue;
      if (capped && items.length >= highVolumeItemCap) {
        skipped++;
        continue;
      }
      if (cdnEnabled && item.thumbnail != null && isKnownCdnUrl(item.thumbnail)) {
        const normalized = normalizeKnownCdn(item.thumbnail);
        if (normalized !== item.thumbnail) {
          logger.debug("parser", "CDN 缩略图规整", { from: truncate(item.thumbnail), to: truncate(normalized) });
        }
        items.push({ ...item, thumbnail: normalized });
      } else {
        items.push(item);
      }
    }
  }
  if (skipped > 0) {
    logger.debug("parser", `已达条目上限 ${highVolumeItemCap}，跳过 ${skipped} 条`, { source: ctx.sourceName });
  }
  return { items, siteIcon: extractSiteIcon(doc) };
}


function deliver(items: FeedItem[], ctx: FeedContext, sink: ResultSink): number {
  sink.setLabel(feedLabel(ctx));
  sink.clearItems();
  let delivered = 0;
  for (const item of items) {
    if (!matchesSearch(item, ctx.searchQuery)) continue;
    sink.addItem(item.title, item.link, item.thumbnail, ctx.categoryId, ctx.sourceName);
    delivered++;
  }
  return delivered;
}


/** 与信源同名的订阅记录图标不同时回写；失败只记日志 */
async function updateSiteFavicon(store: FeedSourceStore, sourceName: string, faviconUrl: string): Promise<void> {
  try {
    const all = await store.getAllSources();
    const source = all.find((s) => s.name === sourceName);
    if (source == null || source.faviconUrl === faviconUrl) return;
    await store.updateFaviconUrl(source.url, faviconUrl);
    emitFaviconUpdated({ sourceUrl: source.url, faviconUrl });
    logger.debug("parser", "站点图标已更新", { source_url: source.url, favicon: faviconUrl });
  } catch (err) {
    logger.warn("parser", "站点图标回写失败", { source: sourceName, err: errMessage(err) });
  }
}


/**
 * 排队补图：CDN 链接且缩略图缺失/过短的条目走高清图抓取（投递时沿用条目自身标题），
 * 其余无缩略图条目走 Open Graph 抓取；两类各自不超过 maxUpgradesPerFeed。
 */
function queueUpgrades(items: FeedItem[], ctx: FeedContext, sink: ResultSink, deps: ParseDeps, cdnEnabled: boolean): Promise<boolean>[] {
  const limit = deps.config.enrich.maxUpgradesPerFeed;
  const jobs: Promise<boolean>[] = [];
  let cdnQueued = 0;
  let ogQueued = 0;
  for (const item of items) {
    const onCdn = cdnEnabled && isKnownCdnUrl(item.link);
    if (onCdn && deps.cdnFetcher != null) {
      if (cdnQueued >= limit) continue;
      if (item.thumbnail != null && item.thumbnail.length >= SHORT_THUMBNAIL_LENGTH) continue;
      const keepTitle: AddItemFn = (_title, url, thumbnail, categoryId, sourceName) =>
        sink.addItem(item.title, url, thumbnail, categoryId, sourceName);
      jobs.push(deps.cdnFetcher(item.link, keepTitle, ctx.categoryId, ctx.sourceName));
      cdnQueued++;
    } else if (!onCdn && item.thumbnail == null && deps.ogFetcher != null && ogQueued < limit) {
      jobs.push(deps.ogFetcher(item.link, sink.addItem, ctx.categoryId, ctx.sourceName));
      ogQueued++;
    }
  }
  return jobs;
}


/** 失败出口的空投递：只给标题并清空 */
function settleEmpty(ctx: FeedContext, sink: ResultSink): void {
  try {
    sink.setLabel(feedLabel(ctx));
    sink.clearItems();
  } catch (err) {
    logger.warn("parser", "空结果投递失败", { source: ctx.sourceName, err: errMessage(err) });
  }
}


/**
 * 解析 feed 正文并投递：setLabel → clearItems → 逐条 addItem（零条目同样调用前两者）。
 * 解析失败返回 ok=false 的空结果；尚未投递时仍调用 setLabel 与 clearItems，视图据此结束加载态。
 * 文档句柄在所有出口释放一次。
 */
export function parseRssAndDisplay(body: string | Uint8Array, ctx: FeedContext, sink: ResultSink, deps: ParseDeps): ParseOutcome {
  const empty: ParseOutcome = { ok: false, items: [], delivered: 0, upgradesQueued: 0, background: Promise.resolve() };
  let doc: FeedDocument | null = null;
  let started = false;
  try {
    doc = parseFeedDocument(body);
    if (doc == null) {
      logger.warn("parser", "feed 解析失败：没有根元素", { source: ctx.sourceName });
      settleEmpty(ctx, sink);
      return empty;
    }
    const cdnEnabled = isCdnExtractEnabled();
    const { items, siteIcon } = collectItems(doc, ctx, deps, cdnEnabled);
    doc.release();

    started = true;
    const delivered = deliver(items, ctx, sink);
    logger.debug("parser", `解析完成：${items.length} 条，投递 ${delivered} 条`, { source: ctx.sourceName, root: doc.rootName });

    const background: Promise<unknown>[] = [];
    if (ctx.categoryId === deps.config.categories.aggregation && siteIcon && deps.sources != null) {
      background.push(updateSiteFavicon(deps.sources, ctx.sourceName, siteIcon));
    }
    const shown = items.filter((item) => matchesSearch(item, ctx.searchQuery));
    const upgrades = queueUpgrades(shown, ctx, sink, deps, cdnEnabled);
    background.push(...upgrades);

    return {
      ok: true,
      items,
      delivered,
      siteIcon,
      upgradesQueued: upgrades.length,
      background: Promise.all(background).then(() => undefined),
    };
  } catch (err) {
    logger.warn("parser", "feed 解析/投递异常", { source: ctx.sourceName, err: errMessage(err) });
    if (!started) settleEmpty(ctx, sink);
    return empty;
  } finally {
    if (doc != null && !doc.released) doc.release();
  }
}
