// CDN 高清图补图：JSON-LD image → 页面中首个 srcset/data-src/src 图片 → ichef 直链，结果强制 https

import { parse } from "node-html-parser";
import { CDN_IMAGE_HOST_PATTERN, selectLargestFromSrcset } from "../image/index.js";
import type { ImageCandidate } from "../image/index.js";
import { logger, errMessage } from "../logger/index.js";
import { decodeAmp, forceHttps, isHttpUrl, looksLikeImage, truncate, upgradeProtocolRelative } from "../utils/url.js";
import { createEnricher } from "./run.js";
import type { EnrichDeps, EnrichFn, EnrichResult } from "./types.js";


const IMAGE_ATTR = /(srcset|data-srcset|data-src|src)=["']([^"']+)["']/g;


/** JSON-LD 的 image 取值：字符串、{ url }、或二者组成的数组 */
function imageFromValue(v: unknown): string | undefined {
  if (typeof v === "string") return v.trim() || undefined;
  if (Array.isArray(v)) {
    for (const entry of v) {
      const found = imageFromValue(entry);
      if (found != null) return found;
    }
    return undefined;
  }
  if (v != null && typeof v === "object" && "url" in v && typeof v.url === "string") {
    return v.url.trim() || undefined;
  }
  return undefined;
}


/** 深度优先找第一个 image 字段（兼容 @graph 与数组包裹） */
function findJsonLdImage(node: unknown): string | undefined {
  if (Array.isArray(node)) {
    for (const entry of node) {
      const found = findJsonLdImage(entry);
      if (found != null) return found;
    }
    return undefined;
  }
  if (node == null || typeof node !== "object") return undefined;
  for (const [key, value] of Object.entries(node)) {
    if (key === "image") {
      const found = imageFromValue(value);
      if (found != null) return found;
    }
  }
  for (const value of Object.values(node)) {
    if (value != null && typeof value === "object") {
      const found = findJsonLdImage(value);
      if (found != null) return found;
    }
  }
  return undefined;
}


function fromJsonLd(html: string, articleUrl: string): ImageCandidate | undefined {
  const scripts = parse(html).querySelectorAll('script[type="application/ld+json"]');
  for (const script of scripts) {
    let data: unknown;
    try {
      data = JSON.parse(script.rawText);
    } catch (err) {
      logger.debug("enrich", "JSON-LD 解析失败，跳过该块", { source_url: articleUrl, err: errMessage(err) });
      continue;
    }
    const found = findJsonLdImage(data);
    if (found != null) return { url: found, priority: "json-ld" };
  }
  return undefined;
}


/** 相对地址按文章 URL 解析；解析后不是 http(s) 的返回 undefined */
function absoluteImageUrl(url: string, articleUrl: string): string | undefined {
  const candidate = upgradeProtocolRelative(decodeAmp(url));
  if (isHttpUrl(candidate)) return candidate;
  try {
    const resolved = new URL(candidate, articleUrl);
    return resolved.protocol === "http:" || resolved.protocol === "https:" ? resolved.href : undefined;
  } catch (err) {
    logger.debug("enrich", "图片地址无法解析，跳过", { source_url: articleUrl, url: truncate(url), err: errMessage(err) });
    return undefined;
  }
}


/** 文档顺序中第一个可用的图片属性；srcset 取最大宽度项 */
function fromImageAttributes(html: string, articleUrl: string): ImageCandidate | undefined {
  for (const m of html.matchAll(IMAGE_ATTR)) {
    const attr = (m[1] ?? "").toLowerCase();
    const value = m[2] ?? "";
    const isSrcset = attr.endsWith("srcset");
    const raw = isSrcset ? selectLargestFromSrcset(value) : value;
    if (!raw || raw.startsWith("data:") || !looksLikeImage(raw)) continue;
    const url = absoluteImageUrl(raw, articleUrl);
    if (url == null) continue;
    return { url, priority: isSrcset ? "srcset-selected" : "src-attribute" };
  }
  return undefined;
}


function fromHostPattern(html: string): ImageCandidate | undefined {
  const url = CDN_IMAGE_HOST_PATTERN.exec(html)?.[0];
  return url != null ? { url, priority: "cdn-pattern" } : undefined;
}


export function resolveCdnHighRes(html: string, articleUrl: string): EnrichResult | undefined {
  const best = fromJsonLd(html, articleUrl) ?? fromImageAttributes(html, articleUrl) ?? fromHostPattern(html);
  if (best == null) return undefined;
  const image = forceHttps(decodeAmp(best.url));
  logger.debug("enrich", `CDN 高清图命中：${best.priority}`, { source_url: articleUrl, image: truncate(image) });
  return { title: articleUrl, image };
}


export function createCdnHighResFetcher(deps: EnrichDeps): EnrichFn {
  return createEnricher("CDN 高清图", resolveCdnHighRes, deps);
}
