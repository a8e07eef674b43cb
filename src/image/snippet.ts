// HTML 片段取图：RSS description / content:encoded 等字段里的 <a href> 与 src/srcset 启发式扫描，不做 DOM 解析

import { logger } from "../logger/index.js";
import {
  cleanCandidateUrl,
  decodeHtmlEntities,
  decodeMinimalPercent,
  isHttpUrl,
  isThumbnailUrl,
  isTrackingUrl,
  looksLikeImage,
  truncate,
  upgradeProtocolRelative,
} from "../utils/url.js";
import { selectLargestFromSrcset } from "./srcset.js";
import type { ImageCandidate } from "./types.js";


const HREF_TO_IMAGE = /href=["']([^"']+\.(?:jpg|jpeg|png|webp|gif))["']/i;
const IMAGE_ATTR = /(src|data-src|srcset|data-srcset)=["']([^"']+)["']/g;
const MIN_URL_LENGTH = 20;


/** 第一遍：<a href> 直接指向图片文件（常见于高清原图链接 + 低清 <img> 的写法） */
function findHrefCandidate(html: string): string | undefined {
  const m = HREF_TO_IMAGE.exec(html);
  if (!m?.[1]) return undefined;
  const url = cleanCandidateUrl(m[1]);
  if (isTrackingUrl(url) || isThumbnailUrl(url)) return undefined;
  if (url.length < MIN_URL_LENGTH || !isHttpUrl(url)) return undefined;
  return url;
}


/** srcset 类属性取最大宽度项；解析不出时取第一项的 URL 部分 */
function resolveSrcsetValue(value: string): string {
  const largest = selectLargestFromSrcset(value);
  if (largest != null) return largest;
  const first = value.split(",")[0]?.trim() ?? "";
  const space = first.indexOf(" ");
  return space > 0 ? first.slice(0, space) : first;
}


/** 实体解码 + 最小百分号解码 + 协议补全 */
function decodeAttrUrl(value: string): string {
  return upgradeProtocolRelative(decodeMinimalPercent(decodeHtmlEntities(value)));
}


/**
 * 从 HTML 片段中挑出最具代表性的图片及其来源标签。
 * srcset 命中立即返回；否则在 href 候选与 src 候选间取舍：仅当 src 候选像缩略图时选 href。
 */
export function resolveImageCandidate(html: string): ImageCandidate | undefined {
  const hrefCandidate = findHrefCandidate(html);
  let srcCandidate: string | undefined;
  let thumbnailFallback: string | undefined;

  for (const m of html.matchAll(IMAGE_ATTR)) {
    const attrName = (m[1] ?? "").toLowerCase();
    const rawValue = m[2] ?? "";
    const isSrcset = attrName.endsWith("srcset");
    const url = decodeAttrUrl(isSrcset ? resolveSrcsetValue(rawValue) : rawValue);

    if (url.toLowerCase().startsWith("data:") || url.length < MIN_URL_LENGTH) continue;
    if (isTrackingUrl(url) || !looksLikeImage(url) || !isHttpUrl(url)) continue;

    if (isSrcset) {
      logger.debug("image", "片段取图：命中 srcset", { url: truncate(url) });
      return { url, priority: "srcset-selected" };
    }
    if (isThumbnailUrl(url)) {
      thumbnailFallback ??= url;
    } else {
      srcCandidate ??= url;
    }
  }

  const src = srcCandidate ?? thumbnailFallback;
  if (hrefCandidate != null && src != null && isThumbnailUrl(src)) {
    logger.debug("image", "片段取图：src 为缩略图，改用 href", { url: truncate(hrefCandidate) });
    return { url: hrefCandidate, priority: "href-to-file" };
  }
  if (src != null) return { url: src, priority: "src-attribute" };
  if (hrefCandidate != null) return { url: hrefCandidate, priority: "href-to-file" };
  return undefined;
}


/** 从 HTML 片段中提取图片 URL，找不到返回 undefined */
export function extractFromHtmlSnippet(html: string): string | undefined {
  return resolveImageCandidate(html)?.url;
}
