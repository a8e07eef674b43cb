// 条目提取：Atom / RSS 2.0 / RSS 1.0 共用同一套 title、link、缩略图规则

import { extractFromHtmlSnippet } from "../image/index.js";
import { cleanCandidateUrl, hasImageExtension } from "../utils/url.js";
import type { FeedItem } from "../types/feedItem.js";
import {
  NS_CONTENT,
  NS_MEDIA,
  asArray,
  attrOf,
  childrenOf,
  isXmlNode,
  textOf,
} from "./document.js";
import type { FeedDocument, XmlNode } from "./document.js";


const ITEM_TAGS = ["item", "entry"] as const;


/** 根元素直接包含条目（Atom、RSS 1.0）时条目取自根，否则取自 channel / feed 容器 */
export function itemContainers(doc: FeedDocument): XmlNode[] {
  const root = doc.root;
  if (childrenOf(root, ITEM_TAGS).length > 0) return [root];
  return childrenOf(root, ["channel", "feed"]).filter(isXmlNode);
}


export function itemNodes(container: XmlNode): XmlNode[] {
  return childrenOf(container, ITEM_TAGS).filter(isXmlNode);
}


/** 条目链接：Atom href 优先 rel="alternate" 或无 rel，其次第一个 href；RSS 取元素文本 */
export function extractLink(item: XmlNode): string | undefined {
  let firstHref: string | undefined;
  let textLink: string | undefined;
  for (const link of asArray(item.link)) {
    const href = attrOf(link, "href")?.trim();
    if (href) {
      const rel = attrOf(link, "rel");
      if (rel == null || rel === "alternate") return href;
      firstHref ??= href;
      continue;
    }
    const text = textOf(link)?.trim();
    if (text) textLink ??= text;
  }
  return firstHref ?? textLink;
}


/** media:content 是否为图片：type 以 image 开头、medium="image" 或扩展名是图片 */
function isImageMediaContent(node: unknown, url: string): boolean {
  const type = attrOf(node, "type");
  if (type != null && type.toLowerCase().startsWith("image")) return true;
  if (attrOf(node, "medium") === "image") return true;
  return hasImageExtension(url);
}


function firstUrlAttr(nodes: unknown[], accept?: (node: unknown, url: string) => boolean): string | undefined {
  for (const node of nodes) {
    const url = attrOf(node, "url")?.trim();
    if (url && (accept == null || accept(node, url))) return url;
  }
  return undefined;
}


function snippetImage(nodes: unknown[]): string | undefined {
  for (const node of nodes) {
    const html = textOf(node);
    if (!html) continue;
    const found = extractFromHtmlSnippet(html);
    if (found != null) return found;
  }
  return undefined;
}


/**
 * 缩略图按优先级取第一个命中：enclosure → media:thumbnail → 图片型 media:content
 * （后两者也查 media:group）→ description 片段 → Atom content / summary 片段 → content:encoded 片段。
 */
export function extractThumbnail(doc: FeedDocument, item: XmlNode): string | undefined {
  const groups = childrenOf(item, doc.qualified(NS_MEDIA, "group")).filter(isXmlNode);
  const scopes = [item, ...groups];
  const thumbnailTags = doc.qualified(NS_MEDIA, "thumbnail");
  const contentTags = doc.qualified(NS_MEDIA, "content");

  const candidate =
    firstUrlAttr(asArray(item.enclosure)) ??
    firstUrlAttr(scopes.flatMap((s) => childrenOf(s, thumbnailTags))) ??
    firstUrlAttr(scopes.flatMap((s) => childrenOf(s, contentTags)), isImageMediaContent) ??
    snippetImage(asArray(item.description)) ??
    snippetImage(asArray(item.content)) ??
    snippetImage(asArray(item.summary)) ??
    snippetImage(childrenOf(item, doc.qualified(NS_CONTENT, "encoded")));
  return candidate != null ? cleanCandidateUrl(candidate) : undefined;
}


/** 单条目 → FeedItem；缺 title 或 link 返回 undefined */
export function extractItem(doc: FeedDocument, item: XmlNode): FeedItem | undefined {
  const title = textOf(item.title)?.trim();
  const link = extractLink(item);
  if (!title || !link) return undefined;
  const thumbnail = extractThumbnail(doc, item);
  return thumbnail != null ? { title, link, thumbnail } : { title, link };
}


/** 站点图标：<image><url> 或 <link rel="icon" href>，Atom 的 <icon> / <logo> 兜底 */
export function extractSiteIcon(doc: FeedDocument): string | undefined {
  const scopes = [doc.root, ...childrenOf(doc.root, ["channel", "feed"]).filter(isXmlNode)];
  for (const scope of scopes) {
    for (const image of asArray(scope.image)) {
      if (!isXmlNode(image)) continue;
      const url = textOf(image.url)?.trim();
      if (url) return cleanCandidateUrl(url);
    }
    for (const link of asArray(scope.link)) {
      const href = attrOf(link, "href")?.trim();
      if (href && attrOf(link, "rel") === "icon") return cleanCandidateUrl(href);
    }
  }
  for (const scope of scopes) {
    const icon = textOf(scope.icon)?.trim() || textOf(scope.logo)?.trim();
    if (icon) return cleanCandidateUrl(icon);
  }
  return undefined;
}
