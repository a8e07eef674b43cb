// Open Graph 补图：文章页 og:image（必需，去缩放参数）与 og:title，标题依次退回首个 <h1> 与文章 URL

import { parse } from "node-html-parser";
import type { HTMLElement } from "node-html-parser";
import { stripResizeParams } from "../image/index.js";
import type { ImageCandidate } from "../image/index.js";
import { cleanCandidateUrl } from "../utils/url.js";
import { createEnricher } from "./run.js";
import type { EnrichDeps, EnrichFn, EnrichResult } from "./types.js";


/** property= 与 name= 两种写法都认 */
function metaContent(root: HTMLElement, key: string): string | undefined {
  const el = root.querySelector(`meta[property="${key}"]`) ?? root.querySelector(`meta[name="${key}"]`);
  const content = el?.getAttribute("content")?.trim();
  return content ? content : undefined;
}


/** og:image 常带 CMS 的缩放参数，去掉后取原图 */
function ogImage(root: HTMLElement): ImageCandidate | undefined {
  const content = metaContent(root, "og:image");
  if (content == null) return undefined;
  return { url: stripResizeParams(cleanCandidateUrl(content)), priority: "og-tag" };
}


export function resolveOpenGraph(html: string, articleUrl: string): EnrichResult | undefined {
  const root = parse(html);
  const image = ogImage(root);
  if (image == null) return undefined;
  const title = metaContent(root, "og:title") || root.querySelector("h1")?.text.trim() || articleUrl;
  return { title, image: image.url };
}


export function createOpenGraphFetcher(deps: EnrichDeps): EnrichFn {
  return createEnricher("Open Graph", resolveOpenGraph, deps);
}
