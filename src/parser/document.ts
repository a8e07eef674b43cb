// 加固的 XML 解析：fast-xml-parser 只做字符串解析，不联网、不展开自定义实体、不校验；命名空间前缀按根元素声明解析

import { XMLParser } from "fast-xml-parser";
import { prepareFeedBody } from "./sanitize.js";


/** 解析树中的元素：属性以 "@_" 前缀存放，文本在 "#text" */
export type XmlNode = Record<string, unknown>;


export const NS_MEDIA = "http://search.yahoo.com/mrss/";
export const NS_CONTENT = "http://purl.org/rss/1.0/modules/content/";

/** 根元素未声明时按惯用前缀兜底 */
const CONVENTIONAL_PREFIXES: Record<string, string> = {
  [NS_MEDIA]: "media",
  [NS_CONTENT]: "content",
};


const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  removeNSPrefix: false,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  processEntities: true,
  htmlEntities: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
});


export function isXmlNode(v: unknown): v is XmlNode {
  return v != null && typeof v === "object" && !Array.isArray(v);
}


/** 重复元素解析为数组，单个为对象/字符串，缺失为 undefined：统一成数组 */
export function asArray(v: unknown): unknown[] {
  if (v == null) return [];
  return Array.isArray(v) ? v : [v];
}


/** 元素文本：纯文本节点直接返回，带属性的节点取 "#text" */
export function textOf(v: unknown): string | undefined {
  if (typeof v === "string") return v;
  if (typeof v === "number" || typeof v === "boolean") return String(v);
  if (Array.isArray(v)) return textOf(v[0]);
  if (isXmlNode(v)) return textOf(v["#text"]);
  return undefined;
}


/** 读取属性值 */
export function attrOf(v: unknown, name: string): string | undefined {
  if (!isXmlNode(v)) return undefined;
  const a = v[`@_${name}`];
  return typeof a === "string" ? a : undefined;
}


/** 子元素集合（保持文档顺序，重复元素展开） */
export function childrenOf(node: XmlNode, names: readonly string[]): unknown[] {
  return names.flatMap((n) => asArray(node[n]));
}


/** 已解析的 feed 文档；release 后不可再访问，多次 release 只生效一次 */
export class FeedDocument {
  private tree: XmlNode | null;
  private readonly prefixes = new Map<string, string[]>();
  readonly rootName: string;

  constructor(rootName: string, root: XmlNode) {
    this.rootName = rootName;
    this.tree = root;
    for (const [key, value] of Object.entries(root)) {
      if (!key.startsWith("@_xmlns:") || typeof value !== "string") continue;
      const prefix = key.slice("@_xmlns:".length);
      const list = this.prefixes.get(value) ?? [];
      list.push(prefix);
      this.prefixes.set(value, list);
    }
  }

  get root(): XmlNode {
    if (this.tree == null) throw new Error("FeedDocument 已释放");
    return this.tree;
  }

  get released(): boolean {
    return this.tree == null;
  }

  /** 命名空间 URI + 本地名 → 可能出现的限定名（声明的前缀优先，惯用前缀兜底） */
  qualified(nsUri: string, localName: string): string[] {
    const names = (this.prefixes.get(nsUri) ?? []).map((p) => `${p}:${localName}`);
    const fallback = CONVENTIONAL_PREFIXES[nsUri];
    if (fallback != null) {
      const conventional = `${fallback}:${localName}`;
      if (!names.includes(conventional)) names.push(conventional);
    }
    return names;
  }

  release(): void {
    this.tree = null;
    this.prefixes.clear();
  }
}


/**
 * 预处理并解析 feed 正文。解析器异常向上抛出，由调用方记录；
 * 没有根元素（空文档、纯文本）时返回 null。
 */
export function parseFeedDocument(body: string | Uint8Array): FeedDocument | null {
  const parsed: unknown = parser.parse(prepareFeedBody(body));
  if (!isXmlNode(parsed)) return null;
  for (const [key, value] of Object.entries(parsed)) {
    if (key.startsWith("?") || key.startsWith("#")) continue;
    // 空根元素（<rss/>）解析为空串；重复根元素取第一个
    const root = asArray(value)[0];
    return new FeedDocument(key, isXmlNode(root) ? root : {});
  }
  return null;
}
