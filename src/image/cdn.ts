// 已知图片 CDN（BBC ichef）的 URL 规整：把尺寸片段改写为大图规格，去掉限制尺寸的查询参数

import { logger, errMessage } from "../logger/index.js";
import { decodeAmp, forceHttps } from "../utils/url.js";


/** 判定 URL 属于该 CDN / 站点的主机特征 */
const CDN_HOST_MARKERS = ["bbc.", "bbci.co.uk"];


/** 页面中直接出现的 CDN 图片地址 */
export const CDN_IMAGE_HOST_PATTERN = /https?:\/\/ichef\.bbci\.co\.[a-z]+\/[^"'\s]+/;


/** 有序改写规则：彼此独立，依次作用在上一步结果上；每条替换结果再次匹配时保持不变 */
const REWRITES: ReadonlyArray<readonly [RegExp, string]> = [
  [/\/news\/\d+\//g, "/news/1024/"],
  [/\/\d+x\d+\/(?!cpsprodpb)/g, "/1024x576/"],
  [/\/ace\/standard\/\d+\//g, "/ace/standard/1024/"],
  [/\/ace\/(?:thumbnail|thumb|standard)\/\d+\//g, "/ace/standard/1024/"],
  [/\/(?:resize|preview)\/\d+x\d+\/(?!cpsprodpb)/g, "/resize/1024x576/"],
];

const CPS_PATH = /\/news\/(?:[^/]+\/)*cpsprodpb\//;
const NEWS_WITHOUT_SIZE = /\/news\/(?!1024\/)/g;
const SMALL_SEGMENT = /\/(?:thumb|thumbnail|small|crop)\//g;


/** URL 是否属于已知 CDN / 站点 */
export function isKnownCdnUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return CDN_HOST_MARKERS.some((m) => lower.includes(m));
}


/** 规整为大图 URL；不匹配任何规则时原样返回（仅做 https 与 &amp; 清洗），内部异常返回原始输入 */
export function normalizeKnownCdn(url: string): string {
  try {
    let u = forceHttps(decodeAmp(url));
    for (const [pattern, replacement] of REWRITES) {
      u = u.replace(pattern, replacement);
    }
    // cpsprodpb 路径缺尺寸片段时补 /news/1024/
    if (CPS_PATH.test(u)) {
      u = u.replace(NEWS_WITHOUT_SIZE, "/news/1024/");
    }
    u = u.replace(SMALL_SEGMENT, "/1024x576/");
    const q = u.indexOf("?");
    if (q >= 0) u = u.slice(0, q);
    return u;
  } catch (err) {
    logger.debug("image", "CDN 规整失败，保留原 URL", { url, err: errMessage(err) });
    return url;
  }
}
