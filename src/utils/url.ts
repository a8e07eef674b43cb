// URL 与字符串工具：协议补全、实体解码、图片/追踪像素/缩略图特征判断，供 image 与 parser 共用


const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".webp", ".gif"];
const IMAGE_KEYWORDS = ["jpg", "jpeg", "png", "webp", "gif"];
const TRACKING_MARKERS = ["tracking", "pixel", "1x1"];
const THUMBNAIL_MARKERS = ["_thm.", "/thumb/", "/thumbnail/"];


/** 协议相对 URL（//host/path）补全为 https */
export function upgradeProtocolRelative(url: string): string {
  return url.startsWith("//") ? `https:${url}` : url;
}


/** 协议相对与 http 一律改为 https */
export function forceHttps(url: string): string {
  const u = upgradeProtocolRelative(url);
  if (u.startsWith("http:")) return `https:${u.slice(5)}`;
  return u;
}


/** 仅解码 &amp;，feed 属性里最常见的转义 */
export function decodeAmp(s: string): string {
  return s.replace(/&amp;/g, "&");
}


/** 候选图片 URL 统一清洗：协议补全 + &amp; 解码 */
export function cleanCandidateUrl(url: string): string {
  return upgradeProtocolRelative(decodeAmp(url.trim()));
}


/** 解码常见 HTML 实体（&amp; &lt; &gt; &quot;） */
export function decodeHtmlEntities(s: string): string {
  return s
    .replace(/&amp;/g, "&")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, "\"");
}


/** 最小化百分号解码，仅处理 : / ? = & 五个字符，其余保持原样 */
export function decodeMinimalPercent(s: string): string {
  return s
    .replace(/%3A/g, ":")
    .replace(/%2F/g, "/")
    .replace(/%3F/g, "?")
    .replace(/%3D/g, "=")
    .replace(/%26/g, "&");
}


export function isHttpUrl(url: string): boolean {
  return url.startsWith("http://") || url.startsWith("https://");
}


/** 以图片扩展名结尾（忽略大小写） */
export function hasImageExtension(url: string): boolean {
  const lower = url.toLowerCase();
  return IMAGE_EXTENSIONS.some((ext) => lower.endsWith(ext));
}


/** 含图片格式关键字（比扩展名宽松，允许出现在路径或参数中） */
export function looksLikeImage(url: string): boolean {
  const lower = url.toLowerCase();
  return IMAGE_KEYWORDS.some((k) => lower.includes(k));
}


/** 追踪像素 / 1x1 占位图 */
export function isTrackingUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return TRACKING_MARKERS.some((m) => lower.includes(m));
}


/** 路径看起来是缩略图 */
export function isThumbnailUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return THUMBNAIL_MARKERS.some((m) => lower.includes(m));
}


/** 日志里截断过长 URL */
export function truncate(s: string, max = 80): string {
  return s.length > max ? `${s.slice(0, max)}...` : s;
}
