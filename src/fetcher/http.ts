// 基于全局 fetch 的文本拉取：超时用 AbortSignal.timeout，任何失败都折叠成结果而非异常

import { logger } from "../logger/index.js";
import type { HttpClient, HttpTextResult, RequestConfig } from "./types.js";


const DEFAULT_TIMEOUT_MS = 15000;

const FEED_USER_AGENT = "feedline/1.0";
const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

const DNS_ERROR = /ENOTFOUND|EAI_AGAIN|getaddrinfo|could not resolve/i;


/** feed 拉取请求头 */
export function feedHeaders(): Record<string, string> {
  return {
    "User-Agent": FEED_USER_AGENT,
    Accept: "application/rss+xml, application/atom+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8",
  };
}


/** 文章页请求头：模拟浏览器，部分站点对非浏览器 UA 返回精简页面 */
export function browserHeaders(): Record<string, string> {
  return {
    "User-Agent": BROWSER_USER_AGENT,
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "Accept-Language": "en-GB,en;q=0.9",
    "Cache-Control": "no-cache",
  };
}


/** 2xx 视为成功 */
export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}


/** 传输错误消息是否为域名解析失败 */
export function isDnsError(message: string | undefined): boolean {
  return message != null && DNS_ERROR.test(message);
}


/** undici 的 "fetch failed" 把真实原因放在 cause 里 */
function describeFetchError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause;
  if (cause instanceof Error) {
    const code = "code" in cause && typeof cause.code === "string" ? ` (${cause.code})` : "";
    return `${err.message}: ${cause.message}${code}`;
  }
  return err.message;
}


/** GET 文本；传输失败返回 statusCode 0 与 errorMessage，从不抛出 */
export async function fetchText(url: string, config: RequestConfig = {}): Promise<HttpTextResult> {
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  try {
    const res = await fetch(url, {
      headers: config.headers ?? feedHeaders(),
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs),
    });
    const body = await res.text();
    return { statusCode: res.status, body, finalUrl: res.url || url };
  } catch (err) {
    const errorMessage = describeFetchError(err);
    logger.debug("feeder", "HTTP 请求失败", { source_url: url, err: errorMessage });
    return { statusCode: 0, body: "", finalUrl: url, errorMessage };
  }
}


/** 默认客户端：直接走全局 fetch */
export const defaultHttpClient: HttpClient = { fetchText };
