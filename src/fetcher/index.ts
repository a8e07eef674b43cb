// HTTP 拉取：全局 fetch + 超时，不抛异常，失败以 statusCode 0 表示
export { fetchText, feedHeaders, browserHeaders, isDnsError, isSuccessStatus, defaultHttpClient } from "./http.js";
export type { HttpClient, HttpTextResult, RequestConfig } from "./types.js";
